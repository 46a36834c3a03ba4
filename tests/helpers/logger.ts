import pino, { type Logger } from 'pino';
import { z } from 'zod';

const lineSchema = z
  .object({
    level: z.number(),
    msg: z.string().optional(),
  })
  .passthrough();

export type LogLine = z.infer<typeof lineSchema>;

export const LEVEL = { debug: 20, info: 30, warn: 40, error: 50 } as const;

export interface CaptureLogger {
  log: Logger;
  lines: LogLine[];
  /** Messages logged at exactly `level`. */
  messages(level: keyof typeof LEVEL): string[];
}

/**
 * Real pino logger writing JSON lines into memory, so tests can assert on
 * what was logged without stubbing the logger.
 */
export function captureLogger(): CaptureLogger {
  const lines: LogLine[] = [];
  const log = pino(
    { level: 'debug' },
    {
      write(msg: string) {
        lines.push(lineSchema.parse(JSON.parse(msg)));
      },
    },
  );
  return {
    log,
    lines,
    messages: (level) => lines.filter((l) => l.level === LEVEL[level]).map((l) => l.msg ?? ''),
  };
}
