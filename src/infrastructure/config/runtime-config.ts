import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

/**
 * Runtime configuration schema. Every key has a default, so an empty or
 * missing file yields a complete config.
 */
export const runtimeConfigSchema = z.object({
  world: z
    .object({
      visibility_timeout_ms: z.coerce.number().int().positive().default(800),
    })
    .default({}),
  completion: z
    .object({
      quiet_interval_ms: z.coerce.number().int().nonnegative().default(250),
    })
    .default({}),
  stream: z
    .object({
      redis_url: z.string().min(1).default('redis://localhost:6379'),
      key: z.string().min(1).default('robot_events'),
      group: z.string().min(1).default('world_runtime'),
      consumer: z.string().min(1).default('runtime-1'),
      block_ms: z.coerce.number().int().positive().default(5000),
      batch_size: z.coerce.number().int().positive().default(100),
    })
    .default({}),
  relay: z
    .object({
      enabled: z.boolean().default(true),
      channel: z.string().min(1).default('world_events'),
    })
    .default({}),
  http: z
    .object({
      host: z.string().min(1).default('0.0.0.0'),
      port: z.coerce.number().int().min(0).max(65535).default(3000),
    })
    .default({}),
  log: z
    .object({
      level: z.enum(LOG_LEVELS).default('info'),
    })
    .default({}),
});

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>;

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = runtimeConfigSchema.parse({});

/** Invalid overrides are ignored rather than failing startup. */
const envSchema = z.object({
  REDIS_URL: z.string().min(1).optional().catch(undefined),
  HOST: z.string().min(1).optional().catch(undefined),
  PORT: z.coerce.number().int().min(0).max(65535).optional().catch(undefined),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional().catch(undefined),
  WORKER_ID: z.string().min(1).optional().catch(undefined),
});

/**
 * Minimal YAML reader for the flat runtime config structure.
 *
 * Handles only what config/runtime.yaml uses: top-level section keys with
 * indented `key: scalar` lines. Not a general-purpose YAML parser.
 */
export function parseSimpleYaml(content: string): Record<string, Record<string, unknown>> {
  const result: Record<string, Record<string, unknown>> = {};
  let section: Record<string, unknown> | null = null;

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trimEnd();
    if (line.trim() === '' || line.trimStart().startsWith('#')) continue;

    const colonIdx = line.indexOf(':');
    if (colonIdx === -1) continue;
    const key = line.slice(0, colonIdx).trim();

    // Top-level key (no leading whitespace)
    if (!line.startsWith(' ') && !line.startsWith('\t')) {
      section = {};
      result[key] = section;
      continue;
    }

    if (section !== null) section[key] = parseScalar(line.slice(colonIdx + 1).trim());
  }

  return result;
}

function parseScalar(raw: string): unknown {
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  if (raw.length >= 2 && (raw.startsWith('"') || raw.startsWith("'")) && raw.endsWith(raw.charAt(0))) {
    return raw.slice(1, -1);
  }
  return raw;
}

function readConfigFile(filePath: string): Record<string, Record<string, unknown>> | null {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch {
    return null;
  }
  return parseSimpleYaml(content);
}

/**
 * Loads runtime configuration from YAML, then applies environment overrides.
 *
 * Falls back to DEFAULT_RUNTIME_CONFIG if the file is missing or any value
 * in it is invalid.
 */
export function loadRuntimeConfig(
  configPath?: string,
  env: Record<string, string | undefined> = process.env,
): RuntimeConfig {
  const filePath = configPath ?? resolve(process.cwd(), 'config', 'runtime.yaml');
  const sections = readConfigFile(filePath) ?? {};
  const parsed = runtimeConfigSchema.safeParse(sections);
  const base = parsed.success ? parsed.data : DEFAULT_RUNTIME_CONFIG;

  const overrides = envSchema.parse(env);
  return {
    ...base,
    stream: {
      ...base.stream,
      redis_url: overrides.REDIS_URL ?? base.stream.redis_url,
      consumer: overrides.WORKER_ID ?? base.stream.consumer,
    },
    http: {
      host: overrides.HOST ?? base.http.host,
      port: overrides.PORT ?? base.http.port,
    },
    log: {
      level: overrides.LOG_LEVEL ?? base.log.level,
    },
  };
}
