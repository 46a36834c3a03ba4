import { readFileSync } from 'node:fs';
import { z } from 'zod';

const intentsFile = new URL('../../data/user-intents.json', import.meta.url);

/** Voice intent names, indexed by the wire intent id. */
export const USER_INTENTS: readonly string[] = z
  .array(z.string().min(1))
  .parse(JSON.parse(readFileSync(intentsFile, 'utf-8')));

export function userIntentName(intentId: number): string {
  return USER_INTENTS[intentId] ?? 'unknown';
}
