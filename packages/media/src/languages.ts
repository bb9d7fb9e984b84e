/**
 * Language table
 *
 * Names and codes recognised in file names and probe tags.
 * The table itself lives in data/languages.json.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { UNKNOWN_LANGUAGE } from './types.js';

const languageSchema = z.object({
  name: z.string().min(1),
  code: z.string().min(2),
  aliases: z.array(z.string().min(2)),
});

export type Language = z.infer<typeof languageSchema>;

function loadLanguages(): Language[] {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../data/languages.json', import.meta.url), 'utf8')
  );
  return z.array(languageSchema).parse(raw);
}

export const LANGUAGES: readonly Language[] = loadLanguages();

// Codes such as "pan" or "ben" are also ordinary title words, so file names
// are matched against aliases only. Probe tags are matched against both.
const BY_ALIAS = new Map<string, Language>();
const BY_CODE = new Map<string, Language>();
for (const language of LANGUAGES) {
  BY_CODE.set(language.code, language);
  for (const alias of language.aliases) {
    BY_ALIAS.set(alias.toLowerCase(), language);
  }
}

/**
 * Match a single file name token against the table's aliases
 */
export function matchLanguageToken(token: string): Language | undefined {
  return BY_ALIAS.get(token.toLowerCase());
}

/**
 * Match a probe language tag ("hin", "fra", "deu") against codes and aliases
 */
export function matchLanguageTag(tag: string): Language | undefined {
  const normalized = tag.toLowerCase();
  return BY_CODE.get(normalized) ?? BY_ALIAS.get(normalized);
}

/**
 * Display name for a probe language tag ("hin" → "Hindi").
 * Unrecognised tags are returned as-is; missing ones become "Unknown language".
 */
export function describeLanguage(tag: string): string {
  if (!tag || tag === UNKNOWN_LANGUAGE) {
    return 'Unknown language';
  }
  return matchLanguageTag(tag)?.name ?? tag;
}
