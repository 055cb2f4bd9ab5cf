/**
 * Keyword matching for spoken intents.
 *
 * Keywords containing Latin letters match whole words only ("send" must not
 * fire on "end"); keywords in Japanese script match anywhere, since the
 * transcript has no word separators.
 */

import type { Intent, KeywordSets } from '@parley/core';
import defaults from './keywords.json' with { type: 'json' };

export const DEFAULT_KEYWORDS: KeywordSets = {
  affirmative: [...defaults.affirmative],
  terminate: [...defaults.terminate],
  stop: [...defaults.stop],
};

/** Replace the default sets with the ones given; missing sets keep the defaults. */
export function resolveKeywords(overrides: Partial<KeywordSets> = {}): KeywordSets {
  return {
    affirmative: overrides.affirmative ?? DEFAULT_KEYWORDS.affirmative,
    terminate: overrides.terminate ?? DEFAULT_KEYWORDS.terminate,
    stop: overrides.stop ?? DEFAULT_KEYWORDS.stop,
  };
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Whether `keyword` occurs in the already lower-cased `text`. */
export function matchesKeyword(text: string, keyword: string): boolean {
  const needle = keyword.trim().toLowerCase();
  if (!needle) return false;

  if (/[a-z]/.test(needle)) {
    return new RegExp(`(?<![a-z0-9])${escapeRegExp(needle)}(?![a-z0-9])`).test(text);
  }
  return text.includes(needle);
}

export function matchesAny(text: string, keywords: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return keywords.some((k) => matchesKeyword(lower, k));
}

/**
 * Classify a transcript. Terminate keywords are checked first so that an
 * utterance containing both ("はい、終わり") never continues the loop.
 */
export function classifyTranscript(transcript: string, keywords: KeywordSets): Intent {
  const text = transcript.trim().toLowerCase();
  if (!text) return 'unknown';
  if (matchesAny(text, keywords.terminate)) return 'terminate';
  if (matchesAny(text, keywords.affirmative)) return 'affirmative';
  return 'unknown';
}
