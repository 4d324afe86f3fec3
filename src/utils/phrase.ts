const WORD = String.raw`[\p{L}\p{N}_]`;

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Case-insensitive pattern for a whole phrase: the match may not start or
 * end inside a word, whatever the script.
 */
export function phraseRegExp(phrase: string, flags = 'giu'): RegExp {
  return new RegExp(`(?<!${WORD})${escapeRegExp(phrase)}(?!${WORD})`, flags);
}

export function containsPhrase(text: string, phrase: string): boolean {
  const trimmed = phrase.trim();
  return trimmed.length > 0 && phraseRegExp(trimmed, 'iu').test(text);
}
