const COMBINING_MARKS = /[\u0300-\u036f]/g;
const NON_WORD_RUN = /[^\p{L}\p{N}]+/gu;

/** Case-fold, strip accents, collapse punctuation and whitespace to single spaces. */
export function normalizeText(text: string): string {
  return text
    .normalize("NFD")
    .replace(COMBINING_MARKS, "")
    .toLowerCase()
    .replace(NON_WORD_RUN, " ")
    .trim();
}

/**
 * Whole-word containment on normalized text: both sides are single-space
 * separated, so padding with spaces gives word boundaries for multi-word phrases.
 */
export function containsPhrase(normalizedText: string, normalizedPhrase: string): boolean {
  if (normalizedPhrase === "" || normalizedText === "") {
    return false;
  }
  return ` ${normalizedText} `.includes(` ${normalizedPhrase} `);
}

export function countWords(normalizedPhrase: string): number {
  return normalizedPhrase === "" ? 0 : normalizedPhrase.split(" ").length;
}
