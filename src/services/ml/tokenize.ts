const TOKEN_PATTERN = /\b\w\w+\b/g;

/**
 * Lower-case word tokens of two or more characters
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

/**
 * All n-grams for n in [minN, maxN], space-joined, in order of n then position
 */
export function ngrams(tokens: string[], [minN, maxN]: [number, number]): string[] {
  const terms: string[] = [];
  for (let n = Math.max(1, minN); n <= maxN; n++) {
    for (let i = 0; i + n <= tokens.length; i++) {
      terms.push(tokens.slice(i, i + n).join(' '));
    }
  }
  return terms;
}
