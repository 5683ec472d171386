/**
 * Deterministic word generation for filter tests.
 */

const ALPHABET = 'abcdefghijklmnopqrstuvwxyz';

export function lcg(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state;
  };
}

function randomWord(next: () => number, length: number): string {
  let word = '';
  for (let i = 0; i < length; i++) {
    word += ALPHABET[(next() >>> 16) % ALPHABET.length];
  }
  return word;
}

/**
 * `count` distinct lowercase words of 6-10 letters, none of them in `exclude`.
 */
export function generateWords(seed: number, count: number, exclude: ReadonlySet<string> = new Set()): string[] {
  const next = lcg(seed);
  const seen = new Set<string>();
  const words: string[] = [];
  while (words.length < count) {
    const word = randomWord(next, 6 + ((next() >>> 16) % 5));
    if (seen.has(word) || exclude.has(word)) continue;
    seen.add(word);
    words.push(word);
  }
  return words;
}
