/**
 * Utility functions for comparing short texts
 */

function normalize(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, ' ');
}

function bigrams(text: string): Map<string, number> {
  const grams = new Map<string, number>();
  for (let i = 0; i < text.length - 1; i++) {
    const gram = text.slice(i, i + 2);
    grams.set(gram, (grams.get(gram) ?? 0) + 1);
  }
  return grams;
}

/**
 * Dice coefficient over character bigrams, ignoring case and runs of whitespace
 * @returns a score between 0 (nothing shared) and 1 (identical)
 * @example
 * textSimilarity('night', 'nacht') // returns 0.25
 */
export function textSimilarity(a: string, b: string): number {
  const left = normalize(a);
  const right = normalize(b);

  if (!left || !right) {
    return 0;
  }
  if (left === right) {
    return 1;
  }
  if (left.length < 2 || right.length < 2) {
    return 0;
  }

  const leftGrams = bigrams(left);
  let overlap = 0;
  for (const [gram, count] of bigrams(right)) {
    overlap += Math.min(count, leftGrams.get(gram) ?? 0);
  }
  return (2 * overlap) / (left.length - 1 + (right.length - 1));
}
