import type { ErrorRates, TextComparator } from './text-comparator';

/**
 * Levenshtein distance between two token sequences
 */
function editDistance(source: readonly string[], target: readonly string[]): number {
  if (source.length === 0) return target.length;
  if (target.length === 0) return source.length;

  let previous = Array.from({ length: target.length + 1 }, (_, j) => j);

  for (let i = 1; i <= source.length; i++) {
    const current = [i];
    for (let j = 1; j <= target.length; j++) {
      const substitution = source[i - 1] === target[j - 1] ? 0 : 1;
      current[j] = Math.min(
        previous[j] + 1,
        current[j - 1] + 1,
        previous[j - 1] + substitution,
      );
    }
    previous = current;
  }

  return previous[target.length];
}

/**
 * Edit distance normalized by reference length
 *
 * An empty reference yields 0 against an empty hypothesis and 1 otherwise.
 */
function errorRate(reference: readonly string[], hypothesis: readonly string[]): number {
  if (reference.length === 0) {
    return hypothesis.length === 0 ? 0 : 1;
  }
  return editDistance(reference, hypothesis) / reference.length;
}

function toWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

/**
 * EditDistanceComparator
 *
 * CER counts code points, WER counts whitespace-separated words. Both texts
 * are trimmed first.
 */
export class EditDistanceComparator implements TextComparator {
  compare(reference: string, hypothesis: string): ErrorRates {
    const ref = reference.trim();
    const hyp = hypothesis.trim();

    return {
      cer: errorRate([...ref], [...hyp]),
      wer: errorRate(toWords(ref), toWords(hyp)),
    };
  }
}
