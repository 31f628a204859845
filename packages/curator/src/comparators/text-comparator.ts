/**
 * Character and word error rates of a hypothesis against a reference
 */
export interface ErrorRates {
  cer: number;
  wer: number;
}

/**
 * Text-comparison collaborator used by the text-quality evaluator
 */
export interface TextComparator {
  compare(reference: string, hypothesis: string): ErrorRates;
}
