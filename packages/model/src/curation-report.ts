/**
 * Report types produced by the quality curation pass.
 *
 * Each evaluator returns its own report; the curator combines them into a
 * CurationReport. Reports are plain data, created once per call and never
 * mutated afterwards.
 */

/**
 * Number of headings found at each depth (1-4)
 */
export interface HeadingCount {
  h1: number;
  h2: number;
  h3: number;
  h4: number;
}

/**
 * Result of the rule-based structural checks
 */
export interface StructureReport {
  headingCount: HeadingCount;

  /**
   * False when a heading is more than one level deeper than the heading before it
   */
  headingOrderValid: boolean;

  /**
   * Number of contiguous runs of table lines
   */
  tableCount: number;

  /**
   * False when a non-separator table line has a pipe count different from the first table line
   */
  tableValid: boolean;

  /**
   * Number of complete `$$` pairs
   */
  equationCount: number;

  /**
   * False when the document holds an odd number of `$$` delimiters
   */
  equationValid: boolean;

  issues: string[];
  pass: boolean;
}

/**
 * Result of the language-model judgment
 *
 * Sub-scores are nominally 1-10 and the overall score 0-100. All values come
 * from untrusted model output; a failed evaluation reports zeros.
 */
export interface SemanticReport {
  structureScore: number;
  completenessScore: number;
  coherenceScore: number;
  overallScore: number;
  issues: string[];
  recommendation: string;
  pass: boolean;

  /**
   * Raw model output, kept when it could not be parsed
   */
  rawResponse?: string;
}

/**
 * Result of the lexical checks
 *
 * Error rates are present only when a reference text was supplied.
 */
export interface TextQualityReport {
  charCount: number;
  wordCount: number;

  /**
   * Character error rate against the reference text
   */
  cer?: number;

  /**
   * Word error rate against the reference text
   */
  wer?: number;

  pass: boolean;
}

/**
 * Combined verdict over all three evaluators
 */
export interface CurationReport {
  /**
   * Logical AND of the three evaluator passes
   */
  pass: boolean;

  textQuality: TextQualityReport;
  structureQuality: StructureReport;
  semanticQuality: SemanticReport;

  /**
   * Semantic overall score plus structural and text bonuses, clamped to 0-100
   */
  overallScore: number;

  recommendation: string;
}
