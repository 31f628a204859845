import type { TextQualityReport } from '@silverforge/model';

import type { TextComparator } from '../comparators/text-comparator';

import { EditDistanceComparator } from '../comparators/edit-distance-comparator';
import { TEXT_QUALITY } from '../config/constants';

/**
 * Count characters and words of a document and, given a reference text,
 * its character and word error rates.
 *
 * Without a reference (or with a whitespace-only one) nothing can be
 * compared and the report passes.
 *
 * @param comparator - Computes CER/WER (default: EditDistanceComparator)
 */
export function evaluateTextQuality(
  markdown: string,
  reference?: string,
  comparator: TextComparator = new EditDistanceComparator(),
): TextQualityReport {
  const report: TextQualityReport = {
    charCount: [...markdown].length,
    wordCount: markdown.split(/\s+/).filter((word) => word.length > 0).length,
    pass: true,
  };

  if (reference === undefined || reference.trim() === '') {
    return report;
  }

  const { cer, wer } = comparator.compare(reference, markdown);

  return {
    ...report,
    cer,
    wer,
    pass: cer < TEXT_QUALITY.MAX_CER,
  };
}
