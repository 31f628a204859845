import type { CurationReport } from './curation-report';

export type CurationJobStatus = 'pending' | 'processing' | 'completed' | 'failed';

/**
 * One PDF moving through parse, refine and curate
 *
 * Jobs live in a map owned by the caller, keyed by jobId.
 */
export interface CurationJob {
  jobId: string;
  filename: string;
  filePath: string;
  status: CurationJobStatus;

  /**
   * 0-100
   */
  progress: number;

  markdown?: string;
  qualityScore?: number;
  qualityDetails?: CurationReport;
  error?: string;
  createdAt: Date;
  completedAt?: Date;
}
