import type { CurationJob } from '@silverforge/model';

import { randomUUID } from 'node:crypto';
import { parse } from 'node:path';

import { CURATION_JOB } from '../config/constants';

/**
 * Register a pending job in a caller-owned job map
 */
export function createCurationJob(
  jobs: Map<string, CurationJob>,
  filename: string,
  filePath: string,
): CurationJob {
  const job: CurationJob = {
    jobId: `job_${randomUUID()}`,
    filename,
    filePath,
    status: 'pending',
    progress: 0,
    createdAt: new Date(),
  };

  jobs.set(job.jobId, job);
  return job;
}

/**
 * Name of the Markdown file produced for an uploaded PDF
 *
 * @example getResultFilename('paper.pdf') // 'paper_silver.md'
 */
export function getResultFilename(filename: string): string {
  return `${parse(filename).name}${CURATION_JOB.RESULT_SUFFIX}`;
}
