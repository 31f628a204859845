import type { LoggerMethods } from '@silverforge/logger';
import type {
  CurationJob,
  CurationRecordStore,
  CurationReport,
  MarkdownSource,
} from '@silverforge/model';

import { ConcurrentPool } from '@silverforge/shared';
import { existsSync } from 'node:fs';

import { CURATION_JOB } from '../config/constants';
import {
  CurationError,
  CurationJobNotFoundError,
} from '../errors/curation-error';

/**
 * Anything that can curate refined Markdown, typically a Curator
 */
export interface DocumentCurator {
  curate(markdown: string, reference?: string): Promise<CurationReport>;

  /**
   * Called once at the end of processAll()
   */
  logTokenUsage?(): void;
}

export interface CurationJobRunnerOptions {
  logger: LoggerMethods;

  /**
   * Turns a PDF into refined Markdown, typically a PDFParser
   */
  source: MarkdownSource;

  curator: DocumentCurator;

  /**
   * Completed jobs are saved here when ownerId is also given
   */
  recordStore?: CurationRecordStore;
  ownerId?: string;

  /**
   * Jobs processed at once by processAll() (default: 1)
   */
  concurrency?: number;

  /**
   * Stops processAll() from starting further jobs
   */
  abortSignal?: AbortSignal;

  /**
   * Called after every status or progress change
   */
  onProgress?: (job: CurationJob) => void;
}

const { PROGRESS } = CURATION_JOB;

/**
 * CurationJobRunner
 *
 * Drives jobs from a caller-owned map through parse, curate and save:
 * pending → processing → completed | failed. A failing job records its
 * error and never affects other jobs.
 */
export class CurationJobRunner {
  private readonly logger: LoggerMethods;
  private readonly source: MarkdownSource;
  private readonly curator: DocumentCurator;
  private readonly recordStore?: CurationRecordStore;
  private readonly ownerId?: string;
  private readonly concurrency: number;
  private readonly abortSignal?: AbortSignal;
  private readonly onProgress?: (job: CurationJob) => void;

  constructor(options: CurationJobRunnerOptions) {
    this.logger = options.logger;
    this.source = options.source;
    this.curator = options.curator;
    this.recordStore = options.recordStore;
    this.ownerId = options.ownerId;
    this.concurrency = options.concurrency ?? CURATION_JOB.DEFAULT_CONCURRENCY;
    this.abortSignal = options.abortSignal;
    this.onProgress = options.onProgress;
  }

  /**
   * Run one pending job; jobs in any other status are returned untouched
   *
   * @throws {CurationJobNotFoundError} When jobId is not in the map
   */
  async process(
    jobs: Map<string, CurationJob>,
    jobId: string,
  ): Promise<CurationJob> {
    const job = jobs.get(jobId);
    if (!job) {
      throw new CurationJobNotFoundError(jobId);
    }

    if (job.status !== 'pending') {
      this.logger.info(
        `[CurationJobRunner] Skipping ${jobId}: status is ${job.status}`,
      );
      return job;
    }

    job.status = 'processing';
    job.error = undefined;
    this.setProgress(job, PROGRESS.STARTED);

    try {
      if (!existsSync(job.filePath)) {
        throw new CurationError('Source file not found');
      }
      this.setProgress(job, PROGRESS.SOURCE_READY);

      this.logger.info(`[CurationJobRunner] Parsing ${job.filename}...`);
      const markdown = await this.source.process(job.filePath);
      this.setProgress(job, PROGRESS.PARSED);

      this.setProgress(job, PROGRESS.CURATING);
      const report = await this.curator.curate(markdown);
      this.setProgress(job, PROGRESS.CURATED);

      job.markdown = markdown;
      job.qualityScore = report.overallScore;
      job.qualityDetails = report;

      await this.saveRecord(job, markdown, report);

      job.status = 'completed';
      job.completedAt = new Date();
      this.setProgress(job, PROGRESS.COMPLETED);

      this.logger.info(
        `[CurationJobRunner] Completed ${job.filename}: score=${report.overallScore}`,
      );
    } catch (error) {
      job.status = 'failed';
      job.error = CurationError.getErrorMessage(error);
      this.setProgress(job, 0);

      this.logger.error(
        `[CurationJobRunner] Failed ${job.filename}: ${job.error}`,
      );
    }

    return job;
  }

  /**
   * Run every pending job in the map
   *
   * @returns The jobs that were pending when the call started
   */
  async processAll(jobs: Map<string, CurationJob>): Promise<CurationJob[]> {
    const pending = [...jobs.values()].filter(
      (job) => job.status === 'pending',
    );

    this.logger.info(
      `[CurationJobRunner] Processing ${pending.length} pending jobs (concurrency: ${this.concurrency})`,
    );

    let finished = 0;
    await ConcurrentPool.run(
      pending,
      this.concurrency,
      (job) => this.process(jobs, job.jobId),
      (job) => {
        finished++;
        this.logger.info(
          `[CurationJobRunner] ${finished}/${pending.length} ${job.filename}: ${job.status}`,
        );
      },
      this.abortSignal,
    );

    const count = (status: CurationJob['status']) =>
      pending.filter((job) => job.status === status).length;
    this.logger.info(
      `[CurationJobRunner] Finished: ${count('completed')} completed, ${count('failed')} failed`,
    );
    this.curator.logTokenUsage?.();

    return pending;
  }

  /**
   * A failed save is logged; the curation result is kept on the job
   */
  private async saveRecord(
    job: CurationJob,
    markdown: string,
    report: CurationReport,
  ): Promise<void> {
    if (!this.recordStore || !this.ownerId) {
      return;
    }

    try {
      await this.recordStore.save({
        ownerId: this.ownerId,
        filename: job.filename,
        markdown,
        qualityScore: report.overallScore,
        qualityDetails: report,
      });
    } catch (error) {
      this.logger.error(
        `[CurationJobRunner] Could not save ${job.filename}: ${CurationError.getErrorMessage(error)}`,
      );
    }
  }

  private setProgress(job: CurationJob, progress: number): void {
    job.progress = progress;
    this.onProgress?.(job);
  }
}
