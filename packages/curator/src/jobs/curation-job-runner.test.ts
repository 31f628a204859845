import type { LoggerMethods } from '@silverforge/logger';
import type {
  CurationJob,
  CurationRecordStore,
  CurationReport,
} from '@silverforge/model';

import { existsSync } from 'node:fs';
import { type Mock, beforeEach, describe, expect, test, vi } from 'vitest';

import { CurationJobNotFoundError } from '../errors/curation-error';
import { InMemoryCurationRecordStore } from '../stores/in-memory-curation-record-store';
import { createCurationJob } from './curation-job';
import { CurationJobRunner } from './curation-job-runner';

vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
}));

const mockExistsSync = existsSync as Mock;

const report: CurationReport = {
  pass: true,
  textQuality: { charCount: 7, wordCount: 2, pass: true },
  structureQuality: {
    headingCount: { h1: 1, h2: 0, h3: 0, h4: 0 },
    headingOrderValid: true,
    tableCount: 0,
    tableValid: true,
    equationCount: 0,
    equationValid: true,
    issues: [],
    pass: true,
  },
  semanticQuality: {
    structureScore: 8,
    completenessScore: 8,
    coherenceScore: 8,
    overallScore: 75,
    issues: [],
    recommendation: '',
    pass: true,
  },
  overallScore: 95,
  recommendation: 'Usable: all checks passed',
};

describe('CurationJobRunner', () => {
  let mockLogger: LoggerMethods;
  let source: { process: Mock };
  let curator: { curate: Mock };
  let jobs: Map<string, CurationJob>;

  beforeEach(() => {
    vi.clearAllMocks();
    mockLogger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    };
    source = { process: vi.fn().mockResolvedValue('# Paper') };
    curator = { curate: vi.fn().mockResolvedValue(report) };
    jobs = new Map();
    mockExistsSync.mockReturnValue(true);
  });

  describe('process', () => {
    test('completes a pending job', async () => {
      const job = createCurationJob(jobs, 'paper.pdf', '/uploads/paper.pdf');
      const runner = new CurationJobRunner({
        logger: mockLogger,
        source,
        curator,
      });

      const result = await runner.process(jobs, job.jobId);

      expect(result).toBe(job);
      expect(source.process).toHaveBeenCalledWith('/uploads/paper.pdf');
      expect(curator.curate).toHaveBeenCalledWith('# Paper');
      expect(job.status).toBe('completed');
      expect(job.progress).toBe(100);
      expect(job.markdown).toBe('# Paper');
      expect(job.qualityScore).toBe(95);
      expect(job.qualityDetails).toBe(report);
      expect(job.completedAt).toBeInstanceOf(Date);
      expect(job.error).toBeUndefined();
    });

    test('reports progress milestones in order', async () => {
      const job = createCurationJob(jobs, 'paper.pdf', '/uploads/paper.pdf');
      const seen: Array<[string, number]> = [];
      const runner = new CurationJobRunner({
        logger: mockLogger,
        source,
        curator,
        onProgress: (j) => seen.push([j.status, j.progress]),
      });

      await runner.process(jobs, job.jobId);

      expect(seen).toEqual([
        ['processing', 10],
        ['processing', 20],
        ['processing', 60],
        ['processing', 70],
        ['processing', 90],
        ['completed', 100],
      ]);
    });

    test('throws for an unknown job id', async () => {
      const runner = new CurationJobRunner({
        logger: mockLogger,
        source,
        curator,
      });

      await expect(runner.process(jobs, 'job_missing')).rejects.toThrow(
        CurationJobNotFoundError,
      );
      await expect(runner.process(jobs, 'job_missing')).rejects.toThrow(
        'Curation job not found: job_missing',
      );
    });

    test('fails the job when the source file is missing', async () => {
      mockExistsSync.mockReturnValue(false);
      const job = createCurationJob(jobs, 'gone.pdf', '/uploads/gone.pdf');
      const runner = new CurationJobRunner({
        logger: mockLogger,
        source,
        curator,
      });

      await runner.process(jobs, job.jobId);

      expect(job.status).toBe('failed');
      expect(job.error).toBe('Source file not found');
      expect(job.progress).toBe(0);
      expect(source.process).not.toHaveBeenCalled();
    });

    test('fails the job when parsing throws', async () => {
      source.process.mockRejectedValue(
        new Error('Document Parse API error: 500 - boom'),
      );
      const job = createCurationJob(jobs, 'paper.pdf', '/uploads/paper.pdf');
      const runner = new CurationJobRunner({
        logger: mockLogger,
        source,
        curator,
      });

      await runner.process(jobs, job.jobId);

      expect(job.status).toBe('failed');
      expect(job.error).toBe('Document Parse API error: 500 - boom');
      expect(job.progress).toBe(0);
      expect(curator.curate).not.toHaveBeenCalled();
      expect(mockLogger.error).toHaveBeenCalledWith(
        '[CurationJobRunner] Failed paper.pdf: Document Parse API error: 500 - boom',
      );
    });

    test('does not rerun jobs that are not pending', async () => {
      const job = createCurationJob(jobs, 'paper.pdf', '/uploads/paper.pdf');
      job.status = 'completed';
      const runner = new CurationJobRunner({
        logger: mockLogger,
        source,
        curator,
      });

      const result = await runner.process(jobs, job.jobId);

      expect(result.status).toBe('completed');
      expect(source.process).not.toHaveBeenCalled();
    });

    test('saves a record when a store and owner are given', async () => {
      const recordStore = new InMemoryCurationRecordStore();
      const job = createCurationJob(jobs, 'paper.pdf', '/uploads/paper.pdf');
      const runner = new CurationJobRunner({
        logger: mockLogger,
        source,
        curator,
        recordStore,
        ownerId: 'user-1',
      });

      await runner.process(jobs, job.jobId);

      const records = await recordStore.listByOwner('user-1');
      expect(records).toHaveLength(1);
      expect(records[0]).toMatchObject({
        ownerId: 'user-1',
        filename: 'paper.pdf',
        markdown: '# Paper',
        qualityScore: 95,
        qualityDetails: report,
      });
    });

    test('does not save without an owner', async () => {
      const recordStore = new InMemoryCurationRecordStore();
      const job = createCurationJob(jobs, 'paper.pdf', '/uploads/paper.pdf');
      const runner = new CurationJobRunner({
        logger: mockLogger,
        source,
        curator,
        recordStore,
      });

      await runner.process(jobs, job.jobId);

      expect(job.status).toBe('completed');
      expect(await recordStore.listByOwner('user-1')).toEqual([]);
    });

    test('keeps the job completed when saving fails', async () => {
      const recordStore: CurationRecordStore = {
        save: vi.fn().mockRejectedValue(new Error('db offline')),
        listByOwner: vi.fn(),
        get: vi.fn(),
        delete: vi.fn(),
      };
      const job = createCurationJob(jobs, 'paper.pdf', '/uploads/paper.pdf');
      const runner = new CurationJobRunner({
        logger: mockLogger,
        source,
        curator,
        recordStore,
        ownerId: 'user-1',
      });

      await runner.process(jobs, job.jobId);

      expect(job.status).toBe('completed');
      expect(mockLogger.error).toHaveBeenCalledWith(
        '[CurationJobRunner] Could not save paper.pdf: db offline',
      );
    });
  });

  describe('processAll', () => {
    test('runs only pending jobs and isolates failures', async () => {
      const ok = createCurationJob(jobs, 'ok.pdf', '/uploads/ok.pdf');
      const bad = createCurationJob(jobs, 'bad.pdf', '/uploads/bad.pdf');
      const done = createCurationJob(jobs, 'done.pdf', '/uploads/done.pdf');
      done.status = 'completed';
      source.process.mockImplementation(async (path: string) => {
        if (path === '/uploads/bad.pdf') throw new Error('parse failed');
        return '# Paper';
      });
      const runner = new CurationJobRunner({
        logger: mockLogger,
        source,
        curator,
      });

      const processed = await runner.processAll(jobs);

      expect(processed).toEqual([ok, bad]);
      expect(ok.status).toBe('completed');
      expect(bad.status).toBe('failed');
      expect(bad.error).toBe('parse failed');
      expect(source.process).toHaveBeenCalledTimes(2);
      expect(mockLogger.info).toHaveBeenCalledWith(
        '[CurationJobRunner] Finished: 1 completed, 1 failed',
      );
    });

    test('logs each finished job and the curator token usage', async () => {
      createCurationJob(jobs, 'ok.pdf', '/uploads/ok.pdf');
      createCurationJob(jobs, 'bad.pdf', '/uploads/bad.pdf');
      source.process.mockImplementation(async (path: string) => {
        if (path === '/uploads/bad.pdf') throw new Error('parse failed');
        return '# Paper';
      });
      const logTokenUsage = vi.fn();
      const runner = new CurationJobRunner({
        logger: mockLogger,
        source,
        curator: { curate: curator.curate, logTokenUsage },
      });

      await runner.processAll(jobs);

      expect(mockLogger.info).toHaveBeenCalledWith(
        '[CurationJobRunner] 1/2 ok.pdf: completed',
      );
      expect(mockLogger.info).toHaveBeenCalledWith(
        '[CurationJobRunner] 2/2 bad.pdf: failed',
      );
      expect(logTokenUsage).toHaveBeenCalledTimes(1);
    });

    test('processes one job at a time by default', async () => {
      createCurationJob(jobs, 'a.pdf', '/uploads/a.pdf');
      createCurationJob(jobs, 'b.pdf', '/uploads/b.pdf');
      let active = 0;
      let maxActive = 0;
      source.process.mockImplementation(async () => {
        active++;
        maxActive = Math.max(maxActive, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active--;
        return '# Paper';
      });
      const runner = new CurationJobRunner({
        logger: mockLogger,
        source,
        curator,
      });

      await runner.processAll(jobs);

      expect(maxActive).toBe(1);
    });

    test('starts no jobs once aborted', async () => {
      const job = createCurationJob(jobs, 'a.pdf', '/uploads/a.pdf');
      const controller = new AbortController();
      controller.abort();
      const runner = new CurationJobRunner({
        logger: mockLogger,
        source,
        curator,
        abortSignal: controller.signal,
      });

      await runner.processAll(jobs);

      expect(job.status).toBe('pending');
      expect(source.process).not.toHaveBeenCalled();
    });
  });
});
