import type { CurationReport } from './curation-report';

/**
 * A curated document as handed to the persistence collaborator
 */
export interface CurationRecord {
  id: string;
  ownerId: string;
  filename: string;
  markdown: string;
  qualityScore: number;
  qualityDetails: CurationReport;
  createdAt: Date;
}

/**
 * Storage for curated documents, scoped by owner
 */
export interface CurationRecordStore {
  save(record: Omit<CurationRecord, 'id' | 'createdAt'>): Promise<CurationRecord>;

  /**
   * Newest first
   */
  listByOwner(ownerId: string, limit?: number): Promise<CurationRecord[]>;

  get(id: string, ownerId: string): Promise<CurationRecord | undefined>;

  /**
   * @returns Whether a record was removed
   */
  delete(id: string, ownerId: string): Promise<boolean>;
}
