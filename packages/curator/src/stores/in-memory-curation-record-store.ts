import type { CurationRecord, CurationRecordStore } from '@silverforge/model';

import { randomUUID } from 'node:crypto';

const DEFAULT_LIST_LIMIT = 50;

/**
 * CurationRecordStore kept in process memory
 *
 * Records are only visible to their owner.
 */
export class InMemoryCurationRecordStore implements CurationRecordStore {
  private readonly records = new Map<string, CurationRecord>();

  async save(
    record: Omit<CurationRecord, 'id' | 'createdAt'>,
  ): Promise<CurationRecord> {
    const saved: CurationRecord = {
      ...record,
      id: randomUUID(),
      createdAt: new Date(),
    };
    this.records.set(saved.id, saved);
    return saved;
  }

  async listByOwner(
    ownerId: string,
    limit = DEFAULT_LIST_LIMIT,
  ): Promise<CurationRecord[]> {
    // Map iterates in insertion order
    return [...this.records.values()]
      .filter((record) => record.ownerId === ownerId)
      .reverse()
      .slice(0, limit);
  }

  async get(id: string, ownerId: string): Promise<CurationRecord | undefined> {
    const record = this.records.get(id);
    return record?.ownerId === ownerId ? record : undefined;
  }

  async delete(id: string, ownerId: string): Promise<boolean> {
    if (!(await this.get(id, ownerId))) {
      return false;
    }
    return this.records.delete(id);
  }
}
