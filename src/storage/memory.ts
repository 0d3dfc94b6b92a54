/**
 * In-memory revocation storage for tests and single-process use.
 */

import type { RevocationRecord, RevocationStorage } from '../core/types.js';

export class MemoryRevocationStorage implements RevocationStorage {
  private records = new Map<string, RevocationRecord>();

  async getRevocation(userId: string): Promise<RevocationRecord | null> {
    const record = this.records.get(userId);
    return record ? { ...record } : null;
  }

  async saveRevocation(record: RevocationRecord): Promise<void> {
    this.records.set(record.userId, { ...record });
  }

  async listRevocations(): Promise<RevocationRecord[]> {
    return Array.from(this.records.values(), r => ({ ...r }))
      .sort((a, b) => (a.userId < b.userId ? -1 : a.userId > b.userId ? 1 : 0));
  }
}
