import type { AuditDraft, AuditRecord, AuditSink, AuditVerification } from '../types/index.js';
import { sealRecord, verifyRecords } from './audit-log.js';
import { HashChain } from './hasher.js';

export class MemoryAuditLog implements AuditSink {
  private readonly records: AuditRecord[] = [];
  private readonly chain = new HashChain();

  async append(draft: AuditDraft): Promise<AuditRecord> {
    const record = sealRecord(draft, this.records.length, this.chain);
    this.records.push(record);
    this.chain.advance(record.hash);
    return record;
  }

  verify(): AuditVerification {
    const errors = verifyRecords(this.records);
    return { valid: errors.length === 0, count: this.records.length, errors };
  }

  list(): readonly AuditRecord[] {
    return this.records;
  }

  findByThreat(threatId: string): AuditRecord[] {
    return this.records.filter(record => record.threat_id === threatId);
  }
}
