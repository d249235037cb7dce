import { existsSync, mkdirSync, readFileSync } from 'fs';
import { appendFile } from 'fs/promises';
import { dirname } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { GATE_VERSION } from '../types/index.js';
import type { AuditDraft, AuditRecord, AuditSink, AuditVerification } from '../types/index.js';
import { HashChain } from './hasher.js';
import { loadKeyPair, signAuditRecord, verifyAuditSignature, type KeyPair } from './signer.js';

const gateStateSchema = z.enum([
  'generated',
  'classified',
  'auto_approved',
  'pending_confirmation',
  'approved',
  'denied',
  'failed',
  'logged'
]);

export const auditRecordSchema = z
  .object({
    event_id: z.string(),
    sequence: z.number().int().nonnegative(),
    timestamp: z.string(),
    threat_id: z.string(),
    recommendation: z.string(),
    destructive: z.boolean(),
    approved: z.boolean(),
    notes: z.string().nullable(),
    mode: z.enum(['single', 'batch']),
    prior_confirmation: z.boolean(),
    outcome: z.enum(['approved', 'denied', 'failed']),
    error_code: z.string().optional(),
    transitions: z.array(gateStateSchema),
    prev_hash: z.string(),
    hash: z.string(),
    gate_version: z.string(),
    signature: z.string().optional()
  })
  .strict();

export function sealRecord(
  draft: AuditDraft,
  sequence: number,
  chain: HashChain,
  privateKey?: string
): AuditRecord {
  const { decision } = draft;

  const body = {
    event_id: uuidv4(),
    sequence,
    timestamp: decision.timestamp,
    threat_id: decision.threat_id,
    recommendation: decision.recommendation,
    destructive: decision.destructive,
    approved: decision.approved,
    notes: decision.notes,
    mode: draft.mode,
    prior_confirmation: draft.prior_confirmation,
    outcome: draft.outcome,
    error_code: draft.error_code,
    transitions: [...draft.transitions, 'logged' as const],
    prev_hash: chain.getCurrentHash(),
    gate_version: GATE_VERSION
  };

  const { hash } = chain.link(body);
  const record: AuditRecord = { ...body, hash };

  if (privateKey) {
    record.signature = signAuditRecord(record, privateKey);
  }

  return record;
}

export function verifyRecords(records: AuditRecord[], publicKey?: string): string[] {
  const errors: string[] = [];
  let prevHash = new HashChain().getCurrentHash();

  records.forEach((record, i) => {
    const { hash, signature, ...body } = record;

    if (record.prev_hash !== prevHash) {
      errors.push(`Record ${i}: Chain broken - expected prev_hash ${prevHash}, got ${record.prev_hash}`);
    }
    if (!HashChain.verifyRecord(body, hash, record.prev_hash)) {
      errors.push(`Record ${i}: Hash mismatch`);
    }
    if (publicKey) {
      if (!signature) {
        errors.push(`Record ${i}: Missing signature`);
      } else if (!verifyAuditSignature(record, signature, publicKey)) {
        errors.push(`Record ${i}: Invalid signature`);
      }
    }

    prevHash = hash;
  });

  return errors;
}

function parseLine(line: string): AuditRecord | undefined {
  try {
    const parsed = auditRecordSchema.safeParse(JSON.parse(line));
    return parsed.success ? parsed.data : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Append-only JSONL audit log. Each line is one sealed record carrying the
 * hash of its predecessor, and an Ed25519 signature when a key pair exists
 * in `keyDir`.
 *
 * Appends are queued, so concurrent decisions never interleave within a line
 * and the chain head only moves after the line is on disk.
 */
export class AuditLog implements AuditSink {
  private logPath: string;
  private keyPair: KeyPair | null;
  private chain: HashChain;
  private sequence: number;
  private tail: Promise<void> = Promise.resolve();

  constructor(logPath: string, keyDir?: string) {
    this.logPath = logPath;
    this.keyPair = keyDir ? loadKeyPair(keyDir) : null;

    // Ensure directory exists
    const dir = dirname(logPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true, mode: 0o700 });
    }

    // Resume the chain from the last readable record, or genesis
    const lines = this.readLines();
    let last: AuditRecord | undefined;
    for (let i = lines.length - 1; i >= 0 && !last; i--) {
      last = parseLine(lines[i]);
    }

    this.chain = new HashChain(last?.hash);
    this.sequence = last ? last.sequence + 1 : 0;
  }

  private readLines(): string[] {
    if (!existsSync(this.logPath)) return [];

    return readFileSync(this.logPath, 'utf-8').split('\n').filter(Boolean);
  }

  append(draft: AuditDraft): Promise<AuditRecord> {
    const run = this.tail.then(() => this.write(draft));
    // The caller observes a failure through `run`; the queue itself moves on.
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async write(draft: AuditDraft): Promise<AuditRecord> {
    const record = sealRecord(draft, this.sequence, this.chain, this.keyPair?.privateKey);

    await appendFile(this.logPath, JSON.stringify(record) + '\n', { encoding: 'utf-8', mode: 0o600 });

    this.chain.advance(record.hash);
    this.sequence++;
    return record;
  }

  verify(): AuditVerification {
    const lines = this.readLines();
    const records: AuditRecord[] = [];
    const errors: string[] = [];

    lines.forEach((line, i) => {
      const record = parseLine(line);
      if (record) {
        records.push(record);
      } else {
        errors.push(`Record ${i}: Invalid record`);
      }
    });

    if (errors.length === 0) {
      errors.push(...verifyRecords(records, this.keyPair?.publicKey));
    }

    return {
      valid: errors.length === 0,
      count: lines.length,
      errors
    };
  }

  getPath(): string {
    return this.logPath;
  }
}
