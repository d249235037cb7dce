import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  AuditLog,
  GENESIS_HASH,
  generateKeyPair,
  saveKeyPair,
  verifyAuditSignature
} from '../src/crypto/index.js';
import type { AuditDraft } from '../src/types/index.js';

function draft(threatId: string, approved = true): AuditDraft {
  return {
    decision: {
      threat_id: threatId,
      recommendation: 'Isolate the host.',
      destructive: false,
      approved,
      notes: null,
      timestamp: '2026-01-15T10:00:00.000Z'
    },
    mode: 'single',
    prior_confirmation: false,
    outcome: approved ? 'approved' : 'failed',
    transitions: ['generated', 'classified', 'auto_approved', 'approved']
  };
}

describe('AuditLog', () => {
  let dir: string;
  let logPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'remediation-gate-'));
    logPath = join(dir, 'logs', 'audit.jsonl');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const lines = () => readFileSync(logPath, 'utf-8').split('\n').filter(Boolean);

  it('appends one chained JSON line per record', async () => {
    const log = new AuditLog(logPath);

    const first = await log.append(draft('t-1'));
    const second = await log.append(draft('t-2'));

    expect(lines()).toHaveLength(2);
    expect(JSON.parse(lines()[0])).toEqual(first);
    expect(first.sequence).toBe(0);
    expect(first.prev_hash).toBe(GENESIS_HASH);
    expect(first.transitions).toEqual(['generated', 'classified', 'auto_approved', 'approved', 'logged']);
    expect(second.sequence).toBe(1);
    expect(second.prev_hash).toBe(first.hash);
    expect(log.verify()).toEqual({ valid: true, count: 2, errors: [] });
  });

  it('serializes concurrent appends into whole lines', async () => {
    const log = new AuditLog(logPath);

    const records = await Promise.all(Array.from({ length: 20 }, (_, i) => log.append(draft(`t-${i}`))));

    expect(records.map(record => record.sequence)).toEqual(Array.from({ length: 20 }, (_, i) => i));
    expect(lines()).toHaveLength(20);
    expect(lines().map(line => JSON.parse(line).threat_id)).toEqual(records.map(record => record.threat_id));
    expect(log.verify().valid).toBe(true);
  });

  it('detects an edited record', async () => {
    const log = new AuditLog(logPath);
    await log.append(draft('t-1', false));
    await log.append(draft('t-2'));

    const [first, second] = lines();
    writeFileSync(logPath, first.replace('"approved":false', '"approved":true') + '\n' + second + '\n');

    expect(log.verify()).toEqual({ valid: false, count: 2, errors: ['Record 0: Hash mismatch'] });
  });

  it('detects a removed record', async () => {
    const log = new AuditLog(logPath);
    await log.append(draft('t-1'));
    await log.append(draft('t-2'));
    await log.append(draft('t-3'));

    const [first, , third] = lines();
    writeFileSync(logPath, `${first}\n${third}\n`);

    const result = log.verify();
    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatch(/^Record 1: Chain broken/);
  });

  it('flags lines that are not audit records', async () => {
    const log = new AuditLog(logPath);
    await log.append(draft('t-1'));
    writeFileSync(logPath, lines()[0] + '\nnot json\n');

    expect(log.verify()).toEqual({ valid: false, count: 2, errors: ['Record 1: Invalid record'] });
  });

  it('resumes the chain when reopened', async () => {
    const first = new AuditLog(logPath);
    const last = await first.append(draft('t-1'));

    const reopened = new AuditLog(logPath);
    const next = await reopened.append(draft('t-2'));

    expect(next.sequence).toBe(1);
    expect(next.prev_hash).toBe(last.hash);
    expect(reopened.verify().valid).toBe(true);
  });

  it('signs records when a key pair is present', async () => {
    const keyDir = join(dir, 'keys');
    const keyPair = generateKeyPair();
    saveKeyPair(keyDir, keyPair);

    const log = new AuditLog(logPath, keyDir);
    const record = await log.append(draft('t-1'));

    expect(record.signature).toBeDefined();
    expect(verifyAuditSignature(record, record.signature ?? '', keyPair.publicKey)).toBe(true);
    expect(log.verify().valid).toBe(true);
  });

  it('rejects the append when the file cannot be written and keeps the queue moving', async () => {
    const blocker = join(dir, 'not-a-dir');
    writeFileSync(blocker, '');
    const log = new AuditLog(join(blocker, 'audit.jsonl'));

    await expect(log.append(draft('t-1'))).rejects.toThrow();
    await expect(log.append(draft('t-2'))).rejects.toThrow();
  });
});
