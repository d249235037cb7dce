import { describe, expect, it } from 'vitest';
import {
  AuditWriteError,
  ConfirmationRequired,
  GenerationError,
  GenerationTimeout,
  InputError
} from '../src/errors.js';
import { MemoryAuditLog } from '../src/crypto/index.js';
import { ApprovalGate, CONFIRMED_NOTE, DENIAL_NOTE } from '../src/gate/approval-gate.js';
import type { AuditSink, ThreatRecord } from '../src/types/index.js';
import type { GenerationBackend } from '../src/inference/router.js';
import {
  DESTRUCTIVE_TEXT,
  FailingAuditSink,
  SAFE_TEXT,
  fixedClock,
  scriptedBackend,
  silentLogger,
  type Reply
} from './helpers.js';

const ransomware: ThreatRecord = { threat_id: 'malware-001', description: 'ransomware encrypting /home' };
const adware: ThreatRecord = { threat_id: 'adware-002', description: 'browser toolbar' };

function makeGate(
  replies: Record<string, Reply>,
  auditLog: AuditSink = new MemoryAuditLog(),
  backend: GenerationBackend = scriptedBackend(replies)
): ApprovalGate {
  return new ApprovalGate({ backend, auditLog, logger: silentLogger, timeoutMs: 50, clock: fixedClock });
}

describe('ApprovalGate', () => {
  it('auto-approves non-destructive advice whatever the confirmation flag', async () => {
    const audit = new MemoryAuditLog();
    const gate = makeGate({ 'adware-002': SAFE_TEXT }, audit);

    const unconfirmed = await gate.decide(adware, { priorConfirmation: false });
    const confirmed = await gate.decide(adware, { priorConfirmation: true });

    for (const decision of [unconfirmed, confirmed]) {
      expect(decision).toEqual({
        threat_id: 'adware-002',
        recommendation: SAFE_TEXT,
        destructive: false,
        approved: true,
        notes: null,
        timestamp: '2026-01-15T10:00:00.000Z'
      });
    }

    expect(audit.list()).toHaveLength(2);
    expect(audit.list()[0].transitions).toEqual(['generated', 'classified', 'auto_approved', 'approved', 'logged']);
    expect(audit.list()[0].outcome).toBe('approved');
  });

  it('denies a destructive recommendation without prior confirmation and logs the denial', async () => {
    const audit = new MemoryAuditLog();
    const gate = makeGate({ 'malware-001': DESTRUCTIVE_TEXT }, audit);

    const error = await gate.decide(ransomware, { priorConfirmation: false }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfirmationRequired);
    expect(error instanceof ConfirmationRequired && error.decision).toEqual({
      threat_id: 'malware-001',
      recommendation: DESTRUCTIVE_TEXT,
      destructive: true,
      approved: false,
      notes: DENIAL_NOTE,
      timestamp: '2026-01-15T10:00:00.000Z'
    });

    const [entry] = audit.list();
    expect(audit.list()).toHaveLength(1);
    expect(entry.threat_id).toBe('malware-001');
    expect(entry.approved).toBe(false);
    expect(entry.outcome).toBe('denied');
    expect(entry.error_code).toBe('CONFIRMATION_REQUIRED');
    expect(entry.transitions).toEqual(['generated', 'classified', 'pending_confirmation', 'denied', 'logged']);
  });

  it('approves a destructive recommendation with prior confirmation', async () => {
    const audit = new MemoryAuditLog();
    const gate = makeGate({ 'malware-001': DESTRUCTIVE_TEXT }, audit);

    const decision = await gate.decide(ransomware, { priorConfirmation: true });

    expect(decision.destructive).toBe(true);
    expect(decision.approved).toBe(true);
    expect(decision.notes).toBe(CONFIRMED_NOTE);
    expect(audit.list()).toHaveLength(1);
    expect(audit.list()[0].prior_confirmation).toBe(true);
    expect(audit.list()[0].transitions).toEqual([
      'generated',
      'classified',
      'pending_confirmation',
      'approved',
      'logged'
    ]);
  });

  it('logs and surfaces a backend failure before classification', async () => {
    const audit = new MemoryAuditLog();
    const gate = makeGate({ 'malware-001': new Error('connect ECONNREFUSED 127.0.0.1:11434') }, audit);

    await expect(gate.decide(ransomware, { priorConfirmation: true })).rejects.toThrow(
      new GenerationError('connect ECONNREFUSED 127.0.0.1:11434')
    );

    const [entry] = audit.list();
    expect(audit.list()).toHaveLength(1);
    expect(entry).toMatchObject({
      threat_id: 'malware-001',
      recommendation: '',
      destructive: false,
      approved: false,
      notes: 'connect ECONNREFUSED 127.0.0.1:11434',
      outcome: 'failed',
      error_code: 'GENERATION_ERROR',
      transitions: ['failed', 'logged']
    });
  });

  it('times out a slow backend and aborts its request', async () => {
    const audit = new MemoryAuditLog();
    let aborted = false;
    const backend: GenerationBackend = {
      generate: (_prompt, signal) =>
        new Promise<string>((_, reject) => {
          signal?.addEventListener('abort', () => {
            aborted = true;
            reject(new Error('aborted'));
          });
        })
    };
    const gate = makeGate({}, audit, backend);

    const error = await gate.decide(ransomware, { priorConfirmation: false }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationTimeout);
    expect(error).toBeInstanceOf(GenerationError);
    expect(aborted).toBe(true);
    expect(audit.list()[0].notes).toBe('Generation timed out after 50ms');
    expect(audit.list()[0].error_code).toBe('GENERATION_TIMEOUT');
  });

  it('clamps an oversized timeout instead of expiring at once', async () => {
    const gate = new ApprovalGate({
      backend: scriptedBackend({ 'adware-002': { delayMs: 20, text: SAFE_TEXT } }),
      auditLog: new MemoryAuditLog(),
      logger: silentLogger,
      timeoutMs: 3_000_000_000,
      clock: fixedClock
    });

    const decision = await gate.decide(adware, { priorConfirmation: false });

    expect(decision.approved).toBe(true);
    expect(decision.recommendation).toBe(SAFE_TEXT);
  });

  it('treats an empty recommendation as a generation failure', async () => {
    const audit = new MemoryAuditLog();
    const gate = makeGate({ 'adware-002': '   ' }, audit);

    await expect(gate.decide(adware, { priorConfirmation: false })).rejects.toThrow(
      'Backend returned an empty recommendation'
    );
    expect(audit.list()[0].approved).toBe(false);
  });

  it('logs unserializable input as a failed attempt', async () => {
    const audit = new MemoryAuditLog();
    const backend = scriptedBackend({});
    const gate = makeGate({}, audit, backend);

    await expect(
      gate.decide({ threat_id: 'bad-1', additional_info: { score: Infinity } }, { priorConfirmation: false })
    ).rejects.toBeInstanceOf(InputError);

    expect(backend.calls).toHaveLength(0);
    expect(audit.list()).toHaveLength(1);
    expect(audit.list()[0].error_code).toBe('INPUT_ERROR');
  });

  it('never reports an approval when the audit log cannot be written', async () => {
    const sink = new FailingAuditSink();
    const gate = makeGate({ 'adware-002': SAFE_TEXT }, sink);

    await expect(gate.decide(adware, { priorConfirmation: true })).rejects.toThrow(
      new AuditWriteError('Audit log write failed: disk full')
    );
    expect(sink.attempts).toBe(1);
  });

  it('gives the same outcome for the same threat and text', async () => {
    const gate = makeGate({ 'malware-001': DESTRUCTIVE_TEXT });

    const first = await gate.decide(ransomware, { priorConfirmation: true });
    const second = await gate.decide(ransomware, { priorConfirmation: true });

    expect(second).toEqual(first);
  });

  it('returns a frozen record detached from the audit copy', async () => {
    const audit = new MemoryAuditLog();
    const gate = makeGate({}, audit);

    const decision = await gate.decide(adware, { priorConfirmation: false });

    expect(Object.isFrozen(decision)).toBe(true);
    expect(audit.list()[0]).not.toBe(decision);
    expect(audit.verify()).toEqual({ valid: true, count: 1, errors: [] });
  });

  it('records the decision mode', async () => {
    const audit = new MemoryAuditLog();
    const gate = makeGate({}, audit);

    await gate.decide(adware, { priorConfirmation: false, mode: 'batch' });

    expect(audit.list()[0].mode).toBe('batch');
  });
});
