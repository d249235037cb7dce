import type { Logger } from 'pino';
import {
  AuditWriteError,
  ConfirmationRequired,
  GateError,
  GenerationError,
  GenerationTimeout,
  describeError
} from '../errors.js';
import { isDestructive, type DestructiveClassifier } from '../classifier/index.js';
import type { GenerationBackend } from '../inference/router.js';
import { buildPrompt } from '../prompt/builder.js';
import type {
  AuditSink,
  DecisionMode,
  DecisionOutcome,
  DecisionRecord,
  GateState,
  PromptInput,
  ThreatRecord
} from '../types/index.js';

export const DENIAL_NOTE = 'Destructive action denied: caller must confirm before submission.';
export const CONFIRMED_NOTE = 'Destructive action approved on prior confirmation.';

export const DEFAULT_TIMEOUT_MS = 30_000;
// setTimeout fires after 1ms for any delay above this
export const MAX_TIMEOUT_MS = 2_147_483_647;

export interface ApprovalGateOptions {
  backend: GenerationBackend;
  auditLog: AuditSink;
  logger: Logger;
  classifier?: DestructiveClassifier;
  timeoutMs?: number;
  clock?: () => Date;
}

export interface DecisionOptions {
  // Out-of-band human approval asserted by the caller at submission time
  priorConfirmation: boolean;
  mode?: DecisionMode;
}

interface Outcome {
  recommendation: string;
  destructive: boolean;
  approved: boolean;
  notes: string | null;
  outcome: DecisionOutcome;
  transitions: GateState[];
  errorCode?: string;
}

/**
 * Single-threat decision protocol:
 *
 *   generated → classified → auto_approved → approved → logged
 *                          → pending_confirmation → approved | denied → logged
 *   (prompt or backend failure) failed → logged
 *
 * Exactly one audit record is appended, and awaited, per call to decide().
 * A destructive recommendation is only approved when the caller supplied
 * prior confirmation; there is no interactive prompt.
 */
export class ApprovalGate {
  private readonly backend: GenerationBackend;
  private readonly auditLog: AuditSink;
  private readonly logger: Logger;
  private readonly classify: DestructiveClassifier;
  private readonly timeoutMs: number;
  private readonly clock: () => Date;

  constructor(options: ApprovalGateOptions) {
    this.backend = options.backend;
    this.auditLog = options.auditLog;
    this.logger = options.logger.child({ component: 'approval-gate' });
    this.classify = options.classifier ?? isDestructive;
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.timeoutMs = Number.isFinite(timeoutMs)
      ? Math.min(Math.max(1, Math.floor(timeoutMs)), MAX_TIMEOUT_MS)
      : MAX_TIMEOUT_MS;
    this.clock = options.clock ?? (() => new Date());
  }

  async decide(threat: ThreatRecord, options: DecisionOptions): Promise<DecisionRecord> {
    const mode = options.mode ?? 'single';
    const priorConfirmation = options.priorConfirmation === true;

    let recommendation: string;
    try {
      recommendation = await this.generate(buildPrompt(threat));
    } catch (error) {
      const failure = error instanceof GateError ? error : new GenerationError(describeError(error), { cause: error });
      this.logger.error({ threat_id: threat.threat_id, err: failure }, 'Recommendation generation failed');

      await this.record(threat, mode, priorConfirmation, {
        recommendation: '',
        destructive: false,
        approved: false,
        notes: failure.message,
        outcome: 'failed',
        transitions: ['failed'],
        errorCode: failure.code
      });
      throw failure;
    }

    const destructive = this.classify(recommendation);
    const transitions: GateState[] = ['generated', 'classified'];

    if (!destructive) {
      const decision = await this.record(threat, mode, priorConfirmation, {
        recommendation,
        destructive,
        approved: true,
        notes: null,
        outcome: 'approved',
        transitions: [...transitions, 'auto_approved', 'approved']
      });
      return decision;
    }

    transitions.push('pending_confirmation');

    if (priorConfirmation) {
      return this.record(threat, mode, priorConfirmation, {
        recommendation,
        destructive,
        approved: true,
        notes: CONFIRMED_NOTE,
        outcome: 'approved',
        transitions: [...transitions, 'approved']
      });
    }

    this.logger.warn(
      { threat_id: threat.threat_id, mode, recommendation },
      'Destructive action requested without confirmation; denying'
    );

    const denial = await this.record(threat, mode, priorConfirmation, {
      recommendation,
      destructive,
      approved: false,
      notes: DENIAL_NOTE,
      outcome: 'denied',
      transitions: [...transitions, 'denied'],
      errorCode: 'CONFIRMATION_REQUIRED'
    });
    throw new ConfirmationRequired(denial);
  }

  private async generate(prompt: PromptInput): Promise<string> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Reject before aborting so the race settles on the timeout, not on
        // the backend's abort error.
        reject(new GenerationTimeout(this.timeoutMs));
        controller.abort();
      }, this.timeoutMs);
    });

    try {
      const text = await Promise.race([this.backend.generate(prompt, controller.signal), deadline]);
      if (typeof text !== 'string' || text.trim().length === 0) {
        throw new GenerationError('Backend returned an empty recommendation');
      }
      return text.trim();
    } finally {
      clearTimeout(timer);
    }
  }

  private async record(
    threat: ThreatRecord,
    mode: DecisionMode,
    priorConfirmation: boolean,
    result: Outcome
  ): Promise<DecisionRecord> {
    const decision: DecisionRecord = Object.freeze({
      threat_id: threat.threat_id,
      recommendation: result.recommendation,
      destructive: result.destructive,
      approved: result.approved,
      notes: result.notes,
      timestamp: this.clock().toISOString()
    });

    try {
      await this.auditLog.append({
        decision,
        mode,
        prior_confirmation: priorConfirmation,
        outcome: result.outcome,
        error_code: result.errorCode,
        transitions: result.transitions
      });
    } catch (error) {
      this.logger.fatal({ threat_id: threat.threat_id, err: error }, 'Audit log write failed');
      throw new AuditWriteError(`Audit log write failed: ${describeError(error)}`, { cause: error });
    }

    return decision;
  }
}
