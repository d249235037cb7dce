import type { Logger } from 'pino';
import { ConfirmationRequired, GateError, describeError } from '../errors.js';
import type { ApprovalGate } from '../gate/approval-gate.js';
import type { DecisionRecord, ThreatRecord } from '../types/index.js';

export const DEFAULT_CONCURRENCY = 4;

export interface BatchOrchestratorOptions {
  gate: ApprovalGate;
  logger: Logger;
  concurrency?: number;
  clock?: () => Date;
}

export class BatchOrchestrator {
  private readonly gate: ApprovalGate;
  private readonly logger: Logger;
  private readonly concurrency: number;
  private readonly clock: () => Date;

  constructor(options: BatchOrchestratorOptions) {
    this.gate = options.gate;
    this.logger = options.logger.child({ component: 'batch' });
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY));
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * One record per input threat, in input order. Destructive recommendations
   * are never approved here: every item goes through the gate without prior
   * confirmation, whatever the caller asked for.
   */
  async run(threats: readonly ThreatRecord[]): Promise<DecisionRecord[]> {
    const report = new Array<DecisionRecord | undefined>(threats.length).fill(undefined);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < threats.length) {
        const index = next++;
        report[index] = await this.runOne(threats[index]);
      }
    };

    const workers = Array.from({ length: Math.min(this.concurrency, threats.length) }, () => worker());
    await Promise.all(workers);

    this.logger.info(
      {
        total: threats.length,
        approved: report.filter(entry => entry?.approved).length
      },
      'Batch processed'
    );

    return report.map((entry, i) => entry ?? this.placeholder(threats[i], 'Unexpected error: item was not processed'));
  }

  private async runOne(threat: ThreatRecord): Promise<DecisionRecord> {
    try {
      return await this.gate.decide(threat, { priorConfirmation: false, mode: 'batch' });
    } catch (error) {
      if (error instanceof ConfirmationRequired) {
        this.logger.warn({ threat_id: threat.threat_id }, `Batch threat denied: ${error.message}`);
        return error.decision;
      }
      if (error instanceof GateError) {
        this.logger.warn({ threat_id: threat.threat_id, code: error.code }, `Batch threat failed: ${error.message}`);
        return this.placeholder(threat, `Failed: ${error.message}`);
      }
      this.logger.error({ threat_id: threat.threat_id, err: error }, 'Unexpected error on batch threat');
      return this.placeholder(threat, `Unexpected error: ${describeError(error)}`);
    }
  }

  private placeholder(threat: ThreatRecord, notes: string): DecisionRecord {
    return Object.freeze({
      threat_id: threat.threat_id,
      recommendation: '',
      destructive: false,
      approved: false,
      notes,
      timestamp: this.clock().toISOString()
    });
  }
}
