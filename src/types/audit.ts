import type { DecisionMode, DecisionOutcome, DecisionRecord, GateState } from './decision.js';

// What the gate hands to the sink; chain fields are added on append.
export interface AuditDraft {
  decision: DecisionRecord;
  mode: DecisionMode;
  prior_confirmation: boolean;
  outcome: DecisionOutcome;
  error_code?: string;
  transitions: GateState[];
}

export interface AuditRecord {
  event_id: string;
  sequence: number;
  timestamp: string;
  threat_id: string;
  recommendation: string;
  destructive: boolean;
  approved: boolean;
  notes: string | null;
  mode: DecisionMode;
  prior_confirmation: boolean;
  outcome: DecisionOutcome;
  error_code?: string;
  transitions: GateState[];
  prev_hash: string;
  hash: string;
  gate_version: string;
  signature?: string;
}

export interface AuditVerification {
  valid: boolean;
  count: number;
  errors: string[];
}

export interface AuditSink {
  append(draft: AuditDraft): Promise<AuditRecord>;
  verify(): AuditVerification;
}
