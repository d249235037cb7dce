export type { ExtraValue, ExtraInfo, ThreatRecord, PromptInput } from './threat.js';
export type {
  GateState,
  DecisionMode,
  DecisionOutcome,
  DecisionRecord,
  BatchReport,
  ErrorResponse
} from './decision.js';
export type { AuditDraft, AuditRecord, AuditVerification, AuditSink } from './audit.js';

export const GATE_VERSION = '1.0.0';
