export type GateState =
  | 'generated'
  | 'classified'
  | 'auto_approved'
  | 'pending_confirmation'
  | 'approved'
  | 'denied'
  | 'failed'
  | 'logged';

export type DecisionMode = 'single' | 'batch';

export type DecisionOutcome = 'approved' | 'denied' | 'failed';

export interface DecisionRecord {
  readonly threat_id: string;
  readonly recommendation: string;
  readonly destructive: boolean;
  readonly approved: boolean;
  readonly notes: string | null;
  readonly timestamp: string;
}

export interface BatchReport {
  report: DecisionRecord[];
}

export interface ErrorResponse {
  error_code: string;
  detail: string;
  decision?: DecisionRecord;
}
