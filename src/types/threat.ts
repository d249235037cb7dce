export type ExtraValue = string | number | boolean | ExtraInfo;

export interface ExtraInfo {
  [key: string]: ExtraValue;
}

// Caller-owned and transient; never mutated once received.
export interface ThreatRecord {
  readonly threat_id: string;
  readonly file_path?: string;
  readonly sha256?: string;
  readonly description?: string;
  readonly additional_info?: Readonly<ExtraInfo>;
}

export interface PromptInput {
  system: string;
  user: string;
}
