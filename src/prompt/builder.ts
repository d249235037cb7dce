import { InputError } from '../errors.js';
import type { PromptInput, ThreatRecord } from '../types/index.js';

export const SYSTEM_PROMPT = 'You are a cybersecurity assistant specialized in AV/EDR.';

const INSTRUCTIONS =
  'Provide a concise recommendation that includes what to do, why it matters, ' +
  "and if it is destructive (mention 'delete', 'remove', 'kill', etc.). " +
  'Return the recommendation in a single paragraph.';

function isPlainObject(value: object): boolean {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

// Walks additional_info before serializing: JSON.stringify would silently turn
// NaN into null and drop functions, so those are rejected instead.
function assertSerializable(value: unknown, path: string, ancestors: Set<object>): void {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return;
    case 'number':
      if (!Number.isFinite(value)) {
        throw new InputError(`${path} is not a finite number`);
      }
      return;
    case 'object': {
      if (value === null || Array.isArray(value) || !isPlainObject(value)) {
        throw new InputError(`${path} must be a string, number, boolean or mapping`);
      }
      if (ancestors.has(value)) {
        throw new InputError(`${path} contains a circular reference`);
      }
      ancestors.add(value);
      for (const [key, nested] of Object.entries(value)) {
        assertSerializable(nested, `${path}.${key}`, ancestors);
      }
      ancestors.delete(value);
      return;
    }
    default:
      throw new InputError(`${path} has unsupported type ${typeof value}`);
  }
}

function threatPayload(threat: ThreatRecord): Record<string, unknown> {
  if (typeof threat.threat_id !== 'string' || threat.threat_id.trim().length === 0) {
    throw new InputError('threat_id is required');
  }

  const payload: Record<string, unknown> = { threat_id: threat.threat_id };
  for (const field of ['file_path', 'sha256', 'description'] as const) {
    const value = threat[field];
    if (value === undefined) continue;
    if (typeof value !== 'string') {
      throw new InputError(`${field} must be a string`);
    }
    payload[field] = value;
  }

  if (threat.additional_info !== undefined) {
    assertSerializable(threat.additional_info, 'additional_info', new Set());
    // Key order is the object's own: integer-like keys ascending, then the rest as inserted
    payload.additional_info = threat.additional_info;
  }

  return payload;
}

export function buildPrompt(threat: ThreatRecord): PromptInput {
  const payload = threatPayload(threat);

  return {
    system: SYSTEM_PROMPT,
    user: `Threat Data:\n${JSON.stringify(payload, null, 2)}\n\n${INSTRUCTIONS}`
  };
}
