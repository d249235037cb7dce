import { pino, type Logger } from 'pino';
import type { GenerationBackend } from '../src/inference/router.js';
import type { AuditDraft, AuditRecord, AuditSink, AuditVerification, PromptInput } from '../src/types/index.js';

export const silentLogger: Logger = pino({ level: 'silent' });

export const FIXED_TIME = new Date('2026-01-15T10:00:00.000Z');
export const fixedClock = (): Date => FIXED_TIME;

export const SAFE_TEXT = 'Isolate the host and collect memory for analysis.';
export const DESTRUCTIVE_TEXT = 'Quarantine and delete the encrypted files immediately.';

// 'hang' never settles unless the gate aborts the request.
export type Reply = string | Error | 'hang' | { delayMs: number; text: string };

export interface ScriptedBackend extends GenerationBackend {
  calls: PromptInput[];
}

export function scriptedBackend(replies: Record<string, Reply>, fallback: Reply = SAFE_TEXT): ScriptedBackend {
  const calls: PromptInput[] = [];

  return {
    calls,
    async generate(prompt: PromptInput, signal?: AbortSignal): Promise<string> {
      calls.push(prompt);
      const id = Object.keys(replies).find(key => prompt.user.includes(`"threat_id": "${key}"`));
      const reply = id === undefined ? fallback : replies[id];

      if (reply === 'hang') {
        return new Promise<string>((_, reject) => {
          signal?.addEventListener('abort', () => reject(new Error('aborted')));
        });
      }
      if (reply instanceof Error) {
        throw reply;
      }
      if (typeof reply === 'string') {
        return reply;
      }
      await new Promise(resolve => setTimeout(resolve, reply.delayMs));
      return reply.text;
    }
  };
}

export class FailingAuditSink implements AuditSink {
  attempts = 0;

  async append(_draft: AuditDraft): Promise<AuditRecord> {
    this.attempts++;
    throw new Error('disk full');
  }

  verify(): AuditVerification {
    return { valid: true, count: 0, errors: [] };
  }
}
