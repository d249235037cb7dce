import type { Logger } from 'pino';
import { BatchOrchestrator } from './batch/orchestrator.js';
import { createClassifier } from './classifier/index.js';
import type { GateConfig } from './config.js';
import { AuditLog } from './crypto/index.js';
import { ApprovalGate } from './gate/approval-gate.js';
import { InferenceRouter, type GenerationBackend } from './inference/router.js';
import type { ServerDeps } from './server.js';
import type { AuditSink } from './types/index.js';

export interface Overrides {
  backend?: GenerationBackend;
  auditLog?: AuditSink;
}

// Builds every collaborator from configuration. Tests pass overrides for the
// generation backend and the audit sink.
export function createComponents(config: GateConfig, logger: Logger, overrides: Overrides = {}): ServerDeps {
  const router = new InferenceRouter(config.inference.backends, config.inference.default);
  const auditLog = overrides.auditLog ?? new AuditLog(config.audit.log_path, config.audit.key_dir);

  const gate = new ApprovalGate({
    backend: overrides.backend ?? router,
    auditLog,
    logger,
    classifier: createClassifier(config.classifier.destructive_terms),
    timeoutMs: config.inference.timeout_ms
  });

  const orchestrator = new BatchOrchestrator({
    gate,
    logger,
    concurrency: config.batch.concurrency
  });

  return {
    config,
    gate,
    orchestrator,
    auditLog,
    backends: () => router.getAvailableBackends(),
    logger
  };
}
