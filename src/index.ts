export * from './types/index.js';
export * from './errors.js';
export { buildPrompt, SYSTEM_PROMPT } from './prompt/builder.js';
export { createClassifier, isDestructive, tokenize, DEFAULT_DESTRUCTIVE_TERMS, type DestructiveClassifier } from './classifier/index.js';
export { ApprovalGate, DENIAL_NOTE, CONFIRMED_NOTE, type ApprovalGateOptions, type DecisionOptions } from './gate/approval-gate.js';
export { BatchOrchestrator, type BatchOrchestratorOptions } from './batch/orchestrator.js';
export { AuditLog, MemoryAuditLog, HashChain } from './crypto/index.js';
export { InferenceRouter, type GenerationBackend, type InferenceBackend } from './inference/router.js';
export { loadConfig, parseConfig, type GateConfig } from './config.js';
export { buildServer, type ServerDeps } from './server.js';
export { createComponents } from './app.js';
export { createLogger } from './logger.js';
