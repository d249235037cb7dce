import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import type { Logger } from 'pino';
import { ZodError } from 'zod';

import type { BatchOrchestrator } from './batch/orchestrator.js';
import type { GateConfig } from './config.js';
import { ConfirmationRequired, GateError } from './errors.js';
import type { ApprovalGate } from './gate/approval-gate.js';
import { batchRequestSchema, formatIssues, recommendRequestSchema } from './schema.js';
import { GATE_VERSION } from './types/index.js';
import type { AuditSink, BatchReport, DecisionRecord, ErrorResponse } from './types/index.js';

export interface ServerDeps {
  config: GateConfig;
  gate: ApprovalGate;
  orchestrator: BatchOrchestrator;
  auditLog: AuditSink;
  backends: () => string[];
  logger: Logger;
}

const PUBLIC_ROUTES = new Set(['/api/health']);

export function bearerToken(header: string | undefined): string | undefined {
  if (!header) return undefined;
  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  return match ? match[1] : undefined;
}

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const { config, gate, orchestrator, auditLog, logger } = deps;
  const apiKeys = new Set(config.auth.api_keys);

  const app = Fastify({ logger: false });

  await app.register(cors, {
    origin: config.auth.allowed_origins.map(allowed =>
      allowed.includes('*') ? new RegExp('^' + allowed.split('*').map(escapeRegExp).join('.*') + '$') : allowed
    ),
    credentials: true
  });

  await app.register(rateLimit, {
    max: config.rate_limits.requests_per_minute,
    timeWindow: '1 minute'
  });

  // API key validation; disabled when no keys are configured
  app.addHook('onRequest', async (request, reply) => {
    if (apiKeys.size === 0 || PUBLIC_ROUTES.has(request.routeOptions.url ?? '')) return;

    const apiKey = bearerToken(request.headers.authorization);
    if (!apiKey || !apiKeys.has(apiKey)) {
      const body: ErrorResponse = { error_code: 'AUTH_FAILED', detail: 'Invalid or missing API key' };
      return reply.status(401).send(body);
    }
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      const body: ErrorResponse = { error_code: 'INPUT_ERROR', detail: formatIssues(error) };
      return reply.status(422).send(body);
    }

    if (error instanceof GateError) {
      const body: ErrorResponse = { error_code: error.code, detail: error.message };
      if (error instanceof ConfirmationRequired) {
        body.decision = error.decision;
      }
      return reply.status(error.statusCode).send(body);
    }

    // Fastify's own errors (bad JSON, rate limit) carry a 4xx status
    if (typeof error.statusCode === 'number' && error.statusCode < 500) {
      const body: ErrorResponse = { error_code: error.code ?? 'BAD_REQUEST', detail: error.message };
      return reply.status(error.statusCode).send(body);
    }

    logger.error({ err: error, url: request.url }, 'Unhandled request error');
    const body: ErrorResponse = { error_code: 'INTERNAL_ERROR', detail: 'Internal server error' };
    return reply.status(500).send(body);
  });

  app.get('/api/health', async () => {
    const auditVerification = auditLog.verify();
    return {
      status: 'healthy',
      version: GATE_VERSION,
      backends: deps.backends(),
      audit_log_valid: auditVerification.valid
    };
  });

  app.post('/api/recommend', async (request): Promise<DecisionRecord> => {
    const body = recommendRequestSchema.parse(request.body);
    const decision = await gate.decide(body.threat, { priorConfirmation: body.confirm });

    logger.info(
      { threat_id: decision.threat_id, destructive: decision.destructive, approved: decision.approved },
      'Recommendation decided'
    );
    return decision;
  });

  app.post('/api/batch', async (request): Promise<BatchReport> => {
    const body = batchRequestSchema.parse(request.body);
    const report = await orchestrator.run(body.threats);
    return { report };
  });

  return app;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.+?^${}()|[\]\\]/g, '\\$&');
}
