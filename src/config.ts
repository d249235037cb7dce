import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { DEFAULT_DESTRUCTIVE_TERMS } from './classifier/index.js';
import { MAX_TIMEOUT_MS } from './gate/approval-gate.js';

const backendSchema = z.object({
  name: z.string().min(1),
  type: z.enum(['anthropic', 'ollama', 'openai']),
  model: z.string().min(1),
  baseUrl: z.string().url().optional(),
  apiKey: z.string().optional()
});

export const configSchema = z.object({
  server: z
    .object({
      port: z.number().int().min(0).max(65535).default(8088),
      host: z.string().default('127.0.0.1')
    })
    .default({}),
  auth: z
    .object({
      api_keys: z.array(z.string().min(1)).default([]),
      allowed_origins: z.array(z.string()).default(['http://localhost:*'])
    })
    .default({}),
  rate_limits: z
    .object({
      requests_per_minute: z.number().int().positive().default(600)
    })
    .default({}),
  inference: z
    .object({
      backends: z
        .array(backendSchema)
        .min(1)
        .default([{ name: 'local', type: 'openai', model: 'gpt-oss:20b', baseUrl: 'http://localhost:11434/v1' }]),
      default: z.string().default('local'),
      timeout_ms: z.number().int().positive().max(MAX_TIMEOUT_MS).default(30_000)
    })
    .default({}),
  audit: z
    .object({
      log_path: z.string().default(resolve(homedir(), '.remediation-gate', 'logs', 'audit.jsonl')),
      key_dir: z.string().default(resolve(homedir(), '.remediation-gate', 'keys'))
    })
    .default({}),
  classifier: z
    .object({
      destructive_terms: z.array(z.string().min(1)).min(1).default([...DEFAULT_DESTRUCTIVE_TERMS])
    })
    .default({}),
  batch: z
    .object({
      concurrency: z.number().int().positive().default(4)
    })
    .default({})
});

export type GateConfig = z.infer<typeof configSchema>;

export function configPaths(env: NodeJS.ProcessEnv = process.env): string[] {
  const paths = [
    resolve(process.cwd(), 'remediation-gate.yaml'),
    resolve(homedir(), '.remediation-gate', 'config.yaml'),
    resolve(homedir(), '.config', 'remediation-gate', 'config.yaml')
  ];
  return env.REMEDIATION_GATE_CONFIG ? [resolve(env.REMEDIATION_GATE_CONFIG), ...paths] : paths;
}

export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): GateConfig {
  const config = configSchema.parse(raw ?? {});

  if (env.REMEDIATION_GATE_API_KEY && !config.auth.api_keys.includes(env.REMEDIATION_GATE_API_KEY)) {
    config.auth.api_keys.push(env.REMEDIATION_GATE_API_KEY);
  }

  if (!config.inference.backends.some(backend => backend.name === config.inference.default)) {
    throw new Error(`Default backend ${config.inference.default} is not configured`);
  }

  return config;
}

export function loadConfig(explicitPath?: string, env: NodeJS.ProcessEnv = process.env): GateConfig {
  const candidates = explicitPath ? [resolve(explicitPath)] : configPaths(env);

  for (const path of candidates) {
    if (existsSync(path)) {
      return parseConfig(parseYaml(readFileSync(path, 'utf-8')), env);
    }
  }

  if (explicitPath) {
    throw new Error(`Config file not found: ${explicitPath}`);
  }

  // Default configuration
  return parseConfig({}, env);
}
