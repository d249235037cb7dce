#!/usr/bin/env node

import { readFile } from 'fs/promises';
import { parseArgs } from 'util';
import { createComponents } from '../app.js';
import { loadConfig } from '../config.js';
import { describeError } from '../errors.js';
import { createLogger } from '../logger.js';
import { buildServer } from '../server.js';
import type { ThreatRecord } from '../types/index.js';
import { parseThreatCsv } from './csv.js';

const USAGE = 'Usage: remediation-gate-batch --batch <csv_file> [--config <path>]';

async function runBatchCli(argv: string[]): Promise<number> {
  let csvFile: string | undefined;
  let configPath: string | undefined;
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        batch: { type: 'string' },
        config: { type: 'string' }
      }
    });
    csvFile = values.batch;
    configPath = values.config;
  } catch (error) {
    console.error(`Error: ${describeError(error)}\n${USAGE}`);
    return 1;
  }

  if (!csvFile) {
    console.error(`Error: --batch <csv_file> required.\n${USAGE}`);
    return 1;
  }

  let threats: ThreatRecord[];
  try {
    threats = parseThreatCsv(await readFile(csvFile, 'utf-8'));
  } catch (error) {
    console.error(`Error reading ${csvFile}: ${describeError(error)}`);
    return 1;
  }

  const config = loadConfig(configPath);
  const logger = createLogger({ destination: 2 });
  const app = await buildServer(createComponents(config, logger));

  try {
    // Same code path as the HTTP endpoint, without opening a socket
    const [apiKey] = config.auth.api_keys;
    const resp = await app.inject({
      method: 'POST',
      url: '/api/batch',
      headers: apiKey ? { authorization: `Bearer ${apiKey}` } : {},
      payload: { threats }
    });

    if (resp.statusCode !== 200) {
      console.error(`Batch failed: ${resp.body}`);
      return 1;
    }

    console.log(JSON.stringify(resp.json(), null, 2));
    return 0;
  } finally {
    await app.close();
  }
}

runBatchCli(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  error => {
    console.error(`Batch failed: ${describeError(error)}`);
    process.exitCode = 1;
  }
);
