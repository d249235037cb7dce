#!/usr/bin/env node

import { parseArgs } from 'util';
import { loadConfig } from '../config.js';
import { createAuditKeys, resolveKeyDir } from '../crypto/keys.js';
import { describeError } from '../errors.js';

const USAGE = 'Usage: remediation-gate-keygen [key_dir] [--config <path>]';

function main(argv: string[]): number {
  let keyDirArg: string | undefined;
  let configPath: string | undefined;
  try {
    const { values, positionals } = parseArgs({
      args: argv,
      options: { config: { type: 'string' } },
      allowPositionals: true
    });
    keyDirArg = positionals[0];
    configPath = values.config;
  } catch (error) {
    console.error(`Error: ${describeError(error)}\n${USAGE}`);
    return 1;
  }

  const keys = createAuditKeys(resolveKeyDir(keyDirArg, loadConfig(configPath)));
  console.log(`Key directory: ${keys.keyDir}`);

  if (keys.status === 'exists') {
    console.log('Keys already exist here. Delete them first to regenerate.');
    return 1;
  }

  console.log(`Private key: ${keys.privateKeyPath} (mode 600)`);
  console.log(`Public key:  ${keys.publicKeyPath} (mode 644)`);
  console.log('Audit records written with this key directory are now signed.');
  return 0;
}

process.exitCode = main(process.argv.slice(2));
