#!/usr/bin/env node

import { loadConfig } from '../config.js';
import { AuditLog } from '../crypto/index.js';

function main(): number {
  const config = loadConfig();
  const logPath = process.argv[2] || config.audit.log_path;
  const keyDir = process.argv[3] || config.audit.key_dir;

  const result = new AuditLog(logPath, keyDir).verify();

  console.log(`Audit log: ${logPath}`);
  console.log(`Records:   ${result.count}`);

  if (result.valid) {
    console.log('Chain intact.');
    return 0;
  }

  console.log('Chain INVALID:');
  for (const error of result.errors) {
    console.log(`  - ${error}`);
  }
  return 1;
}

process.exitCode = main();
