import { join } from 'path';
import type { GateConfig } from '../config.js';
import { generateKeyPair, loadKeyPair, saveKeyPair, PRIVATE_KEY_FILE, PUBLIC_KEY_FILE } from './signer.js';

export interface AuditKeyFiles {
  status: 'created' | 'exists';
  keyDir: string;
  privateKeyPath: string;
  publicKeyPath: string;
}

// The audit log signs with whatever it finds in audit.key_dir
export function resolveKeyDir(explicitDir: string | undefined, config: GateConfig): string {
  return explicitDir || config.audit.key_dir;
}

/** Writes a fresh Ed25519 pair to `keyDir` unless one is already there. */
export function createAuditKeys(keyDir: string): AuditKeyFiles {
  const files = {
    keyDir,
    privateKeyPath: join(keyDir, PRIVATE_KEY_FILE),
    publicKeyPath: join(keyDir, PUBLIC_KEY_FILE)
  };

  if (loadKeyPair(keyDir)) {
    return { status: 'exists', ...files };
  }

  saveKeyPair(keyDir, generateKeyPair());
  return { status: 'created', ...files };
}
