export { sha256, hashObject, canonicalJson, HashChain, GENESIS_HASH } from './hasher.js';
export {
  generateKeyPair,
  saveKeyPair,
  loadKeyPair,
  signData,
  verifySignature,
  signAuditRecord,
  verifyAuditSignature,
  PRIVATE_KEY_FILE,
  PUBLIC_KEY_FILE,
  type KeyPair
} from './signer.js';
export { createAuditKeys, resolveKeyDir, type AuditKeyFiles } from './keys.js';
export { AuditLog, auditRecordSchema, sealRecord, verifyRecords } from './audit-log.js';
export { MemoryAuditLog } from './memory-audit-log.js';
