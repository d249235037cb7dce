import { createHash } from 'crypto';

export function sha256(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

// Key-sorted at every depth, so equal objects always hash equally.
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(item => canonicalJson(item)).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, nested]) => nested !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, nested]) => `${JSON.stringify(key)}:${canonicalJson(nested)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

export function hashObject(obj: object): string {
  return sha256(canonicalJson(obj));
}

export const GENESIS_HASH = sha256('remediation-gate-genesis');

// Hash chain for tamper-evident log
export class HashChain {
  private prevHash: string;

  constructor(lastHash?: string) {
    this.prevHash = lastHash ?? GENESIS_HASH;
  }

  // Hash of a record linked to the current head. Does not move the head:
  // call advance() once the record is durably stored.
  link(record: object): { hash: string; prevHash: string } {
    const prevHash = this.prevHash;
    return { hash: sha256(hashObject(record) + prevHash), prevHash };
  }

  advance(hash: string): void {
    this.prevHash = hash;
  }

  static verifyRecord(record: object, expectedHash: string, prevHash: string): boolean {
    return sha256(hashObject(record) + prevHash) === expectedHash;
  }

  getCurrentHash(): string {
    return this.prevHash;
  }
}
