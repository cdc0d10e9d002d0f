import { appendFileSync, existsSync, mkdirSync, readFileSync } from 'fs';
import { dirname } from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { ErrorCode, ProviderFamily } from '../types/index.js';
import { GENESIS_HASH, sha256 } from './hasher.js';

export const AUDIT_VERSION = '1.0.0';

export interface AuditRecord {
  event_id: string;
  timestamp: string;
  action: 'CONSULT' | 'REFUSED';
  family: ProviderFamily | 'none';
  model: string;
  hash_input: string;
  hash_output: string;
  fragment_count: number;
  error_code?: ErrorCode;
  prev_record_hash: string;
  audit_version: string;
}

export interface ConsultationEvent {
  action: 'CONSULT' | 'REFUSED';
  family?: ProviderFamily;
  model?: string;
  input: string;
  output: string;
  fragmentCount: number;
  errorCode?: ErrorCode;
}

function readLines(path: string): string[] {
  if (!existsSync(path)) return [];
  return readFileSync(path, 'utf-8').trim().split('\n').filter(Boolean);
}

/**
 * Append-only JSONL log of consultations. Each record stores hashes of the
 * prompt and reply, never the text, and links to the hash of the record
 * before it so that edits and deletions break the chain.
 */
export class AuditLog {
  private prevHash: string;

  constructor(readonly logPath: string) {
    const dir = dirname(logPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    const lines = readLines(logPath);
    const last = lines[lines.length - 1];
    this.prevHash = last === undefined ? GENESIS_HASH : sha256(last);
  }

  log(event: ConsultationEvent): AuditRecord {
    const record: AuditRecord = {
      event_id: uuidv4(),
      timestamp: new Date().toISOString(),
      action: event.action,
      family: event.family ?? 'none',
      model: event.model ?? 'none',
      hash_input: sha256(event.input),
      hash_output: sha256(event.output),
      fragment_count: event.fragmentCount,
      prev_record_hash: this.prevHash,
      audit_version: AUDIT_VERSION
    };
    if (event.errorCode) {
      record.error_code = event.errorCode;
    }

    const line = JSON.stringify(record);
    appendFileSync(this.logPath, line + '\n');
    this.prevHash = sha256(line);
    return record;
  }

  verify(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    let expected = GENESIS_HASH;

    readLines(this.logPath).forEach((line, i) => {
      let record: unknown;
      try {
        record = JSON.parse(line);
      } catch {
        errors.push(`Record ${i}: Invalid JSON`);
        expected = sha256(line);
        return;
      }

      const prev =
        typeof record === 'object' && record !== null && 'prev_record_hash' in record
          ? record.prev_record_hash
          : undefined;
      if (prev !== expected) {
        errors.push(`Record ${i}: Chain broken - expected prev_hash ${expected}, got ${String(prev)}`);
      }
      expected = sha256(line);
    });

    return { valid: errors.length === 0, errors };
  }
}
