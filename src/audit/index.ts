export { sha256, GENESIS_HASH } from './hasher.js';
export { AuditLog, AUDIT_VERSION, type AuditRecord, type ConsultationEvent } from './audit-log.js';
