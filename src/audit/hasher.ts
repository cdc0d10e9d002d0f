import { createHash } from 'crypto';

export function sha256(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

export const GENESIS_HASH = sha256('consultgate-genesis');
