/**
 * Random identifiers from node:crypto.
 */

import { randomBytes, randomUUID } from 'node:crypto';
import type { IIdGenerator } from './IIdGenerator.js';

export class RandomIdGenerator implements IIdGenerator {
  conversationId(): string {
    return `conv_${randomUUID().replace(/-/g, '')}`;
  }

  /** INQ-YYYYMMDD-XXXXXXXX (UTC date + 8 hex chars). */
  inquiryId(now: Date): string {
    const date = now.toISOString().slice(0, 10).replace(/-/g, '');
    return `INQ-${date}-${randomBytes(4).toString('hex').toUpperCase()}`;
  }

  correlationId(): string {
    return `ERR_${randomBytes(4).toString('hex')}`;
  }

  requestId(): string {
    return randomUUID();
  }
}
