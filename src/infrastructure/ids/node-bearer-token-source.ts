import { randomUUID } from 'node:crypto';
import type { BearerToken } from '../../domain/invocation/invocation-request.js';
import type { BearerTokenSource } from '../../ports/bearer-token.port.js';

/**
 * Random UUID v4 bearer tokens (CSPRNG-backed).
 */
export class NodeBearerTokenSource implements BearerTokenSource {
  next(): BearerToken {
    return randomUUID() as BearerToken;
  }
}
