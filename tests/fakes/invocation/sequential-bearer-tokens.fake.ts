import type { BearerTokenSource } from '../../../src/ports/bearer-token.port.js';
import type { BearerToken } from '../../../src/domain/invocation/invocation-request.js';

/**
 * Deterministic bearer tokens: token-1, token-2, ...
 */
export class SequentialBearerTokens implements BearerTokenSource {
  private issued = 0;

  next(): BearerToken {
    this.issued += 1;
    return `token-${this.issued}` as BearerToken;
  }
}
