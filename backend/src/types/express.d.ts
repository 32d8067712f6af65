import type { Principal } from '../services/tokenValidator.js';
import type { Role } from '../services/groupResolver.js';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      principal?: Principal;
      /** Role resolved from the principal's groups, when one matched. */
      role?: Role;
      /** Aborted when the client goes away before the response finishes. */
      abortSignal?: AbortSignal;
    }
  }
}

export {};
