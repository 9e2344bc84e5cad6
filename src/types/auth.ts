// =============================================================================
// GAZETTE - Authentication Types
// =============================================================================

import { User } from './publishing';

declare global {
  namespace Express {
    interface Request {
      /** Set by authenticate middleware from a verified bearer token */
      user?: User;
      requestId?: string;
    }
  }
}

export {};
