/**
 * Hono application environment type.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */

import type { AuthContext } from "./auth.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Authenticated caller (set by auth middleware when API keys are configured) */
    auth: AuthContext;
  };
}
