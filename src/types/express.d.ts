import type { AuthContext } from "./context";

declare global {
  namespace Express {
    interface Request {
      auth?: AuthContext;
      /** Set when a bearer token was presented but could not be resolved. */
      authFailure?: string;
    }
  }
}

export {};
