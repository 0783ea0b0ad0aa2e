// src/types/express.d.ts

// Make this file a module (prevents global re-declarations)
export {};

declare global {
  namespace Express {
    /** Claims lifted from a verified bearer token. */
    interface AuthClaims {
      userId: string;
      role: string;
    }
  }
}

declare module 'express-serve-static-core' {
  interface Request {
    id?: string;
    auth?: Express.AuthClaims;
  }
}
