import type { Actor } from './observation';

declare global {
  namespace Express {
    interface Request {
      correlationId?: string;
      actor?: Actor;
    }
  }
}

export {};
