/**
 * Session-cookie auth gate. The core never reads the session: handlers take
 * the user id from here and pass it explicitly.
 */

import {NextFunction, Request, RequestHandler, Response} from 'express';
import {SessionRecord} from '../types';
import {AppEffects} from '../pure/effects';
import {resolveSession} from '../pure/accounts';

export const SESSION_COOKIE = 'sid';

export type Authenticated = SessionRecord & {
  readonly sessionId: string;
};

declare global {
  namespace Express {
    interface Request {
      auth?: Authenticated;
    }
  }
}

export function readCookie(header: string | undefined, name: string): string | null {
  if (!header) {
    return null;
  }
  for (const part of header.split(';')) {
    const separator = part.indexOf('=');
    if (separator === -1) continue;
    if (part.slice(0, separator).trim() === name) {
      return decodeURIComponent(part.slice(separator + 1).trim());
    }
  }
  return null;
}

export function requireSession(effects: Pick<AppEffects, 'sessions'>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const sessionId = readCookie(req.headers.cookie, SESSION_COOKIE);
    if (!sessionId) {
      res.status(401).json({error: 'Login required'});
      return;
    }

    resolveSession(sessionId)(effects).then(session => {
      if (!session) {
        res.status(401).json({error: 'Session expired, please login again'});
        return;
      }
      req.auth = {...session, sessionId};
      next();
    }, next);
  };
}

export function authOf(req: Request): Authenticated {
  if (!req.auth) {
    throw new Error(`No session on ${req.method} ${req.path}; route is missing requireSession`);
  }
  return req.auth;
}
