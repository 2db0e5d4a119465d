import type { RequestHandler } from 'express';
import { ApiError } from './error-handler';

const BEARER_PREFIX = 'bearer ';

/**
 * Event senders authenticate with `Authorization: Bearer <token>`. An empty token set leaves the
 * endpoints open, which is how the controller runs beside a local event source.
 */
export function requireEventToken(tokens: Set<string>): RequestHandler {
  return (req, _res, next) => {
    if (tokens.size === 0) {
      req.auth = { token: null };
      return next();
    }

    const header = req.headers.authorization;
    if (!header || !header.toLowerCase().startsWith(BEARER_PREFIX)) {
      return next(new ApiError(401, 'invalid_token', 'Missing event token. Supply Authorization: Bearer <token>.'));
    }

    const token = header.slice(BEARER_PREFIX.length).trim();
    if (!tokens.has(token)) {
      return next(new ApiError(401, 'invalid_token', 'Event token is not recognized.'));
    }

    req.auth = { token };
    return next();
  };
}
