import type { MiddlewareHandler } from 'hono';
import { timeout } from 'hono/timeout';
import { HTTPException } from 'hono/http-exception';
import type { OAuthVariables } from '../types/hono.js';

/**
 * Source of the current time; injectable so tests can move the clock
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Capture one timestamp per request; every TTL check in the request uses it
 */
export function requestTime(clock: Clock = systemClock): MiddlewareHandler<{ Variables: OAuthVariables }> {
  return async (c, next) => {
    c.set('requestTime', clock());
    await next();
  };
}

/**
 * Bound every request; a timeout surfaces as server_error through the error handler
 */
export function requestTimeout(ms: number): MiddlewareHandler<{ Variables: OAuthVariables }> {
  return timeout(ms, () => new HTTPException(500, { message: `Request timed out after ${ms} ms` }));
}
