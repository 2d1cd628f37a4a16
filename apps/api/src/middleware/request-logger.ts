/**
 * Request Logging Middleware
 *
 * One JSON line per request and per response, with the request id and
 * timing echoed back in `X-Request-ID` and `X-Response-Time`.
 *
 * @module apps/api/middleware/request-logger
 */

import type { Context, Next } from 'hono';

export type AppEnv = {
  Variables: {
    requestId: string;
    startTime: number;
  };
};

function generateRequestId(): string {
  return `req_${Date.now()}_${Math.random().toString(36).substring(2, 9)}`;
}

/**
 * Sets `requestId` and `startTime` on the context for handlers
 */
export async function requestLogger(c: Context<AppEnv>, next: Next): Promise<void> {
  const startTime = Date.now();
  const requestId = c.req.header('X-Request-ID') ?? generateRequestId();
  const method = c.req.method;
  const path = c.req.path;

  c.set('requestId', requestId);
  c.set('startTime', startTime);

  console.log(
    JSON.stringify({
      type: 'request',
      requestId,
      method,
      path,
      timestamp: new Date(startTime).toISOString(),
    })
  );

  await next();

  const durationMs = Date.now() - startTime;
  const statusCode = c.res.status;

  // hono's compose routes handler errors through onError before this point
  const line = JSON.stringify({
    type: 'response',
    requestId,
    method,
    path,
    statusCode,
    durationMs,
  });
  if (statusCode >= 500) {
    console.error(line);
  } else {
    console.log(line);
  }

  c.header('X-Request-ID', requestId);
  c.header('X-Response-Time', `${durationMs}ms`);
}
