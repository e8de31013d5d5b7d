import type { MiddlewareHandler } from 'hono';

const CORS_HEADERS: Record<string, string> = {
  'Access-Control-Allow-Methods': 'GET,POST,OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type,Authorization',
  'Access-Control-Allow-Credentials': 'true',
};

// Echoes the request origin when it matches `allowedOrigin`; '*' allows any origin.
export function cors(allowedOrigin: string): MiddlewareHandler {
  return async (c, next) => {
    const origin = c.req.header('origin') ?? '';
    let allowOrigin: string | undefined;
    if (origin && (origin === allowedOrigin || allowedOrigin === '*')) {
      allowOrigin = origin;
    } else if (!origin && allowedOrigin === '*') {
      allowOrigin = '*';
    }

    // Preflight: return a native Response, nothing downstream needs to run
    if (c.req.method === 'OPTIONS') {
      const preflightHeaders: Record<string, string> = { ...CORS_HEADERS };
      if (allowOrigin) preflightHeaders['Access-Control-Allow-Origin'] = allowOrigin;
      return new Response(null, { status: 204, headers: preflightHeaders });
    }

    if (allowOrigin) c.header('Access-Control-Allow-Origin', allowOrigin);
    Object.entries(CORS_HEADERS).forEach(([k, v]) => c.header(k, v));
    await next();
  };
}
