import { Hono } from 'hono';
import { logger } from 'hono/logger';
import { z } from 'zod';
import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import { OPERATION_NAMES, OPERATIONS } from './calculator.js';
import type { ServerConfig } from './config.js';
import { cors } from './cors.js';

const thisDir = path.dirname(fileURLToPath(import.meta.url));
const INDEX_HTML_PATH = path.resolve(thisDir, '..', 'static', 'index.html');

// Numeric strings ("5", " 2.5 ") are accepted alongside JSON numbers; blank
// or non-numeric strings still fail as non-numbers.
const floatField = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() !== '' ? Number(value) : value),
  z.number().finite(),
);

const operationSchema = z.object({
  a: floatField,
  b: floatField,
});

const OTHER_METHODS = ['GET', 'PUT', 'PATCH', 'DELETE'];

export type OperationRequest = z.infer<typeof operationSchema>;

export type ValidationIssue = {
  loc: Array<string | number>;
  msg: string;
  type: string;
}

function toValidationIssues(issues: z.ZodIssue[]): ValidationIssue[] {
  return issues.map((issue) => ({
    loc: ['body', ...issue.path],
    msg: issue.message,
    type: issue.code,
  }));
}

export function createApp(config: ServerConfig): Hono {
  const app = new Hono();

  if (config.debug) {
    app.use('*', logger());
  }
  app.use('*', cors(config.corsOrigin));

  if (existsSync(INDEX_HTML_PATH)) {
    app.get('/', async (c) => c.html(await readFile(INDEX_HTML_PATH, 'utf8')));
  }

  app.get('/health', (c) => {
    console.debug('[server] /health pinged');
    return c.json({ status: 'ok' });
  });

  for (const name of OPERATION_NAMES) {
    const operation = OPERATIONS[name];

    app.post(`/${name}`, async (c) => {
      let body: unknown;
      try {
        body = await c.req.json();
      } catch {
        return c.json({ detail: [{ loc: ['body'], msg: 'Invalid JSON', type: 'json_invalid' }] }, 422);
      }
      const parseResult = operationSchema.safeParse(body);
      if (!parseResult.success) {
        return c.json({ detail: toValidationIssues(parseResult.error.issues) }, 422);
      }
      const { a, b } = parseResult.data;
      const result = operation(a, b);
      if (!result.ok) {
        return c.json({ detail: result.error.message }, 400);
      }
      // an overflow to +/-Infinity serializes as null
      return c.json({ result: result.value });
    });

    app.on(OTHER_METHODS, `/${name}`, (c) => c.json({ detail: 'Method Not Allowed' }, 405, { Allow: 'POST' }));
  }

  app.onError((err, c) => {
    console.error('[server] unhandled error', err);
    return c.json({ detail: 'Internal Server Error' }, 500);
  });

  app.all('*', (c) => c.json({ detail: 'Not Found' }, 404));

  return app;
}
