import { randomUUID } from 'crypto';
import pinoHttp from 'pino-http';
import type { Request } from 'express';
import type { Logger } from 'pino';

const REDACTED_HEADERS: ReadonlySet<string> = new Set([
  'authorization',
  'cookie',
  'set-cookie',
  'x-api-key',
]);

const REQUEST_ID_HEADER = 'x-request-id';

export interface RequestLoggerOptions {
  logger: Logger;
  quietHealthCheck?: boolean;
}

export function createRequestLogger(options: RequestLoggerOptions) {
  const { logger, quietHealthCheck = true } = options;

  return pinoHttp({
    logger,

    // Reuse the caller's request id when it sends one
    genReqId: (req, res) => {
      const incoming = req.headers[REQUEST_ID_HEADER];
      const id = typeof incoming === 'string' && incoming.length > 0 ? incoming : randomUUID();
      res.setHeader(REQUEST_ID_HEADER, id);
      return id;
    },

    autoLogging: {
      ignore: quietHealthCheck
        ? (req) => (req as Request).originalUrl === '/api/health'
        : undefined,
    },

    serializers: {
      req: (req) => ({
        id: req.id,
        method: req.method,
        url: req.url,
        headers: redactHeaders(req.headers),
      }),
      res: (res) => ({
        statusCode: res.statusCode,
      }),
    },
  });
}

function redactHeaders(
  headers: Record<string, string | string[] | undefined>
): Record<string, string | string[] | undefined> {
  const redacted: Record<string, string | string[] | undefined> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (REDACTED_HEADERS.has(key.toLowerCase())) {
      redacted[key] = '[REDACTED]';
    } else if (value !== undefined) {
      redacted[key] = value;
    }
  }
  return redacted;
}

export { redactHeaders };
