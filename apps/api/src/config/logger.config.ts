/**
 * Logger Configuration
 *
 * Pino through nestjs-pino: readable colourised output in development,
 * structured JSON in production, request correlation ids and redaction of
 * credentials.
 */

import type { IncomingHttpHeaders } from 'http';
import type { Params } from 'nestjs-pino';
import type { Level, TransportSingleOptions } from 'pino';
import type { Options } from 'pino-http';

import { randomUUID } from 'crypto';

/**
 * Routes excluded from automatic request logging
 */
export const IGNORED_ROUTES = ['/api/health'];

const REDACT_PATHS = ['req.headers.authorization', 'req.headers.cookie', 'res.headers["set-cookie"]'];

export function shouldIgnoreRoute(url?: string): boolean {
  if (!url) return false;
  return IGNORED_ROUTES.some((route) => url === route || url.startsWith(route + '/') || url.startsWith(route + '?'));
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Reuses an upstream request id when one is present, otherwise a random UUID.
 */
export function generateRequestId(headers: IncomingHttpHeaders): string {
  return firstHeader(headers['x-request-id']) || firstHeader(headers['x-correlation-id']) || randomUUID();
}

export function resolveLogLevel(status: number, err?: Error): Level {
  if (status >= 500 || err) return 'error';
  if (status >= 400) return 'warn';
  return 'info';
}

function buildTransport(isProduction: boolean): TransportSingleOptions | undefined {
  // Production writes JSON lines to stdout
  if (isProduction) return undefined;

  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      singleLine: false,
      translateTime: 'HH:MM:ss.l',
      ignore: 'pid,hostname,req,res',
      messageFormat: '{if context}[{context}] {end}{msg}{if responseTime} ({responseTime}ms){end}'
    }
  };
}

/**
 * Create LoggerModule configuration
 */
export function createLoggerConfig(env: NodeJS.ProcessEnv = process.env): Params {
  const isProduction = env.NODE_ENV === 'production';
  const transport = buildTransport(isProduction);

  const pinoHttp: Options = {
    level: env.LOG_LEVEL || (isProduction ? 'info' : 'debug'),
    autoLogging: {
      ignore: (req) => shouldIgnoreRoute(req.url)
    },
    genReqId: (req) => generateRequestId(req.headers),
    customLogLevel: (_req, res, err) => resolveLogLevel(res.statusCode, err),
    customSuccessMessage: (req, res) => `${req.method || 'UNKNOWN'} ${req.url || '/'} - ${res.statusCode}`,
    customErrorMessage: (req, res, err) =>
      `${req.method || 'UNKNOWN'} ${req.url || '/'} - ${res.statusCode} - ${err.message}`,
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]'
    },
    serializers: {
      req: (req: { method?: string; url?: string; id?: string }) => ({
        method: req.method,
        url: req.url,
        id: req.id
      }),
      res: (res: { statusCode?: number }) => ({
        statusCode: res.statusCode
      })
    },
    ...(transport && { transport })
  };

  return {
    pinoHttp,
    forRoutes: ['{*path}']
  };
}
