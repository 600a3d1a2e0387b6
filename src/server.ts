/**
 * @file src/server.ts
 * @description Calculator API - HTTP runtime
 *
 * Builds the Express application exposing the four arithmetic endpoints and
 * the health check, and owns the process lifecycle when run directly.
 *
 * ERROR HANDLING:
 * 1. Invalid bodies never reach a handler. The zod schema rejects them and
 *    the client receives 422 with one issue per failing field.
 * 2. Domain errors (division by zero) are raised by the calculator and
 *    mapped here to `HttpError(400)` with a fixed message.
 * 3. The final error middleware catches everything else, logs it with the
 *    request ID and answers a generic 500. Stack traces stay in the logs.
 */

import express, {
  type Application,
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
} from 'express';
import type { Server } from 'http';
import { randomUUID } from 'crypto';

import cors from 'cors';
import rateLimit from 'express-rate-limit';

import { calculate, DivisionByZeroError } from './calculator.js';
import { loadConfig } from './config.js';
import { HttpError, isBodyParserError, RequestValidationError } from './errors.js';
import { Logger } from './logger.js';
import { buildOpenApiDocument } from './openapi.js';
import { createMetrics, recordOperation, recordRequestDuration, renderMetrics } from './metrics.js';
import {
  CONSTANTS,
  OPERATIONS,
  schemas,
  type ErrorBody,
  type HealthResponse,
  type Metrics,
  type Operation,
  type ServerConfig,
} from './types.js';

function getRequestId(res: Response): string {
  const requestId: unknown = res.locals['requestId'];
  return typeof requestId === 'string' ? requestId : 'unknown';
}

function sendError(res: Response, status: number, detail: ErrorBody['detail']): void {
  const body: ErrorBody = { detail };
  res.status(status).json(body);
}

/**
 * Answers 405 for any method a route does not register.
 */
function methodNotAllowed(allow: string): RequestHandler {
  return (_req: Request, _res: Response, next: NextFunction) => {
    next(
      new HttpError(CONSTANTS.STATUS.METHOD_NOT_ALLOWED, CONSTANTS.MESSAGES.METHOD_NOT_ALLOWED, {
        Allow: allow,
      }),
    );
  };
}

/**
 * @summary Builds the handler for `POST /calc/<operation>`.
 * @remarks
 * Parse, validate, compute, serialize. The handler throws synchronously;
 * Express forwards the error to the error middleware registered last in
 * `createApp`.
 */
function calculationHandler(
  operation: Operation,
  logger: Logger,
  metrics: Metrics | undefined,
): RequestHandler {
  return (req: Request, res: Response) => {
    const requestLogger = logger.withContext({ requestId: getRequestId(res), operation });

    const parsed = schemas.calculationRequest.safeParse(req.body);
    if (!parsed.success) {
      requestLogger.debug('Calculation request failed validation', {
        issues: parsed.error.issues.length,
      });
      throw RequestValidationError.fromZodError(parsed.error);
    }

    try {
      const response = calculate(operation, parsed.data);
      if (metrics) recordOperation(metrics, operation);
      requestLogger.debug('Calculation completed', { ...response });
      res.status(CONSTANTS.STATUS.OK).json(response);
    } catch (error) {
      if (error instanceof DivisionByZeroError) {
        requestLogger.warn('Division by zero attempted', { a: error.dividend, b: parsed.data.b });
        throw new HttpError(CONSTANTS.STATUS.BAD_REQUEST, CONSTANTS.MESSAGES.DIVISION_BY_ZERO);
      }
      throw error;
    }
  };
}

/**
 * @summary Creates the fully configured Express application.
 * @remarks
 * MIDDLEWARE STACK:
 * 1. CORS (preflight answered here, cached for 24h)
 * 2. Request ID, request logging and duration metrics
 * 3. Rate limiting on `/calc` only, so health checks are never throttled
 * 4. Content-Length check
 * 5. JSON parsing
 * 6. Routes (including GET /openapi.json), 404 fallback, error middleware
 *
 * Nothing is shared between apps: each call gets its own logger, metrics
 * and rate-limit store.
 */
function createApp(config: ServerConfig = loadConfig(), logger = new Logger(config.logLevel)): Application {
  const app = express();
  const metrics = config.enableMetrics ? createMetrics() : undefined;

  app.disable('x-powered-by');

  app.use(
    cors({
      origin: config.corsOrigin,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Accept'],
      exposedHeaders: [CONSTANTS.HTTP.REQUEST_ID_HEADER],
      maxAge: CONSTANTS.HTTP.PREFLIGHT_CACHE,
    }),
  );

  app.use((req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();
    const requestId = randomUUID();
    res.locals['requestId'] = requestId;
    res.setHeader(CONSTANTS.HTTP.REQUEST_ID_HEADER, requestId);

    const requestLogger = logger.withContext({ requestId });
    requestLogger.debug('HTTP request received', {
      method: req.method,
      url: req.originalUrl,
      userAgent: req.headers['user-agent'],
      contentType: req.headers['content-type'],
    });

    res.on('finish', () => {
      const duration = Date.now() - startTime;
      if (metrics) recordRequestDuration(metrics, duration);
      requestLogger.debug('HTTP response sent', { status: res.statusCode, durationMs: duration });
    });

    next();
  });

  app.use(
    '/calc',
    rateLimit({
      windowMs: config.rateLimitWindow,
      limit: config.rateLimitMax,
      statusCode: CONSTANTS.STATUS.TOO_MANY_REQUESTS,
      message: { detail: CONSTANTS.MESSAGES.TOO_MANY_REQUESTS },
      standardHeaders: true,
      legacyHeaders: false,
    }),
  );

  // Reject oversized bodies from the header alone, before reading them.
  app.use((req: Request, _res: Response, next: NextFunction) => {
    const contentLength = parseInt(req.headers['content-length'] ?? '0', 10);
    if (contentLength > CONSTANTS.HTTP.MAX_REQUEST_SIZE) {
      next(
        new HttpError(
          CONSTANTS.STATUS.REQUEST_TOO_LARGE,
          `Request too large. Maximum size: ${CONSTANTS.HTTP.MAX_REQUEST_SIZE} bytes`,
          // The body is never read, so the connection cannot be reused.
          { Connection: 'close' },
        ),
      );
      return;
    }
    next();
  });

  app.use(express.json({ limit: CONSTANTS.HTTP.JSON_LIMIT }));

  app
    .route('/health')
    .get((_req: Request, res: Response) => {
      const body: HealthResponse = { status: 'ok' };
      res.json(body);
    })
    .all(methodNotAllowed('GET, HEAD'));

  for (const operation of OPERATIONS) {
    app
      .route(`/calc/${operation}`)
      .post(calculationHandler(operation, logger, metrics))
      .all(methodNotAllowed('POST'));
  }

  const openApiDocument = buildOpenApiDocument();
  app
    .route('/openapi.json')
    .get((_req: Request, res: Response) => {
      res.json(openApiDocument);
    })
    .all(methodNotAllowed('GET, HEAD'));

  if (metrics) {
    app
      .route('/metrics')
      .get((_req: Request, res: Response) => {
        res.set('Content-Type', 'text/plain; version=0.0.4');
        res.send(renderMetrics(metrics));
      })
      .all(methodNotAllowed('GET, HEAD'));
  }

  app.use((_req: Request, res: Response) => {
    sendError(res, CONSTANTS.STATUS.NOT_FOUND, CONSTANTS.MESSAGES.NOT_FOUND);
  });

  // Express recognises error middleware by its four parameters.
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (error instanceof HttpError) {
      res.set(error.headers);
      sendError(res, error.status, error.detail);
      return;
    }

    if (error instanceof RequestValidationError) {
      sendError(res, CONSTANTS.STATUS.UNPROCESSABLE_ENTITY, error.issues);
      return;
    }

    if (isBodyParserError(error)) {
      if (error.type === 'entity.parse.failed') {
        sendError(res, CONSTANTS.STATUS.UNPROCESSABLE_ENTITY, [
          { loc: ['body'], msg: CONSTANTS.MESSAGES.MALFORMED_JSON, type: 'json_invalid' },
        ]);
        return;
      }
      if (error.status >= 400 && error.status < 500) {
        sendError(res, error.status, error.message);
        return;
      }
    }

    logger.withContext({ requestId: getRequestId(res) }).error('Unhandled error in request handler', {
      method: req.method,
      url: req.originalUrl,
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    sendError(res, CONSTANTS.STATUS.INTERNAL_SERVER_ERROR, CONSTANTS.MESSAGES.INTERNAL_ERROR);
  });

  return app;
}

/**
 * Starts the HTTP server on the configured port and installs SIGTERM/SIGINT
 * handlers that close it before exiting.
 */
async function startServer(config: ServerConfig = loadConfig()): Promise<Server> {
  const logger = new Logger(config.logLevel);
  const app = createApp(config, logger);

  const server = await new Promise<Server>((resolve, reject) => {
    const s = app.listen(config.port, () => resolve(s));
    s.once('error', reject);
  });

  logger.info('Calculator API started', {
    port: config.port,
    corsOrigin: config.corsOrigin,
    rateLimitMax: config.rateLimitMax,
    metrics: config.enableMetrics,
    nodeVersion: process.version,
    pid: process.pid,
  });
  logger.info('Available endpoints', {
    health: `GET http://localhost:${config.port}/health`,
    openapi: `GET http://localhost:${config.port}/openapi.json`,
    calc: OPERATIONS.map((op) => `POST http://localhost:${config.port}/calc/${op}`),
    ...(config.enableMetrics && { metrics: `GET http://localhost:${config.port}/metrics` }),
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info('Graceful shutdown initiated', { signal });
    server.close((err) => {
      if (err) {
        logger.error('HTTP server failed to close', { error: err.message });
        process.exit(1);
      }
      logger.info('HTTP server closed', { uptime: process.uptime() });
      process.exit(0);
    });
  };

  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);

  return server;
}

if (require.main === module && process.env['NODE_ENV'] !== 'test') {
  startServer().catch((error: unknown) => {
    new Logger('error').error('Server startup failed', {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
  });
}

export { createApp, startServer };
