/**
 * @file src/types.ts
 * @description Data contracts for the calculator API.
 * Zod schemas, constants and TypeScript type definitions live here. Apart
 * from the operand coercion the schemas run, the file holds no runtime logic,
 * so every other module can depend on it.
 */

import { z } from 'zod';

/**
 * The closed set of arithmetic operations exposed under `/calc/<operation>`.
 */
export const OPERATIONS = ['add', 'subtract', 'multiply', 'divide'] as const;

export type Operation = (typeof OPERATIONS)[number];

/**
 * Decimal float syntax accepted in a string operand: optional sign, digits
 * with an optional fraction, optional exponent.
 */
const FLOAT_STRING = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Turns a string that spells a finite float into that number. Every other
 * value is passed through untouched for `z.number()` to judge.
 */
export function coerceNumericString(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const trimmed = value.trim();
  if (!FLOAT_STRING.test(trimmed)) return value;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : value;
}

/**
 * Operand schema shared by `a` and `b`. JSON numbers and numeric strings
 * (`"2"`, `" -1.5e3 "`) are accepted; empty or non-numeric strings, booleans,
 * null and objects are rejected before a handler runs.
 */
const operand = (description: string) =>
  z.preprocess(
    coerceNumericString,
    z
      .number({
        required_error: 'Field required',
        invalid_type_error: 'Input should be a valid number',
      })
      .describe(description),
  );

const validationIssue = z.object({
  loc: z.array(z.union([z.string(), z.number()])).describe('Path to the failing value, starting at "body"'),
  msg: z.string().describe('What is wrong with the value'),
  type: z.string().describe('Validator issue code'),
});

/**
 * Pre-compiled Zod schemas for request and response bodies.
 *
 * The request schema validates every `POST /calc/*` body at run time. The
 * response and error schemas type the handlers' output and are published,
 * together with the request schema, in the document served at
 * `GET /openapi.json`.
 */
export const schemas = {
  /**
   * Body of every `POST /calc/*` request. Unknown keys are stripped.
   */
  calculationRequest: z.object({
    a: operand('First operand'),
    b: operand('Second operand'),
  }),

  calculationResponse: z.object({
    operation: z.enum(OPERATIONS).describe('Operation that produced the result'),
    a: z.number().describe('First operand, echoed from the request'),
    b: z.number().describe('Second operand, echoed from the request'),
    result: z.number().describe('Computed result'),
  }),

  healthResponse: z.object({
    status: z.literal('ok').describe('Always "ok" while the process serves requests'),
  }),

  errorResponse: z.object({
    detail: z.string().describe('Human-readable reason for the failure'),
  }),

  validationErrorResponse: z.object({
    detail: z.array(validationIssue).describe('One entry per failing field'),
  }),
} as const;

/**
 * Parsed (post-coercion) type of a schema: `a` and `b` are numbers here even
 * when the client sent them as strings.
 */
export type SchemaOutput<T extends keyof typeof schemas> = z.infer<(typeof schemas)[T]>;

export type CalculationRequest = SchemaOutput<'calculationRequest'>;
export type CalculationResponse = SchemaOutput<'calculationResponse'>;
export type HealthResponse = SchemaOutput<'healthResponse'>;

/**
 * Application-wide constants.
 */
export const CONSTANTS = {
  /** Title and version published in GET /openapi.json */
  API: {
    TITLE: 'Calculator API',
    VERSION: '0.1.0',
  },

  HTTP: {
    /** Maximum request body size, checked against Content-Length before parsing */
    MAX_REQUEST_SIZE: 1048576, // 1MB
    /** Express JSON parser limit (should match MAX_REQUEST_SIZE) */
    JSON_LIMIT: '1mb',
    /** CORS preflight cache duration in seconds */
    PREFLIGHT_CACHE: 86400, // 24 hours
    /** Response header carrying the per-request correlation ID */
    REQUEST_ID_HEADER: 'X-Request-ID',
  },

  STATUS: {
    OK: 200,
    BAD_REQUEST: 400,
    NOT_FOUND: 404,
    METHOD_NOT_ALLOWED: 405,
    REQUEST_TOO_LARGE: 413,
    UNPROCESSABLE_ENTITY: 422,
    TOO_MANY_REQUESTS: 429,
    INTERNAL_SERVER_ERROR: 500,
  },

  /**
   * Fixed client-facing messages. Tests assert these verbatim.
   */
  MESSAGES: {
    DIVISION_BY_ZERO: 'Cannot divide by zero',
    NOT_FOUND: 'Not Found',
    METHOD_NOT_ALLOWED: 'Method Not Allowed',
    TOO_MANY_REQUESTS: 'Too many requests. Please try again later.',
    INTERNAL_ERROR: 'Internal Server Error',
    MALFORMED_JSON: 'JSON decode error',
  },

  METRICS: {
    /** Number of request durations retained for quantile calculation */
    MAX_SAMPLES: 1000,
  },
} as const;

/**
 * Shape of the in-memory metrics collector owned by one app instance.
 */
export type Metrics = {
  /** Request duration measurements in milliseconds, most recent last */
  requestDuration: number[];
  /** Successful calculations per operation */
  operationCount: Map<Operation, number>;
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Configuration for the server, read from the environment by `loadConfig`.
 */
export type ServerConfig = {
  /** Port number for the HTTP server */
  port: number;
  /** CORS origin policy (use specific origins in production) */
  corsOrigin: string;
  /** Whether to collect metrics and expose GET /metrics */
  enableMetrics: boolean;
  /** Minimum level a log entry needs to be written */
  logLevel: LogLevel;
  /** Maximum requests per client in the rate limit window */
  rateLimitMax: number;
  /** Rate limiting time window in milliseconds */
  rateLimitWindow: number;
};

/**
 * Structured log entry as written to stdout.
 */
export type LogEntry = {
  /** ISO 8601 timestamp of the log entry */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Contextual data (request ID, operation, ...) */
  context: Record<string, unknown>;
  /** Additional structured data */
  [key: string]: unknown;
};

/**
 * One entry of a 422 response body: where the problem is, what it is, and
 * the validator's code for it.
 */
export type ValidationIssue = z.infer<typeof validationIssue>;

/**
 * Body of every error response: a fixed message, or the per-field issues of
 * a 422.
 */
export type ErrorBody = {
  detail: SchemaOutput<'errorResponse'>['detail'] | ValidationIssue[];
};
