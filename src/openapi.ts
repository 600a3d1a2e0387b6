import { zodToJsonSchema } from 'zod-to-json-schema';
import type { ZodTypeAny } from 'zod';
import { CONSTANTS, OPERATIONS, schemas, type Operation } from './types.js';

/** A generated schema, published as is. */
type JsonSchema = object;

type SchemaRef = { $ref: string };

type ResponseObject = {
  description: string;
  content?: { 'application/json': { schema: SchemaRef } };
};

type OperationObject = {
  summary: string;
  operationId: string;
  tags: string[];
  requestBody?: {
    required: boolean;
    content: { 'application/json': { schema: SchemaRef } };
  };
  responses: Record<string, ResponseObject>;
};

export type OpenApiDocument = {
  openapi: string;
  info: { title: string; version: string };
  paths: Record<string, Record<string, OperationObject>>;
  components: { schemas: Record<string, JsonSchema> };
};

/**
 * Component name → zod schema. Everything the paths reference lives here.
 */
const COMPONENTS = {
  CalculationRequest: schemas.calculationRequest,
  CalculationResponse: schemas.calculationResponse,
  HealthResponse: schemas.healthResponse,
  ErrorResponse: schemas.errorResponse,
  HTTPValidationError: schemas.validationErrorResponse,
} satisfies Record<string, ZodTypeAny>;

type ComponentName = keyof typeof COMPONENTS;

function ref(name: ComponentName): SchemaRef {
  return { $ref: `#/components/schemas/${name}` };
}

function jsonResponse(description: string, name: ComponentName): ResponseObject {
  return { description, content: { 'application/json': { schema: ref(name) } } };
}

const SUMMARIES: Record<Operation, string> = {
  add: 'Add b to a',
  subtract: 'Subtract b from a',
  multiply: 'Multiply a by b',
  divide: 'Divide a by b',
};

function calculationOperation(operation: Operation): OperationObject {
  const responses: Record<string, ResponseObject> = {
    '200': jsonResponse('Successful Response', 'CalculationResponse'),
  };
  if (operation === 'divide') {
    responses['400'] = jsonResponse(CONSTANTS.MESSAGES.DIVISION_BY_ZERO, 'ErrorResponse');
  }
  responses['422'] = jsonResponse('Validation Error', 'HTTPValidationError');
  responses['429'] = jsonResponse(CONSTANTS.MESSAGES.TOO_MANY_REQUESTS, 'ErrorResponse');

  return {
    summary: SUMMARIES[operation],
    operationId: operation,
    tags: ['calc'],
    requestBody: {
      required: true,
      content: { 'application/json': { schema: ref('CalculationRequest') } },
    },
    responses,
  };
}

/**
 * Builds the OpenAPI 3.0 document describing `/health` and every
 * `/calc/<operation>` route. Component schemas are generated from the same
 * zod schemas the handlers validate with, so the two cannot drift apart.
 */
export function buildOpenApiDocument(): OpenApiDocument {
  const components: Record<string, JsonSchema> = {};
  for (const [name, schema] of Object.entries(COMPONENTS)) {
    components[name] = zodToJsonSchema(schema, { target: 'openApi3', $refStrategy: 'none' });
  }

  const paths: OpenApiDocument['paths'] = {
    '/health': {
      get: {
        summary: 'Health check',
        operationId: 'health',
        tags: ['health'],
        responses: { '200': jsonResponse('Successful Response', 'HealthResponse') },
      },
    },
  };
  for (const operation of OPERATIONS) {
    paths[`/calc/${operation}`] = { post: calculationOperation(operation) };
  }

  return {
    openapi: '3.0.3',
    info: { title: CONSTANTS.API.TITLE, version: CONSTANTS.API.VERSION },
    paths,
    components: { schemas: components },
  };
}
