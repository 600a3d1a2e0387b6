import { describe, test, expect, beforeAll, afterAll } from '@jest/globals';
import { createApp } from '../server.js';
import { postJson, startTestServer, testConfig } from './test-utils.js';

describe('Calculator API - async HTTP client', () => {
  let baseUrl: string;
  let cleanup: () => Promise<void>;

  beforeAll(async () => {
    ({ baseUrl, cleanup } = await startTestServer(createApp(testConfig())));
  });

  afterAll(async () => {
    await cleanup();
  });

  test('POST /calc/add over HTTP returns the sum', async () => {
    const { status, body } = await postJson(baseUrl, '/calc/add', { a: 1, b: 4 });

    expect(status).toBe(200);
    expect(body).toEqual({ operation: 'add', a: 1, b: 4, result: 5 });
  });

  test('POST /calc/divide by zero over HTTP returns 400', async () => {
    const { status, body } = await postJson(baseUrl, '/calc/divide', { a: 2, b: 0 });

    expect(status).toBe(400);
    expect(body).toEqual({ detail: 'Cannot divide by zero' });
  });

  test('GET /health over HTTP', async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toMatch(/^application\/json/);
    expect(await response.json()).toEqual({ status: 'ok' });
  });

  test('concurrent requests are handled independently', async () => {
    const results = await Promise.all(
      Array.from({ length: 10 }, (_, i) => postJson(baseUrl, '/calc/multiply', { a: i, b: i })),
    );

    results.forEach(({ status, body }, i) => {
      expect(status).toBe(200);
      expect(body).toEqual({ operation: 'multiply', a: i, b: i, result: i * i });
    });
  });

  test('operands round-trip unchanged', async () => {
    const a = 123456.789;
    const b = -0.000001;
    const { body } = await postJson(baseUrl, '/calc/subtract', { a, b });

    expect(body).toEqual({ operation: 'subtract', a, b, result: a - b });
  });

  test('a non-numeric operand over HTTP is a 422', async () => {
    const { status, body } = await postJson(baseUrl, '/calc/divide', { a: 'ten', b: 2 });

    expect(status).toBe(422);
    expect(body).toEqual({
      detail: [{ loc: ['body', 'a'], msg: 'Input should be a valid number', type: 'invalid_type' }],
    });
  });
});
