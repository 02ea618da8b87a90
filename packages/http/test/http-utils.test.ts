import { ERRORS } from '@fxconvert/domain';
import Fastify from 'fastify';
import { describe, expect, it } from 'vitest';
import { parseHost, parsePort } from '../src/bootstrap.js';
import { deny } from '../src/errors.js';
import { registerServiceMetrics } from '../src/metrics.js';

describe('deny', () => {
  it('sends the error envelope with the definition status', async () => {
    const app = Fastify({ logger: false, genReqId: () => 'req-1' });
    app.get('/fail', async (request, reply) => deny({ request, reply, error: ERRORS.INVALID_PAYLOAD, details: { field: 'amount' } }));

    const response = await app.inject({ method: 'GET', url: '/fail' });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: {
        code: 'INVALID_PAYLOAD',
        message: 'Invalid request payload.',
        requestId: 'req-1',
        details: { field: 'amount' }
      }
    });
    await app.close();
  });
});

describe('registerServiceMetrics', () => {
  it('counts requests by route and status', async () => {
    const app = Fastify({ logger: false });
    registerServiceMetrics(app, 'converter-api');
    app.get('/ping', async () => ({ ok: true }));

    await app.inject({ method: 'GET', url: '/ping' });
    const response = await app.inject({ method: 'GET', url: '/metrics' });

    expect(response.statusCode).toBe(200);
    expect(response.body).toContain('converter_api_request_total{method="GET",route="/ping",status="200"} 1');
    await app.close();
  });
});

describe('bootstrap parsing', () => {
  it('falls back to the default port and rejects invalid ones', () => {
    expect(parsePort(undefined, 3020, 'CONVERTER_API_PORT')).toBe(3020);
    expect(() => parsePort('70000', 3020, 'CONVERTER_API_PORT')).toThrow(
      'CONVERTER_API_PORT must be an integer between 1 and 65535.'
    );
  });

  it('rejects a blank host', () => {
    expect(parseHost(undefined, '0.0.0.0', 'CONVERTER_API_HOST')).toBe('0.0.0.0');
    expect(() => parseHost('  ', '0.0.0.0', 'CONVERTER_API_HOST')).toThrow('CONVERTER_API_HOST must be a non-empty host string.');
  });
});
