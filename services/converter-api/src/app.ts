/**
 * Converter API
 *
 * HTTP front end over the shared conversion stack: single-rate lookups and
 * conversions that are recorded to history once the reply is sent.
 */

import type { RateCache } from '@fxconvert/adapters';
import { loadConverterServiceEnv, loadRuntimeConfig } from '@fxconvert/config';
import { createConversionStack, type ConversionStack } from '@fxconvert/conversion';
import { dbHealthcheck } from '@fxconvert/db';
import { ERRORS } from '@fxconvert/domain';
import { deny, registerServiceMetrics } from '@fxconvert/http';
import { createServiceLogger, type HealthProbe, type ServiceLogger } from '@fxconvert/observability';
import Fastify, { type FastifyInstance } from 'fastify';
import { registerConversionRoutes } from './routes/conversions.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerRateRoutes } from './routes/rates.js';

export interface ConverterApiDeps {
  stack: ConversionStack;
  logger: ServiceLogger;
  probes: HealthProbe[];
}

function rateCacheProbe(rates: RateCache): HealthProbe {
  return {
    name: 'rates',
    check: async () => {
      const snapshot = rates.snapshot();
      if (!snapshot) {
        return { status: 'degraded', message: 'rate table not loaded yet' };
      }
      return {
        status: rates.isFresh() ? 'healthy' : 'degraded',
        message: `base=${snapshot.base} source=${snapshot.source} fetchedAt=${snapshot.fetchedAt.toISOString()}`
      };
    }
  };
}

const databaseProbe: HealthProbe = {
  name: 'database',
  check: async () => ((await dbHealthcheck()) ? { status: 'healthy' } : { status: 'degraded' })
};

export function defaultProbes(stack: ConversionStack): HealthProbe[] {
  return stack.store ? [databaseProbe, rateCacheProbe(stack.rates)] : [rateCacheProbe(stack.rates)];
}

export async function buildConverterApiApp(overrides: Partial<ConverterApiDeps> = {}): Promise<FastifyInstance> {
  const logger =
    overrides.logger ?? createServiceLogger({ service: 'converter-api', minLevel: loadRuntimeConfig().LOG_LEVEL ?? 'info' });
  const stack = overrides.stack ?? createConversionStack({ env: loadConverterServiceEnv(), logger });
  const probes = overrides.probes ?? defaultProbes(stack);

  const app = Fastify({ logger: false });
  const metrics = registerServiceMetrics(app, 'converter-api');

  app.setErrorHandler((error, request, reply) => {
    if (error.statusCode !== undefined && error.statusCode < 500) {
      logger.info('converter-api request rejected', {
        requestId: request.id,
        route: request.routeOptions.url,
        code: error.code,
        error: error.message
      });
      return deny({ request, reply, error: ERRORS.INVALID_PAYLOAD });
    }

    logger.error('converter-api request failed', {
      requestId: request.id,
      route: request.routeOptions.url,
      error: error.message
    });
    return deny({ request, reply, error: ERRORS.INTERNAL_ERROR });
  });

  registerHealthRoutes(app, { probes });
  registerRateRoutes(app, { rates: stack.rates });
  registerConversionRoutes(app, { service: stack.service, metrics });

  app.addHook('onClose', async () => {
    await stack.activityLog.idle();
  });

  return app;
}
