import type { RateCache } from '@fxconvert/adapters';
import { apiErrorFor, isConversionFailure, normalizeCurrencyCode } from '@fxconvert/domain';
import { deny } from '@fxconvert/http';
import type { FastifyInstance } from 'fastify';

export function registerRateRoutes(app: FastifyInstance, deps: { rates: RateCache }): void {
  app.get<{ Params: { code: string } }>('/v1/rates/:code', async (request, reply) => {
    try {
      const code = normalizeCurrencyCode(request.params.code);
      const rate = await deps.rates.getRate(code);
      const snapshot = deps.rates.snapshot();

      return reply.status(200).send({
        base: deps.rates.base,
        code,
        rate,
        fetchedAt: snapshot?.fetchedAt.toISOString() ?? null
      });
    } catch (error) {
      if (isConversionFailure(error)) {
        return deny({ request, reply, error: apiErrorFor(error) });
      }
      throw error;
    }
  });
}
