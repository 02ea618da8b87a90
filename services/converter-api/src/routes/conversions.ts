import type { ConversionService } from '@fxconvert/conversion';
import { ConversionRequestSchema, ERRORS, apiErrorFor, type ConversionFailure } from '@fxconvert/domain';
import { deny } from '@fxconvert/http';
import type { ConversionOutcomeLabel, ServiceMetrics } from '@fxconvert/observability';
import type { FastifyInstance } from 'fastify';

function outcomeLabel(error: ConversionFailure): ConversionOutcomeLabel {
  switch (error.code) {
    case 'INVALID_AMOUNT':
      return 'invalid_amount';
    case 'UNKNOWN_CURRENCY':
      return 'unknown_currency';
    case 'RATE_NETWORK_ERROR':
    case 'RATE_PARSE_ERROR':
      return 'rate_unavailable';
  }
}

export function registerConversionRoutes(
  app: FastifyInstance,
  deps: {
    service: ConversionService;
    metrics: ServiceMetrics;
  }
): void {
  app.post('/v1/conversions', async (request, reply) => {
    const parsed = ConversionRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return deny({
        request,
        reply,
        error: ERRORS.INVALID_PAYLOAD,
        details: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
      });
    }

    const outcome = await deps.service.convert(parsed.data);
    if (outcome.isErr()) {
      deps.metrics.conversionCount.labels(outcomeLabel(outcome.error)).inc();
      return deny({ request, reply, error: apiErrorFor(outcome.error) });
    }

    const result = outcome.value;
    deps.metrics.conversionCount.labels('success').inc();
    reply.status(201).send(result);

    // Recorded after the reply is written; `record` resolves to a Result and never rejects.
    void deps.service.record(result);
    return reply;
  });
}
