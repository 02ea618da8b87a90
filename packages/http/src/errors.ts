import type { ApiErrorDefinition } from '@fxconvert/domain';
import type { FastifyReply, FastifyRequest } from 'fastify';

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    requestId: string;
    details?: unknown;
  };
}

export function errorEnvelope(request: FastifyRequest, code: string, message: string, details?: unknown): ErrorEnvelope {
  return {
    error: {
      code,
      message,
      requestId: request.id,
      ...(details !== undefined ? { details } : {})
    }
  };
}

export function deny(params: {
  request: FastifyRequest;
  reply: FastifyReply;
  error: ApiErrorDefinition;
  details?: unknown;
}): FastifyReply {
  return params.reply
    .status(params.error.status)
    .send(errorEnvelope(params.request, params.error.code, params.error.message, params.details));
}
