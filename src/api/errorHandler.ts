import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { isGatewayError } from '../utils/errors.js';

/** Maps gateway errors to their status, validation failures to 400, the rest to 500. */
export function errorHandler(err: FastifyError | Error, req: FastifyRequest, reply: FastifyReply) {
  if (err instanceof ZodError) {
    req.log.warn({ issues: err.issues }, 'Request validation failed');
    return reply.status(400).send({ error: 'validation_failed', details: err.issues });
  }

  if (isGatewayError(err)) {
    if (err.status >= 500) {
      req.log.error({ err }, err.message);
    } else {
      req.log.warn({ code: err.code }, err.message);
    }
    const payload: Record<string, unknown> = { error: err.code, message: err.message };
    if (err.details != null) payload.details = err.details;
    return reply.status(err.status).send(payload);
  }

  const status = 'statusCode' in err && typeof err.statusCode === 'number' && err.statusCode >= 400 ? err.statusCode : 500;
  if (status >= 500) {
    req.log.error({ err }, 'Unhandled error');
    return reply.status(500).send({ error: 'internal_error', message: 'Internal server error' });
  }
  return reply.status(status).send({ error: 'bad_request', message: err.message });
}
