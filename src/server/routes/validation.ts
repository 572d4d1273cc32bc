import type { FastifyReply, FastifyRequest } from 'fastify';
import type { z } from 'zod';
import { createErrorResponse, ErrorCode } from '../types.js';

/**
 * Parse a request part, sending 400 BAD_REQUEST when it does not match.
 * Returns null once the error reply has been sent; the handler should
 * then return the reply.
 */
export function parseOrReply<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  label: string,
  request: FastifyRequest,
  reply: FastifyReply
): z.infer<S> | null {
  const result = schema.safeParse(value ?? {});
  if (result.success) {
    return result.data;
  }
  void reply.status(400).send(
    createErrorResponse(
      ErrorCode.BAD_REQUEST,
      `Invalid ${label}`,
      { errors: result.error.errors },
      request.id
    )
  );
  return null;
}
