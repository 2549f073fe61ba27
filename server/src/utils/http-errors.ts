import type { FastifyReply, FastifyRequest } from "fastify";

import { InvalidParameterError, isSynthesisError } from "../errors.js";

type ErrorBody = {
  message: string;
  code: string;
  field?: string;
};

/** Maps pipeline errors onto status codes; anything unexpected is a logged 500. */
export function sendError(
  request: FastifyRequest,
  reply: FastifyReply,
  error: unknown,
  context: Record<string, unknown> = {},
): FastifyReply {
  if (isSynthesisError(error)) {
    const body: ErrorBody = { message: error.message, code: error.code };
    if (error instanceof InvalidParameterError) {
      body.field = error.field;
    }

    if (error.statusCode >= 500) {
      request.log.error({ err: error, ...context }, "Synthesis request failed");
    } else {
      request.log.warn({ code: error.code, ...context }, error.message);
    }
    return reply.status(error.statusCode).send(body);
  }

  request.log.error({ err: error, ...context }, "Unexpected error");
  return reply
    .status(500)
    .send({ message: "Internal server error", code: "INTERNAL" } satisfies ErrorBody);
}
