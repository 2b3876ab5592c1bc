import type { FastifyError, FastifyReply, FastifyRequest } from "fastify";
import { isOrderBookError, type OrderBookErrorCode } from "../engine/index.js";

const STATUS_BY_CODE: Record<OrderBookErrorCode, number> = {
  INVALID_ORDER: 400,
  DUPLICATE_ORDER: 409,
  NOT_FOUND: 404,
  UNKNOWN_SYMBOL: 404,
  INVALID_REQUEST: 400,
  INSUFFICIENT_LIQUIDITY: 422,
};

export function statusForCode(code: OrderBookErrorCode): number {
  return STATUS_BY_CODE[code];
}

export function errorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply
): FastifyReply {
  if (isOrderBookError(error)) {
    request.log.info({ code: error.code, details: error.details }, error.message);
    return reply.status(statusForCode(error.code)).send(error.toJSON());
  }

  // malformed JSON, oversized bodies and the like
  if (error.statusCode !== undefined && error.statusCode < 500) {
    return reply.status(error.statusCode).send({
      error: { code: error.code, message: error.message },
    });
  }

  request.log.error({ err: error }, "unhandled error");
  return reply.status(500).send({
    error: { code: "INTERNAL_ERROR", message: "Internal server error" },
  });
}
