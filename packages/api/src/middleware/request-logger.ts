import { FastifyRequest, FastifyReply } from 'fastify';

export function requestLoggerHook(
  request: FastifyRequest,
  _reply: FastifyReply,
  done: () => void
): void {
  request.log.info(
    {
      method: request.method,
      url: request.url,
      ip: request.ip,
    },
    'Incoming request'
  );

  done();
}

export function responseLoggerHook(
  request: FastifyRequest,
  reply: FastifyReply,
  done: () => void
): void {
  request.log.info(
    {
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      durationMs: Math.round(reply.elapsedTime),
    },
    'Request completed'
  );
  done();
}
