import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { gatewayInvocationSchema, type GatewayInvocation } from '../gateway/invocation.js';
import type { AuthorizerHandler } from '../gateway/AuthorizerHandler.js';
import { mapError, sanitizeForLogging } from '../errors/index.js';

export interface AuthorizeRoutesOptions {
  handler: AuthorizerHandler;
}

/**
 * Gateway-facing routes. Every authorization decision, DENY included, is a 200 whose body the
 * gateway interprets; non-200 responses are reserved for invocations that could not be read.
 */
export async function authorizeRoutes(
  fastify: FastifyInstance,
  options: AuthorizeRoutesOptions
) {
  const { handler } = options;

  fastify.post<{
    Body: GatewayInvocation;
  }>('/v1/authorize', async (request: FastifyRequest<{ Body: GatewayInvocation }>, reply: FastifyReply) => {
    let invocation: GatewayInvocation;
    try {
      invocation = gatewayInvocationSchema.parse(request.body);
    } catch (error) {
      const appError = mapError(error);
      request.log.warn(
        { code: appError.code, details: sanitizeForLogging(appError.details) },
        'Rejected unreadable invocation'
      );
      return reply.status(appError.httpStatus).send(appError.toPayload(request.id));
    }

    const response = await handler.handle(invocation);
    return reply.status(200).send(response);
  });

  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({ status: 'ok' });
  });
}
