import type { FastifyReply, FastifyRequest } from 'fastify';
import { Actor } from '../types/fulfillment.types';
import { DomainError } from './errors';

const PRIVILEGED_ROLES = new Set(
     (process.env.PRIVILEGED_ROLES || 'supervisor,admin')
          .split(',')
          .map((role) => role.trim().toLowerCase())
          .filter((role) => role.length > 0)
);

export class MissingActorError extends DomainError {
     constructor() {
          super('x-actor-id header is required', 'ACTOR_REQUIRED', 400);
     }
}

function headerValue(value: string | string[] | undefined): string | undefined {
     const first = Array.isArray(value) ? value[0] : value;
     const trimmed = first?.trim();
     return trimmed ? trimmed : undefined;
}

/**
 * Resolves the acting user from `x-actor-id` / `x-actor-role`. Identity is
 * established upstream; this only decides whether the role is privileged.
 */
export function actorFromRequest(request: FastifyRequest): Actor {
     const id = headerValue(request.headers['x-actor-id']);
     if (!id) {
          throw new MissingActorError();
     }

     const role = headerValue(request.headers['x-actor-role'])?.toLowerCase();
     return { id, privileged: role !== undefined && PRIVILEGED_ROLES.has(role) };
}

// Maps domain errors to their status; anything else is logged and answered with 500
export function sendError(
     request: FastifyRequest,
     reply: FastifyReply,
     error: unknown,
     context: string
): FastifyReply {
     if (error instanceof DomainError) {
          if (error.statusCode >= 500) {
               request.log.error({ err: error }, context);
          }
          return reply.code(error.statusCode).send({
               error: error.code,
               message: error.message,
          });
     }

     request.log.error({ err: error }, context);
     return reply.code(500).send({
          error: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
     });
}
