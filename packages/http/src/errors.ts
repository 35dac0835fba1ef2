import type { VersioningError, VersioningErrorCode } from '@versionkit/core';
import type { FastifyReply, FastifyRequest } from 'fastify';

export function errorEnvelope(request: FastifyRequest, code: string, message: string, details?: unknown): { error: Record<string, unknown> } {
  const error: Record<string, unknown> = {
    code,
    message,
    requestId: request.id
  };

  if (details !== undefined) {
    error.details = details;
  }

  return { error };
}

export function deny(params: {
  request: FastifyRequest;
  reply: FastifyReply;
  code: string;
  message: string;
  status?: number;
  details?: unknown;
}): FastifyReply {
  return params.reply.status(params.status ?? 400).send(errorEnvelope(params.request, params.code, params.message, params.details));
}

export const VERSIONING_ERROR_STATUS: Readonly<Record<VersioningErrorCode, number>> = {
  INVALID_VERSION: 400,
  MISSING_VERSION: 400,
  UNSUPPORTED_VERSION: 400,
  ROUTE_NOT_FOUND: 404,
  VERSION_NOT_FOUND: 404,
  INCOMPARABLE_VERSIONS: 500,
  VERSIONING_CONFIGURATION: 500
};

export function denyVersioningError(request: FastifyRequest, reply: FastifyReply, error: VersioningError): FastifyReply {
  const status = VERSIONING_ERROR_STATUS[error.code];

  // Server-side faults keep their details in the logs.
  if (status >= 500) {
    return deny({ request, reply, status, code: error.code, message: 'API versioning is misconfigured.' });
  }

  return deny({ request, reply, status, code: error.code, message: error.message, details: error.details });
}
