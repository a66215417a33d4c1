import { ZodError } from "zod";
import type { FastifyReply, FastifyRequest } from "fastify";
import {
  AuthenticationError,
  NotImplementedError,
  StepUpChallengeError,
  ValidationError
} from "../core/errors.js";
import type { CredentialContext } from "../core/services/credential-context.js";
import type { GatewayContext } from "../core/services/gateway-context.js";
import type { ErrorEnvelope, ErrorType } from "../core/types/envelope.js";
import { createId } from "../lib/id.js";

export function requestIdFromHeaders(headers: Record<string, unknown>): string {
  const header = headers["x-request-id"];
  if (typeof header === "string" && header.trim().length > 0) {
    return header;
  }
  if (Array.isArray(header) && typeof header[0] === "string" && header[0].trim().length > 0) {
    return header[0];
  }
  return createId("req");
}

export function authHeaderFromHeaders(headers: Record<string, unknown>): string | undefined {
  const header = headers.authorization;
  if (typeof header === "string") {
    return header;
  }
  if (Array.isArray(header) && typeof header[0] === "string") {
    return header[0];
  }
  return undefined;
}

export function bearerTokenFromHeaders(headers: Record<string, unknown>): string | undefined {
  const header = authHeaderFromHeaders(headers);
  if (!header) {
    return undefined;
  }
  const match = /^bearer\s+(\S+)\s*$/i.exec(header);
  return match?.[1];
}

// Header values may only carry visible ASCII, space and tab.
const HEADER_SAFE = /^[\t\x20-\x7e]*$/;

/**
 * Builds the `WWW-Authenticate` value for a step-up challenge. The claims
 * challenge goes in as a quoted-string; when it cannot be carried in a header
 * only the error is advertised and the body remains the source of truth.
 */
export function stepUpAuthenticateHeader(claimsChallenge: string | undefined): string {
  const base = 'Bearer error="insufficient_claims"';
  if (claimsChallenge === undefined || !HEADER_SAFE.test(claimsChallenge)) {
    return base;
  }
  const quoted = claimsChallenge.replace(/[\\"]/g, (char) => `\\${char}`);
  return `${base}, error_description="${quoted}"`;
}

export interface RequestScope {
  credentials: CredentialContext;
  abortSignal: AbortSignal;
}

/**
 * Runs a route handler with its own credential context. The caller's token is
 * bound before the handler runs and the context is cleared when it finishes,
 * whatever the outcome. The abort signal fires if the client disconnects first.
 */
export async function withRequestScope<T>(
  context: GatewayContext,
  request: FastifyRequest,
  reply: FastifyReply,
  handler: (scope: RequestScope) => Promise<T>
): Promise<T> {
  const credentials = context.createCredentialContext();
  const controller = new AbortController();
  const onClose = () => {
    if (!reply.raw.writableFinished) {
      controller.abort(new Error("Client closed the connection."));
    }
  };
  reply.raw.once("close", onClose);

  try {
    const token = bearerTokenFromHeaders(request.headers);
    if (context.inboundTokenVerifier) {
      // With verification configured, anonymous callers never reach the service identity.
      if (!token) {
        throw new AuthenticationError("A bearer token is required.");
      }
      await context.inboundTokenVerifier.verify(token);
    }
    if (token) {
      credentials.setToken(token);
    }
    return await handler({ credentials, abortSignal: controller.signal });
  } finally {
    reply.raw.off("close", onClose);
    credentials.clear();
  }
}

interface MappedError {
  status: number;
  type: ErrorType;
  message: string;
}

function mapError(error: unknown): MappedError {
  if (error instanceof StepUpChallengeError) {
    return { status: 401, type: "mfa_required", message: error.message };
  }
  if (error instanceof ZodError) {
    return { status: 400, type: "validation_error", message: "Invalid request payload." };
  }
  if (error instanceof ValidationError) {
    return { status: 400, type: "validation_error", message: error.message };
  }
  if (error instanceof AuthenticationError) {
    return { status: 401, type: "authentication_error", message: "Unauthorized access" };
  }
  if (error instanceof NotImplementedError) {
    return { status: 501, type: "not_implemented_error", message: "Feature not implemented" };
  }
  // Request errors raised by the framework itself keep their status (400 malformed JSON, 413 oversized body, 415 content type).
  if (
    error instanceof Error &&
    "statusCode" in error &&
    typeof error.statusCode === "number" &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  ) {
    return { status: error.statusCode, type: "validation_error", message: error.message };
  }
  return { status: 500, type: "server_error", message: "Internal server error" };
}

/**
 * The one place thrown errors become HTTP responses.
 */
export function handleError(error: unknown, request: FastifyRequest, reply: FastifyReply) {
  const mapped = mapError(error);
  const envelope: ErrorEnvelope = {
    error: {
      code: mapped.status,
      message: mapped.message,
      type: mapped.type
    }
  };

  if (error instanceof StepUpChallengeError) {
    envelope.error.details = {
      claimsChallenge: error.claimsChallenge ?? null,
      scopes: [...error.scopes],
      correlationId: error.correlationId ?? null,
      errorCode: error.providerErrorCode,
      classification: error.classification
    };
    reply.header("www-authenticate", stepUpAuthenticateHeader(error.claimsChallenge));
    request.log.warn(
      {
        providerErrorCode: error.providerErrorCode,
        classification: error.classification,
        correlationId: error.correlationId
      },
      "Step-up authentication required"
    );
  } else if (mapped.status >= 500) {
    request.log.error({ err: error }, "An unhandled exception occurred");
  } else {
    request.log.info({ type: mapped.type, status: mapped.status }, error instanceof Error ? error.message : "Request rejected");
  }

  return reply.status(mapped.status).type("application/json").send(envelope);
}
