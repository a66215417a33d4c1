export const STEP_UP_MESSAGE = "Multi-factor authentication is required";

export interface StepUpChallengeInput {
  providerErrorCode: string;
  claimsChallenge?: string | undefined;
  scopes: readonly string[];
  correlationId?: string | undefined;
  classification: string;
  message?: string | undefined;
  cause?: unknown;
}

/**
 * Raised when the identity provider will not issue a delegated token without
 * further interactive proof from the end user (MFA, conditional access, consent).
 *
 * The claims challenge is an opaque provider payload: it is stored and forwarded
 * exactly as received.
 */
export class StepUpChallengeError extends Error {
  readonly providerErrorCode: string;
  readonly claimsChallenge: string | undefined;
  readonly scopes: readonly string[];
  readonly correlationId: string | undefined;
  readonly classification: string;

  constructor(input: StepUpChallengeInput) {
    if (!Array.isArray(input.scopes) || input.scopes.length === 0) {
      throw new TypeError("StepUpChallengeError requires at least one scope.");
    }
    super(input.message ?? STEP_UP_MESSAGE, input.cause === undefined ? undefined : { cause: input.cause });
    this.name = "StepUpChallengeError";
    this.providerErrorCode = input.providerErrorCode;
    this.claimsChallenge = input.claimsChallenge;
    this.scopes = Object.freeze([...input.scopes]);
    this.correlationId = input.correlationId;
    this.classification = input.classification;
  }
}

export type DelegationFailureKind = "misconfigured" | "provider_rejected" | "provider_unavailable" | "invalid_response";

/**
 * Server-side failure talking to the identity provider. Never recoverable by the caller.
 */
export class DelegationError extends Error {
  readonly kind: DelegationFailureKind;
  readonly providerErrorCode: string | undefined;
  readonly correlationId: string | undefined;

  constructor(
    kind: DelegationFailureKind,
    message: string,
    options?: { providerErrorCode?: string | undefined; correlationId?: string | undefined; cause?: unknown }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "DelegationError";
    this.kind = kind;
    this.providerErrorCode = options?.providerErrorCode;
    this.correlationId = options?.correlationId;
  }
}

export class DelegationConfigurationError extends DelegationError {
  constructor(message: string) {
    super("misconfigured", message);
    this.name = "DelegationConfigurationError";
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class AuthenticationError extends Error {
  constructor(message = "Unauthorized access") {
    super(message);
    this.name = "AuthenticationError";
  }
}

export class NotImplementedError extends Error {
  constructor(message = "Feature not implemented") {
    super(message);
    this.name = "NotImplementedError";
  }
}

export class DownstreamRequestError extends Error {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "DownstreamRequestError";
  }
}
