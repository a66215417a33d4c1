export class GatewayHttpError extends Error {
  readonly status: number;
  readonly type: string;
  readonly details?: unknown;

  constructor(input: { status: number; type: string; message: string; details?: unknown }) {
    super(input.message);
    this.name = "GatewayHttpError";
    this.status = input.status;
    this.type = input.type;
    this.details = input.details;
  }
}

export type StepUpFailureReason =
  | "no_account"
  | "silent_failed"
  | "interactive_failed"
  | "cancelled"
  | "timeout"
  | "challenge_repeated";

/**
 * Terminal outcome of a step-up attempt. Never retried automatically.
 */
export class StepUpFailedError extends Error {
  readonly reason: StepUpFailureReason;
  readonly correlationId: string | null;

  constructor(reason: StepUpFailureReason, message: string, options?: { correlationId?: string | null; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "StepUpFailedError";
    this.reason = reason;
    this.correlationId = options?.correlationId ?? null;
  }
}

export class InteractionRequiredError extends Error {
  readonly errorCode: string;

  constructor(errorCode = "interaction_required", message = "User interaction is required.") {
    super(message);
    this.name = "InteractionRequiredError";
    this.errorCode = errorCode;
  }
}

export function isInteractionRequired(error: unknown): boolean {
  if (error instanceof InteractionRequiredError) {
    return true;
  }
  return error instanceof Error && error.name === "InteractionRequiredAuthError";
}

export function isUserCancellation(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "errorCode" in error &&
    error.errorCode === "user_cancelled"
  );
}
