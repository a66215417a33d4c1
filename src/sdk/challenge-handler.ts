import { z } from "zod";
import { isInteractionRequired, isUserCancellation, StepUpFailedError, type StepUpFailureReason } from "./errors.js";
import type { AccountInfo, StepUpChallengeDetails, StepUpEvent, StepUpEventName, TokenBroker, TokenRequest } from "./types.js";

const challengeEnvelopeSchema = z.object({
  error: z.object({
    type: z.literal("mfa_required"),
    details: z.object({
      claimsChallenge: z.string().nullable(),
      scopes: z.array(z.string()).min(1),
      correlationId: z.string().nullable().optional(),
      errorCode: z.string(),
      classification: z.string()
    })
  })
});

export interface StepUpChallengeHandlerOptions {
  broker: TokenBroker;
  /** Budget for the interactive prompt; the user may take a while. */
  interactiveTimeoutMs?: number | undefined;
  onEvent?: ((event: StepUpEvent) => void) | undefined;
}

export interface ChallengeResponse {
  status: number;
  body: unknown;
}

class InteractiveTimeoutError extends Error {}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new InteractiveTimeoutError(`Interactive authentication timed out after ${timeoutMs} ms.`)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function parseChallenge(body: unknown): StepUpChallengeDetails | undefined {
  const parsed = challengeEnvelopeSchema.safeParse(body);
  if (!parsed.success) {
    return undefined;
  }
  const details = parsed.data.error.details;
  return {
    claimsChallenge: details.claimsChallenge,
    scopes: details.scopes,
    correlationId: details.correlationId ?? null,
    errorCode: details.errorCode,
    classification: details.classification
  };
}

/**
 * Turns a gateway `mfa_required` response into a fresh access token: silent
 * acquisition with the claims challenge first, one interactive prompt if the
 * identity library says the user has to be involved.
 */
export class StepUpChallengeHandler {
  private readonly broker: TokenBroker;
  private readonly interactiveTimeoutMs: number;
  private readonly onEvent: ((event: StepUpEvent) => void) | undefined;

  constructor(options: StepUpChallengeHandlerOptions) {
    this.broker = options.broker;
    this.interactiveTimeoutMs = options.interactiveTimeoutMs ?? 5 * 60_000;
    this.onEvent = options.onEvent;
  }

  isChallenge(response: ChallengeResponse): boolean {
    if (response.status !== 401) {
      return false;
    }
    const body = response.body;
    if (typeof body !== "object" || body === null || !("error" in body)) {
      return false;
    }
    const error = body.error;
    return typeof error === "object" && error !== null && "type" in error && error.type === "mfa_required";
  }

  async handle(details: StepUpChallengeDetails, account: AccountInfo | undefined): Promise<string> {
    if (!account) {
      this.emit("failed", details, "no account");
      throw new StepUpFailedError("no_account", "No account available for step-up authentication.", {
        correlationId: details.correlationId
      });
    }

    this.emit("challenge_started", details);

    const request: TokenRequest = {
      scopes: [...details.scopes],
      account,
      ...(details.claimsChallenge !== null ? { claims: details.claimsChallenge } : {})
    };

    let silentError: unknown;
    try {
      const result = await this.broker.acquireTokenSilent({ ...request, forceRefresh: true });
      this.emit("completed_silently", details);
      return result.accessToken;
    } catch (error) {
      silentError = error;
    }

    if (!isInteractionRequired(silentError)) {
      throw this.fail("silent_failed", details, silentError);
    }

    this.emit("requires_interaction", details, errorMessage(silentError));
    try {
      const result = await withTimeout(this.broker.acquireTokenInteractive(request), this.interactiveTimeoutMs);
      this.emit("completed_interactive", details);
      return result.accessToken;
    } catch (error) {
      const reason: StepUpFailureReason =
        error instanceof InteractiveTimeoutError ? "timeout" : isUserCancellation(error) ? "cancelled" : "interactive_failed";
      throw this.fail(reason, details, error);
    }
  }

  private fail(reason: StepUpFailureReason, details: StepUpChallengeDetails, cause: unknown): StepUpFailedError {
    const message = errorMessage(cause);
    this.emit("failed", details, message);
    return new StepUpFailedError(reason, `MFA authentication failed: ${message}`, {
      correlationId: details.correlationId,
      cause
    });
  }

  private emit(name: StepUpEventName, details: StepUpChallengeDetails, error?: string): void {
    this.onEvent?.({
      name,
      correlationId: details.correlationId,
      errorCode: details.errorCode,
      scopes: [...details.scopes],
      ...(error !== undefined ? { error } : {})
    });
  }
}
