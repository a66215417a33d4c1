export type GatewayErrorType =
  | "mfa_required"
  | "validation_error"
  | "authentication_error"
  | "not_implemented_error"
  | "server_error";

export interface StepUpChallengeDetails {
  claimsChallenge: string | null;
  scopes: string[];
  correlationId: string | null;
  errorCode: string;
  classification: string;
}

export interface GatewayErrorBody {
  error: {
    code: number;
    message: string;
    type: string;
    details?: unknown;
  };
}

export interface MeResponse {
  subjectId: string | null;
  delegated: boolean;
}

export interface DownstreamCallInput {
  method?: "GET" | "POST" | undefined;
  path: string;
  body?: unknown;
}

export interface DownstreamCallResponse<T = unknown> {
  status: number;
  delegated: boolean;
  data: T;
}

export interface HealthResponse {
  status: string;
  service: string;
  timestamp: string;
}

/** The signed-in account a token broker acquires tokens for. */
export interface AccountInfo {
  homeAccountId: string;
  username?: string | undefined;
  tenantId?: string | undefined;
}

export interface TokenRequest {
  scopes: string[];
  account: AccountInfo;
  /** Provider claims challenge, passed through exactly as the gateway sent it. */
  claims?: string | undefined;
  forceRefresh?: boolean | undefined;
}

export interface TokenResult {
  accessToken: string;
}

/**
 * The caller's identity library (a browser or desktop OAuth client). Silent
 * acquisition must throw {@link InteractionRequiredError} (or an error named
 * `InteractionRequiredAuthError`) when the user has to be involved.
 */
export interface TokenBroker {
  acquireTokenSilent(request: TokenRequest): Promise<TokenResult>;
  acquireTokenInteractive(request: TokenRequest): Promise<TokenResult>;
}

export type StepUpEventName =
  | "challenge_started"
  | "completed_silently"
  | "requires_interaction"
  | "completed_interactive"
  | "failed";

export interface StepUpEvent {
  name: StepUpEventName;
  correlationId: string | null;
  errorCode: string;
  scopes: string[];
  error?: string | undefined;
}
