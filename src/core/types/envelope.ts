export type ErrorType =
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

export interface ErrorEnvelope {
  error: {
    code: number;
    message: string;
    type: ErrorType;
    details?: StepUpChallengeDetails;
  };
}
