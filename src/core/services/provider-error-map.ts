import type { ProviderErrorBody } from "../types/schemas.js";

export type ProviderErrorOutcome = "step_up" | "fatal";

export interface ProviderErrorClassification {
  outcome: ProviderErrorOutcome;
  /** `AADSTS<code>` when the provider sent a numeric code, otherwise the OAuth `error` value. */
  providerErrorCode: string;
  classification: string;
}

interface CodeRule {
  outcome: ProviderErrorOutcome;
  classification: string;
}

/**
 * Provider error codes that decide between "the user must step up" and
 * "the gateway is misconfigured". Codes not listed fall through to the OAuth
 * `error` value rules below.
 */
export const PROVIDER_CODE_RULES: ReadonlyMap<number, CodeRule> = new Map<number, CodeRule>([
  // MFA and strong authentication
  [50074, { outcome: "step_up", classification: "AdditionalAction" }],
  [50076, { outcome: "step_up", classification: "AdditionalAction" }],
  [50079, { outcome: "step_up", classification: "AdditionalAction" }],
  [50158, { outcome: "step_up", classification: "AdditionalAction" }],
  // Conditional access the user can satisfy (compliant or registered device)
  [53000, { outcome: "step_up", classification: "AdditionalAction" }],
  [53001, { outcome: "step_up", classification: "AdditionalAction" }],
  [530003, { outcome: "step_up", classification: "AdditionalAction" }],
  [65001, { outcome: "step_up", classification: "ConsentRequired" }],
  [50055, { outcome: "step_up", classification: "UserPasswordExpired" }],
  // Session or refresh material expired; a fresh sign-in fixes it
  [50133, { outcome: "step_up", classification: "TokenExpired" }],
  [50173, { outcome: "step_up", classification: "TokenExpired" }],
  [70043, { outcome: "step_up", classification: "TokenExpired" }],
  [700082, { outcome: "step_up", classification: "TokenExpired" }],
  // Gateway-side problems
  [7000215, { outcome: "fatal", classification: "None" }], // invalid client secret
  [7000222, { outcome: "fatal", classification: "None" }], // client secret expired
  [700016, { outcome: "fatal", classification: "None" }], // application not found in tenant
  [700027, { outcome: "fatal", classification: "None" }], // client assertion signature invalid
  [90002, { outcome: "fatal", classification: "None" }], // tenant not found
  [50013, { outcome: "fatal", classification: "None" }], // assertion audience or signature invalid
  [50105, { outcome: "fatal", classification: "None" }], // user not assigned to the application
  [53003, { outcome: "fatal", classification: "None" }] // blocked by conditional access, no remediation
]);

const STEP_UP_OAUTH_ERRORS = new Set(["interaction_required", "login_required", "consent_required"]);

const SUBERROR_CLASSIFICATIONS: Record<string, string> = {
  basic_action: "BasicAction",
  additional_action: "AdditionalAction",
  message_only: "MessageOnly",
  consent_required: "ConsentRequired",
  user_password_expired: "UserPasswordExpired",
  bad_token: "BadToken",
  token_expired: "TokenExpired"
};

export function providerCodeOf(body: ProviderErrorBody): number | undefined {
  const first = body.error_codes?.[0];
  if (typeof first === "number") {
    return first;
  }
  const match = /AADSTS(\d+)/.exec(body.error_description ?? "");
  if (match?.[1]) {
    return Number.parseInt(match[1], 10);
  }
  return undefined;
}

export function classifyProviderError(body: ProviderErrorBody): ProviderErrorClassification {
  const code = providerCodeOf(body);
  const providerErrorCode = code === undefined ? body.error : `AADSTS${code}`;
  const rule = code === undefined ? undefined : PROVIDER_CODE_RULES.get(code);

  let outcome: ProviderErrorOutcome;
  let classification: string;
  if (rule) {
    outcome = rule.outcome;
    classification = rule.classification;
  } else if (STEP_UP_OAUTH_ERRORS.has(body.error)) {
    outcome = "step_up";
    classification = body.error === "consent_required" ? "ConsentRequired" : "None";
  } else if (body.error === "invalid_grant" && typeof body.claims === "string" && body.claims.length > 0) {
    outcome = "step_up";
    classification = "AdditionalAction";
  } else {
    outcome = "fatal";
    classification = "None";
  }

  if (outcome === "step_up" && body.suberror) {
    classification = SUBERROR_CLASSIFICATIONS[body.suberror] ?? classification;
  }

  return { outcome, providerErrorCode, classification };
}
