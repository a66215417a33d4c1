import type { GrantStyle } from "../config.js";
import { DelegationError, StepUpChallengeError } from "../errors.js";
import type { AccessToken, ClientCredential, GetTokenOptions, TokenCredential } from "../types/auth.js";
import type { Logger } from "../../lib/logger.js";
import { classifyProviderError } from "./provider-error-map.js";
import { appendClientAuthentication, type TokenEndpointClient } from "./token-endpoint-client.js";

export const JWT_BEARER_GRANT = "urn:ietf:params:oauth:grant-type:jwt-bearer";
export const TOKEN_EXCHANGE_GRANT = "urn:ietf:params:oauth:grant-type:token-exchange";
export const ACCESS_TOKEN_TYPE = "urn:ietf:params:oauth:token-type:access_token";

// Cached tokens are refreshed this long before they actually expire.
const EXPIRY_SKEW_MS = 5 * 60_000;

export interface OnBehalfOfCredentialOptions {
  endpoint: TokenEndpointClient;
  clientId: string;
  clientCredential: ClientCredential;
  userAssertion: string;
  grantStyle?: GrantStyle | undefined;
  logger: Logger;
}

/** Cache key for a scope set: order and duplicates do not matter. */
export function scopeKey(scopes: readonly string[]): string {
  return [...new Set(scopes)].sort((a, b) => a.localeCompare(b)).join(" ");
}

/**
 * Exchanges one caller's access token for a downstream-scoped token.
 */
export class OnBehalfOfCredential implements TokenCredential {
  private readonly endpoint: TokenEndpointClient;
  private readonly clientId: string;
  private readonly clientCredential: ClientCredential;
  private readonly userAssertion: string;
  private readonly grantStyle: GrantStyle;
  private readonly logger: Logger;
  private readonly cache = new Map<string, AccessToken>();

  constructor(options: OnBehalfOfCredentialOptions) {
    this.endpoint = options.endpoint;
    this.clientId = options.clientId;
    this.clientCredential = options.clientCredential;
    this.userAssertion = options.userAssertion;
    this.grantStyle = options.grantStyle ?? "jwt-bearer";
    this.logger = options.logger;
  }

  async getToken(scopes: readonly string[], options?: GetTokenOptions): Promise<AccessToken> {
    if (scopes.length === 0) {
      throw new TypeError("At least one scope is required to request a delegated token.");
    }

    const key = scopeKey(scopes);
    const cached = this.cache.get(key);
    if (cached && cached.expiresOnTimestamp - EXPIRY_SKEW_MS > Date.now()) {
      return cached;
    }

    const form = await this.buildGrant(scopes);
    const result = await this.endpoint.requestToken(form, options?.abortSignal);

    if (result.ok) {
      if (!options?.abortSignal?.aborted) {
        this.cache.set(key, result.token);
      }
      return result.token;
    }

    const classified = classifyProviderError(result.error);
    if (classified.outcome === "step_up") {
      this.logger.warn(
        {
          providerErrorCode: classified.providerErrorCode,
          classification: classified.classification,
          correlationId: result.error.correlation_id,
          scopes: [...scopes]
        },
        "Identity provider requires interactive step-up for delegated token"
      );
      throw new StepUpChallengeError({
        providerErrorCode: classified.providerErrorCode,
        claimsChallenge: result.error.claims,
        scopes,
        correlationId: result.error.correlation_id,
        classification: classified.classification
      });
    }

    throw new DelegationError(
      "provider_rejected",
      `On-behalf-of exchange rejected with HTTP ${result.status}: ${result.error.error_description ?? result.error.error}`,
      {
        providerErrorCode: classified.providerErrorCode,
        correlationId: result.error.correlation_id
      }
    );
  }

  private async buildGrant(scopes: readonly string[]): Promise<URLSearchParams> {
    const form = new URLSearchParams();
    if (this.grantStyle === "token-exchange") {
      form.set("grant_type", TOKEN_EXCHANGE_GRANT);
      form.set("subject_token", this.userAssertion);
      form.set("subject_token_type", ACCESS_TOKEN_TYPE);
    } else {
      form.set("grant_type", JWT_BEARER_GRANT);
      form.set("assertion", this.userAssertion);
      form.set("requested_token_use", "on_behalf_of");
    }
    form.set("scope", scopes.join(" "));
    await appendClientAuthentication(form, this.clientId, this.clientCredential);
    return form;
  }
}
