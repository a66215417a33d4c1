import { DelegationError } from "../errors.js";
import type { AccessToken, ClientCredential, GetTokenOptions, TokenCredential } from "../types/auth.js";
import { scopeKey } from "./on-behalf-of-credential.js";
import { providerCodeOf } from "./provider-error-map.js";
import { appendClientAuthentication, type TokenEndpointClient } from "./token-endpoint-client.js";

const EXPIRY_SKEW_MS = 5 * 60_000;

/**
 * The gateway's own identity, used when a request carries no usable caller
 * token. App-only tokens can never be stepped up, so every provider error is fatal.
 */
export class ClientCredentialsCredential implements TokenCredential {
  private readonly cache = new Map<string, AccessToken>();

  constructor(
    private readonly endpoint: TokenEndpointClient,
    private readonly clientId: string,
    private readonly clientCredential: ClientCredential
  ) {}

  async getToken(scopes: readonly string[], options?: GetTokenOptions): Promise<AccessToken> {
    if (scopes.length === 0) {
      throw new TypeError("At least one scope is required to request a service token.");
    }
    const key = scopeKey(scopes);
    const cached = this.cache.get(key);
    if (cached && cached.expiresOnTimestamp - EXPIRY_SKEW_MS > Date.now()) {
      return cached;
    }

    const form = new URLSearchParams({ grant_type: "client_credentials", scope: scopes.join(" ") });
    await appendClientAuthentication(form, this.clientId, this.clientCredential);
    const result = await this.endpoint.requestToken(form, options?.abortSignal);
    if (!result.ok) {
      const code = providerCodeOf(result.error);
      throw new DelegationError("provider_rejected", `Client credentials grant rejected with HTTP ${result.status}.`, {
        providerErrorCode: code === undefined ? result.error.error : `AADSTS${code}`,
        correlationId: result.error.correlation_id
      });
    }
    if (!options?.abortSignal?.aborted) {
      this.cache.set(key, result.token);
    }
    return result.token;
  }
}
