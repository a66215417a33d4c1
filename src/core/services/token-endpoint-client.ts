import { DelegationError } from "../errors.js";
import type { AccessToken, ClientCredential, FetchLike } from "../types/auth.js";
import { providerErrorSchema, tokenResponseSchema, type ProviderErrorBody } from "../types/schemas.js";

export const CLIENT_ASSERTION_TYPE = "urn:ietf:params:oauth:client-assertion-type:jwt-bearer";

export type TokenEndpointResult =
  | { ok: true; token: AccessToken }
  | { ok: false; status: number; error: ProviderErrorBody };

export interface TokenEndpointClientOptions {
  tokenEndpoint: string;
  fetchFn?: FetchLike | undefined;
  timeoutMs?: number | undefined;
}

export function tokenEndpointFor(authorityHost: string, tenantId: string): string {
  const host = authorityHost.endsWith("/") ? authorityHost.slice(0, -1) : authorityHost;
  return `${host}/${encodeURIComponent(tenantId)}/oauth2/v2.0/token`;
}

export async function appendClientAuthentication(
  form: URLSearchParams,
  clientId: string,
  credential: ClientCredential
): Promise<void> {
  form.set("client_id", clientId);
  if (credential.kind === "secret") {
    form.set("client_secret", credential.secret);
    return;
  }
  form.set("client_assertion_type", CLIENT_ASSERTION_TYPE);
  form.set("client_assertion", await credential.getAssertion());
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return undefined;
  }
}

/**
 * Posts form-encoded grants to an OAuth2 token endpoint. Provider errors come
 * back as values so callers can decide how to classify them; transport and
 * protocol failures are thrown as {@link DelegationError}.
 */
export class TokenEndpointClient {
  readonly tokenEndpoint: string;
  private readonly fetchFn: FetchLike;
  private readonly timeoutMs: number;

  constructor(options: TokenEndpointClientOptions) {
    this.tokenEndpoint = options.tokenEndpoint;
    this.fetchFn = options.fetchFn ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 15_000;
  }

  async requestToken(form: URLSearchParams, abortSignal?: AbortSignal): Promise<TokenEndpointResult> {
    const timeoutSignal = AbortSignal.timeout(this.timeoutMs);
    const signal = abortSignal ? AbortSignal.any([abortSignal, timeoutSignal]) : timeoutSignal;

    let status: number;
    let text: string;
    try {
      const response = await this.fetchFn(this.tokenEndpoint, {
        method: "POST",
        headers: {
          "content-type": "application/x-www-form-urlencoded",
          accept: "application/json"
        },
        body: form.toString(),
        signal
      });
      status = response.status;
      text = await response.text();
    } catch (error) {
      if (abortSignal?.aborted) {
        throw abortSignal.reason ?? error;
      }
      if (timeoutSignal.aborted) {
        throw new DelegationError("provider_unavailable", `Token endpoint did not respond within ${this.timeoutMs} ms.`, {
          cause: error
        });
      }
      throw new DelegationError("provider_unavailable", "Token endpoint request failed.", { cause: error });
    }

    // The caller may have gone away while the body was read; its result must not be used.
    if (abortSignal?.aborted) {
      throw abortSignal.reason;
    }

    const payload = parseJson(text);
    if (status >= 200 && status < 300) {
      const parsed = tokenResponseSchema.safeParse(payload);
      if (!parsed.success) {
        throw new DelegationError("invalid_response", "Token endpoint returned an unrecognized success payload.");
      }
      return {
        ok: true,
        token: {
          token: parsed.data.access_token,
          expiresOnTimestamp: Date.now() + parsed.data.expires_in * 1000
        }
      };
    }

    const error = providerErrorSchema.safeParse(payload);
    if (!error.success) {
      throw new DelegationError("invalid_response", `Token endpoint returned HTTP ${status} without an OAuth error body.`);
    }
    return { ok: false, status, error: error.data };
  }
}
