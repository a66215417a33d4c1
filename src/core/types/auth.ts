export interface AccessToken {
  token: string;
  /** Epoch milliseconds. */
  expiresOnTimestamp: number;
}

export interface GetTokenOptions {
  abortSignal?: AbortSignal | undefined;
}

/**
 * Anything able to produce an access token for a set of scopes on demand.
 */
export interface TokenCredential {
  getToken(scopes: readonly string[], options?: GetTokenOptions): Promise<AccessToken>;
}

export type ClientCredential =
  | { kind: "secret"; secret: string }
  | { kind: "assertion"; getAssertion: () => Promise<string> };

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
