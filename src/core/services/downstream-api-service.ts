import { AuthenticationError, DownstreamRequestError } from "../errors.js";
import type { FetchLike, TokenCredential } from "../types/auth.js";
import type { Logger } from "../../lib/logger.js";
import type { CredentialContext } from "./credential-context.js";

export interface DownstreamApiServiceOptions {
  baseUrl: string;
  scopes: string[];
  serviceCredential?: TokenCredential | undefined;
  fetchFn?: FetchLike | undefined;
  timeoutMs?: number | undefined;
  logger: Logger;
}

export interface DownstreamRequest {
  method: "GET" | "POST";
  path: string;
  body?: unknown;
  abortSignal?: AbortSignal | undefined;
}

export interface DownstreamResult {
  status: number;
  data: unknown;
  delegated: boolean;
}

/**
 * Calls the downstream work-management API as the current caller, falling back
 * to the gateway's own identity when the request carries no usable token.
 */
export class DownstreamApiService {
  private readonly baseUrl: string;
  private readonly scopes: string[];
  private readonly serviceCredential: TokenCredential | undefined;
  private readonly fetchFn: FetchLike;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: DownstreamApiServiceOptions) {
    this.baseUrl = options.baseUrl.endsWith("/") ? options.baseUrl.slice(0, -1) : options.baseUrl;
    this.scopes = options.scopes;
    this.serviceCredential = options.serviceCredential;
    this.fetchFn = options.fetchFn ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.logger = options.logger;
  }

  async request(credentials: CredentialContext, input: DownstreamRequest): Promise<DownstreamResult> {
    const delegatedCredential = credentials.getDelegatedCredential();
    const credential = delegatedCredential ?? this.serviceCredential;
    if (!credential) {
      throw new AuthenticationError("No credential available for the downstream API.");
    }

    // A step-up challenge raised here travels up to the error boundary untouched.
    const accessToken = await credential.getToken(this.scopes, { abortSignal: input.abortSignal });

    const url = `${this.baseUrl}${input.path}`;
    const timeoutSignal = AbortSignal.timeout(this.timeoutMs);
    const signal = input.abortSignal ? AbortSignal.any([input.abortSignal, timeoutSignal]) : timeoutSignal;
    const headers: Record<string, string> = {
      authorization: `Bearer ${accessToken.token}`,
      accept: "application/json"
    };
    const body = input.method === "POST" && input.body !== undefined ? JSON.stringify(input.body) : undefined;
    if (body !== undefined) {
      headers["content-type"] = "application/json";
    }

    this.logger.debug({ method: input.method, path: input.path, delegated: Boolean(delegatedCredential) }, "Calling downstream API");
    const response = await this.fetchFn(url, {
      method: input.method,
      headers,
      ...(body !== undefined ? { body } : {}),
      signal
    });

    const text = await response.text();
    if (!response.ok) {
      this.logger.error(
        { method: input.method, path: input.path, status: response.status, body: text.slice(0, 2000) },
        "Downstream API request failed"
      );
      throw new DownstreamRequestError(response.status, `Downstream API returned HTTP ${response.status}.`);
    }

    let data: unknown = null;
    if (text.length > 0) {
      try {
        data = JSON.parse(text) as unknown;
      } catch {
        data = text;
      }
    }
    return { status: response.status, data, delegated: Boolean(delegatedCredential) };
  }
}
