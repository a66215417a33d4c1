import { parseChallenge, type StepUpChallengeHandler } from "./challenge-handler.js";
import { GatewayHttpError, StepUpFailedError } from "./errors.js";
import type {
  AccountInfo,
  DownstreamCallInput,
  DownstreamCallResponse,
  GatewayErrorBody,
  HealthResponse,
  MeResponse
} from "./types.js";

export interface GatewayClientOptions {
  baseUrl: string;
  token?: string | undefined;
  fetchFn?: typeof fetch | undefined;
  userAgent?: string | undefined;
  timeoutMs?: number | undefined;
  maxRetries?: number | undefined;
  challengeHandler?: StepUpChallengeHandler | undefined;
  account?: AccountInfo | undefined;
  /** Timeout for the single replay after a step-up; independent of `timeoutMs`. */
  replayTimeoutMs?: number | undefined;
}

interface Exchange {
  status: number;
  ok: boolean;
  payload: unknown;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function toUrl(baseUrl: string, path: string): string {
  return new URL(path.replace(/^\//, ""), baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`).toString();
}

function shouldRetry(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || status === 500 || status === 502 || status === 503 || status === 504;
}

function isErrorBody(payload: unknown): payload is GatewayErrorBody {
  if (typeof payload !== "object" || payload === null || !("error" in payload)) {
    return false;
  }
  const error = payload.error;
  return (
    typeof error === "object" &&
    error !== null &&
    "type" in error &&
    typeof error.type === "string" &&
    "message" in error &&
    typeof error.message === "string"
  );
}

function toHttpError(exchange: Exchange): GatewayHttpError {
  if (isErrorBody(exchange.payload)) {
    return new GatewayHttpError({
      status: exchange.status,
      type: exchange.payload.error.type,
      message: exchange.payload.error.message,
      ...(exchange.payload.error.details !== undefined ? { details: exchange.payload.error.details } : {})
    });
  }
  return new GatewayHttpError({
    status: exchange.status,
    type: "http_error",
    message: `HTTP ${exchange.status}`
  });
}

export class GatewayClient {
  private readonly baseUrl: string;
  private token: string | undefined;
  private readonly fetchFn: typeof fetch;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly challengeHandler: StepUpChallengeHandler | undefined;
  private readonly account: AccountInfo | undefined;
  private readonly replayTimeoutMs: number;

  constructor(options: GatewayClientOptions) {
    this.baseUrl = options.baseUrl;
    this.token = options.token;
    this.fetchFn = options.fetchFn ?? fetch;
    this.userAgent = options.userAgent ?? "obo-stepup-gateway-sdk/0.1";
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.maxRetries = options.maxRetries ?? 2;
    this.challengeHandler = options.challengeHandler;
    this.account = options.account;
    this.replayTimeoutMs = options.replayTimeoutMs ?? 30_000;
  }

  setToken(token: string | undefined): void {
    this.token = token;
  }

  getToken(): string | undefined {
    return this.token;
  }

  async health(): Promise<HealthResponse> {
    return this.requestJson("GET", "/health", { retryMode: "safe" });
  }

  async getMe(): Promise<MeResponse> {
    return this.requestJson("GET", "/v1/me", { retryMode: "safe" });
  }

  async callDownstream<T = unknown>(input: DownstreamCallInput): Promise<DownstreamCallResponse<T>> {
    return this.requestJson("POST", "/v1/downstream", {
      body: { method: input.method ?? "GET", path: input.path, ...(input.body !== undefined ? { body: input.body } : {}) },
      retryMode: (input.method ?? "GET") === "GET" ? "safe" : "none"
    });
  }

  private async requestJson<T>(
    method: string,
    path: string,
    options?: {
      body?: unknown;
      retryMode?: "safe" | "none" | undefined;
    }
  ): Promise<T> {
    const url = toUrl(this.baseUrl, path);
    const body = options?.body === undefined ? undefined : JSON.stringify(options.body);
    const maxAttempts = options?.retryMode === "safe" ? Math.max(1, this.maxRetries + 1) : 1;

    const first = await this.exchange(method, url, body, maxAttempts, this.timeoutMs);
    if (first.ok) {
      return first.payload as T;
    }

    const challenge = this.challengeHandler?.isChallenge({ status: first.status, body: first.payload })
      ? parseChallenge(first.payload)
      : undefined;
    if (!this.challengeHandler || !challenge) {
      throw toHttpError(first);
    }

    const freshToken = await this.challengeHandler.handle(challenge, this.account);
    this.token = freshToken;

    // Replay exactly once; a second challenge is terminal.
    const replay = await this.exchange(method, url, body, 1, this.replayTimeoutMs);
    if (replay.ok) {
      return replay.payload as T;
    }
    if (this.challengeHandler.isChallenge({ status: replay.status, body: replay.payload })) {
      throw new StepUpFailedError("challenge_repeated", "Step-up authentication did not satisfy the gateway.", {
        correlationId: parseChallenge(replay.payload)?.correlationId ?? null
      });
    }
    throw toHttpError(replay);
  }

  private async exchange(
    method: string,
    url: string,
    body: string | undefined,
    maxAttempts: number,
    timeoutMs: number
  ): Promise<Exchange> {
    const headers: Record<string, string> = {
      accept: "application/json",
      "user-agent": this.userAgent
    };
    if (this.token) {
      headers.authorization = `Bearer ${this.token}`;
    }
    if (body !== undefined) {
      headers["content-type"] = "application/json";
    }

    let attempt = 0;
    let lastError: unknown;

    while (attempt < maxAttempts) {
      attempt += 1;
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), timeoutMs);
      try {
        const response = await this.fetchFn(url, {
          method,
          headers,
          ...(body !== undefined ? { body } : {}),
          signal: controller.signal
        });

        let payload: unknown = null;
        try {
          payload = (await response.json()) as unknown;
        } catch {
          payload = null;
        }

        if (!response.ok && attempt < maxAttempts && shouldRetry(response.status)) {
          await sleep(200 * 2 ** (attempt - 1));
          continue;
        }
        return { status: response.status, ok: response.ok, payload };
      } catch (error) {
        lastError = error;
        if (attempt < maxAttempts) {
          await sleep(200 * 2 ** (attempt - 1));
          continue;
        }
        throw error;
      } finally {
        clearTimeout(timeout);
      }
    }

    throw lastError instanceof Error ? lastError : new Error("Request failed.");
  }
}
