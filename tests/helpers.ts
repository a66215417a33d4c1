import type { FastifyInstance } from "fastify";
import { UnsecuredJWT, type JWTPayload } from "jose";
import type { FetchLike } from "../src/core/types/auth.js";

export const AUTHORITY_HOST = "https://login.example.test";
export const TOKEN_ENDPOINT = `${AUTHORITY_HOST}/tenant-1/oauth2/v2.0/token`;
export const DOWNSTREAM_BASE_URL = "https://downstream.example.test";
export const DOWNSTREAM_SCOPE = "api://dev/.default";

export function unsignedToken(claims: JWTPayload): string {
  return new UnsecuredJWT(claims).encode();
}

export interface FakeReply {
  status: number;
  body: unknown;
}

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: string;
}

function headersOf(init?: RequestInit): Record<string, string> {
  const headers: Record<string, string> = {};
  new Headers(init?.headers).forEach((value, key) => {
    headers[key] = value;
  });
  return headers;
}

/**
 * In-process stand-in for an HTTP dependency. `respond` sees every request and
 * decides the reply; requests are recorded for assertions.
 */
export function fakeHttp(respond: (request: RecordedRequest, call: number) => FakeReply) {
  const requests: RecordedRequest[] = [];
  const fetchFn: FetchLike = async (input, init) => {
    const request: RecordedRequest = {
      url: input,
      method: init?.method ?? "GET",
      headers: headersOf(init),
      body: typeof init?.body === "string" ? init.body : ""
    };
    requests.push(request);
    const reply = respond(request, requests.length);
    return new Response(typeof reply.body === "string" ? reply.body : JSON.stringify(reply.body), {
      status: reply.status,
      headers: { "content-type": "application/json" }
    });
  };
  return { fetchFn, requests };
}

export function formOf(request: RecordedRequest | undefined): URLSearchParams {
  return new URLSearchParams(request?.body ?? "");
}

export function tokenSuccess(accessToken: string, expiresIn = 3600): FakeReply {
  return { status: 200, body: { access_token: accessToken, token_type: "Bearer", expires_in: expiresIn } };
}

export function stepUpReply(claims: string | undefined, correlationId = "corr-42"): FakeReply {
  return {
    status: 400,
    body: {
      error: "invalid_grant",
      error_description: "AADSTS50079: Due to a configuration change made by your administrator, you must enroll in multi-factor authentication.",
      error_codes: [50079],
      correlation_id: correlationId,
      ...(claims !== undefined ? { claims } : {})
    }
  };
}

export function invalidClientReply(): FakeReply {
  return {
    status: 401,
    body: {
      error: "invalid_client",
      error_description: "AADSTS7000215: Invalid client secret provided.",
      error_codes: [7000215],
      correlation_id: "corr-misconfigured"
    }
  };
}

export function testEnv(overrides?: Record<string, string | undefined>): Record<string, string | undefined> {
  return {
    GATEWAY_TENANT_ID: "tenant-1",
    GATEWAY_CLIENT_ID: "client-1",
    GATEWAY_CLIENT_SECRET: "test-secret",
    GATEWAY_AUTHORITY_HOST: AUTHORITY_HOST,
    GATEWAY_DOWNSTREAM_BASE_URL: DOWNSTREAM_BASE_URL,
    GATEWAY_DOWNSTREAM_SCOPES: DOWNSTREAM_SCOPE,
    GATEWAY_LOG_LEVEL: "silent",
    ...overrides
  };
}

/**
 * A `fetch` that routes into `app.inject`, so SDK calls never leave the process.
 */
export function createInjectFetch(app: FastifyInstance, onRequest?: () => void): typeof fetch {
  return async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    onRequest?.();
    const url = new URL(typeof input === "string" ? input : input instanceof URL ? input.href : input.url);
    const method = (init?.method ?? "GET").toUpperCase();
    if (method !== "GET" && method !== "POST" && method !== "OPTIONS") {
      throw new Error(`Unsupported method in test fetch: ${method}`);
    }
    const injected = await app.inject({
      method,
      url: `${url.pathname}${url.search}`,
      headers: headersOf(init),
      ...(typeof init?.body === "string" ? { payload: init.body } : {})
    });

    const responseHeaders: Record<string, string> = {};
    for (const [key, value] of Object.entries(injected.headers)) {
      if (typeof value === "string") {
        responseHeaders[key] = value;
      } else if (Array.isArray(value) && typeof value[0] === "string") {
        responseHeaders[key] = value[0];
      } else if (value !== undefined) {
        responseHeaders[key] = String(value);
      }
    }

    const nullBody = injected.statusCode === 204 || injected.statusCode === 304;
    return new Response(nullBody ? null : injected.body, {
      status: injected.statusCode,
      headers: responseHeaders
    });
  };
}
