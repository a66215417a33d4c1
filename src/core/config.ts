import { z } from "zod";

export const DEFAULT_AUTHORITY_HOST = "https://login.microsoftonline.com";
export const DEFAULT_DOWNSTREAM_SCOPE = "499b84ac-1321-427f-aa17-267ca6975798/.default";

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => value === "true" || value === "1");

function positiveInt(fallback: number) {
  return z
    .string()
    .optional()
    .transform((value) => {
      if (!value) {
        return fallback;
      }
      const parsed = Number.parseInt(value, 10);
      return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
    });
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

function scopeList(fallback: string[]) {
  return z
    .string()
    .optional()
    .transform((value) => {
      const scopes = (value ?? "")
        .split(/[\s,]+/)
        .map((entry) => entry.trim())
        .filter(Boolean);
      return scopes.length > 0 ? scopes : fallback;
    });
}

const envSchema = z.object({
  PORT: positiveInt(8080),
  HOST: z.string().default("0.0.0.0"),
  GATEWAY_TENANT_ID: z.string().default(""),
  GATEWAY_CLIENT_ID: z.string().default(""),
  GATEWAY_CLIENT_SECRET: optionalString,
  GATEWAY_CLIENT_ASSERTION_FILE: optionalString,
  GATEWAY_AUTHORITY_HOST: z.string().url().default(DEFAULT_AUTHORITY_HOST),
  GATEWAY_TOKEN_ENDPOINT: optionalString,
  GATEWAY_GRANT_STYLE: z.enum(["jwt-bearer", "token-exchange"]).default("jwt-bearer"),
  GATEWAY_TOKEN_TIMEOUT_MS: positiveInt(15_000),
  GATEWAY_DOWNSTREAM_BASE_URL: z.string().url().default("https://dev.azure.com"),
  GATEWAY_DOWNSTREAM_SCOPES: scopeList([DEFAULT_DOWNSTREAM_SCOPE]),
  GATEWAY_SERVICE_IDENTITY: booleanFlag,
  GATEWAY_INBOUND_JWKS_URI: optionalString,
  GATEWAY_INBOUND_ISSUER: optionalString,
  GATEWAY_INBOUND_AUDIENCE: optionalString,
  GATEWAY_BODY_LIMIT_BYTES: positiveInt(1_048_576),
  GATEWAY_CORS_ORIGINS: optionalString,
  GATEWAY_LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
});

export type GrantStyle = "jwt-bearer" | "token-exchange";

export interface DelegationSettings {
  tenantId: string;
  clientId: string;
  clientSecret?: string | undefined;
  clientAssertionFile?: string | undefined;
  authorityHost: string;
  tokenEndpoint?: string | undefined;
  grantStyle: GrantStyle;
  tokenTimeoutMs: number;
}

export interface InboundVerificationSettings {
  jwksUri: string;
  issuer?: string | undefined;
  audience?: string | undefined;
}

export interface GatewayConfig {
  port: number;
  host: string;
  delegation: DelegationSettings;
  downstream: {
    baseUrl: string;
    scopes: string[];
    serviceIdentity: boolean;
  };
  inbound?: InboundVerificationSettings | undefined;
  bodyLimitBytes: number;
  corsOrigins: string[];
  logLevel: string;
}

/**
 * Reads gateway settings from the environment. Missing tenant or client ids are
 * not an error here: delegation simply stays unavailable and every credential
 * request falls back to the non-delegated path.
 */
export function loadGatewayConfig(env: Record<string, string | undefined> = process.env): GatewayConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    host: parsed.HOST,
    delegation: {
      tenantId: parsed.GATEWAY_TENANT_ID.trim(),
      clientId: parsed.GATEWAY_CLIENT_ID.trim(),
      clientSecret: parsed.GATEWAY_CLIENT_SECRET,
      clientAssertionFile: parsed.GATEWAY_CLIENT_ASSERTION_FILE,
      authorityHost: parsed.GATEWAY_AUTHORITY_HOST,
      tokenEndpoint: parsed.GATEWAY_TOKEN_ENDPOINT,
      grantStyle: parsed.GATEWAY_GRANT_STYLE,
      tokenTimeoutMs: parsed.GATEWAY_TOKEN_TIMEOUT_MS
    },
    downstream: {
      baseUrl: parsed.GATEWAY_DOWNSTREAM_BASE_URL,
      scopes: parsed.GATEWAY_DOWNSTREAM_SCOPES,
      serviceIdentity: parsed.GATEWAY_SERVICE_IDENTITY
    },
    inbound: parsed.GATEWAY_INBOUND_JWKS_URI
      ? {
          jwksUri: parsed.GATEWAY_INBOUND_JWKS_URI,
          issuer: parsed.GATEWAY_INBOUND_ISSUER,
          audience: parsed.GATEWAY_INBOUND_AUDIENCE
        }
      : undefined,
    bodyLimitBytes: parsed.GATEWAY_BODY_LIMIT_BYTES,
    corsOrigins: (parsed.GATEWAY_CORS_ORIGINS ?? "")
      .split(",")
      .map((origin) => origin.trim())
      .filter(Boolean),
    logLevel: parsed.GATEWAY_LOG_LEVEL
  };
}
