import { decodeJwt } from "jose";
import type { ClientCredential, TokenCredential } from "../types/auth.js";
import type { Logger } from "../../lib/logger.js";
import type { DelegatedCredentialFactory } from "./delegated-credential-factory.js";

/** Claims that identify the caller, in priority order. */
export const SUBJECT_CLAIMS = ["oid", "sub", "http://schemas.microsoft.com/identity/claims/objectidentifier"] as const;

export interface DelegationIdentity {
  tenantId: string;
  clientId: string;
  clientCredential: ClientCredential | undefined;
}

export interface CredentialContextOptions {
  factory: DelegatedCredentialFactory;
  identity: DelegationIdentity;
  logger: Logger;
}

export function subjectIdFromToken(token: string): string | undefined {
  const payload = decodeJwt(token);
  for (const claim of SUBJECT_CLAIMS) {
    const value = payload[claim];
    if (typeof value === "string" && value.trim().length > 0) {
      return value;
    }
  }
  return undefined;
}

/**
 * Holds one inbound request's caller token and the identity derived from it.
 *
 * An instance belongs to exactly one request: it is created when the request
 * starts, populated once from the Authorization header, and cleared when the
 * response has been sent. Nothing here is shared between requests, so there is
 * no locking.
 */
export class CredentialContext {
  private rawToken: string | undefined;
  private subjectId: string | undefined;
  private readonly factory: DelegatedCredentialFactory;
  private readonly identity: DelegationIdentity;
  private readonly logger: Logger;

  constructor(options: CredentialContextOptions) {
    this.factory = options.factory;
    this.identity = options.identity;
    this.logger = options.logger;
  }

  /**
   * Stores the caller's token if it parses as a JWT carrying a usable subject.
   * Anything else leaves the context empty; unauthenticated callers are normal.
   */
  setToken(token: string): void {
    let subjectId: string | undefined;
    try {
      subjectId = subjectIdFromToken(token);
    } catch (error) {
      this.logger.warn(
        { reason: error instanceof Error ? error.message : String(error) },
        "Invalid or malformed access token provided"
      );
      this.reset();
      return;
    }

    if (!subjectId) {
      this.logger.warn("Access token carries no subject identifier");
      this.reset();
      return;
    }

    this.rawToken = token;
    this.subjectId = subjectId;
    this.logger.debug({ subjectId }, "Credential context set");
  }

  getSubjectId(): string | undefined {
    return this.subjectId;
  }

  hasToken(): boolean {
    return this.rawToken !== undefined;
  }

  /**
   * Returns a credential that exchanges the caller's token on demand, or
   * undefined when there is no token or delegation is not configured.
   */
  getDelegatedCredential(): TokenCredential | undefined {
    if (this.rawToken === undefined) {
      this.logger.debug("No caller token available for on-behalf-of exchange");
      return undefined;
    }

    try {
      return this.factory.mint({
        tenantId: this.identity.tenantId,
        clientId: this.identity.clientId,
        clientCredential: this.identity.clientCredential,
        userAssertion: this.rawToken
      });
    } catch (error) {
      this.logger.error({ err: error, subjectId: this.subjectId }, "Failed to create on-behalf-of credential");
      return undefined;
    }
  }

  clear(): void {
    this.reset();
    this.logger.debug("Credential context cleared");
  }

  private reset(): void {
    this.rawToken = undefined;
    this.subjectId = undefined;
  }
}
