import { createRemoteJWKSet, jwtVerify, type JWTPayload, type JWTVerifyGetKey } from "jose";
import type { InboundVerificationSettings } from "../config.js";
import { AuthenticationError } from "../errors.js";

export interface InboundTokenVerifierOptions {
  settings: InboundVerificationSettings;
  keySet?: JWTVerifyGetKey | undefined;
}

/**
 * Signature, issuer, audience and lifetime checks for caller tokens. Runs before
 * the token is handed to the request's credential context.
 */
export class InboundTokenVerifier {
  private readonly keySet: JWTVerifyGetKey;
  private readonly issuer: string | undefined;
  private readonly audience: string | undefined;

  constructor(options: InboundTokenVerifierOptions) {
    this.keySet = options.keySet ?? createRemoteJWKSet(new URL(options.settings.jwksUri));
    this.issuer = options.settings.issuer;
    this.audience = options.settings.audience;
  }

  async verify(token: string): Promise<JWTPayload> {
    try {
      const { payload } = await jwtVerify(token, this.keySet, {
        ...(this.issuer ? { issuer: this.issuer } : {}),
        ...(this.audience ? { audience: this.audience } : {}),
        clockTolerance: 60
      });
      return payload;
    } catch (error) {
      throw new AuthenticationError(error instanceof Error ? `Invalid access token: ${error.message}` : "Invalid access token.");
    }
  }
}
