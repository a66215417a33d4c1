import { readFile } from "node:fs/promises";
import type { DelegationSettings, GrantStyle } from "../config.js";
import { DelegationConfigurationError, DelegationError } from "../errors.js";
import type { ClientCredential, FetchLike, TokenCredential } from "../types/auth.js";
import type { Logger } from "../../lib/logger.js";
import { OnBehalfOfCredential } from "./on-behalf-of-credential.js";
import { TokenEndpointClient, tokenEndpointFor } from "./token-endpoint-client.js";

export interface MintInput {
  tenantId: string;
  clientId: string;
  clientCredential: ClientCredential | undefined;
  userAssertion: string;
}

export interface DelegatedCredentialFactoryOptions {
  authorityHost: string;
  tokenEndpoint?: string | undefined;
  grantStyle?: GrantStyle | undefined;
  timeoutMs?: number | undefined;
  fetchFn?: FetchLike | undefined;
  logger: Logger;
}

// Tenant ids end up in the token endpoint path: GUIDs or verified domain names only.
const TENANT_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9.-]{0,252}$/;

/**
 * Resolves the gateway's client credential from settings. A federated assertion
 * file is re-read on every token request because the platform rotates it.
 */
export function clientCredentialFromSettings(settings: DelegationSettings): ClientCredential | undefined {
  if (settings.clientSecret) {
    return { kind: "secret", secret: settings.clientSecret };
  }
  const assertionFile = settings.clientAssertionFile;
  if (assertionFile) {
    return {
      kind: "assertion",
      getAssertion: () => readAssertion(assertionFile)
    };
  }
  return undefined;
}

async function readAssertion(assertionFile: string): Promise<string> {
  let contents: string;
  try {
    contents = await readFile(assertionFile, "utf8");
  } catch (error) {
    throw new DelegationError("misconfigured", "Client assertion file could not be read.", { cause: error });
  }
  const assertion = contents.trim();
  if (!assertion) {
    throw new DelegationError("misconfigured", "Client assertion file is empty.");
  }
  return assertion;
}

export class DelegatedCredentialFactory {
  private readonly options: DelegatedCredentialFactoryOptions;

  constructor(options: DelegatedCredentialFactoryOptions) {
    this.options = options;
  }

  mint(input: MintInput): TokenCredential {
    if (!input.tenantId.trim()) {
      throw new DelegationConfigurationError("Tenant id is not configured.");
    }
    if (!TENANT_ID_PATTERN.test(input.tenantId)) {
      throw new DelegationConfigurationError("Tenant id contains unsupported characters.");
    }
    if (!input.clientId.trim()) {
      throw new DelegationConfigurationError("Client id is not configured.");
    }
    if (!input.clientCredential) {
      throw new DelegationConfigurationError("Neither a client secret nor a client assertion is configured.");
    }
    if (!input.userAssertion) {
      throw new DelegationConfigurationError("A user assertion is required for the on-behalf-of grant.");
    }

    const endpoint = new TokenEndpointClient({
      tokenEndpoint: this.options.tokenEndpoint ?? tokenEndpointFor(this.options.authorityHost, input.tenantId),
      fetchFn: this.options.fetchFn,
      timeoutMs: this.options.timeoutMs
    });

    return new OnBehalfOfCredential({
      endpoint,
      clientId: input.clientId,
      clientCredential: input.clientCredential,
      userAssertion: input.userAssertion,
      grantStyle: this.options.grantStyle,
      logger: this.options.logger
    });
  }
}
