import { loadGatewayConfig, type GatewayConfig } from "../config.js";
import type { FetchLike, TokenCredential } from "../types/auth.js";
import { createLogger, type Logger } from "../../lib/logger.js";
import { ClientCredentialsCredential } from "./client-credentials-credential.js";
import { CredentialContext, type DelegationIdentity } from "./credential-context.js";
import { clientCredentialFromSettings, DelegatedCredentialFactory } from "./delegated-credential-factory.js";
import { DownstreamApiService } from "./downstream-api-service.js";
import { InboundTokenVerifier } from "./inbound-token-verifier.js";
import { TokenEndpointClient, tokenEndpointFor } from "./token-endpoint-client.js";

export interface GatewayContext {
  config: GatewayConfig;
  logger: Logger;
  credentialFactory: DelegatedCredentialFactory;
  serviceCredential: TokenCredential | undefined;
  inboundTokenVerifier: InboundTokenVerifier | undefined;
  downstreamApiService: DownstreamApiService;
  /** Allocates a fresh, empty credential context for one inbound request. */
  createCredentialContext(): CredentialContext;
}

export interface GatewayContextOptions {
  config?: GatewayConfig | undefined;
  env?: Record<string, string | undefined> | undefined;
  logger?: Logger | undefined;
  /** Used for identity provider calls. */
  identityFetchFn?: FetchLike | undefined;
  /** Used for downstream API calls. */
  downstreamFetchFn?: FetchLike | undefined;
  inboundTokenVerifier?: InboundTokenVerifier | undefined;
}

export function createGatewayContext(options?: GatewayContextOptions): GatewayContext {
  const config = options?.config ?? loadGatewayConfig(options?.env ?? process.env);
  const logger = options?.logger ?? createLogger({ level: config.logLevel });
  const delegation = config.delegation;

  const credentialFactory = new DelegatedCredentialFactory({
    authorityHost: delegation.authorityHost,
    tokenEndpoint: delegation.tokenEndpoint,
    grantStyle: delegation.grantStyle,
    timeoutMs: delegation.tokenTimeoutMs,
    fetchFn: options?.identityFetchFn,
    logger: logger.child({ component: "on-behalf-of" })
  });

  // Read-only for the life of the process; every request's context shares it.
  const identity: DelegationIdentity = Object.freeze({
    tenantId: delegation.tenantId,
    clientId: delegation.clientId,
    clientCredential: clientCredentialFromSettings(delegation)
  });

  let serviceCredential: TokenCredential | undefined;
  if (config.downstream.serviceIdentity && identity.clientCredential && identity.tenantId && identity.clientId) {
    serviceCredential = new ClientCredentialsCredential(
      new TokenEndpointClient({
        tokenEndpoint: delegation.tokenEndpoint ?? tokenEndpointFor(delegation.authorityHost, identity.tenantId),
        fetchFn: options?.identityFetchFn,
        timeoutMs: delegation.tokenTimeoutMs
      }),
      identity.clientId,
      identity.clientCredential
    );
  }

  const inboundTokenVerifier =
    options?.inboundTokenVerifier ?? (config.inbound ? new InboundTokenVerifier({ settings: config.inbound }) : undefined);

  const downstreamApiService = new DownstreamApiService({
    baseUrl: config.downstream.baseUrl,
    scopes: config.downstream.scopes,
    serviceCredential,
    fetchFn: options?.downstreamFetchFn,
    logger: logger.child({ component: "downstream-api" })
  });

  const contextLogger = logger.child({ component: "credential-context" });

  return {
    config,
    logger,
    credentialFactory,
    serviceCredential,
    inboundTokenVerifier,
    downstreamApiService,
    createCredentialContext: () =>
      new CredentialContext({
        factory: credentialFactory,
        identity,
        logger: contextLogger
      })
  };
}
