export { GatewayClient } from "./client.js";
export type { GatewayClientOptions } from "./client.js";
export { StepUpChallengeHandler, parseChallenge } from "./challenge-handler.js";
export type { ChallengeResponse, StepUpChallengeHandlerOptions } from "./challenge-handler.js";
export {
  GatewayHttpError,
  InteractionRequiredError,
  StepUpFailedError,
  isInteractionRequired,
  isUserCancellation
} from "./errors.js";
export type { StepUpFailureReason } from "./errors.js";
export type {
  AccountInfo,
  DownstreamCallInput,
  DownstreamCallResponse,
  GatewayErrorBody,
  GatewayErrorType,
  HealthResponse,
  MeResponse,
  StepUpChallengeDetails,
  StepUpEvent,
  StepUpEventName,
  TokenBroker,
  TokenRequest,
  TokenResult
} from "./types.js";
