export { executeWithKeyRotation, normalizeKeys, DEFAULT_PROVIDER_TIMEOUT_MS } from "./key-rotation";
export type { KeyAttempt, KeyRotationOptions } from "./key-rotation";
export {
  ProviderError,
  GenerationError,
  SpeechError,
  classifyStatus,
  classifyProviderError,
  describeFailure,
} from "./types";
export type { GatewayFailure, GatewayFailureKind, GatewayResult, RotatableFailureKind } from "./types";
