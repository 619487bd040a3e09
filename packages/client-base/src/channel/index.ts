// =============================================================================
// Channel Module Exports
// =============================================================================

export {
  parseGrpcUri,
  parseGrpcUriOrThrow,
  type ParseGrpcUriOptions,
} from "./uri";
