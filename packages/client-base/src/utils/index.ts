// =============================================================================
// Utils Module Exports
// =============================================================================

export { runPromiseUnwrapped } from "./run";

export { withRetry, retryCall } from "./retry";
