// =============================================================================
// Client Module Exports
// =============================================================================

export { BaseApiClient, type BaseApiClientOptions } from "./base-client";
