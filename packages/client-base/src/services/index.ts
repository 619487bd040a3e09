// =============================================================================
// Services Module Exports
// =============================================================================

export { ClientConfigService } from "./config";
export { ClientLoggerService, consoleLogger, safeLog } from "./logger";
