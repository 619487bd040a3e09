// =============================================================================
// Streaming Module Exports
// =============================================================================

export type {
  MultiplexerState,
  CloseReason,
  MultiplexerSnapshot,
  StreamMultiplexerOptions,
  ConsumerSlot,
} from "./types";

export { Consumer } from "./consumer";
export { StreamMultiplexer } from "./multiplexer";
