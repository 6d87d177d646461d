export { TransferOrchestrator, artifactFileName } from './orchestrator.js';
export type { TransferOrchestratorOptions, ChunkOutcome } from './orchestrator.js';
export { ChunkReassembler } from './reassembler.js';
export type { AcceptResult, ChunkReassemblerOptions } from './reassembler.js';
export { DeadlineTracker } from './deadline-tracker.js';
export {
  FailureReasons,
  canTransition,
  isTerminal,
} from './types.js';
export type {
  TransferStatus,
  TransferErrorCode,
  TransferSnapshot,
  TransferChangeCallback,
} from './types.js';
