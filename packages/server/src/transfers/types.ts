/**
 * Transfer status. `completed` and `failed` are terminal.
 */
export type TransferStatus = 'pending' | 'dispatched' | 'in_progress' | 'completed' | 'failed';

/**
 * Why a transfer failed
 */
export type TransferErrorCode =
  | 'AgentNotConnected'
  | 'AgentDisconnected'
  | 'ConnectionReplaced'
  | 'ProtocolViolation'
  | 'InactivityTimeout'
  | 'ArtifactWriteFailure'
  | 'AgentAborted'
  | 'Cancelled'
  | 'ServerShutdown';

/**
 * Transfer record as seen by readers. Always a frozen copy.
 */
export interface TransferSnapshot {
  readonly id: string;
  readonly agentId: string;
  /** Path on the agent, interpreted only by the agent */
  readonly sourcePath: string;
  /** Artifact path on the server */
  readonly destinationPath: string;
  readonly status: TransferStatus;
  readonly chunksReceived: number;
  readonly bytesReceived: number;
  /** Source size announced by the agent, if any */
  readonly totalBytes: number | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly completedAt: Date | null;
  readonly error: string | null;
  readonly errorCode: TransferErrorCode | null;
}

export type TransferChangeCallback = (snapshot: TransferSnapshot) => void;

export function isTerminal(status: TransferStatus): boolean {
  return status === 'completed' || status === 'failed';
}

/**
 * Forward-only transitions of the transfer state machine
 */
const TRANSITIONS: Record<TransferStatus, readonly TransferStatus[]> = {
  pending: ['dispatched', 'failed'],
  dispatched: ['in_progress', 'failed'],
  in_progress: ['in_progress', 'completed', 'failed'],
  completed: [],
  failed: [],
};

export function canTransition(from: TransferStatus, to: TransferStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Human-readable reasons recorded on failed transfers */
export const FailureReasons = {
  AGENT_NOT_CONNECTED: 'agent not connected',
  AGENT_DISCONNECTED: 'agent disconnected',
  CONNECTION_REPLACED: 'connection replaced',
  INACTIVITY_TIMEOUT: 'inactivity timeout',
  CANCELLED: 'cancelled',
  SERVER_SHUTDOWN: 'server shutting down',
} as const;
