/**
 * Errors returned synchronously to control-plane callers.
 * Data-path failures never throw; they are recorded on the transfer.
 */

export type ControlPlaneErrorCode =
  | 'BadRequest'
  | 'AgentNotConnected'
  | 'AgentBusy'
  | 'TransferNotFound';

export class ControlPlaneError extends Error {
  public readonly code: ControlPlaneErrorCode;
  public readonly statusCode: number;

  constructor(code: ControlPlaneErrorCode, statusCode: number, message: string) {
    super(message);
    this.name = 'ControlPlaneError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class AgentNotConnectedError extends ControlPlaneError {
  constructor(agentId: string) {
    super('AgentNotConnected', 404, `Client ${agentId} is not connected`);
    this.name = 'AgentNotConnectedError';
  }
}

export class AgentBusyError extends ControlPlaneError {
  constructor(agentId: string) {
    super('AgentBusy', 409, `Client ${agentId} already has a transfer in progress`);
    this.name = 'AgentBusyError';
  }
}

export class TransferNotFoundError extends ControlPlaneError {
  constructor(transferId: string) {
    super('TransferNotFound', 404, `Download '${transferId}' not found`);
    this.name = 'TransferNotFoundError';
  }
}
