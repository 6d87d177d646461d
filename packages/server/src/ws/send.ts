import type { WebSocket } from 'ws';
import { encodeMessage } from '@edgepull/protocol';
import type { ServerMessage } from '@edgepull/protocol';

/**
 * Send a JSON message to an agent.
 * Returns false without sending when the socket is not open. `onError`
 * receives failures reported by the transport after the frame was queued.
 */
export function sendMessage(
  socket: WebSocket,
  message: ServerMessage,
  onError?: (err: Error) => void
): boolean {
  if (socket.readyState !== socket.OPEN) {
    return false;
  }
  socket.send(encodeMessage(message), (err) => {
    if (err && onError) {
      onError(err);
    }
  });
  return true;
}
