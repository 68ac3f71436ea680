import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  ErrorCode,
  isJSONRPCError,
  isJSONRPCRequest,
  isJSONRPCResponse,
  type JSONRPCMessage,
  type RequestId,
} from "@modelcontextprotocol/sdk/types.js";

/**
 * A request-driven HTTP transport for MCP.
 *
 * Bridges individual HTTP requests to the MCP server's transport interface:
 * each JSON-RPC request waits on a promise that `send` resolves when the
 * server answers with the same id.
 */
export class HttpTransport implements Transport {
  private readonly pendingResponses = new Map<RequestId, (response: JSONRPCMessage) => void>();

  onmessage?: (message: JSONRPCMessage) => void;
  onclose?: () => void;
  onerror?: (error: Error) => void;

  constructor(private readonly timeoutMs = 60_000) {}

  async start(): Promise<void> {
    // Request-driven; nothing to open.
  }

  async close(): Promise<void> {
    for (const [id, resolve] of this.pendingResponses) {
      resolve(failure(id, ErrorCode.ConnectionClosed, "Transport closed"));
    }
    this.pendingResponses.clear();
    this.onclose?.();
  }

  async send(message: JSONRPCMessage): Promise<void> {
    if (isJSONRPCResponse(message) || isJSONRPCError(message)) {
      const resolve = this.pendingResponses.get(message.id);
      if (resolve) {
        this.pendingResponses.delete(message.id);
        resolve(message);
      }
    }
    // Server-initiated notifications have nowhere to go in this mode.
  }

  /**
   * Dispatch one message from an HTTP POST. Resolves with the server's
   * reply to a request, or `null` for notifications and responses, which
   * get none.
   */
  handleJsonRpc(message: JSONRPCMessage): Promise<JSONRPCMessage | null> {
    if (!isJSONRPCRequest(message)) {
      this.onmessage?.(message);
      return Promise.resolve(null);
    }

    const id = message.id;
    if (this.pendingResponses.has(id)) {
      return Promise.resolve(
        failure(id, ErrorCode.InvalidRequest, `Request id ${String(id)} is already in flight`)
      );
    }
    return new Promise<JSONRPCMessage>((resolve) => {
      const timer = setTimeout(() => {
        if (this.pendingResponses.delete(id)) {
          resolve(failure(id, ErrorCode.RequestTimeout, "Request timed out"));
        }
      }, this.timeoutMs);
      timer.unref();

      // Register before dispatch: the server may answer synchronously.
      this.pendingResponses.set(id, (response) => {
        clearTimeout(timer);
        resolve(response);
      });
      this.onmessage?.(message);
    });
  }
}

function failure(id: RequestId, code: number, message: string): JSONRPCMessage {
  return { jsonrpc: "2.0", id, error: { code, message } };
}
