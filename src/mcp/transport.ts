import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  isJSONRPCError,
  isJSONRPCRequest,
  isJSONRPCResponse,
  type JSONRPCError,
  type JSONRPCMessage,
  type RequestId,
} from "@modelcontextprotocol/sdk/types.js";

/**
 * A lightweight HTTP transport for MCP that works with Hono.
 *
 * Bridges individual HTTP requests to the MCP Server's transport interface.
 * Each JSON-RPC request gets a response via a Promise-based dispatch.
 */
export class HttpTransport implements Transport {
  private pendingResponses = new Map<
    RequestId,
    (response: JSONRPCMessage) => void
  >();

  onmessage?: (message: JSONRPCMessage) => void;
  onclose?: () => void;
  onerror?: (error: Error) => void;

  constructor(private readonly timeoutMs = 60_000) {}

  async start(): Promise<void> {
    // No-op: HTTP transport is request-driven
  }

  async close(): Promise<void> {
    for (const [id, resolve] of this.pendingResponses) {
      resolve(rpcError(id, "Transport closed"));
    }
    this.pendingResponses.clear();
    this.onclose?.();
  }

  async send(message: JSONRPCMessage): Promise<void> {
    // Route server responses to the waiting HTTP request
    if ((isJSONRPCResponse(message) || isJSONRPCError(message)) && message.id !== undefined) {
      const resolver = this.pendingResponses.get(message.id);
      if (resolver) {
        this.pendingResponses.delete(message.id);
        resolver(message);
      }
    }
    // Notifications and server-initiated requests are dropped in HTTP mode
  }

  /**
   * Handle an incoming JSON-RPC message from an HTTP POST.
   * Resolves to the response, or `null` for notifications.
   */
  async handleJsonRpc(body: JSONRPCMessage): Promise<JSONRPCMessage | null> {
    if (!isJSONRPCRequest(body)) {
      this.onmessage?.(body);
      return null;
    }

    const id = body.id;
    return new Promise<JSONRPCMessage>((resolve) => {
      const timer = setTimeout(() => {
        if (this.pendingResponses.delete(id)) {
          resolve(rpcError(id, "Request timed out"));
        }
      }, this.timeoutMs);
      timer.unref();

      // Set up response handler BEFORE dispatching the message
      this.pendingResponses.set(id, (response) => {
        clearTimeout(timer);
        resolve(response);
      });

      this.onmessage?.(body);
    });
  }
}

function rpcError(id: RequestId, message: string): JSONRPCError {
  return { jsonrpc: "2.0", id, error: { code: -32000, message } };
}
