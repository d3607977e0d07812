import WebSocket, { type RawData } from "ws";

/**
 * The part of a `ws` WebSocket the stream connection relies on. Tests pass
 * an in-process fake through `SocketFactory`.
 */
export interface TickerSocket {
  readonly readyState: number;
  on(event: "open", listener: () => void): this;
  on(event: "message", listener: (data: RawData) => void): this;
  on(event: "close", listener: (code: number) => void): this;
  on(event: "error", listener: (error: Error) => void): this;
  on(event: "pong", listener: () => void): this;
  removeAllListeners(event?: string): this;
  send(data: string, cb?: (error?: Error) => void): void;
  ping(data?: unknown, mask?: boolean, cb?: (error: Error) => void): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
}

export type SocketFactory = (url: string) => TickerSocket;

export const SOCKET_OPEN = WebSocket.OPEN;
export const SOCKET_CONNECTING = WebSocket.CONNECTING;
export const SOCKET_CLOSING = WebSocket.CLOSING;

export const createWebSocket: SocketFactory = (url) => new WebSocket(url, { handshakeTimeout: 10000 });

export const rawDataToString = (data: RawData): string => {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(new Uint8Array(data)).toString("utf8");
  }
  return data.toString("utf8");
};
