import { EventEmitter } from "events";
import type { RawData } from "ws";
import type { ConnectionState, ConnectionStatusEvent } from "../types";
import logger from "../utils/logger";
import {
  createWebSocket,
  rawDataToString,
  SOCKET_CLOSING,
  SOCKET_CONNECTING,
  SOCKET_OPEN,
  type SocketFactory,
  type TickerSocket,
} from "./TickerSocket";

export interface StreamConnectionOptions {
  url: string;
  createSocket?: SocketFactory;
  heartbeatIntervalMs?: number;
  reconnectBaseDelayMs?: number;
  reconnectFactor?: number;
  maxReconnectAttempts?: number;
  /** Pause between tearing down a live session and opening the next one. */
  reconnectGraceMs?: number;
  manualReconnectDelayMs?: number;
}

export const computeReconnectDelay = (attempt: number, baseDelayMs = 5000, factor = 1.5): number =>
  baseDelayMs * Math.pow(factor, Math.max(0, attempt - 1));

/**
 * One logical streaming session to the exchange.
 *
 * Emits `state` (ConnectionStatusEvent), `ready` once a session is open,
 * `frame` (string) per inbound message and `failed` when automatic
 * reconnection gives up.
 */
export class StreamConnection extends EventEmitter {
  private readonly url: string;
  private readonly createSocket: SocketFactory;
  private readonly heartbeatIntervalMs: number;
  private readonly reconnectBaseDelayMs: number;
  private readonly reconnectFactor: number;
  private readonly maxReconnectAttempts: number;
  private readonly reconnectGraceMs: number;
  private readonly manualReconnectDelayMs: number;

  private socket?: TickerSocket;
  private state: ConnectionState = "disconnected";
  private reconnectAttempts = 0;
  // Callbacks from a socket opened under an older session are ignored.
  private session = 0;
  private awaitingPong = false;

  private heartbeatTimer?: NodeJS.Timeout;
  private reconnectTimer?: NodeJS.Timeout;
  private pendingConnectTimer?: NodeJS.Timeout;

  constructor(options: StreamConnectionOptions) {
    super();
    this.url = options.url;
    this.createSocket = options.createSocket ?? createWebSocket;
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? 30000;
    this.reconnectBaseDelayMs = options.reconnectBaseDelayMs ?? 5000;
    this.reconnectFactor = options.reconnectFactor ?? 1.5;
    this.maxReconnectAttempts = options.maxReconnectAttempts ?? 10;
    this.reconnectGraceMs = options.reconnectGraceMs ?? 500;
    this.manualReconnectDelayMs = options.manualReconnectDelayMs ?? 1000;
  }

  getState(): ConnectionState {
    return this.state;
  }

  getReconnectAttempts(): number {
    return this.reconnectAttempts;
  }

  isConnected(): boolean {
    return this.state === "connected";
  }

  /**
   * Opens a session. A live or opening session is torn down first and the
   * new one starts after the grace delay.
   */
  connect(): void {
    this.clearTimer("reconnect");
    this.clearTimer("pendingConnect");

    if (this.socket) {
      logger.info({ graceMs: this.reconnectGraceMs }, "Restarting stream session");
      this.teardownSocket();
      this.setState("connecting");
      this.pendingConnectTimer = setTimeout(() => {
        this.pendingConnectTimer = undefined;
        this.open();
      }, this.reconnectGraceMs);
      return;
    }

    this.open();
  }

  disconnect(): void {
    this.clearTimer("reconnect");
    this.clearTimer("pendingConnect");
    this.teardownSocket();
    this.setState("disconnected");
    logger.info("Stream disconnected");
  }

  /** Manual recovery, including from `failed`. Always restarts the attempt count. */
  reconnect(): void {
    this.reconnectAttempts = 0;
    this.disconnect();
    this.pendingConnectTimer = setTimeout(() => {
      this.pendingConnectTimer = undefined;
      this.open();
    }, this.manualReconnectDelayMs);
  }

  /**
   * Starts a connection attempt only when the stream sits idle in
   * `disconnected`. Never revives `failed` or touches the attempt count.
   */
  ensureConnected(): boolean {
    if (this.state !== "disconnected" || this.reconnectTimer || this.pendingConnectTimer) {
      return false;
    }
    logger.info("Stream idle, starting a connection attempt");
    this.connect();
    return true;
  }

  send(payload: unknown): Promise<void> {
    const socket = this.socket;
    if (!socket || this.state !== "connected" || socket.readyState !== SOCKET_OPEN) {
      return Promise.reject(new Error("Stream is not connected"));
    }

    const message = JSON.stringify(payload);
    return new Promise<void>((resolve, reject) => {
      try {
        socket.send(message, (error) => (error ? reject(error) : resolve()));
      } catch (error) {
        reject(error instanceof Error ? error : new Error(String(error)));
      }
    });
  }

  private open(): void {
    const session = ++this.session;
    this.setState("connecting");
    logger.info({ url: this.url, attempt: this.reconnectAttempts }, "Connecting to ticker stream");

    let socket: TickerSocket;
    try {
      socket = this.createSocket(this.url);
    } catch (error) {
      logger.error({ err: error }, "Failed to create stream socket");
      this.handleDisconnect("socket creation failed");
      return;
    }
    this.socket = socket;

    socket.on("open", () => {
      if (session !== this.session) return;
      this.reconnectAttempts = 0;
      this.setState("connected");
      this.startHeartbeat(session);
      logger.info("Ticker stream connected");
      this.emit("ready");
    });

    socket.on("message", (data: RawData) => {
      if (session !== this.session) return;
      try {
        this.emit("frame", rawDataToString(data));
      } catch (error) {
        logger.error({ err: error }, "Frame handler failed");
      }
    });

    socket.on("pong", () => {
      if (session !== this.session) return;
      this.awaitingPong = false;
    });

    socket.on("error", (error: Error) => {
      if (session !== this.session) return;
      logger.warn({ err: error }, "Ticker stream error");
      this.handleDisconnect("transport error");
    });

    socket.on("close", (code: number) => {
      if (session !== this.session) return;
      logger.warn({ code }, "Ticker stream closed");
      this.handleDisconnect("closed");
    });
  }

  private startHeartbeat(session: number): void {
    this.clearTimer("heartbeat");
    this.awaitingPong = false;
    this.heartbeatTimer = setInterval(() => {
      const socket = this.socket;
      if (session !== this.session || !socket) return;

      if (this.awaitingPong) {
        logger.warn("Heartbeat not acknowledged");
        this.handleDisconnect("heartbeat timeout");
        return;
      }

      this.awaitingPong = true;
      try {
        socket.ping(undefined, undefined, (error) => {
          if (error && session === this.session) {
            logger.warn({ err: error }, "Heartbeat ping failed");
            this.handleDisconnect("heartbeat failed");
          }
        });
      } catch (error) {
        logger.warn({ err: error }, "Heartbeat ping failed");
        this.handleDisconnect("heartbeat failed");
      }
    }, this.heartbeatIntervalMs);
  }

  private handleDisconnect(reason: string): void {
    this.teardownSocket();
    this.setState("disconnected");
    logger.info({ reason }, "Stream lost");
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer) {
      return;
    }

    if (this.reconnectAttempts >= this.maxReconnectAttempts) {
      logger.error({ attempts: this.reconnectAttempts }, "Max reconnection attempts reached");
      this.setState("failed");
      this.emit("failed", { attempts: this.reconnectAttempts });
      return;
    }

    this.reconnectAttempts++;
    const delay = computeReconnectDelay(this.reconnectAttempts, this.reconnectBaseDelayMs, this.reconnectFactor);

    logger.info(
      { delay, attempt: this.reconnectAttempts, maxAttempts: this.maxReconnectAttempts },
      "Scheduling stream reconnect",
    );
    this.emitState();

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      this.open();
    }, delay);
  }

  /** Bumps the session, so nothing from the old socket reaches listeners after this. */
  private teardownSocket(): void {
    this.session++;
    this.clearTimer("heartbeat");
    this.awaitingPong = false;

    const socket = this.socket;
    this.socket = undefined;
    if (!socket) return;

    socket.removeAllListeners("open");
    socket.removeAllListeners("message");
    socket.removeAllListeners("close");
    socket.removeAllListeners("pong");
    socket.removeAllListeners("error");
    // close()/terminate() may still emit an error.
    socket.on("error", (error: Error) => {
      logger.debug({ err: error }, "Error from discarded stream socket");
    });

    try {
      if (socket.readyState === SOCKET_OPEN) {
        socket.close(1000, "client disconnect");
      } else if (socket.readyState === SOCKET_CONNECTING || socket.readyState === SOCKET_CLOSING) {
        socket.terminate();
      }
    } catch (error) {
      logger.debug({ err: error }, "Stream socket teardown failed");
    }
  }

  private setState(state: ConnectionState): void {
    if (this.state === state) return;
    this.state = state;
    this.emitState();
  }

  private emitState(): void {
    const event: ConnectionStatusEvent = { state: this.state, retryCount: this.reconnectAttempts };
    this.emit("state", event);
  }

  private clearTimer(timer: "heartbeat" | "reconnect" | "pendingConnect"): void {
    switch (timer) {
      case "heartbeat":
        if (this.heartbeatTimer) clearInterval(this.heartbeatTimer);
        this.heartbeatTimer = undefined;
        break;
      case "reconnect":
        if (this.reconnectTimer) clearTimeout(this.reconnectTimer);
        this.reconnectTimer = undefined;
        break;
      case "pendingConnect":
        if (this.pendingConnectTimer) clearTimeout(this.pendingConnectTimer);
        this.pendingConnectTimer = undefined;
        break;
    }
  }
}

export default StreamConnection;
