import WebSocket from "ws";
import type pino from "pino";
import {
  AppServerError,
  TransportClosedError,
  isConnectionLostSocketError,
} from "../shared/app-server-errors.js";
import type { FrameData } from "../shared/jsonrpc.js";

export const CLOSE_NORMAL = 1000;
export const CLOSE_GOING_AWAY = 1001;
export const CLOSE_INTERNAL_ERROR = 1011;

const DEFAULT_HANDSHAKE_TIMEOUT_MS = 10_000;
const DEFAULT_PING_TIMEOUT_MS = 10_000;

const UNROUTABLE_ENDPOINT_HOSTS = new Set(["0.0.0.0", "::", "::1", "localhost", "127.0.0.1"]);

/**
 * One WebSocket connection to an app-server. Sessions are single use: once
 * closed they never reopen, and a new connection attempt builds a new session.
 */
export interface AppServerSession {
  readonly url: string;
  readonly isClosed: boolean;
  send(text: string): Promise<void>;
  /** Next inbound frame. Rejects with {@link TransportClosedError} once the queue is drained after close. */
  receiveNext(signal?: AbortSignal): Promise<FrameData>;
  /** Round-trip latency in milliseconds. */
  sendPing(timeoutMs?: number): Promise<number>;
  close(code?: number, reason?: string): void;
}

export interface OpenSessionOptions {
  handshakeTimeoutMs?: number;
  logger?: pino.Logger;
}

export type AppServerSessionFactory = (
  url: URL,
  options: OpenSessionOptions
) => Promise<AppServerSession>;

// ============================================================================
// URL validation
// ============================================================================

export function isUnroutableEndpointHost(host: string): boolean {
  const normalized = host.trim().toLowerCase().replace(/^\[/, "").replace(/\]$/, "");
  return UNROUTABLE_ENDPOINT_HOSTS.has(normalized);
}

export function resolveAppServerUrl(raw: string): URL {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new AppServerError({ type: "invalid_url" });
  }

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch (error) {
    throw new AppServerError({ type: "invalid_url" }, { cause: error });
  }

  if (url.protocol !== "ws:" && url.protocol !== "wss:") {
    throw new AppServerError({ type: "invalid_url" });
  }
  const host = url.hostname.replace(/^\[/, "").replace(/\]$/, "");
  if (!host) {
    throw new AppServerError({ type: "invalid_url" });
  }
  if (isUnroutableEndpointHost(host)) {
    throw new AppServerError({ type: "invalid_endpoint_host", host });
  }
  return url;
}

// ============================================================================
// Frame queue
// ============================================================================

type FrameWaiter = {
  resolve: (frame: FrameData) => void;
  reject: (error: unknown) => void;
};

/** Buffers inbound frames until a reader asks for them. */
export class FrameQueue {
  private frames: FrameData[] = [];
  private waiters: FrameWaiter[] = [];
  private closedError: Error | null = null;

  push(frame: FrameData): void {
    if (this.closedError) {
      return;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(frame);
    } else {
      this.frames.push(frame);
    }
  }

  end(error: Error): void {
    if (this.closedError) {
      return;
    }
    this.closedError = error;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.reject(error);
    }
  }

  next(signal?: AbortSignal): Promise<FrameData> {
    const frame = this.frames.shift();
    if (frame !== undefined) {
      return Promise.resolve(frame);
    }
    if (this.closedError) {
      return Promise.reject(this.closedError);
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    return new Promise<FrameData>((resolve, reject) => {
      const onAbort = () => {
        this.waiters = this.waiters.filter((entry) => entry !== waiter);
        reject(signal?.reason);
      };
      const waiter: FrameWaiter = {
        resolve: (value) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(value);
        },
        reject: (error) => {
          signal?.removeEventListener("abort", onAbort);
          reject(error);
        },
      };
      this.waiters.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}

function rawDataToFrame(data: WebSocket.RawData, isBinary: boolean): FrameData {
  const buffer = Array.isArray(data)
    ? Buffer.concat(data)
    : data instanceof ArrayBuffer
      ? Buffer.from(data)
      : data;
  return isBinary ? new Uint8Array(buffer) : buffer.toString("utf8");
}

// ============================================================================
// ws-backed session
// ============================================================================

type PongWaiter = {
  resolve: () => void;
  reject: (error: unknown) => void;
};

export class WebSocketSession implements AppServerSession {
  readonly url: string;
  private readonly socket: WebSocket;
  private readonly logger: pino.Logger | undefined;
  private readonly frames = new FrameQueue();
  private pongWaiters: PongWaiter[] = [];
  private lastSocketError: Error | null = null;
  private closed = false;

  private constructor(socket: WebSocket, url: string, logger: pino.Logger | undefined) {
    this.socket = socket;
    this.url = url;
    this.logger = logger;

    socket.on("message", (data, isBinary) => {
      this.frames.push(rawDataToFrame(data, isBinary));
    });
    socket.on("pong", () => {
      const waiter = this.pongWaiters.shift();
      waiter?.resolve();
    });
    socket.on("error", (error) => {
      this.lastSocketError = error;
      this.logger?.debug({ err: error }, "app-server socket error");
    });
    socket.on("close", (code, reason) => {
      this.markClosed(
        new TransportClosedError({
          code,
          reason: reason.toString("utf8"),
          connectionLost: code === 1006 || isConnectionLostSocketError(this.lastSocketError),
          cause: this.lastSocketError ?? undefined,
        })
      );
    });
  }

  /** Opens the socket and resolves once the upgrade completes. */
  static open(url: URL, options: OpenSessionOptions = {}): Promise<WebSocketSession> {
    const socket = new WebSocket(url, {
      handshakeTimeout: options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS,
      perMessageDeflate: false,
    });
    const session = new WebSocketSession(socket, url.toString(), options.logger);

    return new Promise<WebSocketSession>((resolve, reject) => {
      const cleanup = () => {
        socket.off("open", onOpen);
        socket.off("error", onError);
        socket.off("close", onClose);
      };
      const onOpen = () => {
        cleanup();
        resolve(session);
      };
      const onError = (error: Error) => {
        cleanup();
        session.close(CLOSE_INTERNAL_ERROR, "handshake failed");
        reject(error);
      };
      const onClose = (code: number, reason: Buffer) => {
        cleanup();
        reject(new TransportClosedError({ code, reason: reason.toString("utf8") }));
      };
      socket.on("open", onOpen);
      socket.on("error", onError);
      socket.on("close", onClose);
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  send(text: string): Promise<void> {
    if (this.closed || this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new AppServerError({ type: "not_connected" }));
    }
    return new Promise<void>((resolve, reject) => {
      this.socket.send(text, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  receiveNext(signal?: AbortSignal): Promise<FrameData> {
    return this.frames.next(signal);
  }

  sendPing(timeoutMs: number = DEFAULT_PING_TIMEOUT_MS): Promise<number> {
    if (this.closed || this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new AppServerError({ type: "not_connected" }));
    }
    const startedAt = Date.now();
    return new Promise<number>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pongWaiters = this.pongWaiters.filter((entry) => entry !== waiter);
        reject(new Error(`Ping timed out after ${timeoutMs}ms`));
      }, timeoutMs);
      const waiter: PongWaiter = {
        resolve: () => {
          clearTimeout(timer);
          resolve(Date.now() - startedAt);
        },
        reject: (error) => {
          clearTimeout(timer);
          reject(error);
        },
      };
      this.pongWaiters.push(waiter);
      this.socket.ping(undefined, undefined, (error) => {
        if (error) {
          clearTimeout(timer);
          this.pongWaiters = this.pongWaiters.filter((entry) => entry !== waiter);
          reject(error);
        }
      });
    });
  }

  close(code: number = CLOSE_NORMAL, reason: string = ""): void {
    if (this.closed) {
      return;
    }
    try {
      this.socket.close(code, reason);
    } catch (error) {
      this.logger?.debug({ err: error }, "app-server socket close failed");
      this.socket.terminate();
    }
    this.markClosed(new TransportClosedError({ code, reason, connectionLost: false }));
  }

  private markClosed(error: TransportClosedError): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const pongWaiters = this.pongWaiters;
    this.pongWaiters = [];
    for (const waiter of pongWaiters) {
      waiter.reject(error);
    }
    this.frames.end(error);
  }
}

export const openWebSocketSession: AppServerSessionFactory = (url, options) =>
  WebSocketSession.open(url, options);
