import { AppServerError, TransportClosedError } from "../../shared/app-server-errors.js";
import type { JsonValue } from "../../shared/json-value.js";
import {
  classifyEnvelope,
  decodeEnvelope,
  encodeError,
  encodeNotification,
  encodeRequest,
  encodeResult,
  type FrameData,
  type RpcErrorObject,
  type RpcId,
} from "../../shared/jsonrpc.js";
import {
  CLOSE_NORMAL,
  FrameQueue,
  type AppServerSession,
  type AppServerSessionFactory,
} from "../app-server-transport.js";

export type FakeReply =
  | { result: JsonValue }
  | { error: RpcErrorObject }
  | { noReply: true };

export interface FakeRequestContext {
  id: RpcId;
  session: FakeAppServerSession;
  /** Zero-based index of the session among those the server has opened. */
  sessionIndex: number;
  /** Zero-based count of earlier calls to the same method on any session. */
  callIndex: number;
}

export type FakeMethodHandler = (
  params: JsonValue | undefined,
  context: FakeRequestContext
) => FakeReply;

export interface SentMessage {
  id?: RpcId;
  method?: string;
  params?: JsonValue;
  result?: JsonValue;
  error?: RpcErrorObject;
}

/**
 * In-process stand-in for one app-server WebSocket. Requests the client sends
 * are answered from the owning {@link FakeAppServer}'s handlers on a microtask.
 */
export class FakeAppServerSession implements AppServerSession {
  readonly url: string;
  readonly sent: string[] = [];
  readonly closeCalls: Array<{ code: number; reason: string }> = [];
  pingLatencyMs = 5;
  pingError: Error | null = null;
  pingCount = 0;

  private readonly server: FakeAppServer;
  private readonly frames = new FrameQueue();
  private closed = false;

  constructor(server: FakeAppServer, url: URL) {
    this.server = server;
    this.url = url.toString();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get index(): number {
    return this.server.sessions.indexOf(this);
  }

  send(text: string): Promise<void> {
    if (this.closed) {
      return Promise.reject(new AppServerError({ type: "not_connected" }));
    }
    this.sent.push(text);
    const classified = classifyEnvelope(decodeEnvelope(text));
    if (classified.kind === "request") {
      const { id, method, params } = classified;
      queueMicrotask(() => {
        this.reply(id, this.server.dispatch(method, params, id, this));
      });
    }
    return Promise.resolve();
  }

  receiveNext(signal?: AbortSignal): Promise<FrameData> {
    return this.frames.next(signal);
  }

  sendPing(): Promise<number> {
    this.pingCount += 1;
    if (this.closed) {
      return Promise.reject(new AppServerError({ type: "not_connected" }));
    }
    return this.pingError ? Promise.reject(this.pingError) : Promise.resolve(this.pingLatencyMs);
  }

  close(code: number = CLOSE_NORMAL, reason: string = ""): void {
    if (this.closed) {
      return;
    }
    this.closeCalls.push({ code, reason });
    this.end(new TransportClosedError({ code, reason, connectionLost: false }));
  }

  /** Decoded view of everything the client has sent. */
  messages(): SentMessage[] {
    return this.sent.map((text) => {
      const envelope = decodeEnvelope(text);
      const message: SentMessage = {};
      if (envelope.id !== undefined) message.id = envelope.id;
      if (envelope.method !== undefined) message.method = envelope.method;
      if (envelope.params !== undefined) message.params = envelope.params;
      if (envelope.result !== undefined) message.result = envelope.result;
      if (envelope.error !== undefined) message.error = envelope.error;
      return message;
    });
  }

  requests(method: string): SentMessage[] {
    return this.messages().filter((message) => message.method === method && message.id !== undefined);
  }

  pushFrame(frame: FrameData | JsonValue): void {
    if (typeof frame === "string" || frame instanceof Uint8Array || frame instanceof ArrayBuffer) {
      this.frames.push(frame);
    } else {
      this.frames.push(JSON.stringify(frame));
    }
  }

  notify(method: string, params?: JsonValue): void {
    this.frames.push(encodeNotification(method, params));
  }

  request(id: RpcId, method: string, params?: JsonValue): void {
    this.frames.push(encodeRequest(id, method, params));
  }

  reply(id: RpcId, reply: FakeReply): void {
    if (this.closed) {
      return;
    }
    if ("result" in reply) {
      this.frames.push(encodeResult(id, reply.result));
    } else if ("error" in reply) {
      this.frames.push(encodeError(id, reply.error));
    }
  }

  /** Simulates the network dropping the socket (close code 1006). */
  drop(): void {
    this.end(new TransportClosedError({ code: 1006, connectionLost: true }));
  }

  /** Simulates the server closing the socket in an orderly way. */
  closeFromServer(code: number, reason: string = ""): void {
    this.end(new TransportClosedError({ code, reason, connectionLost: false }));
  }

  private end(error: TransportClosedError): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.frames.end(error);
  }
}

/**
 * Scriptable app-server. Hand {@link FakeAppServer.factory} to the client as
 * its session factory; each connection attempt opens a new
 * {@link FakeAppServerSession}.
 */
export class FakeAppServer {
  readonly sessions: FakeAppServerSession[] = [];
  readonly openAttempts: string[] = [];
  cliVersion = "0.101.0";

  private readonly handlers = new Map<string, FakeMethodHandler>();
  private readonly callCounts = new Map<string, number>();
  private readonly connectErrors: unknown[] = [];
  private connectFailure: unknown = null;

  readonly factory: AppServerSessionFactory = (url) => {
    this.openAttempts.push(url.toString());
    const queued = this.connectErrors.shift();
    const error = queued ?? this.connectFailure;
    if (error !== null && error !== undefined) {
      return Promise.reject(error);
    }
    const session = new FakeAppServerSession(this, url);
    this.sessions.push(session);
    return Promise.resolve(session);
  };

  constructor() {
    this.handle("initialize", () => ({
      result: {
        serverInfo: { name: "fake-app-server", version: this.cliVersion },
        authStatus: "authenticated",
      },
    }));
  }

  get lastSession(): FakeAppServerSession {
    const session = this.sessions[this.sessions.length - 1];
    if (!session) {
      throw new Error("No session has been opened");
    }
    return session;
  }

  handle(method: string, handler: FakeMethodHandler): this {
    this.handlers.set(method, handler);
    return this;
  }

  respondWith(method: string, result: JsonValue): this {
    return this.handle(method, () => ({ result }));
  }

  failWith(method: string, error: RpcErrorObject): this {
    return this.handle(method, () => ({ error }));
  }

  /** Rejects the next connection attempt with `error`. */
  failNextConnect(error: unknown): this {
    this.connectErrors.push(error);
    return this;
  }

  /** Rejects every connection attempt with `error` until cleared with null. */
  failConnects(error: unknown): this {
    this.connectFailure = error;
    return this;
  }

  calls(method: string): number {
    return this.callCounts.get(method) ?? 0;
  }

  dispatch(
    method: string,
    params: JsonValue | undefined,
    id: RpcId,
    session: FakeAppServerSession
  ): FakeReply {
    const callIndex = this.calls(method);
    this.callCounts.set(method, callIndex + 1);
    const handler = this.handlers.get(method);
    if (!handler) {
      return { error: { code: -32601, message: `Method not found: ${method}` } };
    }
    return handler(params, { id, session, sessionIndex: session.index, callIndex });
  }
}

export function connectionError(code: string, message: string = `connect ${code}`): Error {
  return Object.assign(new Error(message), { code });
}
