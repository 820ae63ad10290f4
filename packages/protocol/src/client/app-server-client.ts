import pino from "pino";
import {
  AppServerError,
  EnvelopeDecodeError,
  describeError,
  formatErrorMessage,
  isAppServerError,
  isConnectionLost,
  isMethodNotFound,
  isServerOverloaded,
  shouldRetryReviewTarget,
  shouldRetryWithoutCollaborationMode,
  shouldRetryWithoutEffort,
  shouldRetryWithoutModel,
} from "../shared/app-server-errors.js";
import {
  asObject,
  asString,
  findInt,
  findRawString,
  findString,
  nonEmpty,
  type JsonObject,
  type JsonValue,
} from "../shared/json-value.js";
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
} from "../shared/jsonrpc.js";
import {
  buildUserInputResult,
  completionSnippet,
  DEFAULT_INITIALIZE_PROBES,
  isVersionAtLeast,
  parseContextUsage,
  parsePendingServerRequest,
  probeInitializeMetadata,
  turnStatusFromNotification,
  type ApprovalDecision,
  type ContextUsageSummary,
  type InitializeProbes,
  type PendingServerRequest,
} from "./app-server-parsing.js";
import {
  CLOSE_GOING_AWAY,
  CLOSE_INTERNAL_ERROR,
  CLOSE_NORMAL,
  openWebSocketSession,
  resolveAppServerUrl,
  type AppServerSession,
  type AppServerSessionFactory,
} from "./app-server-transport.js";
import { MessageRouter } from "./message-router.js";
import {
  buildModelCatalog,
  parseModelListPage,
  parseThreadDetail,
  parseThreadList,
  renderThread,
  type ModelDescriptor,
  type RemoteThreadRecord,
  type ThreadDetail,
} from "./thread-model.js";

export const MINIMUM_CLI_VERSION = "0.101.0";

export const DEFAULT_CLIENT_INFO = { name: "pocket-agent", version: "0.1.0" } as const;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_PING_INTERVAL_MS = 20_000;
export const DEFAULT_RECONNECT_MAX_ATTEMPTS = 3;
export const DEFAULT_RECONNECT_BASE_DELAY_MS = 1_000;
const DEFAULT_HANDSHAKE_TIMEOUT_MS = 10_000;
const DEFAULT_OVERLOAD_MAX_ATTEMPTS = 4;
const DEFAULT_OVERLOAD_BASE_DELAY_MS = 250;
const EVENT_LOG_LIMIT = 200;
const MODEL_CATALOG_LIMIT = 300;
const MODEL_PAGE_SIZE = 100;

export type ConnectionState = "disconnected" | "connecting" | "connected";

export type StreamingPhase = "thinking" | "responding";

export type ApprovalPolicy = "untrusted" | "on-failure" | "on-request" | "never";

export interface AppServerDiagnostics {
  cliVersion: string;
  authStatus: string;
  currentModel: string;
  lastPingLatencyMs: number | null;
  lastCheckedAt: Date | null;
  minimumRequiredVersion: string;
}

export type AppServerEvent =
  | { type: "state"; state: ConnectionState }
  | { type: "transcript"; threadId: string; transcript: string }
  | { type: "active_turn"; threadId: string; turnId: string | null }
  | { type: "streaming_phase"; threadId: string; phase: StreamingPhase | null }
  | { type: "server_request"; request: PendingServerRequest }
  | { type: "server_request_resolved"; id: string }
  | { type: "diagnostics"; diagnostics: AppServerDiagnostics }
  | { type: "error"; message: string }
  | {
      type: "turn_completed";
      threadId: string;
      turnId: string | null;
      status: string;
      snippet: string;
    }
  | { type: "context_usage"; threadId: string; usage: ContextUsageSummary }
  | { type: "notification"; method: string; params: JsonValue | undefined }
  | { type: "log"; message: string };

export type AppServerEventListener = (event: AppServerEvent) => void;

export type AppServerClientConfig = {
  logger?: pino.Logger;
  sessionFactory?: AppServerSessionFactory;
  clientInfo?: { name: string; version: string };
  minimumCliVersion?: string;
  requestTimeoutMs?: number;
  pingIntervalMs?: number;
  handshakeTimeoutMs?: number;
  reconnect?: {
    enabled?: boolean;
    maxAttempts?: number;
    baseDelayMs?: number;
  };
  overloadRetry?: {
    maxAttempts?: number;
    baseDelayMs?: number;
  };
  initializeProbes?: InitializeProbes;
  /** Re-read a thread with `thread/read` after its turn completes. Defaults to true. */
  refreshThreadOnTurnCompleted?: boolean;
  /** Jitter source for overload retries, in [0, 1). */
  random?: () => number;
};

export interface ThreadListOptions {
  archived?: boolean;
  limit?: number;
}

export interface ThreadStartOptions {
  cwd: string;
  approvalPolicy: ApprovalPolicy;
  model?: string | null;
}

export interface TurnStartOptions {
  threadId: string;
  text: string;
  model?: string | null;
  effort?: string | null;
  collaborationModeId?: string | null;
}

export interface TurnSteerOptions {
  threadId: string;
  expectedTurnId: string;
  text: string;
}

export type ReviewDelivery = "inline" | "detached";

export type ReviewTarget =
  | { type: "uncommittedChanges" }
  | { type: "baseBranch"; branch: string }
  | { type: "commit"; sha: string; title?: string }
  | { type: "custom"; instructions: string };

export interface ReviewStartOptions {
  threadId: string;
  delivery?: ReviewDelivery;
  target?: ReviewTarget;
}

type LoopExit = { failed: false } | { failed: true; error: unknown };

type Connection = {
  generation: number;
  url: URL;
  session: AppServerSession | null;
  router: MessageRouter;
  abort: AbortController;
  loops: Promise<LoopExit>[];
  hasReceivedFrame: boolean;
  handshakeComplete: boolean;
};

function defaultDiagnostics(minimumRequiredVersion: string): AppServerDiagnostics {
  return {
    cliVersion: "",
    authStatus: "unknown",
    currentModel: "",
    lastPingLatencyMs: null,
    lastCheckedAt: null,
    minimumRequiredVersion,
  };
}

/** Resolves true after `ms`, or false as soon as `signal` aborts. */
function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

function textInput(text: string): JsonValue {
  return [{ type: "text", text }];
}

function reviewTargetPayload(target: ReviewTarget): JsonObject {
  switch (target.type) {
    case "uncommittedChanges":
      return { type: "uncommittedChanges" };
    case "baseBranch":
      return { type: "baseBranch", baseBranch: target.branch };
    case "commit": {
      const title = nonEmpty(target.title);
      return title
        ? { type: "commit", sha: target.sha, title }
        : { type: "commit", sha: target.sha };
    }
    case "custom":
      return { type: "custom", instructions: target.instructions };
  }
}

function reviewTargetCandidates(target: ReviewTarget): JsonObject[] {
  if (target.type !== "baseBranch") {
    return [reviewTargetPayload(target)];
  }
  return [
    reviewTargetPayload(target),
    { type: "baseBranch", branch: target.branch },
    { type: "baseBranch", branchName: target.branch },
  ];
}

/**
 * JSON-RPC client for a remote coding-agent app-server. Owns one WebSocket
 * session per connection generation, correlates requests with responses,
 * folds streaming notifications into per-thread transcripts and reconnects
 * with exponential backoff after transport failures.
 */
export class AppServerClient {
  private readonly logger: pino.Logger;
  private readonly sessionFactory: AppServerSessionFactory;
  private readonly clientInfo: { name: string; version: string };
  private readonly minimumCliVersion: string;
  private readonly requestTimeoutMs: number;
  private readonly pingIntervalMs: number;
  private readonly handshakeTimeoutMs: number;
  private readonly reconnectEnabled: boolean;
  private readonly maxReconnectAttempts: number;
  private readonly reconnectBaseDelayMs: number;
  private readonly overloadMaxAttempts: number;
  private readonly overloadBaseDelayMs: number;
  private readonly initializeProbes: InitializeProbes;
  private readonly refreshThreadOnTurnCompleted: boolean;
  private readonly random: () => number;

  private connection: Connection | null = null;
  private generation = 0;
  private state: ConnectionState = "disconnected";
  private target: string | null = null;
  private endpoint = "";
  private autoReconnect = false;
  private reconnectAttempts = 0;
  private reconnectAbort: AbortController | null = null;
  private lastAttemptReceivedFrame = false;
  private lastErrorMessage: string | null = null;
  private diagnostics: AppServerDiagnostics;
  private models: ModelDescriptor[] = [];

  private readonly transcripts = new Map<string, string>();
  private readonly activeTurns = new Map<string, string>();
  private readonly phases = new Map<string, StreamingPhase>();
  private readonly turnSnapshots = new Map<string, string>();
  private readonly contextUsage = new Map<string, ContextUsageSummary>();
  private readonly pendingRequests = new Map<string, PendingServerRequest>();
  private streamedItemKeys = new Set<string>();
  private readonly log: string[] = [];

  private readonly listeners = new Set<AppServerEventListener>();
  private readonly stateListeners = new Set<(state: ConnectionState) => void>();

  constructor(config: AppServerClientConfig = {}) {
    this.logger = config.logger ?? pino({ level: "silent" });
    this.sessionFactory = config.sessionFactory ?? openWebSocketSession;
    this.clientInfo = config.clientInfo ?? { ...DEFAULT_CLIENT_INFO };
    this.minimumCliVersion = config.minimumCliVersion ?? MINIMUM_CLI_VERSION;
    this.requestTimeoutMs = config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.pingIntervalMs = config.pingIntervalMs ?? DEFAULT_PING_INTERVAL_MS;
    this.handshakeTimeoutMs = config.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS;
    this.reconnectEnabled = config.reconnect?.enabled ?? true;
    this.maxReconnectAttempts = config.reconnect?.maxAttempts ?? DEFAULT_RECONNECT_MAX_ATTEMPTS;
    this.reconnectBaseDelayMs = config.reconnect?.baseDelayMs ?? DEFAULT_RECONNECT_BASE_DELAY_MS;
    this.overloadMaxAttempts = config.overloadRetry?.maxAttempts ?? DEFAULT_OVERLOAD_MAX_ATTEMPTS;
    this.overloadBaseDelayMs = config.overloadRetry?.baseDelayMs ?? DEFAULT_OVERLOAD_BASE_DELAY_MS;
    this.initializeProbes = config.initializeProbes ?? DEFAULT_INITIALIZE_PROBES;
    this.refreshThreadOnTurnCompleted = config.refreshThreadOnTurnCompleted ?? true;
    this.random = config.random ?? Math.random;
    this.diagnostics = defaultDiagnostics(this.minimumCliVersion);
  }

  // ============================================================================
  // Observable state
  // ============================================================================

  subscribe(listener: AppServerEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Calls `listener` with the current state right away, then on every change. */
  subscribeConnectionState(listener: (state: ConnectionState) => void): () => void {
    this.stateListeners.add(listener);
    listener(this.state);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  get connectionState(): ConnectionState {
    return this.state;
  }

  get isConnected(): boolean {
    return this.state === "connected";
  }

  get lastError(): string | null {
    return this.lastErrorMessage;
  }

  get connectedEndpoint(): string {
    return this.endpoint;
  }

  get eventLog(): readonly string[] {
    return this.log;
  }

  get availableModels(): readonly ModelDescriptor[] {
    return this.models;
  }

  getDiagnostics(): AppServerDiagnostics {
    return { ...this.diagnostics };
  }

  getTranscript(threadId: string): string {
    return this.transcripts.get(threadId) ?? "";
  }

  getActiveTurnId(threadId: string): string | undefined {
    return this.activeTurns.get(threadId);
  }

  getActiveTurns(): ReadonlyMap<string, string> {
    return new Map(this.activeTurns);
  }

  getStreamingPhase(threadId: string): StreamingPhase | undefined {
    return this.phases.get(threadId);
  }

  getPendingRequests(): PendingServerRequest[] {
    return [...this.pendingRequests.values()];
  }

  getContextUsage(threadId: string): ContextUsageSummary | undefined {
    return this.contextUsage.get(threadId);
  }

  // ============================================================================
  // Connection lifecycle
  // ============================================================================

  /**
   * Connects to `target`, replacing any current connection. Resets the
   * reconnect budget and re-enables automatic reconnection. A failure is
   * returned to the caller and is not retried.
   */
  async connect(target: string): Promise<void> {
    await this.openConnection(target, true);
  }

  async disconnect(): Promise<void> {
    this.autoReconnect = false;
    this.cancelReconnect();
    await this.teardown(CLOSE_GOING_AWAY, "client disconnect");
    this.clearTurnState();
    this.contextUsage.clear();
    this.models = [];
    this.endpoint = "";
    this.setState("disconnected");
  }

  private async openConnection(target: string, resetReconnectAttempts: boolean): Promise<void> {
    let url: URL;
    try {
      url = resolveAppServerUrl(target);
    } catch (error) {
      this.setLastError(formatErrorMessage(error));
      throw error;
    }

    this.cancelReconnect();
    await this.teardown(CLOSE_NORMAL, "reconnecting");

    if (resetReconnectAttempts) {
      this.reconnectAttempts = 0;
    }
    this.setState("connecting");
    this.setLastError(null);
    this.autoReconnect = true;
    this.target = target;
    this.endpoint = url.toString();
    this.models = [];
    this.phases.clear();
    this.streamedItemKeys.clear();
    this.setDiagnostics(defaultDiagnostics(this.minimumCliVersion));

    this.generation += 1;
    const connection: Connection = {
      generation: this.generation,
      url,
      session: null,
      router: new MessageRouter(),
      abort: new AbortController(),
      loops: [],
      hasReceivedFrame: false,
      handshakeComplete: false,
    };
    this.connection = connection;
    this.logger.debug({ url: this.endpoint, generation: connection.generation }, "Opening app-server connection");

    try {
      const session = await this.sessionFactory(url, {
        handshakeTimeoutMs: this.handshakeTimeoutMs,
        logger: this.logger,
      });
      if (this.connection !== connection) {
        session.close(CLOSE_NORMAL, "superseded");
        throw new AppServerError({ type: "not_connected" });
      }
      connection.session = session;
      this.startLoops(connection, session);

      const initializeResult = await this.request("initialize", {
        clientInfo: { name: this.clientInfo.name, version: this.clientInfo.version },
      });
      this.applyInitializeMetadata(initializeResult);
      await this.notify("initialized");

      const cliVersion = this.diagnostics.cliVersion;
      if (cliVersion && !isVersionAtLeast(cliVersion, this.minimumCliVersion)) {
        throw new AppServerError({
          type: "incompatible_version",
          current: cliVersion,
          minimum: this.minimumCliVersion,
        });
      }

      connection.handshakeComplete = true;
      this.setState("connected");
      this.setDiagnostics({ ...this.diagnostics, lastCheckedAt: new Date() });
      this.appendEvent(`Connected: ${this.endpoint}`);
      this.logger.info({ url: this.endpoint, cliVersion }, "Connected to app-server");
    } catch (error) {
      if (this.connection === connection) {
        const hasReceivedFrame = connection.hasReceivedFrame;
        this.lastAttemptReceivedFrame = hasReceivedFrame;
        this.setLastError(formatErrorMessage(error, { hasReceivedFrame }));
        this.logger.warn({ err: error, url: this.endpoint }, "App-server handshake failed");
        this.endpoint = "";
        this.setState("disconnected");
        await this.teardown(CLOSE_NORMAL, "handshake failed");
      }
      throw error;
    }
  }

  private applyInitializeMetadata(result: JsonValue): void {
    const metadata = probeInitializeMetadata(result, this.initializeProbes);
    this.setDiagnostics({
      ...this.diagnostics,
      cliVersion: metadata.cliVersion ?? this.diagnostics.cliVersion,
      authStatus: metadata.authStatus ?? this.diagnostics.authStatus,
      currentModel: metadata.currentModel ?? this.diagnostics.currentModel,
    });
  }

  private startLoops(connection: Connection, session: AppServerSession): void {
    const loops = [this.runReceiveLoop(connection, session), this.runPingLoop(connection, session)];
    connection.loops = loops;
    for (const loop of loops) {
      void loop
        .then(async (exit) => {
          if (exit.failed) {
            await this.handleTransportFailure(connection, exit.error);
          }
        })
        .catch((error: unknown) => {
          this.logger.error({ err: error }, "App-server failure handling failed");
        });
    }
  }

  /**
   * Stops both loops, closes the session and fails every pending request
   * with `not_connected`. Resolves once both loops have exited. Safe to call
   * repeatedly.
   */
  private async teardown(code: number, reason: string): Promise<void> {
    const connection = this.connection;
    if (!connection) {
      return;
    }
    this.connection = null;
    const notConnected = new AppServerError({ type: "not_connected" });
    connection.abort.abort(notConnected);
    connection.session?.close(code, reason);
    connection.router.failAll(notConnected);
    this.clearPendingRequests();
    this.streamedItemKeys.clear();
    await Promise.all(connection.loops);
  }

  private async handleTransportFailure(connection: Connection, error: unknown): Promise<void> {
    if (this.connection !== connection) {
      return;
    }
    if (!connection.handshakeComplete) {
      // The handshake owns teardown and the retry decision.
      connection.router.failAll(error);
      return;
    }

    const hasReceivedFrame = connection.hasReceivedFrame;
    const retriable = this.shouldAttemptReconnect(error, hasReceivedFrame);
    this.setLastError(formatErrorMessage(error, { hasReceivedFrame }));
    this.logger.warn({ err: error, url: this.endpoint }, "App-server connection lost");
    this.endpoint = "";
    this.clearTurnState();
    this.setState("disconnected");
    await this.teardown(CLOSE_INTERNAL_ERROR, "connection failed");

    if (retriable) {
      this.scheduleReconnect();
    }
  }

  /**
   * A connection lost before any frame arrived usually means the server
   * rejected the upgrade after the socket opened; retrying would fail the
   * same way. Version and address errors are permanent too.
   */
  private shouldAttemptReconnect(error: unknown, hasReceivedFrame: boolean): boolean {
    if (!hasReceivedFrame && isConnectionLost(error)) {
      return false;
    }
    return !(
      isAppServerError(error, "incompatible_version") ||
      isAppServerError(error, "invalid_url") ||
      isAppServerError(error, "invalid_endpoint_host")
    );
  }

  private scheduleReconnect(): void {
    const target = this.target;
    if (!this.reconnectEnabled || !this.autoReconnect || target === null) {
      return;
    }
    if (this.reconnectAttempts >= this.maxReconnectAttempts) {
      this.appendEvent("Reconnect attempts exhausted.");
      this.logger.warn({ attempts: this.reconnectAttempts }, "App-server reconnect attempts exhausted");
      return;
    }

    this.reconnectAttempts += 1;
    const delayMs = this.reconnectBaseDelayMs * 2 ** (this.reconnectAttempts - 1);
    this.appendEvent(`Reconnect in ${Math.round(delayMs / 1000)}s...`);
    this.logger.info({ attempt: this.reconnectAttempts, delayMs }, "Scheduling app-server reconnect");

    this.cancelReconnect();
    const abort = new AbortController();
    this.reconnectAbort = abort;
    void this.runReconnect(target, delayMs, abort);
  }

  private async runReconnect(target: string, delayMs: number, abort: AbortController): Promise<void> {
    const elapsed = await sleep(delayMs, abort.signal);
    if (!elapsed || this.reconnectAbort !== abort) {
      return;
    }
    this.reconnectAbort = null;

    try {
      await this.openConnection(target, false);
    } catch (error) {
      if (this.connection !== null || this.state !== "disconnected") {
        // Superseded by an explicit connect.
        return;
      }
      if (this.shouldAttemptReconnect(error, this.lastAttemptReceivedFrame)) {
        this.scheduleReconnect();
      } else {
        this.logger.warn({ err: error }, "App-server reconnect stopped");
      }
    }
  }

  private cancelReconnect(): void {
    this.reconnectAbort?.abort();
    this.reconnectAbort = null;
  }

  // ============================================================================
  // Loops
  // ============================================================================

  private async runReceiveLoop(connection: Connection, session: AppServerSession): Promise<LoopExit> {
    const { signal } = connection.abort;
    while (!signal.aborted) {
      let frame: FrameData;
      try {
        frame = await session.receiveNext(signal);
      } catch (error) {
        return signal.aborted ? { failed: false } : { failed: true, error };
      }
      if (signal.aborted) {
        return { failed: false };
      }
      connection.hasReceivedFrame = true;

      try {
        this.handleFrame(connection, frame);
      } catch (error) {
        if (
          error instanceof EnvelopeDecodeError &&
          error.rpcId !== undefined &&
          connection.router.fail(error.rpcId, error)
        ) {
          this.logger.warn({ id: error.rpcId }, "Malformed response for pending request");
          continue;
        }
        return { failed: true, error };
      }
    }
    return { failed: false };
  }

  private async runPingLoop(connection: Connection, session: AppServerSession): Promise<LoopExit> {
    const { signal } = connection.abort;
    while (!signal.aborted) {
      const elapsed = await sleep(this.pingIntervalMs, signal);
      if (!elapsed || signal.aborted) {
        return { failed: false };
      }
      try {
        const latencyMs = await session.sendPing();
        if (signal.aborted) {
          return { failed: false };
        }
        this.setDiagnostics({
          ...this.diagnostics,
          lastPingLatencyMs: latencyMs,
          lastCheckedAt: new Date(),
        });
      } catch (error) {
        return signal.aborted ? { failed: false } : { failed: true, error };
      }
    }
    return { failed: false };
  }

  // ============================================================================
  // Requests
  // ============================================================================

  /**
   * Sends a request and waits for its response. Retries with backoff while
   * the server reports that it is overloaded.
   */
  async request(method: string, params?: JsonValue): Promise<JsonValue> {
    let attempt = 0;
    for (;;) {
      try {
        return await this.requestOnce(method, params);
      } catch (error) {
        if (!isServerOverloaded(error) || attempt >= this.overloadMaxAttempts - 1) {
          throw error;
        }
        const baseDelayMs = this.overloadBaseDelayMs * 2 ** attempt;
        const delayMs = baseDelayMs + this.random() * baseDelayMs * 0.25;
        this.appendEvent(
          `Server overloaded; retrying ${method} in ${(delayMs / 1000).toFixed(2)}s`
        );
        await sleep(delayMs);
        attempt += 1;
      }
    }
  }

  private requestOnce(method: string, params: JsonValue | undefined): Promise<JsonValue> {
    const connection = this.connection;
    const session = connection?.session;
    if (!connection || !session || session.isClosed) {
      return Promise.reject(new AppServerError({ type: "not_connected" }));
    }

    const { router } = connection;
    const id = router.nextRequestId();
    return new Promise<JsonValue>((resolve, reject) => {
      router.register(id, method, this.requestTimeoutMs).then(resolve, reject);
      void session.send(encodeRequest(id, method, params)).catch((error: unknown) => {
        router.fail(id, error);
      });
    });
  }

  async notify(method: string, params?: JsonValue): Promise<void> {
    await this.sendText(encodeNotification(method, params));
  }

  async respond(request: PendingServerRequest, result: JsonValue): Promise<void> {
    await this.sendText(encodeResult(request.rpcId, result));
    this.removePendingRequest(request.id);
  }

  async respondError(request: PendingServerRequest, error: RpcErrorObject): Promise<void> {
    await this.sendText(encodeError(request.rpcId, error));
    this.removePendingRequest(request.id);
  }

  async respondCommandApproval(
    request: PendingServerRequest,
    decision: ApprovalDecision
  ): Promise<void> {
    await this.respond(request, { decision });
  }

  async respondFileChangeApproval(
    request: PendingServerRequest,
    decision: ApprovalDecision
  ): Promise<void> {
    await this.respond(request, { decision });
  }

  async respondUserInput(
    request: PendingServerRequest,
    answers: Record<string, readonly string[]>
  ): Promise<void> {
    await this.respond(request, buildUserInputResult(answers));
  }

  private async sendText(text: string): Promise<void> {
    const session = this.connection?.session;
    if (!session || session.isClosed) {
      throw new AppServerError({ type: "not_connected" });
    }
    await session.send(text);
  }

  // ============================================================================
  // Threads
  // ============================================================================

  async threadList(options: ThreadListOptions = {}): Promise<RemoteThreadRecord[]> {
    const params: JsonObject = { limit: options.limit ?? 100 };
    if (options.archived !== undefined) {
      params.archived = options.archived;
    }
    const result = await this.request("thread/list", params);
    return parseThreadList(result, options.archived ?? false);
  }

  async threadRead(threadId: string): Promise<ThreadDetail> {
    const result = await this.request("thread/read", { threadId, includeTurns: true });
    const detail = parseThreadDetail(result);
    this.setTranscript(threadId, renderThread(detail));
    return detail;
  }

  async threadResume(threadId: string): Promise<ThreadDetail> {
    const result = await this.request("thread/resume", { threadId });
    const detail = parseThreadDetail(result);
    this.setTranscript(threadId, renderThread(detail));
    return detail;
  }

  async threadStart(options: ThreadStartOptions): Promise<string> {
    const model = nonEmpty(options.model);
    const start = async (withModel: string | undefined): Promise<string> => {
      const params: JsonObject = { cwd: options.cwd, approvalPolicy: options.approvalPolicy };
      if (withModel) {
        params.model = withModel;
      }
      const result = await this.request("thread/start", params);
      return this.requireId(result, [["thread", "id"]]);
    };

    try {
      return await start(model);
    } catch (error) {
      if (!model || !shouldRetryWithoutModel(error)) {
        throw error;
      }
      this.appendEvent("thread/start rejected model; retrying without model.");
      return start(undefined);
    }
  }

  async threadArchive(threadId: string, archived: boolean = true): Promise<void> {
    await this.request(archived ? "thread/archive" : "thread/unarchive", { threadId });
  }

  async threadFork(threadId: string): Promise<string> {
    const result = await this.request("thread/fork", { threadId });
    return this.requireId(result, [["thread", "id"], ["threadId"], ["id"]]);
  }

  async reviewStart(options: ReviewStartOptions): Promise<string> {
    const candidates = reviewTargetCandidates(options.target ?? { type: "uncommittedChanges" });
    let result: JsonValue | undefined;

    for (const [index, target] of candidates.entries()) {
      try {
        result = await this.request("review/start", {
          threadId: options.threadId,
          delivery: options.delivery ?? "inline",
          target,
        });
        break;
      } catch (error) {
        if (index < candidates.length - 1 && shouldRetryReviewTarget(error)) {
          continue;
        }
        throw error;
      }
    }

    if (!asObject(result)) {
      throw new AppServerError({ type: "malformed_response" });
    }
    const reviewThreadId =
      findString(result, [["reviewThreadId"], ["threadId"], ["thread", "id"]]) ??
      options.threadId;
    const turnId = findString(result, [["turn", "id"]]);
    if (turnId) {
      this.setActiveTurn(reviewThreadId, turnId);
      this.setPhase(reviewThreadId, "thinking");
    }
    return reviewThreadId;
  }

  // ============================================================================
  // Turns
  // ============================================================================

  async turnStart(options: TurnStartOptions): Promise<string> {
    return this.turnStartWithFallbacks(
      options.threadId,
      options.text,
      nonEmpty(options.model),
      nonEmpty(options.effort),
      nonEmpty(options.collaborationModeId)
    );
  }

  private async turnStartWithFallbacks(
    threadId: string,
    text: string,
    model: string | undefined,
    effort: string | undefined,
    collaborationModeId: string | undefined
  ): Promise<string> {
    const params: JsonObject = { threadId, input: textInput(text) };
    if (model) params.model = model;
    if (effort) params.effort = effort;
    if (collaborationModeId) params.collaborationMode = { id: collaborationModeId };

    let result: JsonValue;
    try {
      result = await this.request("turn/start", params);
    } catch (error) {
      if (effort && shouldRetryWithoutEffort(error)) {
        this.appendEvent("turn/start rejected effort; retrying without effort.");
        return this.turnStartWithFallbacks(threadId, text, model, undefined, collaborationModeId);
      }
      if (model && shouldRetryWithoutModel(error)) {
        this.appendEvent("turn/start rejected model; retrying without model.");
        return this.turnStartWithFallbacks(threadId, text, undefined, effort, collaborationModeId);
      }
      if (collaborationModeId && shouldRetryWithoutCollaborationMode(error)) {
        this.appendEvent(
          "turn/start rejected collaboration mode; retrying without collaboration mode."
        );
        return this.turnStartWithFallbacks(threadId, text, model, effort, undefined);
      }
      throw error;
    }

    const turnId = this.requireId(result, [["turn", "id"]]);
    this.setActiveTurn(threadId, turnId);
    this.setPhase(threadId, "thinking");
    return turnId;
  }

  async turnSteer(options: TurnSteerOptions): Promise<void> {
    await this.request("turn/steer", {
      threadId: options.threadId,
      expectedTurnId: options.expectedTurnId,
      input: textInput(options.text),
    });
    this.setPhase(options.threadId, "thinking");
  }

  async turnInterrupt(threadId: string, turnId: string): Promise<void> {
    await this.request("turn/interrupt", { threadId, turnId });
    if (this.activeTurns.get(threadId) === turnId) {
      this.setActiveTurn(threadId, null);
    }
    this.setPhase(threadId, null);
  }

  // ============================================================================
  // Diagnostics and catalogs
  // ============================================================================

  async runDiagnostics(): Promise<AppServerDiagnostics> {
    const session = this.connection?.session;
    if (this.state !== "connected" || !session) {
      throw new AppServerError({ type: "not_connected" });
    }
    const latencyMs = await session.sendPing();
    this.setDiagnostics({
      ...this.diagnostics,
      lastPingLatencyMs: latencyMs,
      lastCheckedAt: new Date(),
    });
    return this.getDiagnostics();
  }

  /** Pages through `model/list`. An older server without the method yields an empty catalog. */
  async listModels(): Promise<ModelDescriptor[]> {
    const entries: JsonObject[] = [];
    const seenCursors = new Set<string>();
    let cursor: string | undefined;

    try {
      for (;;) {
        const params: JsonObject = { limit: MODEL_PAGE_SIZE, includeHidden: false };
        if (cursor) {
          params.cursor = cursor;
        }
        const page = parseModelListPage(await this.request("model/list", params));
        entries.push(...page.entries);
        const next = page.nextCursor;
        if (!next || seenCursors.has(next) || entries.length >= MODEL_CATALOG_LIMIT) {
          break;
        }
        seenCursors.add(next);
        cursor = next;
      }
    } catch (error) {
      if (!isMethodNotFound(error)) {
        throw error;
      }
      this.appendEvent(`model/list unavailable: ${describeError(error)}`);
      return [];
    }

    const catalog = buildModelCatalog(entries);
    if (catalog.length > 0) {
      this.models = catalog;
      if (!this.diagnostics.currentModel) {
        const preferred = catalog.find((entry) => entry.isDefault) ?? catalog[0];
        if (preferred) {
          this.setDiagnostics({ ...this.diagnostics, currentModel: preferred.model });
        }
      }
    }
    return catalog;
  }

  private requireId(result: JsonValue, paths: readonly (readonly string[])[]): string {
    const id = findString(result, paths);
    if (!id) {
      throw new AppServerError({ type: "malformed_response" });
    }
    return id;
  }

  // ============================================================================
  // Inbound dispatch
  // ============================================================================

  private handleFrame(connection: Connection, frame: FrameData): void {
    const classified = classifyEnvelope(decodeEnvelope(frame));
    switch (classified.kind) {
      case "response":
        if (!connection.router.resolve(classified.id, classified.outcome)) {
          this.logger.debug({ id: classified.id }, "Dropped response for unknown request id");
        }
        return;
      case "request":
        this.handleServerRequest(classified.id, classified.method, classified.params);
        return;
      case "notification":
        this.handleNotification(classified.method, classified.params);
        return;
      case "malformed":
        throw new EnvelopeDecodeError(classified.id);
    }
  }

  private handleServerRequest(id: RpcId, method: string, params: JsonValue | undefined): void {
    const request = parsePendingServerRequest(id, method, params);
    this.pendingRequests.set(request.id, request);
    this.appendEvent(`Server request: ${method}`);
    this.emit({ type: "server_request", request });
  }

  private handleNotification(method: string, params: JsonValue | undefined): void {
    const object = asObject(params) ?? {};
    const threadId = asString(object.threadId);

    switch (method) {
      case "item/agentMessage/delta":
      case "item/commandExecution/outputDelta": {
        const delta = asString(object.delta);
        if (threadId === undefined || delta === undefined) {
          break;
        }
        this.setTranscript(threadId, this.getTranscript(threadId) + delta);
        this.setPhase(threadId, "responding");
        break;
      }

      case "item/plan/delta": {
        if (threadId === undefined) {
          break;
        }
        this.appendStreamedItemDelta(
          threadId,
          findString(object, [["itemId"], ["item", "id"]]),
          "plan",
          "Plan: ",
          findRawString(object, [["delta"], ["textDelta"]]) ?? ""
        );
        if (!this.phases.has(threadId)) {
          this.setPhase(threadId, "thinking");
        }
        break;
      }

      case "item/reasoning/summaryTextDelta": {
        if (threadId === undefined) {
          break;
        }
        const summaryIndex = findInt(object, [["summaryIndex"], ["summary", "index"]]) ?? 0;
        this.appendStreamedItemDelta(
          threadId,
          findString(object, [["itemId"], ["item", "id"]]),
          `reasoning-${summaryIndex}`,
          "Reasoning: ",
          findRawString(object, [["delta"], ["textDelta"], ["summaryTextDelta"]]) ?? ""
        );
        if (!this.phases.has(threadId)) {
          this.setPhase(threadId, "thinking");
        }
        break;
      }

      case "item/started": {
        if (threadId === undefined) {
          break;
        }
        const item = asObject(object.item) ?? object;
        const itemType =
          findString(item, [["type"], ["itemType"], ["item_type"]])?.toLowerCase() ?? "";
        if (itemType.includes("agentmessage") || itemType.includes("agent_message")) {
          this.setPhase(threadId, "responding");
        } else if (!this.phases.has(threadId)) {
          this.setPhase(threadId, "thinking");
        }
        break;
      }

      case "turn/started": {
        const turnId = asString(asObject(object.turn)?.id);
        if (threadId === undefined || turnId === undefined) {
          break;
        }
        this.setActiveTurn(threadId, turnId);
        if (this.phases.get(threadId) !== "responding") {
          this.setPhase(threadId, "thinking");
        }
        this.turnSnapshots.set(threadId, this.getTranscript(threadId));
        this.appendEvent(`Turn started for ${threadId}`);
        break;
      }

      case "turn/completed":
      case "turn/failed":
      case "turn/cancelled": {
        if (threadId === undefined) {
          break;
        }
        this.completeTurn(method, threadId, object);
        break;
      }

      case "thread/started": {
        const startedId = findString(object, [["thread", "id"], ["threadId"]]);
        this.appendEvent(`Thread started: ${startedId ?? "unknown"}`);
        break;
      }

      case "thread/tokenUsage/updated": {
        if (threadId === undefined) {
          break;
        }
        const usage = parseContextUsage(object);
        this.contextUsage.set(threadId, usage);
        this.emit({ type: "context_usage", threadId, usage });
        break;
      }

      case "error": {
        const message = asString(object.message) ?? asString(asObject(object.error)?.message);
        if (message !== undefined) {
          this.setLastError(`[Protocol] ${message}`);
        }
        break;
      }

      default:
        this.appendEvent(`Notification: ${method}`);
    }

    this.emit({ type: "notification", method, params });
  }

  private completeTurn(method: string, threadId: string, params: JsonObject): void {
    const status = turnStatusFromNotification(method, params);
    this.appendEvent(`Turn ${status} for ${threadId}`);

    const before = this.turnSnapshots.get(threadId) ?? "";
    this.turnSnapshots.delete(threadId);
    const snippet = completionSnippet(before, this.getTranscript(threadId));
    const turnId = findString(params, [["turn", "id"]]) ?? this.activeTurns.get(threadId) ?? null;
    this.emit({ type: "turn_completed", threadId, turnId, status, snippet });

    this.setActiveTurn(threadId, null);
    this.setPhase(threadId, null);
    this.clearStreamedItemKeys(threadId);

    const completed = method === "turn/completed" || status.trim().toLowerCase() === "completed";
    if (completed && this.refreshThreadOnTurnCompleted && this.state === "connected") {
      void this.refreshThreadSnapshot(threadId, method);
    }
  }

  private async refreshThreadSnapshot(threadId: string, method: string): Promise<void> {
    try {
      await this.threadRead(threadId);
    } catch (error) {
      this.appendEvent(`thread/read after ${method} failed: ${describeError(error)}`);
    }
  }

  private appendStreamedItemDelta(
    threadId: string,
    itemId: string | undefined,
    kind: string,
    prefix: string,
    delta: string
  ): void {
    if (!delta) {
      return;
    }
    const key = `${threadId}|${kind}|${itemId ?? "unknown"}`;
    let transcript = this.getTranscript(threadId);
    if (!this.streamedItemKeys.has(key)) {
      if (transcript && !transcript.endsWith("\n")) {
        transcript += "\n";
      }
      transcript += prefix;
      this.streamedItemKeys.add(key);
    }
    this.setTranscript(threadId, transcript + delta);
  }

  private clearStreamedItemKeys(threadId: string): void {
    const prefix = `${threadId}|`;
    this.streamedItemKeys = new Set(
      [...this.streamedItemKeys].filter((key) => !key.startsWith(prefix))
    );
  }

  // ============================================================================
  // State updates
  // ============================================================================

  private setState(next: ConnectionState): void {
    if (this.state === next) {
      return;
    }
    this.state = next;
    for (const listener of this.stateListeners) {
      try {
        listener(next);
      } catch (error) {
        this.logger.warn({ err: error }, "Connection state listener failed");
      }
    }
    this.emit({ type: "state", state: next });
  }

  private setLastError(message: string | null): void {
    this.lastErrorMessage = message;
    if (message !== null) {
      this.emit({ type: "error", message });
    }
  }

  private setDiagnostics(next: AppServerDiagnostics): void {
    this.diagnostics = next;
    this.emit({ type: "diagnostics", diagnostics: { ...next } });
  }

  private setTranscript(threadId: string, transcript: string): void {
    this.transcripts.set(threadId, transcript);
    this.emit({ type: "transcript", threadId, transcript });
  }

  private setActiveTurn(threadId: string, turnId: string | null): void {
    if (turnId === null) {
      if (!this.activeTurns.delete(threadId)) {
        return;
      }
    } else {
      this.activeTurns.set(threadId, turnId);
    }
    this.emit({ type: "active_turn", threadId, turnId });
  }

  private setPhase(threadId: string, phase: StreamingPhase | null): void {
    if (phase === null) {
      if (!this.phases.delete(threadId)) {
        return;
      }
    } else {
      if (this.phases.get(threadId) === phase) {
        return;
      }
      this.phases.set(threadId, phase);
    }
    this.emit({ type: "streaming_phase", threadId, phase });
  }

  private removePendingRequest(id: string): void {
    if (this.pendingRequests.delete(id)) {
      this.emit({ type: "server_request_resolved", id });
    }
  }

  private clearPendingRequests(): void {
    for (const id of [...this.pendingRequests.keys()]) {
      this.removePendingRequest(id);
    }
  }

  private clearTurnState(): void {
    for (const threadId of [...this.activeTurns.keys()]) {
      this.setActiveTurn(threadId, null);
    }
    for (const threadId of [...this.phases.keys()]) {
      this.setPhase(threadId, null);
    }
    this.turnSnapshots.clear();
    this.streamedItemKeys.clear();
  }

  private appendEvent(message: string): void {
    this.log.push(message);
    if (this.log.length > EVENT_LOG_LIMIT) {
      this.log.splice(0, this.log.length - EVENT_LOG_LIMIT);
    }
    this.emit({ type: "log", message });
  }

  private emit(event: AppServerEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.warn({ err: error, event: event.type }, "App-server event listener failed");
      }
    }
  }
}
