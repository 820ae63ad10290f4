// Public surface of @pocket-agent/protocol
export {
  AppServerClient,
  DEFAULT_CLIENT_INFO,
  MINIMUM_CLI_VERSION,
  type AppServerClientConfig,
  type AppServerDiagnostics,
  type AppServerEvent,
  type AppServerEventListener,
  type ApprovalPolicy,
  type ConnectionState,
  type ReviewDelivery,
  type ReviewStartOptions,
  type ReviewTarget,
  type StreamingPhase,
  type ThreadListOptions,
  type ThreadStartOptions,
  type TurnStartOptions,
  type TurnSteerOptions,
} from "./client/app-server-client.js";
export {
  CLOSE_GOING_AWAY,
  CLOSE_INTERNAL_ERROR,
  CLOSE_NORMAL,
  WebSocketSession,
  isUnroutableEndpointHost,
  openWebSocketSession,
  resolveAppServerUrl,
  type AppServerSession,
  type AppServerSessionFactory,
  type OpenSessionOptions,
} from "./client/app-server-transport.js";
export { MessageRouter } from "./client/message-router.js";
export {
  COMMAND_APPROVAL_METHOD,
  DEFAULT_INITIALIZE_PROBES,
  FILE_CHANGE_APPROVAL_METHOD,
  USER_INPUT_METHOD,
  isVersionAtLeast,
  pendingRequestTitle,
  probeInitializeMetadata,
  type ApprovalDecision,
  type ContextUsageSummary,
  type InitializeProbes,
  type PendingServerRequest,
  type PendingServerRequestKind,
  type UserInputOption,
  type UserInputQuestion,
} from "./client/app-server-parsing.js";
export {
  renderThread,
  type ModelDescriptor,
  type ReasoningEffortOption,
  type RemoteThreadRecord,
  type ThreadDetail,
  type ThreadTurn,
  type TurnItem,
} from "./client/thread-model.js";
export {
  AppServerError,
  EnvelopeDecodeError,
  HANDSHAKE_FAILURE_MESSAGE,
  RPC_INVALID_PARAMS,
  RPC_METHOD_NOT_FOUND,
  RPC_SERVER_OVERLOADED,
  TransportClosedError,
  describeError,
  errorCategory,
  errorCategoryTitle,
  formatErrorMessage,
  isAppServerError,
  type AppServerErrorKind,
  type ErrorCategory,
} from "./shared/app-server-errors.js";
export type { JsonObject, JsonValue } from "./shared/json-value.js";
export type { RpcErrorObject, RpcId } from "./shared/jsonrpc.js";
export { createChildLogger, createRootLogger, resolveLogConfig, type LogFormat, type LogLevel } from "./runtime/logger.js";
export {
  getConfigPath,
  loadPersistedConfig,
  resolveConfigHome,
  savePersistedConfig,
  type PersistedConfig,
} from "./runtime/persisted-config.js";
export { resolveClientConfig, type ResolvedClientConfig } from "./runtime/config.js";
