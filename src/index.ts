export {
  ConfigError,
  CONFIG_PATH_ENV,
  defaultConfig,
  loadConfig,
  PORT_ENV,
  resolveConfigPath,
  validateConfigObject,
} from "./config/config.js";
export type { GatewayConfig, GatewayConfigInput, StreamingCoalesceConfig } from "./config/config.js";
export { isVerbose, setVerbose, shouldLogVerbose } from "./globals.js";
export type { AgentBackend, BackendScope, ChatAffinityHandle, DirEntry, UserScope } from "./gateway/backend.js";
export {
  clientOptionsFromConfig,
  GatewayApiClient,
  type ChatStreamOptions,
  type ConnectionIdentity,
  type GatewayClientOptions,
  type RequestOptions,
  type UploadInput,
  type UploadResult,
  type VmStreamOptions,
} from "./gateway/client.js";
export {
  formatError,
  GatewayClosedError,
  GatewayCommandError,
  GatewayLockError,
  GatewayRequestError,
  GatewayResponseError,
  GatewayUnresponsiveError,
} from "./gateway/errors.js";
export {
  encodeFrame,
  envelopeFrame,
  ErrorCodes,
  errorFrame,
  errorShape,
  parseEnvelope,
  PROTOCOL_VERSION,
  rawFrame,
  type EnvelopeFrame,
  type ErrorCode,
  type ErrorShape,
  type GatewayFrame,
  type RawFrame,
} from "./gateway/protocol/index.js";
export {
  COMMAND_ALIASES,
  dispatchCommand,
  listGatewayCommands,
  type CommandArgs,
  type GatewayCommandContext,
  type GatewayCommandHandler,
} from "./gateway/server-methods.js";
export { sanitizeFilename } from "./gateway/server-methods/uploads.js";
export {
  parseConnectParams,
  startGatewayServer,
  type GatewayServer,
  type GatewayServerOptions,
  type ResolveChatAffinity,
} from "./gateway/server.js";
export { coalesceStream, DEFAULT_COALESCE } from "./gateway/stream-coalesce.js";
export {
  configureLogger,
  createSubsystemLogger,
  getChildLogger,
  resetLogger,
  setLoggerOverride,
  type LoggerSettings,
  type LogLevel,
} from "./logging.js";
