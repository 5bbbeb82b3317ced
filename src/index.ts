export {
  embedBatch,
  embedBatchResilient,
  embedAll,
  createEmbedder,
  type Embedder,
} from "./lib/openai/embeddings";
export { parseResponse, classifyApiErrorType } from "./lib/openai/classifier";
export {
  createOpenAITransport,
  type OpenAITransportOptions,
} from "./lib/openai/transport";
export {
  createSession,
  sessionFromEnv,
  DEFAULT_KEY_VARIABLE,
} from "./lib/session";
export { loadConfig, DEFAULTS, type EmbedConfig } from "./lib/config";
export {
  EmbeddingError,
  TransportError,
  MissingCredentialError,
  ConfigError,
  extractError,
  type EmbeddingErrorKind,
} from "./lib/error";
export {
  logger,
  setLogLevel,
  type Logger,
  type LogLevel,
} from "./lib/logger";
export type * from "./lib/types";
