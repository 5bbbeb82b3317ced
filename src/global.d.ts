declare namespace NodeJS {
  export interface ProcessEnv {
    NODE_ENV?: "development" | "production" | "test";
    OPENAI_API_KEY?: string;
    EMBED_MODEL?: string;
    EMBED_BASE_URL?: string;
    EMBED_TIMEOUT_MS?: string;
    EMBED_GAS?: string;
    EMBED_BATCH_SIZE?: string;
    EMBED_CONCURRENCY?: string;
    EMBED_TRACE?: string;
    LOG_LEVEL?: string;
  }
}
