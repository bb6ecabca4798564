export * from './types/index.js';
export * from './schemas/index.js';
export { ConfigValidationError, parseRuntimeConfig, type RuntimeConfig } from './config/runtime-config.js';
export { configureLogger, createLogger, Logger, type LogContext, type LogLevel } from './logging/logger.js';
export { toJobResultFile, writeJobResult, summarizeResult, type JobResultFile } from './logging/result-writer.js';
export { classifyEngineError, isTimeoutError } from './exception/classifier.js';
export { errorPayload, toErrorPayload, isErrorCode } from './exception/tool-error.js';
export type * from './engines/browser-engine.js';
export { SessionManager, chromiumLauncher, type SessionManagerOptions } from './engines/session-manager.js';
export { ToolRegistry, buildToolRegistry } from './tools/tool-registry.js';
export type { ToolDefinition } from './tools/tool-definition.js';
export { ToolService } from './runner/tool-service.js';
export { ExtractionOrchestrator, type OrchestratorOptions, type ToolCaller } from './runner/extraction-orchestrator.js';
export { analyzeQuality } from './runner/quality-analyzer.js';
export { findArrayField, structureItems } from './runner/structure.js';
export {
  LlmCompletionService,
  type CompletionService,
  type CompletionTransport,
} from './completion-client/completion-service.js';
export { createChatTransport, createOpenAiTransport } from './completion-client/openai-transport.js';
export { RequestDispatcher, toWireResult, type ServerInfo } from './protocol/dispatcher.js';
export { JobConfigError, loadJobConfig, parseJobConfig } from './job/job-loader.js';
export { SERVER_NAME, SERVER_VERSION } from './version.js';
