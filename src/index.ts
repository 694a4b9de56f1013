/**
 * NewsScout
 *
 * Feed ingestion → normalization → grouping → importance scoring →
 * report, with aggregator links resolved to article URLs. See `runPipeline` for the entry point.
 */

export * from './types';
export * from './feeds';
export * from './scoring';
export * from './report';
export * from './evaluation';
export * from './links';
export {
  runPipeline,
  isCapabilityUnreachable,
  type PipelineInput,
  type PipelineResult,
  type PipelineStage,
  type StageTransition,
} from './pipeline';
export { createAnthropicClient, extractJson, type LlmClient, type CompletionRequest } from './llm/client';
export { loadConfig, DEFAULT_RUN_CONFIG, type AppConfig, type RunConfig } from './lib/config';
export { logger, scopedLogger, type Logger, type LogContext } from './lib/logger';
