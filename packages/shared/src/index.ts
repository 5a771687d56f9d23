/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContextAsync,
  withContextFields,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, getOpenAiApiKey, parseTemperaturePair, type Config } from './config';

// Types
export * from './types';

// Errors
export {
  SofPipelineError,
  MissingCredentialError,
  ExtractionServiceError,
  SchemaValidationError,
  InvalidInputError,
  isSofPipelineError,
  toErrorEnvelope,
  type SofErrorCode,
  type SofErrorOptions,
} from './errors';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type ExtractSofJob,
  getRedisConnection,
  createQueue,
  createWorker,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  registerDefaultMetrics,
  jobDurationHistogram,
  jobsProcessedCounter,
  documentsProcessedCounter,
  pipelineDurationHistogram,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  schemaFallbacksCounter,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export {
  validateSofRecord,
  buildSofResponseFormat,
  schemas,
  type ValidationResult,
  type SchemaNode,
  type SofResponseFormat,
} from './schemas';

// Event timing
export {
  parseEventTime,
  parseEventDate,
  computeDurationHours,
  normalizeEvent,
  normalizeEvents,
  type EventClock,
  type EventDay,
} from './event-timing';

// Templates
export {
  getTemplateForStage,
  renderPrompt,
  SOF_EXTRACTION_TEMPLATE,
  SOF_ADJUDICATION_TEMPLATE,
  type PromptStage,
  type PromptTemplate,
} from './templates';

// Extraction steps
export {
  type LlmClient,
  type LlmCompletion,
  type LlmCompletionRequest,
  type SofStepOptions,
  type SofCallOptions,
  type SofRecordRequest,
  type SofRecordResponse,
  BaseSofStep,
  assertDocumentText,
  SofExtractor,
  SofAdjudicator,
  ADJUDICATION_TEMPERATURE,
  OpenAiLlmClient,
  type OpenAiLlmClientOptions,
  requestSofRecord,
  decodeSofCompletion,
  extractJsonPayload,
  extract,
  adjudicate,
} from './extractors';

// Pipeline
export { SofPipeline, processSofDocument, type SofPipelineOptions } from './pipeline';
