/**
 * Lead Qualification Core - Main Entry Point
 *
 * This module exports all public interfaces and implementations for turning
 * language-model assessments of business contacts into scored, durable,
 * auditable qualification records.
 *
 * Architecture:
 * - Parser and derivation engine are pure functions
 * - Store and interaction log sit on a pluggable storage substrate
 * - The resolver maps contact addresses to deterministic lead ids
 * - The pipeline chains them and returns ModuleResult envelopes
 */

// Core Types
export type * from './types/index.js';
export {
  PRIORITIES,
  DISPOSITIONS,
  SENTIMENTS,
  URGENCIES,
  FOLLOW_UP_TIMINGS,
  REQUIRED_FIELDS,
  KNOWN_EVENT_TYPES,
} from './types/index.js';

// Response Parser
export {
  parseQualificationResponse,
  parseReplyAnalysisResponse,
  parseMeetingRequestResponse,
  degradedFields,
  normalizeLabel,
  matchEnumValue,
  scanLabeledLines,
  QUALIFICATION_FIELDS,
  REPLY_ANALYSIS_FIELDS,
  MEETING_REQUEST_FIELDS,
  REPLY_INTENTS,
  MEETING_INTENTS,
  BOOKING_ACTIONS,
  type AgentType,
  type FieldSpec,
  type EnumFieldSpec,
  type IntegerFieldSpec,
  type TextFieldSpec,
  type ParseResult,
  type ParseDegradation,
  type ParseDegradationReason,
  type QualificationAssessment,
  type ReplyAnalysis,
  type MeetingRequestAnalysis,
  type ReplyIntent,
  type MeetingIntent,
  type BookingAction,
} from './parser/index.js';

// Derivation Engine
export {
  scoreLead,
  computeLeadScore,
  determinePriority,
  normalizeConfidence,
  applyBookingOutcome,
  SCORING_VERSION,
  type ScoringInput,
  type ScoringResult,
  type ScoreBreakdown,
  type PriorityRule,
  type BookingOutcome,
} from './scoring/index.js';

// Identity Resolver
export {
  IdentityResolver,
  normalizeAddress,
  deriveLeadId,
  cleanSeed,
  INITIAL_RECORD_DEFAULTS,
  type IdentityResolverOptions,
} from './identity/index.js';

// Qualification Store
export {
  QualificationStore,
  serializeRecord,
  fieldsIntroducedAfter,
  FIELD_VERSIONS,
  FIELD_DEFAULTS,
  CURRENT_SCHEMA_VERSION,
  QUALIFICATIONS_COLLECTION,
  type QualificationStoreOptions,
  type CreateIfAbsentResult,
  type RegisteredField,
} from './store/index.js';

// Interaction Log
export {
  InteractionLog,
  eventKey,
  latestEventsByType,
  EVENTS_COLLECTION,
  type InteractionLogOptions,
} from './interaction-log/index.js';

// Snapshot Differencer
export {
  SnapshotDifferencer,
  buildBeforeView,
  buildAfterView,
  seedFromEvents,
  UNQUALIFIED_VIEW,
  type BeforeView,
  type AfterView,
  type Snapshot,
  type SnapshotDifferencerOptions,
} from './snapshot/index.js';

// Storage Substrate
export {
  S3StorageAdapter,
  FileStorageAdapter,
  MemoryStorageAdapter,
  createStorageAdapter,
  assertValidKey,
  type S3Config,
  type FileConfig,
  type StorageConfig,
} from './storage/index.js';

// Pipeline
export {
  QualificationPipeline,
  explainReasoning,
  summarizeReply,
  type QualificationPipelineOptions,
  type ResponseInput,
  type MeetingResponseInput,
  type QualifyOutcome,
  type ReplyOutcome,
  type MeetingOutcome,
  type ModelQualifyInput,
  type ModelReplyInput,
  type ModelMeetingInput,
} from './pipeline/index.js';

// Language Model Boundary
export {
  ClaudeLanguageModel,
  isRetryableModelError,
  responseFormat,
  buildQualificationPrompt,
  buildReplyAnalysisPrompt,
  buildMeetingRequestPrompt,
  DEFAULT_MODEL,
  type LanguageModel,
  type CompletionOptions,
  type ClaudeConfig,
  type ClaudeLanguageModelOptions,
  type LeadContext,
  type QualificationRequest,
  type ReplyRequest,
  type MeetingRequest,
} from './llm/index.js';

// Errors
export {
  QualificationError,
  ValidationFailedError,
  IdentityConflictError,
  AppendConflictError,
  CorruptRecordError,
  ConfigError,
  LanguageModelError,
  toResultError,
  type QualificationErrorCode,
} from './errors/index.js';

// Logging
export {
  createConsoleLogger,
  defaultLogger,
  silentLogger,
  defaultMetrics,
  LOG_LEVELS,
  type Logger,
  type Metrics,
  type LogLevel,
} from './logging/index.js';

// Concurrency
export { KeyedLock } from './concurrency/index.js';

// Configuration
export {
  loadConfig,
  createQualificationCore,
  type CoreConfig,
  type CoreOverrides,
  type QualificationCore,
} from './config/index.js';
