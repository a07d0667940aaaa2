/**
 * Configuration
 *
 * Reads the environment into a typed config and wires the core components
 * from it.
 *
 * Environment:
 * - QUALIFICATION_STORAGE: memory | file | s3 (default file)
 * - QUALIFICATION_DATA_DIR: data directory for the file substrate (default ./data)
 * - S3_BUCKET, AWS_REGION, S3_PREFIX, S3_ENDPOINT, S3_FORCE_PATH_STYLE
 * - ANTHROPIC_API_KEY, ANTHROPIC_MODEL, ANTHROPIC_MAX_TOKENS
 * - LOG_LEVEL: debug | info | warn | error (default info)
 */

import { z } from 'zod';
import type { StorageAdapter } from '../types/index.js';
import { createStorageAdapter, type StorageConfig } from '../storage/index.js';
import { QualificationStore } from '../store/index.js';
import { InteractionLog } from '../interaction-log/index.js';
import { IdentityResolver } from '../identity/index.js';
import { SnapshotDifferencer } from '../snapshot/index.js';
import { QualificationPipeline } from '../pipeline/index.js';
import { ClaudeLanguageModel, type ClaudeConfig, type LanguageModel } from '../llm/index.js';
import { ConfigError } from '../errors/index.js';
import {
  LOG_LEVELS,
  createConsoleLogger,
  defaultMetrics,
  type LogLevel,
  type Logger,
  type Metrics,
} from '../logging/index.js';

export interface CoreConfig {
  storage: StorageConfig;
  /** Absent when no API key is set; the *WithModel operations then degrade */
  claude: ClaudeConfig | null;
  logLevel: LogLevel;
}

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

const envSchema = z.object({
  QUALIFICATION_STORAGE: z.enum(['memory', 'file', 's3']).default('file'),
  QUALIFICATION_DATA_DIR: z.string().trim().min(1).default('./data'),
  S3_BUCKET: optionalString,
  AWS_REGION: z.string().trim().min(1).default('us-east-1'),
  S3_PREFIX: z.string().trim().min(1).default('qualification'),
  S3_ENDPOINT: optionalString,
  S3_FORCE_PATH_STYLE: z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => value === 'true' || value === '1'),
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: optionalString,
  ANTHROPIC_MAX_TOKENS: z.coerce.number().int().positive().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

type EnvVars = z.infer<typeof envSchema>;

function storageFromEnv(vars: EnvVars): StorageConfig {
  switch (vars.QUALIFICATION_STORAGE) {
    case 'memory':
      return { type: 'memory' };
    case 'file':
      return { type: 'file', directory: vars.QUALIFICATION_DATA_DIR };
    case 's3':
      if (!vars.S3_BUCKET) {
        throw new ConfigError(['S3_BUCKET: required when QUALIFICATION_STORAGE is s3']);
      }
      return {
        type: 's3',
        bucket: vars.S3_BUCKET,
        region: vars.AWS_REGION,
        prefix: vars.S3_PREFIX,
        endpoint: vars.S3_ENDPOINT,
        forcePathStyle: vars.S3_FORCE_PATH_STYLE,
      };
  }
}

/**
 * Build the core configuration from environment variables
 *
 * @param env - Variables to read (defaults to process.env)
 * @throws ConfigError listing every invalid or missing variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): CoreConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const vars = parsed.data;

  const storage = storageFromEnv(vars);

  const claude: ClaudeConfig | null = vars.ANTHROPIC_API_KEY
    ? {
        apiKey: vars.ANTHROPIC_API_KEY,
        model: vars.ANTHROPIC_MODEL,
        maxTokens: vars.ANTHROPIC_MAX_TOKENS,
      }
    : null;

  return { storage, claude, logLevel: vars.LOG_LEVEL };
}

export interface QualificationCore {
  storage: StorageAdapter;
  store: QualificationStore;
  log: InteractionLog;
  resolver: IdentityResolver;
  snapshots: SnapshotDifferencer;
  pipeline: QualificationPipeline;
  logger: Logger;
}

export interface CoreOverrides {
  /** Substrate to use instead of the configured one */
  storage?: StorageAdapter;
  model?: LanguageModel;
  logger?: Logger;
  metrics?: Metrics;
  clock?: () => Date;
}

/**
 * Wire substrate, store, log, resolver, differencer and pipeline
 *
 * @param config - Configuration, usually from loadConfig()
 * @param overrides - Injected collaborators (tests, embedding apps)
 */
export function createQualificationCore(config: CoreConfig, overrides: CoreOverrides = {}): QualificationCore {
  const logger = overrides.logger ?? createConsoleLogger(config.logLevel);
  const metrics = overrides.metrics ?? defaultMetrics;
  const storage = overrides.storage ?? createStorageAdapter(config.storage);

  const store = new QualificationStore({ storage, logger, metrics, clock: overrides.clock });
  const log = new InteractionLog({ storage, logger, metrics, clock: overrides.clock });
  const resolver = new IdentityResolver({ store, log, logger, metrics });
  const snapshots = new SnapshotDifferencer({ store, log });

  let model = overrides.model;
  if (!model && config.claude) {
    model = new ClaudeLanguageModel(config.claude, { logger, metrics });
  }

  const pipeline = new QualificationPipeline({ resolver, store, log, model, logger, metrics });

  logger.info('Qualification core initialized', {
    storage: config.storage.type,
    model: model ? 'configured' : 'none',
  });

  return { storage, store, log, resolver, snapshots, pipeline, logger };
}
