/**
 * Centralized Configuration Module
 *
 * Type-safe, validated configuration for the adaptive session engine. Values
 * are loaded from environment variables, validated against a zod schema and
 * exposed as a single frozen `config` object.
 *
 * Every engine component also accepts its own section as a constructor
 * argument, so tests build components with explicit values and never depend
 * on the process environment.
 *
 * Usage:
 *   import { config, validateConfig } from './config';
 *
 *   console.log(config.server.port);
 *   console.log(config.controller.highThreshold);
 *
 *   validateConfig();
 *
 * @module config
 */

import { z } from 'zod';

// =============================================================================
// Configuration Schema
// =============================================================================

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;

/**
 * Forgetting-curve and difficulty constants for the Item Scheduler.
 */
export const schedulerConfigSchema = z.object({
  /** Stability after the first successful review (days) */
  initialStabilityDays: z.number().positive().default(1),
  /** Stability after a lapse (days) */
  stabilityFloorDays: z.number().positive().default(1),
  /** Hard cap on stability (days) */
  maximumStabilityDays: z.number().positive().default(365),
  minDifficulty: z.number().positive().default(0.3),
  maxDifficulty: z.number().positive().default(5.0),
  /** Difficulty for items whose base difficulty is unusable */
  defaultDifficulty: z.number().positive().default(2.5),
  /** Added to difficulty on a lapse */
  difficultyStepUp: z.number().nonnegative().default(0.3),
  /** Removed from difficulty on a correct answer */
  difficultyStepDown: z.number().nonnegative().default(0.15),
  /** Smallest stability multiplier for a successful review */
  minGrowthFactor: z.number().min(1).default(1.3),
  /** Multiplier gained per unit of difficulty below the maximum */
  growthPerDifficulty: z.number().nonnegative().default(0.5),
  /** Lapse count from which a lapse pins difficulty at the maximum */
  lapseCeiling: z.number().int().positive().default(8),
  /** Throw SchedulerBoundsViolationError instead of clamping */
  strictBounds: z.boolean().default(false),
});

/**
 * Thresholds and sizing for the Adaptive Controller.
 */
export const controllerConfigSchema = z.object({
  lowThreshold: z.number().min(0).max(1).default(0.6),
  highThreshold: z.number().min(0).max(1).default(0.9),
  /** N: minimum window size to enter struggling, and streak length for other transitions */
  windowSize: z.number().int().positive().default(5),
  /** Samples kept per domain window */
  windowCapacity: z.number().int().positive().default(10),
  /** Mean latency at which latency efficiency reaches zero */
  latencyBaselineMs: z.number().positive().default(30000),
  /** Responses slower than this count as hesitation */
  hesitationThresholdMs: z.number().positive().default(10000),
  /** Items requested per injection */
  injectionBatchSize: z.number().int().positive().default(3),
  /** Distance from the reference difficulty of the requested range */
  difficultyBand: z.number().nonnegative().default(0.5),
  /** Lapses at which an item counts as previously lapsed for remediation */
  lapsedItemMinLapses: z.number().int().positive().default(1),
  contentTimeoutMs: z.number().int().positive().default(2000),
});

export const sessionConfigSchema = z.object({
  maxSessionSize: z.number().int().positive().default(20),
  idleTimeoutMs: z.number().int().positive().default(30 * MINUTE_MS),
  /** Ended sessions are kept this long past the idle timeout */
  retentionGraceMs: z.number().int().nonnegative().default(24 * HOUR_MS),
  sweepIntervalMs: z.number().int().positive().default(MINUTE_MS),
  /** Applied event ids remembered per session for duplicate rejection */
  appliedEventMemory: z.number().int().positive().default(200),
  /** Compare-and-swap attempts before a review write gives up */
  maxCasAttempts: z.number().int().positive().default(3),
  tutorTimeoutMs: z.number().int().positive().default(3000),
  /** Rolling accuracy the summary treats as mastered */
  masteryThreshold: z.number().min(0).max(1).default(0.85),
  /** Latest outcomes kept for the rolling accuracy */
  masteryWindow: z.number().int().positive().default(10),
});

export const storeConfigSchema = z.object({
  maxWriteRetries: z.number().int().nonnegative().default(3),
  retryBaseDelayMs: z.number().int().nonnegative().default(50),
});

const configSchema = z.object({
  // Server configuration
  server: z.object({
    port: z.number().int().positive().default(3000),
    host: z.string().default('0.0.0.0'),
    nodeEnv: z
      .string()
      .default('development')
      .pipe(z.enum(['development', 'production', 'test'])),
  }),

  // Database configuration
  database: z.object({
    path: z.string().default('adaptive-sessions.db'),
  }),

  // Anthropic API configuration (tutoring prompts; optional)
  anthropic: z.object({
    apiKey: z.string().optional(),
    model: z.string().default('claude-sonnet-4-5-20250929'),
    maxTokens: z.number().int().positive().default(256),
  }),

  scheduler: schedulerConfigSchema,
  controller: controllerConfigSchema,
  session: sessionConfigSchema,
  store: storeConfigSchema,
});

// TypeScript types inferred from the Zod schemas
export type Config = z.infer<typeof configSchema>;
export type SchedulerConfig = z.infer<typeof schedulerConfigSchema>;
export type ControllerConfig = z.infer<typeof controllerConfigSchema>;
export type SessionConfig = z.infer<typeof sessionConfigSchema>;
export type StoreConfig = z.infer<typeof storeConfigSchema>;

/** Section defaults, used by components constructed without explicit config */
export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = schedulerConfigSchema.parse({});
export const DEFAULT_CONTROLLER_CONFIG: ControllerConfig = controllerConfigSchema.parse({});
export const DEFAULT_SESSION_CONFIG: SessionConfig = sessionConfigSchema.parse({});
export const DEFAULT_STORE_CONFIG: StoreConfig = storeConfigSchema.parse({});

// =============================================================================
// Environment Variable Loading
// =============================================================================

/**
 * Parse an integer from an environment variable string.
 * Returns undefined if the value is not a valid integer.
 */
function parseIntOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Parse a float from an environment variable string.
 */
function parseFloatOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Parse 'true'/'1' and 'false'/'0'. Anything else is undefined.
 */
function parseBooleanOrUndefined(value: string | undefined): boolean | undefined {
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return undefined;
}

/**
 * Load configuration from environment variables.
 * Unset variables are left undefined so the schema defaults apply.
 */
function loadFromEnvironment(env: NodeJS.ProcessEnv): z.input<typeof configSchema> {
  const nodeEnv = env.NODE_ENV ?? 'development';

  return {
    server: {
      port: parseIntOrUndefined(env.PORT),
      host: env.HOST,
      nodeEnv,
    },
    database: {
      path: env.DATABASE_PATH,
    },
    anthropic: {
      apiKey: env.ANTHROPIC_API_KEY,
      model: env.ANTHROPIC_MODEL,
      maxTokens: parseIntOrUndefined(env.ANTHROPIC_MAX_TOKENS),
    },
    scheduler: {
      initialStabilityDays: parseFloatOrUndefined(env.SCHEDULER_INITIAL_STABILITY_DAYS),
      stabilityFloorDays: parseFloatOrUndefined(env.SCHEDULER_STABILITY_FLOOR_DAYS),
      maximumStabilityDays: parseFloatOrUndefined(env.SCHEDULER_MAX_STABILITY_DAYS),
      minDifficulty: parseFloatOrUndefined(env.SCHEDULER_MIN_DIFFICULTY),
      maxDifficulty: parseFloatOrUndefined(env.SCHEDULER_MAX_DIFFICULTY),
      lapseCeiling: parseIntOrUndefined(env.SCHEDULER_LAPSE_CEILING),
      // Strict bounds default on under test so violations fail loudly
      strictBounds: parseBooleanOrUndefined(env.SCHEDULER_STRICT_BOUNDS) ?? nodeEnv === 'test',
    },
    controller: {
      lowThreshold: parseFloatOrUndefined(env.CONTROLLER_LOW_THRESHOLD),
      highThreshold: parseFloatOrUndefined(env.CONTROLLER_HIGH_THRESHOLD),
      windowSize: parseIntOrUndefined(env.CONTROLLER_WINDOW_SIZE),
      contentTimeoutMs: parseIntOrUndefined(env.CONTENT_TIMEOUT_MS),
    },
    session: {
      maxSessionSize: parseIntOrUndefined(env.SESSION_MAX_SIZE),
      idleTimeoutMs: parseIntOrUndefined(env.SESSION_IDLE_TIMEOUT_MS),
      retentionGraceMs: parseIntOrUndefined(env.SESSION_RETENTION_GRACE_MS),
      sweepIntervalMs: parseIntOrUndefined(env.SESSION_SWEEP_INTERVAL_MS),
    },
    store: {
      maxWriteRetries: parseIntOrUndefined(env.STORE_MAX_WRITE_RETRIES),
      retryBaseDelayMs: parseIntOrUndefined(env.STORE_RETRY_BASE_DELAY_MS),
    },
  };
}

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Configuration validation error with detailed information about missing/invalid values.
 */
export class ConfigValidationError extends Error {
  public readonly missingVars: string[];
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(
    message: string,
    missingVars: string[] = [],
    invalidVars: { name: string; reason: string }[] = []
  ) {
    super(message);
    this.name = 'ConfigValidationError';
    this.missingVars = missingVars;
    this.invalidVars = invalidVars;
  }
}

/**
 * Parses raw environment values into a Config.
 *
 * @throws {ConfigValidationError} If any value fails the schema
 */
export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const parseResult = configSchema.safeParse(loadFromEnvironment(env));

  if (!parseResult.success) {
    const invalidVars = parseResult.error.errors.map((e) => ({
      name: e.path.join('.'),
      reason: e.message,
    }));
    throw new ConfigValidationError(
      `Invalid configuration: ${invalidVars.map((v) => `${v.name}: ${v.reason}`).join('; ')}`,
      [],
      invalidVars
    );
  }

  return parseResult.data;
}

/**
 * Cross-field checks the schema cannot express, plus production requirements.
 *
 * In production DATABASE_PATH must be set explicitly; the tutoring API key
 * stays optional because the engine runs without a tutor.
 *
 * @throws {ConfigValidationError} If the configuration is unusable
 */
export function validateConfig(target: Config = config, env: NodeJS.ProcessEnv = process.env): void {
  const missingVars: string[] = [];
  const invalidVars: { name: string; reason: string }[] = [];

  if (target.server.nodeEnv === 'production' && !env.DATABASE_PATH) {
    missingVars.push('DATABASE_PATH');
  }

  if (target.scheduler.minDifficulty >= target.scheduler.maxDifficulty) {
    invalidVars.push({
      name: 'SCHEDULER_MIN_DIFFICULTY',
      reason: 'must be below SCHEDULER_MAX_DIFFICULTY',
    });
  }

  if (target.scheduler.stabilityFloorDays > target.scheduler.maximumStabilityDays) {
    invalidVars.push({
      name: 'SCHEDULER_STABILITY_FLOOR_DAYS',
      reason: 'must not exceed SCHEDULER_MAX_STABILITY_DAYS',
    });
  }

  if (target.controller.lowThreshold >= target.controller.highThreshold) {
    invalidVars.push({
      name: 'CONTROLLER_LOW_THRESHOLD',
      reason: 'must be below CONTROLLER_HIGH_THRESHOLD',
    });
  }

  if (target.controller.windowCapacity < target.controller.windowSize) {
    invalidVars.push({
      name: 'CONTROLLER_WINDOW_SIZE',
      reason: 'must not exceed the window capacity',
    });
  }

  if (missingVars.length > 0 || invalidVars.length > 0) {
    const errorParts: string[] = [];

    if (missingVars.length > 0) {
      errorParts.push(`Missing required environment variables: ${missingVars.join(', ')}`);
    }

    if (invalidVars.length > 0) {
      const invalidDescriptions = invalidVars.map((v) => `${v.name}: ${v.reason}`).join('; ');
      errorParts.push(`Invalid configuration: ${invalidDescriptions}`);
    }

    throw new ConfigValidationError(errorParts.join('\n'), missingVars, invalidVars);
  }
}

// =============================================================================
// Configuration Export
// =============================================================================

/**
 * The validated, type-safe configuration object, loaded once at module load.
 *
 * @example
 * ```typescript
 * import { config } from './config';
 *
 * serve({ fetch: app.fetch, port: config.server.port });
 * ```
 */
export const config: Config = parseConfig(process.env);

/**
 * Helper function to check if we're running in production mode.
 */
export function isProduction(): boolean {
  return config.server.nodeEnv === 'production';
}

/**
 * Helper function to check if we're running in test mode.
 */
export function isTest(): boolean {
  return config.server.nodeEnv === 'test';
}

/**
 * Returns the Anthropic API key, if one is configured.
 */
export function getAnthropicApiKey(): string | undefined {
  return config.anthropic.apiKey;
}

export default config;
