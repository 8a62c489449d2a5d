import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';

// Blank variables (`PORT=`) fall back to the default instead of coercing to 0
const blankAsUnset = (value: unknown) => (value === '' ? undefined : value);

const ratioFromEnv = (fallback: number) =>
  z.preprocess(blankAsUnset, z.coerce.number().min(0).max(1).default(fallback));

const integerFromEnv = (fallback: number, min = 0) =>
  z.preprocess(blankAsUnset, z.coerce.number().int().min(min).default(fallback));

const environmentSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: integerFromEnv(8765),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  OPENAI_API_KEY: z.string().default(''),
  GENERATION_MODEL: z.string().min(1).default('gpt-4o-mini'),
  GENERATION_TIMEOUT_MS: integerFromEnv(15000, 1),
  IDLE_TIMEOUT_MS: integerFromEnv(300000, 1),
  TRANSCRIPT_LIMIT: integerFromEnv(10, 1),
  STICKINESS_RATIO: ratioFromEnv(0.8),
  LOW_CONFIDENCE_THRESHOLD: ratioFromEnv(0.3),
  MAX_TURNS_WITH_SAME_HANDLER: integerFromEnv(5, 1),
  CONTACT_PROMPT_CEILING: integerFromEnv(3, 1),
  ORDER_STORE: z.enum(['memory', 'postgres']).default('memory'),
  ORDER_SEED_FILE: z.string().default('data/sample-orders.json'),
  DATABASE_URL: z.string().default(''),
  DATABASE_POOL_SIZE: integerFromEnv(5, 1)
});

export type LogLevelName = z.infer<typeof environmentSchema>['LOG_LEVEL'];

export interface RoutingPolicy {
  /** A sticky handler keeps the turn while it scores above this share of the best score */
  stickinessRatio: number;
  lowConfidenceThreshold: number;
  maxTurnsWithSameHandler: number;
  contactPromptCeiling: number;
}

export interface EnvironmentConfig {
  host: string;
  port: number;
  logLevel: LogLevelName;
  idleTimeoutMs: number;
  transcriptLimit: number;
  generation: {
    apiKey: string;
    model: string;
    timeoutMs: number;
  };
  routing: RoutingPolicy;
  storage: {
    driver: 'memory' | 'postgres';
    seedFile: string;
    databaseUrl: string;
    poolSize: number;
  };
}

export const DEFAULT_ROUTING_POLICY: RoutingPolicy = {
  stickinessRatio: 0.8,
  lowConfidenceThreshold: 0.3,
  maxTurnsWithSameHandler: 5,
  contactPromptCeiling: 3
};

/**
 * Read the process environment (after loading .env) into a validated config.
 * Throws ConfigurationError listing every invalid variable.
 */
export const initializeEnvironment = (env: NodeJS.ProcessEnv = loadDotenv()): EnvironmentConfig => {
  const parsed = environmentSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parsed.data;

  if (values.ORDER_STORE === 'postgres' && !values.DATABASE_URL) {
    throw new ConfigurationError(['DATABASE_URL: required when ORDER_STORE=postgres']);
  }

  return {
    host: values.HOST,
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    idleTimeoutMs: values.IDLE_TIMEOUT_MS,
    transcriptLimit: values.TRANSCRIPT_LIMIT,
    generation: {
      apiKey: values.OPENAI_API_KEY,
      model: values.GENERATION_MODEL,
      timeoutMs: values.GENERATION_TIMEOUT_MS
    },
    routing: {
      stickinessRatio: values.STICKINESS_RATIO,
      lowConfidenceThreshold: values.LOW_CONFIDENCE_THRESHOLD,
      maxTurnsWithSameHandler: values.MAX_TURNS_WITH_SAME_HANDLER,
      contactPromptCeiling: values.CONTACT_PROMPT_CEILING
    },
    storage: {
      driver: values.ORDER_STORE,
      seedFile: values.ORDER_SEED_FILE,
      databaseUrl: values.DATABASE_URL,
      poolSize: values.DATABASE_POOL_SIZE
    }
  };
};

function loadDotenv(): NodeJS.ProcessEnv {
  dotenv.config();
  return process.env;
}
