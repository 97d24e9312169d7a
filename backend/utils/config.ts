import { SSMClient, GetParameterCommand } from "@aws-sdk/client-ssm";
import { SecretsManagerClient, GetSecretValueCommand } from "@aws-sdk/client-secrets-manager";
import { z } from "zod";
import { logger } from "./logger.js";

const ssmClient = new SSMClient({});
const secretsClient = new SecretsManagerClient({});
const IS_LAMBDA = !!process.env.AWS_LAMBDA_FUNCTION_NAME;

// Cache for SSM parameters and secrets to avoid repeated API calls
const parameterCache: Map<string, string> = new Map();

/**
 * Secret names in AWS Secrets Manager (for sensitive API keys)
 */
const SECRET_NAMES = {
  OPENAI_API_KEY: "/document-summarizer/openai-api-key",
} as const;

/**
 * Parameter names in SSM Parameter Store (for non-sensitive config)
 */
const SSM_PARAMETER_NAMES = {
  OPENAI_MODEL: "/document-summarizer/openai-model",
} as const;

const DEFAULT_MODEL = "gpt-4o-mini";

type SecretKey = keyof typeof SECRET_NAMES;
type SSMKey = keyof typeof SSM_PARAMETER_NAMES;
type ConfigKey = SecretKey | SSMKey;

function isSecretKey(key: ConfigKey): key is SecretKey {
  return key in SECRET_NAMES;
}

/**
 * Get a configuration value from Secrets Manager/SSM Parameter Store (Lambda) or .env (local)
 * Values are cached after first retrieval
 */
async function getConfig(key: ConfigKey): Promise<string | undefined> {
  const cached = parameterCache.get(key);
  if (cached !== undefined) {
    return cached;
  }

  let value: string | undefined;

  if (IS_LAMBDA) {
    if (isSecretKey(key)) {
      try {
        const result = await secretsClient.send(
          new GetSecretValueCommand({ SecretId: SECRET_NAMES[key] })
        );
        value = result.SecretString;
      } catch (error) {
        logger.warn(`Failed to get secret ${key}`, error);
      }
    } else {
      try {
        const result = await ssmClient.send(
          new GetParameterCommand({ Name: SSM_PARAMETER_NAMES[key], WithDecryption: true })
        );
        value = result.Parameter?.Value;
      } catch (error) {
        logger.warn(`Failed to get SSM parameter ${key}`, error);
      }
    }
  } else {
    value = process.env[key];
  }

  if (value !== undefined) {
    parameterCache.set(key, value);
  }

  return value;
}

/**
 * Get a required configuration value - throws if not found
 */
async function getRequiredConfig(key: ConfigKey): Promise<string> {
  const value = await getConfig(key);
  if (!value) {
    const location = isSecretKey(key) ? SECRET_NAMES[key] : SSM_PARAMETER_NAMES[key];
    const type = isSecretKey(key) ? "secret" : "SSM parameter";
    throw new Error(
      `Required configuration ${key} not found. ` +
        (IS_LAMBDA ? `Set ${type} ${location}` : `Set ${key} in .env file`)
    );
  }
  return value;
}

async function getModelId(): Promise<string> {
  return (await getConfig("OPENAI_MODEL")) || DEFAULT_MODEL;
}

// An empty variable (MAX_TOKENS_PER_CHUNK=) counts as unset rather than 0
const unsetWhenEmpty = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === "" ? undefined : value), schema);

const positiveInt = (fallback: number) =>
  unsetWhenEmpty(z.coerce.number().int().positive().default(fallback));

const settingsSchema = z.object({
  MAX_TOKENS_PER_CHUNK: positiveInt(3000),
  MAX_OUTPUT_TOKENS: positiveInt(500),
  POLL_INTERVAL_MS: positiveInt(5000),
  MAX_POLL_ATTEMPTS: positiveInt(60),
  THROTTLE_BASE_DELAY_MS: positiveInt(2000),
  MAX_THROTTLE_RETRIES: unsetWhenEmpty(z.coerce.number().int().nonnegative().default(5)),
});

export interface PipelineSettings {
  maxTokensPerChunk: number;
  maxOutputTokens: number;
  pollIntervalMs: number;
  maxPollAttempts: number;
  throttleBaseDelayMs: number;
  maxThrottleRetries: number;
}

/**
 * Read numeric tunables from the environment, falling back to defaults
 * Throws a ZodError when a value is set but not a valid number
 */
function loadSettings(env: Record<string, string | undefined> = process.env): PipelineSettings {
  const parsed = settingsSchema.parse(env);
  return {
    maxTokensPerChunk: parsed.MAX_TOKENS_PER_CHUNK,
    maxOutputTokens: parsed.MAX_OUTPUT_TOKENS,
    pollIntervalMs: parsed.POLL_INTERVAL_MS,
    maxPollAttempts: parsed.MAX_POLL_ATTEMPTS,
    throttleBaseDelayMs: parsed.THROTTLE_BASE_DELAY_MS,
    maxThrottleRetries: parsed.MAX_THROTTLE_RETRIES,
  };
}

function clearCache(): void {
  parameterCache.clear();
}

export const config = {
  get: getConfig,
  getRequired: getRequiredConfig,
  getModelId,
  loadSettings,
  clearCache,
  DEFAULT_MODEL,
};
