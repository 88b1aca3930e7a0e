import type { ZodError } from 'zod';
import { ConfigurationError } from './errors.js';
import { type VerdictConfig, verdictConfigSchema } from './schema.js';

/**
 * Parse a JSON-valued environment variable
 */
function parseJsonEnv(env: NodeJS.ProcessEnv, key: string): unknown {
  const raw = env[key];
  if (!raw) {
    return undefined;
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`${key} is not valid JSON`);
    }
    throw error;
  }
}

function formatIssues(error: ZodError): string {
  return error.errors.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
}

/**
 * Validate a configuration object (e.g. parsed from a JSON file)
 *
 * @throws ConfigurationError if validation fails
 */
export function parseConfig(raw: unknown): VerdictConfig {
  const result = verdictConfigSchema.safeParse(raw ?? {});

  if (!result.success) {
    throw new ConfigurationError(`Configuration validation failed:\n${formatIssues(result.error)}`);
  }

  return result.data;
}

/**
 * Load and validate configuration from environment variables
 *
 * Unset variables fall back to schema defaults.
 *
 * @param env - Environment variables (defaults to process.env)
 * @returns Validated configuration
 * @throws ConfigurationError if validation fails
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): VerdictConfig {
  const detectors = parseJsonEnv(env, 'DETECTORS_CONFIG');
  if (detectors !== undefined && !Array.isArray(detectors)) {
    throw new ConfigurationError('DETECTORS_CONFIG must be a JSON array');
  }

  const rawConfig = {
    logging: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
    },
    ensemble: {
      detectors,
      quorum: env.ENSEMBLE_QUORUM,
      detectorTimeoutMs: env.DETECTOR_TIMEOUT_MS,
      agreementThreshold: env.ENSEMBLE_AGREEMENT_THRESHOLD,
      overrideScore: env.ENSEMBLE_OVERRIDE_SCORE,
      degradedConfidenceCap: env.ENSEMBLE_DEGRADED_CONFIDENCE_CAP,
    },
    integrator: {
      categoryWeights: parseJsonEnv(env, 'CATEGORY_WEIGHTS'),
      qualityBands: parseJsonEnv(env, 'QUALITY_BANDS'),
    },
    normalization: {
      metrics: parseJsonEnv(env, 'METRIC_RULES'),
      securityConfidence: env.SECURITY_CONFIDENCE,
    },
    analysis: {
      maxCodeBytes: env.MAX_CODE_BYTES,
      providerTimeoutMs: env.PROVIDER_TIMEOUT_MS,
      batchConcurrency: env.BATCH_CONCURRENCY,
    },
    review: {
      maxFunctionStatements: env.REVIEW_MAX_FUNCTION_STATEMENTS,
      maxArguments: env.REVIEW_MAX_ARGUMENTS,
      maxFunctionsWithoutClasses: env.REVIEW_MAX_FUNCTIONS_WITHOUT_CLASSES,
      referenceMatchSimilarity: env.REVIEW_REFERENCE_MATCH_SIMILARITY,
    },
    nodeEnv: env.NODE_ENV,
  };

  return parseConfig(rawConfig);
}
