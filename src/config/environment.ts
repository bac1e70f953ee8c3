import { EnvironmentConfig, LogLevelName } from '../types/environment';
import { ConfigurationError } from '../types/errors';

/**
 * Default values for environment configuration
 */
const DEFAULTS = {
  NODE_ENV: 'development' as const,
  LOG_LEVEL: 'INFO' as const,
  FORMAT_REGISTRY_PATH: 'config/format-registry.json',
  DETECTION_SAMPLE_ROWS: '10',
  SNIFF_SAMPLE_BYTES: '4096',
} as const;

const STARTUP_CORRELATION_ID = 'startup';

const ALLOWED_ENVIRONMENTS = ['development', 'production', 'test'] as const;
const ALLOWED_LOG_LEVELS: readonly LogLevelName[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

const isAllowedEnvironment = (
  value: string,
): value is EnvironmentConfig['environment'] =>
  (ALLOWED_ENVIRONMENTS as readonly string[]).includes(value);

const isLogLevel = (value: string): value is LogLevelName =>
  (ALLOWED_LOG_LEVELS as readonly string[]).includes(value);

/**
 * Parses a positive integer environment variable
 * @throws {ConfigurationError} When the value is not a positive integer
 */
const readPositiveInteger = (key: string, fallback: string): number => {
  const raw = process.env[key] || fallback;
  const parsed = Number(raw);

  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(
      `Invalid ${key}: "${raw}". Must be a positive integer`,
      STARTUP_CORRELATION_ID,
      key,
    );
  }

  return parsed;
};

/**
 * Gets the current environment configuration with validation and defaults
 * @returns {EnvironmentConfig} Validated environment configuration
 * @throws {ConfigurationError} When an environment variable holds an invalid value
 */
export const getEnvironmentConfig = (): EnvironmentConfig => {
  const nodeEnv = process.env.NODE_ENV || DEFAULTS.NODE_ENV;

  if (!isAllowedEnvironment(nodeEnv)) {
    throw new ConfigurationError(
      `Invalid NODE_ENV: "${nodeEnv}". Must be one of: ${ALLOWED_ENVIRONMENTS.join(', ')}`,
      STARTUP_CORRELATION_ID,
      'NODE_ENV',
    );
  }

  const logLevel = (process.env.LOG_LEVEL || DEFAULTS.LOG_LEVEL).toUpperCase();
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(
      `Invalid LOG_LEVEL: "${logLevel}". Must be one of: ${ALLOWED_LOG_LEVELS.join(', ')}`,
      STARTUP_CORRELATION_ID,
      'LOG_LEVEL',
    );
  }

  return {
    environment: nodeEnv,
    logLevel,
    formatRegistryPath: process.env.FORMAT_REGISTRY_PATH || DEFAULTS.FORMAT_REGISTRY_PATH,
    detectionSampleRows: readPositiveInteger('DETECTION_SAMPLE_ROWS', DEFAULTS.DETECTION_SAMPLE_ROWS),
    sniffSampleBytes: readPositiveInteger('SNIFF_SAMPLE_BYTES', DEFAULTS.SNIFF_SAMPLE_BYTES),
  };
};

/**
 * Environment configuration instance with validation and defaults applied
 * @throws {ConfigurationError} When environment validation fails
 */
export const environmentConfig = getEnvironmentConfig();
