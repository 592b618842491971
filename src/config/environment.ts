/**
 * Environment Configuration
 *
 * Centralized configuration management for environment variables.
 * All configuration values should be accessed through this module.
 */

/**
 * Supported HMAC algorithms for access token signing
 */
export type TokenAlgorithm = 'HS256' | 'HS384' | 'HS512';

const TOKEN_ALGORITHMS: readonly TokenAlgorithm[] = ['HS256', 'HS384', 'HS512'];

export interface EnvironmentConfig {
  // Database configuration
  dbHost: string;
  dbPort: number;
  dbName: string;
  dbUser: string;
  dbPassword: string;
  dbSecretArn: string;
  dbSsl: boolean;

  // Token configuration
  jwtSecret: string;
  jwtSecretArn: string;
  jwtAlgorithm: TokenAlgorithm;
  accessTokenExpireMinutes: number;

  // Password hashing
  bcryptRounds: number;

  // HTTP configuration
  corsAllowedOrigins: string[];
  maxUploadBytes: number;

  // Application configuration
  metricsEnabled: boolean;
  logLevel: string;
  nodeEnv: string;
}

function parseInteger(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function parseBoolean(value: string | undefined): boolean {
  return value !== undefined && ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}

function parseAlgorithm(value: string | undefined): TokenAlgorithm {
  const match = TOKEN_ALGORITHMS.find((algorithm) => algorithm === value);
  return match ?? 'HS256';
}

function parseOrigins(value: string | undefined): string[] {
  return (value || 'http://localhost:4200')
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

/**
 * Load and validate environment configuration
 */
export function loadEnvironmentConfig(): EnvironmentConfig {
  return {
    dbHost: process.env.DB_HOST || '',
    dbPort: parseInteger(process.env.DB_PORT, 5432),
    dbName: process.env.DB_NAME || '',
    dbUser: process.env.DB_USER || '',
    dbPassword: process.env.DB_PASSWORD || '',
    dbSecretArn: process.env.DB_SECRET_ARN || '',
    dbSsl: parseBoolean(process.env.DB_SSL),
    jwtSecret: process.env.JWT_SECRET || '',
    jwtSecretArn: process.env.JWT_SECRET_ARN || '',
    jwtAlgorithm: parseAlgorithm(process.env.JWT_ALGORITHM),
    accessTokenExpireMinutes: parseInteger(process.env.ACCESS_TOKEN_EXPIRE_MINUTES, 30),
    bcryptRounds: parseInteger(process.env.BCRYPT_ROUNDS, 12),
    corsAllowedOrigins: parseOrigins(process.env.CORS_ALLOWED_ORIGINS),
    maxUploadBytes: parseInteger(process.env.MAX_UPLOAD_BYTES, 5 * 1024 * 1024),
    metricsEnabled: parseBoolean(process.env.METRICS_ENABLED),
    logLevel: process.env.LOG_LEVEL || 'info',
    nodeEnv: process.env.NODE_ENV || 'development',
  };
}

/**
 * Validate that all required environment variables are set
 */
export function validateEnvironmentConfig(config: EnvironmentConfig): void {
  const requiredFields: (keyof EnvironmentConfig)[] = ['dbHost', 'dbName'];

  const missingFields: string[] = requiredFields.filter((field) => !config[field]);

  if (!config.dbSecretArn && !config.dbUser) {
    missingFields.push('dbUser or dbSecretArn');
  }
  if (!config.jwtSecret && !config.jwtSecretArn) {
    missingFields.push('jwtSecret or jwtSecretArn');
  }

  if (missingFields.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missingFields.join(', ')}`
    );
  }

  if (config.accessTokenExpireMinutes <= 0) {
    throw new Error('ACCESS_TOKEN_EXPIRE_MINUTES must be a positive integer');
  }
}
