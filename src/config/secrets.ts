/**
 * Secrets Module
 *
 * Resolves database credentials and the token signing key, either from
 * environment variables or from AWS Secrets Manager. Fetched secrets are
 * cached for the lifetime of the Lambda container.
 */

import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import { EnvironmentConfig } from './environment';

export interface DatabaseCredentials {
  username: string;
  password: string;
}

const secretCache = new Map<string, string>();

/**
 * Fetch a secret string from AWS Secrets Manager
 */
export async function getSecretString(secretArn: string): Promise<string> {
  const cached = secretCache.get(secretArn);
  if (cached !== undefined) {
    return cached;
  }

  const client = new SecretsManagerClient({ region: process.env.AWS_REGION || 'us-east-1' });

  try {
    const response = await client.send(new GetSecretValueCommand({ SecretId: secretArn }));

    if (!response.SecretString) {
      throw new Error('Secret value is empty');
    }

    secretCache.set(secretArn, response.SecretString);
    return response.SecretString;
  } catch (error) {
    throw new Error(
      `Failed to fetch secret: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }
}

function parseSecretJson(secretString: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(secretString);
    return parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)
      ? Object.fromEntries(Object.entries(parsed))
      : null;
  } catch {
    return null;
  }
}

/**
 * Resolve database credentials
 *
 * Secrets Manager takes precedence when DB_SECRET_ARN is set; the secret
 * must be JSON with `username` and `password` keys (the RDS format).
 */
export async function getDatabaseCredentials(config: EnvironmentConfig): Promise<DatabaseCredentials> {
  if (!config.dbSecretArn) {
    return { username: config.dbUser, password: config.dbPassword };
  }

  const secret = parseSecretJson(await getSecretString(config.dbSecretArn));
  const username = secret?.username;
  const password = secret?.password;

  if (typeof username !== 'string' || typeof password !== 'string') {
    throw new Error('Database secret must contain string username and password');
  }

  return { username, password };
}

/**
 * Resolve the access token signing key
 *
 * A JSON secret must carry the key under `signing_key`; any other secret
 * string is used verbatim.
 */
export async function getSigningKey(config: EnvironmentConfig): Promise<string> {
  if (!config.jwtSecretArn) {
    return config.jwtSecret;
  }

  const secretString = await getSecretString(config.jwtSecretArn);
  const secret = parseSecretJson(secretString);
  if (!secret) {
    return secretString;
  }

  const signingKey = secret.signing_key;
  if (typeof signingKey !== 'string' || signingKey.length === 0) {
    throw new Error('Signing key secret must contain a non-empty signing_key');
  }
  return signingKey;
}

/**
 * Clear cached secrets (for testing only)
 * @internal
 */
export function clearSecretCache(): void {
  secretCache.clear();
}
