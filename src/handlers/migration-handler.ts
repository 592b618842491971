import { APIGatewayProxyResult } from 'aws-lambda';
import { runMigrations } from '../scripts/run-migrations';
import { closePool } from '../config/database';
import { log, LogLevel } from '../utils/logger';

/**
 * Lambda handler for running migrations
 *
 * Invoked directly (console, CLI or deploy hook), never through the API.
 */
export async function handler(): Promise<APIGatewayProxyResult> {
  log(LogLevel.INFO, 'Migration handler invoked');
  const result = await runMigrations();
  await closePool();

  return {
    statusCode: result.success ? 200 : 500,
    body: JSON.stringify(result),
  };
}
