/**
 * Roster API
 *
 * Main entry point for the Lambda function.
 */

export { handler } from './handlers/api-handler';
export * from './config/environment';
