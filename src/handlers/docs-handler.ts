import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import * as fs from 'fs';
import * as path from 'path';
import { notFoundErrorResponse, internalErrorResponse } from '../utils/response-formatter';
import { log, LogLevel } from '../utils/logger';

/**
 * Documentation directory, relative to the compiled handler
 * (dist/src/handlers -> dist/docs)
 */
const DOCS_DIR = process.env.DOCS_DIR || path.join(__dirname, '../../docs');

interface DocsResource {
  file: string;
  contentType: string;
}

const RESOURCES: Record<string, DocsResource> = {
  '/api-docs': { file: 'api-docs.html', contentType: 'text/html' },
  '/api-docs/openapi.json': { file: 'openapi.json', contentType: 'application/json' },
};

/**
 * Lambda handler for serving API documentation
 *
 * Serves the Swagger UI page at /api-docs and the OpenAPI document it
 * renders at /api-docs/openapi.json.
 */
export const handler = async (
  event: APIGatewayProxyEvent
): Promise<APIGatewayProxyResult> => {
  const requestPath = event.path.length > 1 ? event.path.replace(/\/+$/, '') : event.path;
  const resource = RESOURCES[requestPath];

  if (!resource) {
    return notFoundErrorResponse('Documentation resource not found');
  }

  try {
    const content = await fs.promises.readFile(path.join(DOCS_DIR, resource.file), 'utf-8');
    return {
      statusCode: 200,
      headers: {
        'Content-Type': resource.contentType,
        'Cache-Control': 'public, max-age=3600',
      },
      body: content,
    };
  } catch (error) {
    log(LogLevel.ERROR, 'Error serving documentation', {
      path: requestPath,
      error_message: error instanceof Error ? error.message : 'Unknown error',
    });
    return internalErrorResponse('Failed to serve documentation');
  }
};
