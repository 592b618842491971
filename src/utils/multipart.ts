/**
 * Multipart Upload Parsing
 *
 * Extracts one uploaded file from a `multipart/form-data` API Gateway
 * request body. API Gateway delivers binary media types base64-encoded.
 */

import { APIGatewayProxyEvent } from 'aws-lambda';
import busboy from 'busboy';
import { ValidationError } from '../middleware/error-handler';
import { BadRequestError } from '../models/errors';

export interface UploadedFile {
  fieldName: string;
  filename: string;
  mimeType: string;
  content: Buffer;
}

/**
 * Case-insensitive header lookup
 */
export function getHeader(event: APIGatewayProxyEvent, name: string): string | undefined {
  const wanted = name.toLowerCase();
  const headers = event.headers ?? {};
  const key = Object.keys(headers).find((candidate) => candidate.toLowerCase() === wanted);
  return key === undefined ? undefined : headers[key];
}

/**
 * Read the named file part from a multipart request
 *
 * @param fieldName - Form field carrying the file
 * @param maxBytes - Largest accepted file
 * @throws ValidationError when the body is not multipart or the field is missing
 * @throws BadRequestError when the file exceeds maxBytes
 */
export function parseMultipartFile(
  event: APIGatewayProxyEvent,
  fieldName: string,
  maxBytes: number
): Promise<UploadedFile> {
  const contentType = getHeader(event, 'content-type');
  if (!contentType || !contentType.toLowerCase().startsWith('multipart/form-data')) {
    return Promise.reject(new ValidationError('Request must be multipart/form-data', [
      { field: fieldName, message: 'is required' },
    ]));
  }

  const body = Buffer.from(event.body ?? '', event.isBase64Encoded ? 'base64' : 'utf8');

  return new Promise<UploadedFile>((resolve, reject) => {
    let parser: busboy.Busboy;
    try {
      parser = busboy({
        headers: { 'content-type': contentType },
        limits: { fileSize: maxBytes },
      });
    } catch (error) {
      reject(new ValidationError(
        `Malformed multipart request: ${error instanceof Error ? error.message : 'Unknown error'}`
      ));
      return;
    }

    let upload: UploadedFile | null = null;
    let tooLarge = false;

    parser.on('file', (name, stream, info) => {
      if (name !== fieldName) {
        stream.resume();
        return;
      }
      const chunks: Buffer[] = [];

      stream.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
      });
      stream.on('limit', () => {
        tooLarge = true;
      });
      stream.on('end', () => {
        if (upload === null) {
          upload = {
            fieldName: name,
            filename: info.filename ?? '',
            mimeType: info.mimeType,
            content: Buffer.concat(chunks),
          };
        }
      });
    });

    parser.on('error', (error: unknown) => {
      reject(new ValidationError(
        `Malformed multipart request: ${error instanceof Error ? error.message : 'Unknown error'}`
      ));
    });

    parser.on('close', () => {
      if (tooLarge) {
        reject(new BadRequestError(`File exceeds maximum size of ${maxBytes} bytes`));
        return;
      }
      if (upload === null) {
        reject(new ValidationError('No file uploaded', [
          { field: fieldName, message: 'is required' },
        ]));
        return;
      }
      resolve(upload);
    });

    parser.end(body);
  });
}
