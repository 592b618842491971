/**
 * Response Formatter Unit Tests
 *
 * Tests for response formatting utilities.
 */

import { describe, it, expect } from '@jest/globals';
import {
  successResponse,
  errorResponse,
  validationErrorResponse,
  authenticationErrorResponse,
  notFoundErrorResponse,
  conflictErrorResponse,
  internalErrorResponse,
  serviceUnavailableErrorResponse,
  generateRequestId,
  generateTimestamp,
  applyCorsHeaders,
} from '../../src/utils/response-formatter';
import {
  HttpStatus,
  ErrorCode,
  SuccessResponse,
  ErrorResponse,
} from '../../src/models/response';

function successBody<T>(body: string): SuccessResponse<T> {
  return JSON.parse(body);
}

function errorBody(body: string): ErrorResponse {
  return JSON.parse(body);
}

describe('Response Formatter', () => {
  describe('generateRequestId', () => {
    it('should generate a valid UUID v4', () => {
      const uuidRegex = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;
      expect(generateRequestId()).toMatch(uuidRegex);
    });

    it('should generate unique IDs', () => {
      expect(generateRequestId()).not.toBe(generateRequestId());
    });
  });

  describe('generateTimestamp', () => {
    it('should generate an ISO-8601 timestamp close to now', () => {
      const before = Date.now();
      const timestamp = generateTimestamp();
      const after = Date.now();

      expect(timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
      expect(new Date(timestamp).getTime()).toBeGreaterThanOrEqual(before);
      expect(new Date(timestamp).getTime()).toBeLessThanOrEqual(after);
    });
  });

  describe('successResponse', () => {
    it('should wrap data in the envelope', () => {
      const response = successResponse({ players: [] }, HttpStatus.OK, undefined, 'req-1');

      expect(response.statusCode).toBe(200);
      expect(response.headers?.['Content-Type']).toBe('application/json');
      const body = successBody<{ players: unknown[] }>(response.body);
      expect(body.request_id).toBe('req-1');
      expect(body.data).toEqual({ players: [] });
      expect(body).not.toHaveProperty('meta');
    });

    it('should include pagination metadata when given', () => {
      const response = successResponse(
        { players: [] },
        HttpStatus.OK,
        { pagination: { skip: 0, limit: 100, count: 0 } }
      );

      expect(successBody(response.body).meta).toEqual({
        pagination: { skip: 0, limit: 100, count: 0 },
      });
    });

    it('should use the given status code', () => {
      expect(successResponse({}, HttpStatus.CREATED).statusCode).toBe(201);
    });

    it('should generate a request id when none is given', () => {
      expect(successBody(successResponse({}).body).request_id).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('should not send an allowed origin by itself', () => {
      const headers = successResponse({}).headers;

      expect(headers).not.toHaveProperty('Access-Control-Allow-Origin');
      expect(headers?.['Access-Control-Allow-Methods']).toBe('GET,POST,PUT,DELETE,OPTIONS');
    });
  });

  describe('errorResponse', () => {
    it('should omit details when absent', () => {
      const response = errorResponse(ErrorCode.NOT_FOUND, 'Player not found', HttpStatus.NOT_FOUND, undefined, 'req-2');

      expect(errorBody(response.body)).toEqual({
        error: { code: 'NOT_FOUND', message: 'Player not found', request_id: 'req-2' },
      });
    });

    it('should merge extra headers', () => {
      const response = errorResponse(
        ErrorCode.AUTHENTICATION_ERROR,
        'nope',
        HttpStatus.UNAUTHORIZED,
        undefined,
        'req-3',
        { 'X-Extra': '1' }
      );

      expect(response.headers?.['X-Extra']).toBe('1');
      expect(response.headers?.['Content-Type']).toBe('application/json');
    });
  });

  describe('typed error responses', () => {
    it.each([
      [validationErrorResponse('bad', [{ field: 'name', message: 'is required' }], 'r'), 400, 'VALIDATION_ERROR'],
      [authenticationErrorResponse('Could not validate credentials', 'r'), 401, 'AUTHENTICATION_ERROR'],
      [notFoundErrorResponse('Player not found', 'r'), 404, 'NOT_FOUND'],
      [conflictErrorResponse('Username already registered', 'r'), 400, 'CONFLICT'],
      [internalErrorResponse(undefined, undefined, 'r'), 500, 'INTERNAL_ERROR'],
      [serviceUnavailableErrorResponse(undefined, 'r'), 503, 'SERVICE_UNAVAILABLE'],
    ])('should map to status %#', (response, status, code) => {
      expect(response.statusCode).toBe(status);
      expect(errorBody(response.body).error.code).toBe(code);
    });

    it('should add the bearer challenge to authentication errors only', () => {
      expect(authenticationErrorResponse('x').headers?.['WWW-Authenticate']).toBe('Bearer');
      expect(notFoundErrorResponse('x').headers).not.toHaveProperty('WWW-Authenticate');
    });

    it('should use default messages', () => {
      expect(errorBody(internalErrorResponse().body).error.message).toBe('Internal server error');
      expect(errorBody(serviceUnavailableErrorResponse().body).error.message).toBe(
        'Service temporarily unavailable'
      );
    });
  });

  describe('applyCorsHeaders', () => {
    const allowed = ['http://localhost:4200'];

    it('should echo an allowed origin', () => {
      const response = applyCorsHeaders(successResponse({}), 'http://localhost:4200', allowed);

      expect(response.headers?.['Access-Control-Allow-Origin']).toBe('http://localhost:4200');
      expect(response.headers?.Vary).toBe('Origin');
    });

    it('should leave other origins alone', () => {
      const original = successResponse({});

      expect(applyCorsHeaders(original, 'https://evil.example', allowed)).toBe(original);
      expect(applyCorsHeaders(original, undefined, allowed)).toBe(original);
    });
  });
});
