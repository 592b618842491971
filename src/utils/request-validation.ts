/**
 * Request Validation Module
 *
 * Validates request bodies against JSON schemas using ajv before any
 * store call is made. Invalid input becomes a ValidationError (400) with
 * one entry per offending field.
 */

import Ajv, { JSONSchemaType, ErrorObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { FieldError, ValidationError } from '../middleware/error-handler';
import { PlayerCreateInput, PlayerUpdateInput } from '../models/player';
import { LoginInput, SignupInput } from '../models/user';

const ajv = new Ajv({
  allErrors: true,
  strict: true,
  coerceTypes: false,
});

// email format for signup
addFormats(ajv);

/**
 * At least one non-whitespace character
 */
const NOT_BLANK = '\\S';

// players.age and players.jersey_number are INTEGER columns
const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

const signupSchema: JSONSchemaType<SignupInput> = {
  type: 'object',
  properties: {
    email: { type: 'string', format: 'email', maxLength: 255 },
    username: { type: 'string', minLength: 1, maxLength: 100, pattern: NOT_BLANK },
    password: { type: 'string', minLength: 1 },
  },
  required: ['email', 'username', 'password'],
  additionalProperties: false,
};

const loginSchema: JSONSchemaType<LoginInput> = {
  type: 'object',
  properties: {
    username: { type: 'string' },
    password: { type: 'string' },
  },
  required: ['username', 'password'],
  additionalProperties: false,
};

const playerCreateSchema: JSONSchemaType<PlayerCreateInput> = {
  type: 'object',
  properties: {
    name: { type: 'string', minLength: 1, maxLength: 255, pattern: NOT_BLANK },
    position: { type: 'string', nullable: true, maxLength: 100 },
    team: { type: 'string', nullable: true, maxLength: 100 },
    age: { type: 'integer', nullable: true, minimum: INT32_MIN, maximum: INT32_MAX },
    jersey_number: { type: 'integer', nullable: true, minimum: INT32_MIN, maximum: INT32_MAX },
  },
  required: ['name'],
  additionalProperties: false,
};

const playerUpdateSchema: JSONSchemaType<PlayerUpdateInput> = {
  type: 'object',
  properties: {
    // null is rejected separately in validatePlayerUpdate
    name: { type: 'string', nullable: true, minLength: 1, maxLength: 255, pattern: NOT_BLANK },
    position: { type: 'string', nullable: true, maxLength: 100 },
    team: { type: 'string', nullable: true, maxLength: 100 },
    age: { type: 'integer', nullable: true, minimum: INT32_MIN, maximum: INT32_MAX },
    jersey_number: { type: 'integer', nullable: true, minimum: INT32_MIN, maximum: INT32_MAX },
  },
  required: [],
  additionalProperties: false,
};

const validators = {
  signup: ajv.compile(signupSchema),
  login: ajv.compile(loginSchema),
  playerCreate: ajv.compile(playerCreateSchema),
  playerUpdate: ajv.compile(playerUpdateSchema),
};

/**
 * Format ajv errors into field-level messages
 */
export function formatValidationErrors(errors: ErrorObject[] | null | undefined): FieldError[] {
  if (!errors) {
    return [];
  }

  return errors.map((error) => {
    if (error.keyword === 'required' && typeof error.params.missingProperty === 'string') {
      return { field: error.params.missingProperty, message: 'is required' };
    }
    if (error.keyword === 'additionalProperties' && typeof error.params.additionalProperty === 'string') {
      return { field: error.params.additionalProperty, message: 'is not allowed' };
    }
    if (error.keyword === 'pattern') {
      return { field: error.instancePath.replace(/^\//, ''), message: 'must not be blank' };
    }
    return {
      field: error.instancePath.replace(/^\//, '') || 'body',
      message: error.message || 'is invalid',
    };
  });
}

function validate<T>(validator: ValidateFunction<T>, body: unknown): T {
  if (!validator(body)) {
    throw new ValidationError('Invalid request body', formatValidationErrors(validator.errors));
  }
  return body;
}

export function validateSignup(body: unknown): SignupInput {
  return validate(validators.signup, body);
}

export function validateLogin(body: unknown): LoginInput {
  return validate(validators.login, body);
}

export function validatePlayerCreate(body: unknown): PlayerCreateInput {
  return validate(validators.playerCreate, body);
}

/**
 * Validate a partial update; `name` may be omitted but never null
 */
export function validatePlayerUpdate(body: unknown): PlayerUpdateInput {
  if (body !== null && typeof body === 'object' && 'name' in body && body.name === null) {
    throw new ValidationError('Invalid request body', [
      { field: 'name', message: 'must not be null' },
    ]);
  }
  return validate(validators.playerUpdate, body);
}

/**
 * Parse an optional non-negative integer query parameter
 */
export function parseNonNegativeInteger(
  value: string | undefined,
  name: string,
  fallback: number
): number {
  if (value === undefined || value === '') {
    return fallback;
  }
  if (!/^\d+$/.test(value)) {
    throw new ValidationError(`Invalid query parameter: ${name}`, [
      { field: name, message: 'must be a non-negative integer' },
    ]);
  }
  return parseInt(value, 10);
}

/**
 * Parse a player id path segment
 */
export function parsePlayerId(value: string): number {
  if (!/^[1-9]\d*$/.test(value) || !Number.isSafeInteger(Number(value))) {
    throw new ValidationError('Invalid player id', [
      { field: 'player_id', message: 'must be a positive integer' },
    ]);
  }
  return Number(value);
}
