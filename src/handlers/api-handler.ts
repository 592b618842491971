/**
 * Main Lambda Handler Entry Point
 *
 * Handles all API Gateway requests: routing, bearer authentication,
 * error handling, CORS and structured request logging. Each request
 * borrows one database client, shared by every repository it touches.
 */

import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { authenticate } from '../middleware/jwt-validation';
import { handleError, ValidationError } from '../middleware/error-handler';
import { BadRequestError } from '../models/errors';
import { User } from '../models/user';
import { HttpStatus } from '../models/response';
import {
  successResponse,
  notFoundErrorResponse,
  generateRequestId,
  applyCorsHeaders,
} from '../utils/response-formatter';
import { EnvironmentConfig, loadEnvironmentConfig, validateEnvironmentConfig } from '../config/environment';
import { Queryable, withClient } from '../config/database';
import { getSigningKey } from '../config/secrets';
import { logRequest } from '../utils/logger';
import { getHeader, parseMultipartFile } from '../utils/multipart';
import {
  parseNonNegativeInteger,
  parsePlayerId,
  validateLogin,
  validatePlayerCreate,
  validatePlayerUpdate,
  validateSignup,
} from '../utils/request-validation';

// Import services
import { AuthService } from '../services/auth-service';
import { PlayerService } from '../services/player-service';
import { CsvImportService } from '../services/csv-import-service';
import { PasswordHasher } from '../services/password-hasher';
import { TokenService } from '../services/token-service';

// Import repositories
import { UserRepository, UserStore } from '../repositories/user-repository';
import { PlayerRepository } from '../repositories/player-repository';

const DEFAULT_SKIP = 0;
const DEFAULT_LIMIT = 100;
const UPLOAD_FIELD_NAME = 'file';

/**
 * Services bound to one request's database client
 */
interface Services {
  userStore: UserStore;
  authService: AuthService;
  playerService: PlayerService;
  csvImportService: CsvImportService;
}

interface RouteContext {
  event: APIGatewayProxyEvent;
  services: Services;
  config: EnvironmentConfig;
  requestId: string;
}

interface AuthenticatedRouteContext extends RouteContext {
  user: User;
}

/**
 * Route definition
 */
type Route =
  | {
      method: string;
      pathPattern: RegExp;
      requiresAuth: false;
      handler: (context: RouteContext) => Promise<APIGatewayProxyResult>;
    }
  | {
      method: string;
      pathPattern: RegExp;
      requiresAuth: true;
      handler: (context: AuthenticatedRouteContext) => Promise<APIGatewayProxyResult>;
    };

function buildServices(
  db: Queryable,
  tokenService: TokenService,
  config: EnvironmentConfig
): Services {
  const userStore = new UserRepository(db);
  const playerStore = new PlayerRepository(db);

  return {
    userStore,
    authService: new AuthService(userStore, new PasswordHasher(config.bcryptRounds), tokenService),
    playerService: new PlayerService(playerStore),
    csvImportService: new CsvImportService(playerStore),
  };
}

/**
 * Drop trailing slashes so `/players/` routes like `/players`
 */
function normalizePath(path: string): string {
  const trimmed = path.replace(/\/+$/, '');
  return trimmed === '' ? '/' : trimmed;
}

/**
 * Extract query parameter from event
 */
function getQueryParameter(event: APIGatewayProxyEvent, name: string): string | undefined {
  return event.queryStringParameters?.[name];
}

/**
 * Player id is the last path segment
 */
function getPlayerId(event: APIGatewayProxyEvent): number {
  const segments = normalizePath(event.path).split('/');
  return parsePlayerId(segments[segments.length - 1]);
}

function readRawBody(event: APIGatewayProxyEvent): string {
  if (!event.body) {
    throw new BadRequestError('Request body is required');
  }
  return event.isBase64Encoded ? Buffer.from(event.body, 'base64').toString('utf8') : event.body;
}

/**
 * Parse request body
 */
function parseBody(event: APIGatewayProxyEvent): unknown {
  const raw = readRawBody(event);

  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    throw new BadRequestError('Invalid JSON in request body');
  }
}

/**
 * Token requests arrive as JSON or as an OAuth2 password form
 */
function parseCredentialsBody(event: APIGatewayProxyEvent): unknown {
  const contentType = getHeader(event, 'content-type') ?? '';
  if (!contentType.toLowerCase().startsWith('application/x-www-form-urlencoded')) {
    return parseBody(event);
  }

  const form = new URLSearchParams(readRawBody(event));
  const credentials: Record<string, string> = {};
  for (const field of ['username', 'password']) {
    const value = form.get(field);
    if (value !== null) {
      credentials[field] = value;
    }
  }
  return credentials;
}

function getPagination(event: APIGatewayProxyEvent): { skip: number; limit: number } {
  return {
    skip: parseNonNegativeInteger(getQueryParameter(event, 'skip'), 'skip', DEFAULT_SKIP),
    limit: parseNonNegativeInteger(getQueryParameter(event, 'limit'), 'limit', DEFAULT_LIMIT),
  };
}

/**
 * Route handlers
 */

// POST /signup
async function signup({ event, services, requestId }: RouteContext): Promise<APIGatewayProxyResult> {
  const user = await services.authService.signup(validateSignup(parseBody(event)), requestId);
  return successResponse({ user }, HttpStatus.CREATED, undefined, requestId);
}

// POST /token
async function issueToken({ event, services, requestId }: RouteContext): Promise<APIGatewayProxyResult> {
  const token = await services.authService.login(validateLogin(parseCredentialsBody(event)), requestId);
  return successResponse(token, HttpStatus.OK, undefined, requestId);
}

// POST /logout
async function logout({ services, user, requestId }: AuthenticatedRouteContext): Promise<APIGatewayProxyResult> {
  const ack = await services.authService.logout(user, requestId);
  return successResponse(ack, HttpStatus.OK, undefined, requestId);
}

// POST /players
async function createPlayer({ event, services, requestId }: AuthenticatedRouteContext): Promise<APIGatewayProxyResult> {
  const player = await services.playerService.createPlayer(validatePlayerCreate(parseBody(event)));
  return successResponse({ player }, HttpStatus.CREATED, undefined, requestId);
}

// GET /players
async function listPlayers({ event, services, requestId }: AuthenticatedRouteContext): Promise<APIGatewayProxyResult> {
  const { skip, limit } = getPagination(event);
  const players = await services.playerService.listPlayers(skip, limit);
  return successResponse(
    { players },
    HttpStatus.OK,
    { pagination: { skip, limit, count: players.length } },
    requestId
  );
}

// GET /players/{playerId}
async function getPlayerById({ event, services, requestId }: AuthenticatedRouteContext): Promise<APIGatewayProxyResult> {
  const player = await services.playerService.getPlayerById(getPlayerId(event));
  return successResponse({ player }, HttpStatus.OK, undefined, requestId);
}

// PUT /players/{playerId}
async function updatePlayer({ event, services, requestId }: AuthenticatedRouteContext): Promise<APIGatewayProxyResult> {
  const playerId = getPlayerId(event);
  const player = await services.playerService.updatePlayer(playerId, validatePlayerUpdate(parseBody(event)));
  return successResponse({ player }, HttpStatus.OK, undefined, requestId);
}

// DELETE /players/{playerId}
async function deletePlayer({ event, services, requestId }: AuthenticatedRouteContext): Promise<APIGatewayProxyResult> {
  const ack = await services.playerService.deletePlayer(getPlayerId(event));
  return successResponse(ack, HttpStatus.OK, undefined, requestId);
}

// GET /search
async function searchPlayers({ event, services, requestId }: AuthenticatedRouteContext): Promise<APIGatewayProxyResult> {
  const name = getQueryParameter(event, 'name');
  if (name === undefined) {
    throw new ValidationError('Invalid query parameter: name', [
      { field: 'name', message: 'is required' },
    ]);
  }

  const { skip, limit } = getPagination(event);
  const players = await services.playerService.searchPlayers(name, skip, limit);
  return successResponse(
    { players },
    HttpStatus.OK,
    { pagination: { skip, limit, count: players.length } },
    requestId
  );
}

// POST /players/upload-csv
async function uploadPlayersCsv({ event, services, config, requestId }: AuthenticatedRouteContext): Promise<APIGatewayProxyResult> {
  const upload = await parseMultipartFile(event, UPLOAD_FIELD_NAME, config.maxUploadBytes);
  const players = await services.csvImportService.importPlayers(upload, requestId);
  return successResponse({ players }, HttpStatus.CREATED, undefined, requestId);
}

/**
 * Route definitions
 * Note: API Gateway stage is /api/, so paths received don't include the /api prefix
 */
const routes: Route[] = [
  { method: 'POST', pathPattern: /^\/signup$/, requiresAuth: false, handler: signup },
  { method: 'POST', pathPattern: /^\/token$/, requiresAuth: false, handler: issueToken },
  { method: 'POST', pathPattern: /^\/logout$/, requiresAuth: true, handler: logout },
  { method: 'POST', pathPattern: /^\/players\/upload-csv$/, requiresAuth: true, handler: uploadPlayersCsv },
  { method: 'POST', pathPattern: /^\/players$/, requiresAuth: true, handler: createPlayer },
  { method: 'GET', pathPattern: /^\/players$/, requiresAuth: true, handler: listPlayers },
  { method: 'GET', pathPattern: /^\/players\/[^/]+$/, requiresAuth: true, handler: getPlayerById },
  { method: 'PUT', pathPattern: /^\/players\/[^/]+$/, requiresAuth: true, handler: updatePlayer },
  { method: 'DELETE', pathPattern: /^\/players\/[^/]+$/, requiresAuth: true, handler: deletePlayer },
  { method: 'GET', pathPattern: /^\/search$/, requiresAuth: true, handler: searchPlayers },
];

/**
 * Find matching route for request
 */
function findRoute(method: string, path: string): Route | null {
  return routes.find(route =>
    route.method === method && route.pathPattern.test(path)
  ) || null;
}

async function dispatch(
  event: APIGatewayProxyEvent,
  route: Route,
  config: EnvironmentConfig,
  requestId: string,
  onAuthenticated: (user: User) => void
): Promise<APIGatewayProxyResult> {
  validateEnvironmentConfig(config);

  const tokenService = new TokenService({
    secret: await getSigningKey(config),
    algorithm: config.jwtAlgorithm,
    expiresInMinutes: config.accessTokenExpireMinutes,
  });

  return withClient(async (db) => {
    const services = buildServices(db, tokenService, config);
    const context: RouteContext = { event, services, config, requestId };

    if (!route.requiresAuth) {
      return route.handler(context);
    }

    const user = await authenticate(
      getHeader(event, 'authorization'),
      tokenService,
      services.userStore,
      requestId
    );
    onAuthenticated(user);
    return route.handler({ ...context, user });
  });
}

/**
 * Main Lambda handler
 *
 * This handler:
 * 1. Generates a unique request_id for tracing
 * 2. Routes requests by HTTP method and path
 * 3. Authenticates the bearer token on protected routes
 * 4. Handles errors and formats responses
 * 5. Logs every request to CloudWatch with structured logging
 *
 * @param event - API Gateway proxy event
 * @returns API Gateway proxy result
 */
export async function handler(
  event: APIGatewayProxyEvent
): Promise<APIGatewayProxyResult> {
  const startTime = Date.now();
  const requestId = generateRequestId();
  const method = event.httpMethod;
  const path = normalizePath(event.path);
  const config = loadEnvironmentConfig();
  let userId: number | undefined;

  let result: APIGatewayProxyResult;
  try {
    // Handle OPTIONS requests for CORS preflight
    if (method === 'OPTIONS') {
      result = successResponse({}, HttpStatus.OK, undefined, requestId);
    } else {
      const route = findRoute(method, path);
      result = route
        ? await dispatch(event, route, config, requestId, (user) => {
            userId = user.id;
          })
        : notFoundErrorResponse('Route not found', requestId);
    }
  } catch (error) {
    // Use centralized error handling middleware
    result = handleError(error, requestId);
  }

  logRequest({
    requestId,
    method,
    path,
    userId,
    statusCode: result.statusCode,
    latencyMs: Date.now() - startTime,
  });

  return applyCorsHeaders(result, getHeader(event, 'origin'), config.corsAllowedOrigins);
}
