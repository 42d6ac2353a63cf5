import axios, { type AxiosInstance } from 'axios';
import {
  GHOST_API_VERSION,
  SUPPORTED_METHODS,
  type ApiRequest,
  type GhostConnectionConfig,
  type HttpMethod,
  type JsonObject,
} from '../types/ghost.types.js';
import { fail, ok, type GhostApiError, type Result } from '../types/errors.types.js';
import { parseAdminApiKey, signAdminToken, type SignerError } from './token-signer.service.js';
import type { StructuredLogger } from './logger.service.js';
import type { MetricsService } from './metrics.service.js';

/**
 * Ghost Request Dispatcher
 *
 * Sends one authenticated request to the Ghost Admin API and folds every
 * outcome into an ApiResult. Nothing is thrown to the caller, nothing is
 * retried and redirects are not followed: one call, one HTTP request (or
 * none, when the method or the key is rejected up front).
 */

export const REQUEST_TIMEOUT_MS = 30000;

export type ApiResult<T = JsonObject> = Result<T, GhostApiError>;

export interface GhostDispatcherDeps {
  config: GhostConnectionConfig;
  logger: StructuredLogger;
  http?: AxiosInstance;
  metrics?: MetricsService;
  /** Clock used for token timestamps (ms) */
  now?: () => number;
}

/**
 * Plain response used by the connection diagnostic
 */
export interface RawResponse {
  status: number;
  url: string;
  text: string;
}

export function isSupportedMethod(method: string): method is HttpMethod {
  return SUPPORTED_METHODS.some((supported) => supported === method);
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toText(data: unknown): string {
  if (data === undefined || data === null) {
    return '';
  }
  return typeof data === 'string' ? data : JSON.stringify(data);
}

export class GhostDispatcher {
  private config: GhostConnectionConfig;
  private logger: StructuredLogger;
  private http: AxiosInstance;
  private metrics?: MetricsService;
  private now: () => number;

  constructor(deps: GhostDispatcherDeps) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.http = deps.http ?? axios.create();
    this.metrics = deps.metrics;
    this.now = deps.now ?? Date.now;
  }

  /**
   * {baseUrl}/ghost/api/{version}/admin/{endpoint}
   */
  adminUrl(endpoint: string): string {
    return `${this.config.baseUrl}/ghost/api/${GHOST_API_VERSION}/admin/${endpoint}`;
  }

  /**
   * {baseUrl}/ghost/
   */
  siteRootUrl(): string {
    return `${this.config.baseUrl}/ghost/`;
  }

  /**
   * Whether the configured admin key has the ID:SECRET shape
   */
  hasWellFormedKey(): boolean {
    return parseAdminApiKey(this.config.adminApiKey).success;
  }

  /**
   * Signs a fresh token and returns the headers every admin request carries
   */
  buildAuthHeaders(): Result<Record<string, string>, SignerError> {
    const token = signAdminToken(this.config.adminApiKey, this.now());
    if (!token.success) {
      return token;
    }

    return ok({
      Authorization: `Ghost ${token.data}`,
      'Content-Type': 'application/json',
      'Accept-Version': GHOST_API_VERSION,
    });
  }

  /**
   * Sends an authenticated request to an admin endpoint
   */
  async dispatch(request: ApiRequest): Promise<ApiResult> {
    const method = request.method.toUpperCase();
    const url = this.adminUrl(request.endpoint);

    if (!isSupportedMethod(method)) {
      return this.reject(method, url, {
        kind: 'UnsupportedMethod',
        message: `Unsupported method: ${request.method}`,
        method: request.method,
      });
    }

    const headers = this.buildAuthHeaders();
    if (!headers.success) {
      return this.reject(method, url, headers.error);
    }

    this.logger.ghostRequest({ method, url, token: headers.data.Authorization.slice('Ghost '.length) });
    const startTime = Date.now();

    try {
      const response = await this.http.request<unknown>({
        url,
        method,
        headers: headers.data,
        data: method === 'GET' ? undefined : JSON.stringify(request.body ?? {}),
        timeout: REQUEST_TIMEOUT_MS,
        maxRedirects: 0,
        responseType: 'text',
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
      });

      const duration = (Date.now() - startTime) / 1000;
      this.metrics?.recordGhostRequest(method, response.status, duration);
      const responseText = toText(response.data);

      if (response.status < 200 || response.status >= 300) {
        return this.reject(
          method,
          url,
          {
            kind: 'HttpStatusError',
            message: `${method} ${url} failed with status ${response.status}: ${responseText}`,
            statusCode: response.status,
            url,
            headers: { ...headers.data },
            responseText,
          },
          duration
        );
      }

      this.logger.ghostResponse({ method, url, http_status: response.status, duration });
      return this.parseBody(method, url, responseText);
    } catch (error) {
      const duration = (Date.now() - startTime) / 1000;
      this.metrics?.recordGhostRequest(method, 0, duration);

      return this.reject(
        method,
        url,
        {
          kind: 'TransportError',
          message: error instanceof Error ? error.message : String(error),
        },
        duration
      );
    }
  }

  /**
   * Plain GET that reports whatever status came back. Transport errors are
   * thrown; callers wrap this in their own error handling.
   */
  async probe(url: string, headers?: Record<string, string>): Promise<RawResponse> {
    const response = await this.http.request<unknown>({
      url,
      method: 'GET',
      headers,
      timeout: REQUEST_TIMEOUT_MS,
      maxRedirects: 0,
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    });

    return { status: response.status, url, text: toText(response.data) };
  }

  private parseBody(method: string, url: string, responseText: string): ApiResult {
    if (!responseText) {
      return ok({});
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(responseText);
    } catch {
      return this.reject(method, url, {
        kind: 'ResponseShapeError',
        message: 'Response body is not valid JSON',
        response: responseText,
      });
    }

    if (!isJsonObject(parsed)) {
      return this.reject(method, url, {
        kind: 'ResponseShapeError',
        message: 'Response body is not a JSON object',
        response: responseText,
      });
    }

    return ok(parsed);
  }

  private reject(method: string, url: string, error: GhostApiError, duration?: number): ApiResult {
    this.logger.ghostRequestFailed({
      method,
      url,
      http_status: error.kind === 'HttpStatusError' ? error.statusCode : undefined,
      error_kind: error.kind,
      error: error.message,
      duration,
    });
    return fail(error);
  }
}
