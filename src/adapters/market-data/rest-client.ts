/**
 * REST Client for market data APIs
 *
 * Provides single GET requests with:
 * - A bounded timeout (AbortController) covering headers and body
 * - Mapping of network, HTTP and body failures to ProviderError
 * - Response header capture for quota tracking
 *
 * Requests are never retried here; retry policy belongs to the caller.
 */

import { ProviderError } from '../../types/market-data-error';
import { Logger, redactUrl } from '../../utils/logger';

export interface RestClientConfig {
  sourceId: string;
  baseUrl: string;
  timeoutMs: number;
  logger: Logger;
  /** Headers sent with every request (e.g. API key headers) */
  headers?: Record<string, string>;
  /** Pulls the upstream's own error message out of a failed response body */
  describeError?: (body: unknown) => string | undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Response from a REST request
 */
export interface RestResponse {
  data: unknown;
  status: number;
  headers: Record<string, string>;
  latencyMs: number;
}

export class RestClient {
  private readonly config: RestClientConfig;

  constructor(config: RestClientConfig) {
    this.config = config;
  }

  /**
   * Execute a GET request and parse the JSON body
   *
   * @throws ProviderError TIMEOUT, NOT_FOUND (HTTP 404), UPSTREAM_FAILURE
   * (network error or other non-2xx) or MALFORMED_PAYLOAD (non-JSON body)
   */
  async get(path: string, params: Record<string, string> = {}): Promise<RestResponse> {
    const url = this.buildUrl(path, params);
    const startTime = Date.now();

    this.config.logger.debug(`GET ${redactUrl(url)}`);

    // The deadline covers the body as well as the headers
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: { Accept: 'application/json', ...this.config.headers },
        signal: controller.signal
      });

      const headers = this.extractHeaders(response);
      this.config.logger.debug(`${response.status} from ${this.config.sourceId} in ${Date.now() - startTime}ms`);

      if (!response.ok) {
        throw await this.createErrorFromResponse(response, path);
      }

      const data = await this.parseJson(response);
      return { data, status: response.status, headers, latencyMs: Date.now() - startTime };
    } catch (error) {
      throw this.toProviderError(error, controller.signal);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private toProviderError(error: unknown, signal: AbortSignal): ProviderError {
    if (error instanceof ProviderError) {
      return error;
    }
    if (signal.aborted) {
      return new ProviderError(
        'TIMEOUT',
        `Request to ${this.config.sourceId} timed out after ${this.config.timeoutMs}ms`,
        this.config.sourceId,
        undefined,
        error
      );
    }
    return new ProviderError(
      'UPSTREAM_FAILURE',
      `Request to ${this.config.sourceId} failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
      this.config.sourceId,
      undefined,
      error
    );
  }

  /**
   * Create ProviderError from a non-2xx response
   */
  private async createErrorFromResponse(response: Response, path: string): Promise<ProviderError> {
    const detail = await this.readErrorDetail(response);
    const suffix = detail ? `: ${detail}` : '';

    if (response.status === 404) {
      return new ProviderError('NOT_FOUND', `Resource not found: ${path}${suffix}`, this.config.sourceId, 404);
    }
    return new ProviderError(
      'UPSTREAM_FAILURE',
      `${this.config.sourceId} returned HTTP ${response.status}${suffix}`,
      this.config.sourceId,
      response.status
    );
  }

  private async readErrorDetail(response: Response): Promise<string | undefined> {
    if (!this.config.describeError) return undefined;
    const text = await response.text();
    try {
      return this.config.describeError(JSON.parse(text));
    } catch (error) {
      this.config.logger.debug(`Unreadable error body from ${this.config.sourceId}`, error);
      return undefined;
    }
  }

  /**
   * Build full URL from base URL, path, and query parameters
   */
  private buildUrl(path: string, params: Record<string, string>): string {
    const baseUrl = this.config.baseUrl.replace(/\/$/, '');
    const normalizedPath = path.startsWith('/') ? path : `/${path}`;

    let url = `${baseUrl}${normalizedPath}`;
    if (Object.keys(params).length > 0) {
      url += `?${new URLSearchParams(params).toString()}`;
    }
    return url;
  }

  private async parseJson(response: Response): Promise<unknown> {
    const text = await response.text();
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new ProviderError(
        'MALFORMED_PAYLOAD',
        `${this.config.sourceId} returned a body that is not JSON`,
        this.config.sourceId,
        response.status,
        error
      );
    }
  }

  /**
   * Response headers with lower-cased names
   */
  private extractHeaders(response: Response): Record<string, string> {
    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key.toLowerCase()] = value;
    });
    return headers;
  }
}
