/**
 * Plex HTTP Client
 *
 * Thin axios wrapper around the Plex Media Server API. Sends the token as the
 * X-Plex-Token header, asks for JSON, and converts transport failures into
 * CatalogRequestError. Response bodies are validated by the caller.
 */

import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../../middleware/logging.js';
import { CatalogRequestError, ErrorCode, OperationalError } from '../../errors/index.js';
import { getErrorMessage, toError } from '../../utils/errorHandling.js';
import { TIME } from '../../config/constants.js';

export interface PlexClientOptions {
  baseUrl: string;
  token: string;
  timeoutMs?: number;
  /** Pre-built axios instance, used by tests to plug in an in-process adapter */
  httpClient?: AxiosInstance;
}

type QueryParams = Record<string, string | number> | URLSearchParams;

/**
 * Remove the token from a URL before it is logged
 */
export function sanitizeUrlForLogs(raw: string): string {
  return raw.replace(/([?&]X-Plex-Token=)[^&]*/gi, '$1REDACTED');
}

export class PlexClient {
  private readonly client: AxiosInstance;
  readonly baseUrl: string;

  constructor(options: PlexClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.client =
      options.httpClient ??
      axios.create({
        baseURL: this.baseUrl,
        timeout: options.timeoutMs ?? TIME.THIRTY_SECONDS,
      });

    this.client.defaults.baseURL = this.baseUrl;
    this.client.defaults.headers.common['X-Plex-Token'] = options.token;
    this.client.defaults.headers.common['Accept'] = 'application/json';
  }

  /**
   * GET a path and validate the JSON body
   */
  async get<T>(path: string, schema: ZodType<T, ZodTypeDef, unknown>, params?: QueryParams): Promise<T> {
    const data = await this.request({ method: 'GET', url: path, params });
    const parsed = schema.safeParse(data);

    if (!parsed.success) {
      throw new OperationalError(
        `Unexpected Plex response for GET ${path}: ${parsed.error.issues[0]?.message ?? 'invalid body'}`,
        ErrorCode.CATALOG_INVALID_RESPONSE,
        false,
        { service: 'plex', operation: 'get', metadata: { path } },
        parsed.error
      );
    }

    return parsed.data;
  }

  async put(path: string, params?: QueryParams): Promise<void> {
    await this.request({ method: 'PUT', url: path, params });
  }

  async post(path: string, body: Buffer, params?: QueryParams): Promise<void> {
    await this.request({
      method: 'POST',
      url: path,
      params,
      data: body,
      headers: { 'Content-Type': 'application/octet-stream' },
    });
  }

  private async request(config: AxiosRequestConfig): Promise<unknown> {
    const method = config.method ?? 'GET';
    const url = sanitizeUrlForLogs(`${this.baseUrl}${config.url ?? ''}`);

    logger.debug(`Plex ${method} ${url}`, {
      params: config.params instanceof URLSearchParams ? config.params.toString() : config.params,
    });

    try {
      const response = await this.client.request<unknown>(config);
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        throw new CatalogRequestError(
          status === undefined
            ? `Plex ${method} ${url} failed: ${error.message}`
            : `Plex ${method} ${url} failed with HTTP ${status}`,
          method,
          url,
          status,
          undefined,
          error
        );
      }

      throw new CatalogRequestError(
        `Plex ${method} ${url} failed: ${getErrorMessage(error)}`,
        method,
        url,
        undefined,
        undefined,
        toError(error)
      );
    }
  }
}
