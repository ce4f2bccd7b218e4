/**
 * @fileoverview HTTP client for remote data sources
 *
 * ## Architectural Layer: DATA
 *
 * Remote data sources depend on {@link IHttpClient} and receive decoded JSON
 * bodies. Every transport problem is thrown as a data exception:
 *
 * | situation                     | thrown                 |
 * |-------------------------------|------------------------|
 * | non-2xx status                | `ServerException`      |
 * | no answer within `timeoutMs`  | `TimeoutException`     |
 * | connection could not be made  | `NetworkException`     |
 * | JSON body that does not parse | `FormatException`      |
 */

import { consoleLogger, ILogger } from '../../application/logging';
import { errorMessage } from '../data/FailureMapper';
import {
  FormatException,
  NetworkException,
  ServerException,
  TimeoutException,
} from '../data/exceptions';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface HttpRequest {
  method: HttpMethod;

  /** Appended to the client's base URL */
  path: string;

  query?: QueryParams;
  headers?: Record<string, string>;

  /** Sent as JSON */
  body?: unknown;

  /** Overrides the client's timeout */
  timeoutMs?: number;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: unknown;
}

export type RequestOptions = Omit<HttpRequest, 'method' | 'path' | 'body'>;

export interface IHttpClient {
  request(request: HttpRequest): Promise<HttpResponse>;
  get(path: string, options?: RequestOptions): Promise<unknown>;
  post(path: string, body: unknown, options?: RequestOptions): Promise<unknown>;
  put(path: string, body: unknown, options?: RequestOptions): Promise<unknown>;
  delete(path: string, options?: RequestOptions): Promise<unknown>;
}

export type FetchFunction = (input: string, init: RequestInit) => Promise<Response>;

export interface FetchHttpClientOptions {
  baseUrl: string;

  /** Sent with every request */
  headers?: Record<string, string>;

  /** Default: 10000 */
  timeoutMs?: number;

  /** Default: the global `fetch` */
  fetch?: FetchFunction;

  logger?: ILogger;
}

/**
 * {@link IHttpClient} over the WHATWG `fetch` API.
 */
export class FetchHttpClient implements IHttpClient {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFunction;
  private readonly logger: ILogger;

  constructor(options: FetchHttpClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.headers = { accept: 'application/json', ...options.headers };
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? consoleLogger;
  }

  async get(path: string, options: RequestOptions = {}): Promise<unknown> {
    return (await this.request({ ...options, method: 'GET', path })).body;
  }

  async post(path: string, body: unknown, options: RequestOptions = {}): Promise<unknown> {
    return (await this.request({ ...options, method: 'POST', path, body })).body;
  }

  async put(path: string, body: unknown, options: RequestOptions = {}): Promise<unknown> {
    return (await this.request({ ...options, method: 'PUT', path, body })).body;
  }

  async delete(path: string, options: RequestOptions = {}): Promise<unknown> {
    return (await this.request({ ...options, method: 'DELETE', path })).body;
  }

  async request(request: HttpRequest): Promise<HttpResponse> {
    const url = this.buildUrl(request.path, request.query);
    const timeoutMs = request.timeoutMs ?? this.timeoutMs;
    const headers: Record<string, string> = { ...this.headers, ...request.headers };
    if (request.body !== undefined) {
      headers['content-type'] ??= 'application/json';
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    let response: Response;
    let text: string;
    try {
      this.logger.debug(`${request.method} ${url}`);
      response = await this.fetchFn(url, {
        method: request.method,
        headers,
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
      });
      text = await response.text();
    } catch (error) {
      if (controller.signal.aborted) {
        throw new TimeoutException(
          `${request.method} ${url} timed out after ${timeoutMs}ms`,
          timeoutMs,
        );
      }
      throw new NetworkException(`${request.method} ${url} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    } finally {
      clearTimeout(timer);
    }

    const responseHeaders: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      responseHeaders[key] = value;
    });

    if (!response.ok) {
      throw new ServerException(
        response.status,
        `${request.method} ${url} responded with ${response.status}`,
        this.parseErrorBody(text),
      );
    }

    return {
      status: response.status,
      headers: responseHeaders,
      body: this.parseBody(text, response.headers.get('content-type'), url),
    };
  }

  private buildUrl(path: string, query?: QueryParams): string {
    const url = `${this.baseUrl}/${path.replace(/^\/+/, '')}`;
    if (!query) return url;

    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        params.append(key, String(value));
      }
    }
    const search = params.toString();
    return search ? `${url}?${search}` : url;
  }

  private parseBody(text: string, contentType: string | null, url: string): unknown {
    if (text === '') return undefined;
    if (contentType !== null && !contentType.includes('json')) return text;

    try {
      const body: unknown = JSON.parse(text);
      return body;
    } catch (error) {
      throw new FormatException(`Response from ${url} is not valid JSON`, {}, { cause: error });
    }
  }

  /** Error bodies are informational; unparsable ones are kept as text. */
  private parseErrorBody(text: string): unknown {
    if (text === '') return undefined;
    try {
      const body: unknown = JSON.parse(text);
      return body;
    } catch {
      return text;
    }
  }
}
