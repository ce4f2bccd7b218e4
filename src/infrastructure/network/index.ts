/**
 * @module layered-app-kit/infrastructure/network
 * @description Remote access: HTTP client and connectivity probes
 */

export { FetchHttpClient } from './HttpClient';
export type {
  IHttpClient,
  HttpMethod,
  HttpRequest,
  HttpResponse,
  RequestOptions,
  QueryParams,
  FetchFunction,
  FetchHttpClientOptions,
} from './HttpClient';

export { StaticNetworkInfo, DnsNetworkInfo } from './NetworkInfo';
export type { INetworkInfo, DnsNetworkInfoOptions } from './NetworkInfo';
