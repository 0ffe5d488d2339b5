// SPDX-License-Identifier: Apache-2.0

import got, {HTTPError, RequestError, type Got, type Response} from 'got';
import {StatusCodes} from 'http-status-codes';
import {type Duration} from '../../../core/time/duration.js';
import {CloudFoundryApiError} from '../errors/cloud-foundry-api-error.js';
import {ResourceNotFoundError} from '../errors/resource-not-found-error.js';
import {SslHandshakeError} from '../errors/ssl-handshake-error.js';
import {type ResourceOperation} from '../resources/resource-operation.js';
import {type ResourceType} from '../resources/resource-type.js';

export type SearchParameters = Record<string, string | number | boolean | undefined>;

/**
 * Identifies the resource a request is about, so failures can be reported against it.
 */
export interface RequestContext {
  readonly operation: ResourceOperation;
  readonly type: ResourceType;
  readonly name: string;
}

export interface HttpOptions {
  readonly baseUrl: string;
  readonly accessToken: string;
  readonly skipSslValidation: boolean;
  readonly requestTimeout: Duration;
}

interface ErrorBody {
  errors?: {code?: number; title?: string; detail?: string}[];
  description?: string;
}

const SSL_ERROR_CODES: ReadonlySet<string> = new Set<string>(['EPROTO', 'ECONNRESET']);

const CERTIFICATE_ERROR_CODES: ReadonlySet<string> = new Set<string>([
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'CERT_UNTRUSTED',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'ERR_TLS_CERT_ALTNAME_INVALID',
]);

/**
 * Thin JSON layer over got. Every failure is translated into a CloudFoundryApiError: 404 into
 * ResourceNotFoundError, a broken TLS session into SslHandshakeError.
 */
export class CloudFoundryHttp {
  public constructor(private readonly http: Got) {}

  public static create(options: HttpOptions): CloudFoundryHttp {
    const headers: Record<string, string> = {accept: 'application/json'};
    if (options.accessToken.length > 0) {
      headers.authorization = `bearer ${options.accessToken}`;
    }

    return new CloudFoundryHttp(
      got.extend({
        prefixUrl: options.baseUrl,
        headers,
        https: {rejectUnauthorized: !options.skipSslValidation},
        timeout: {request: options.requestTimeout.toMillis()},
        retry: {limit: 0},
      }),
    );
  }

  public async getJson<T>(path: string, context: RequestContext, searchParameters?: SearchParameters): Promise<T> {
    try {
      return await this.http.get(path, {searchParams: CloudFoundryHttp.compact(searchParameters)}).json<T>();
    } catch (error) {
      throw CloudFoundryHttp.translate(error, context);
    }
  }

  public async postJson<T>(
    path: string,
    body: object | undefined,
    context: RequestContext,
    searchParameters?: SearchParameters,
  ): Promise<T> {
    try {
      return await this.http
        .post(path, {json: body ?? {}, searchParams: CloudFoundryHttp.compact(searchParameters)})
        .json<T>();
    } catch (error) {
      throw CloudFoundryHttp.translate(error, context);
    }
  }

  public async patchJson<T>(path: string, body: object, context: RequestContext): Promise<T> {
    try {
      return await this.http.patch(path, {json: body}).json<T>();
    } catch (error) {
      throw CloudFoundryHttp.translate(error, context);
    }
  }

  /**
   * Posts a non JSON body and returns the raw response, for endpoints that answer with a job location.
   */
  public async postBody(
    path: string,
    body: string | FormData,
    context: RequestContext,
    contentType?: string,
  ): Promise<Response<string>> {
    try {
      return await this.http.post(path, {
        body,
        headers: contentType ? {'content-type': contentType} : {},
      });
    } catch (error) {
      throw CloudFoundryHttp.translate(error, context);
    }
  }

  /**
   * @returns the location of the deletion job, when the platform deletes asynchronously
   */
  public async delete(path: string, context: RequestContext): Promise<string | undefined> {
    try {
      const response: Response<string> = await this.http.delete(path);
      return response.statusCode === StatusCodes.ACCEPTED ? response.headers.location : undefined;
    } catch (error) {
      throw CloudFoundryHttp.translate(error, context);
    }
  }

  /**
   * Converts an absolute job location into a path relative to the base url.
   */
  public static relativePath(location: string): string {
    const url: URL = new URL(location, 'http://localhost');
    return url.pathname.replace(/^\/+/, '') + url.search;
  }

  private static compact(searchParameters?: SearchParameters): Record<string, string | number | boolean> {
    const result: Record<string, string | number | boolean> = {};
    for (const [key, value] of Object.entries(searchParameters ?? {})) {
      if (value !== undefined) {
        result[key] = value;
      }
    }
    return result;
  }

  private static translate(error: unknown, context: RequestContext): unknown {
    if (error instanceof HTTPError) {
      const statusCode: number = error.response.statusCode;
      if (statusCode === StatusCodes.NOT_FOUND) {
        return new ResourceNotFoundError(context.operation, context.type, context.name, error);
      }
      return new CloudFoundryApiError(
        `failed to ${context.operation} ${context.type} '${context.name}': HTTP ${statusCode}${CloudFoundryHttp.describe(
          error.response.body,
        )}`,
        statusCode,
        error,
        {...context},
      );
    }

    if (error instanceof RequestError) {
      if (CloudFoundryHttp.isSslFailure(error)) {
        return new SslHandshakeError(
          `TLS failure during ${context.operation} ${context.type} '${context.name}': ${error.message}`,
          error,
          {...context, code: error.code},
        );
      }
      return new CloudFoundryApiError(
        `error occurred during ${context.operation} ${context.type} '${context.name}': ${error.message}`,
        undefined,
        error,
        {...context, code: error.code},
      );
    }

    return error;
  }

  private static isSslFailure(error: RequestError): boolean {
    const code: string = error.code ?? '';
    return (
      code.startsWith('ERR_SSL_') ||
      CERTIFICATE_ERROR_CODES.has(code) ||
      (SSL_ERROR_CODES.has(code) && /ssl|tls|handshake/i.test(error.message))
    );
  }

  private static describe(body: unknown): string {
    if (typeof body !== 'string' || body.length === 0) {
      return '';
    }

    try {
      const parsed: ErrorBody = JSON.parse(body);
      const details: string[] = (parsed.errors ?? [])
        .map((item: {title?: string; detail?: string}): string => item.detail ?? item.title ?? '')
        .filter((detail: string): boolean => detail.length > 0);
      if (details.length > 0) {
        return ` (${details.join('; ')})`;
      }
      return parsed.description ? ` (${parsed.description})` : '';
    } catch {
      return ` (${body.slice(0, 200)})`;
    }
  }
}
