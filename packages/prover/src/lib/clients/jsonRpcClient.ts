// SPDX-License-Identifier: Apache-2.0

import Axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import { BigNumber as BN } from 'bignumber.js';
import JSONBigInt from 'json-bigint';
import { Logger } from 'pino';

import constants from '../constants';
import { predefined } from '../errors/ProverError';
import { decodeResult, JsonRpcResponseSchema } from '../types/schemas';

export type JsonRpcParam = string | number | bigint | boolean | null | InstanceType<typeof BN>;

export interface JsonRpcClientOptions {
  url: string;

  /**
   * Overall timeout of one call, in milliseconds.
   */
  timeout: number;

  /**
   * Extra headers sent with every call, e.g. `Authorization`.
   */
  headers?: Record<string, string>;
}

/**
 * Minimal JSON-RPC 2.0 client over HTTP POST.
 *
 * Integers are read and written through json-bigint so 64-bit values survive
 * the round trip. Every failure surfaces as a ProverError whose kind tells
 * transport, protocol and decode problems apart.
 */
export class JsonRpcClient {
  /**
   * The logger used for logging all output from this class.
   * @private
   */
  private readonly logger: Logger;

  private readonly client: AxiosInstance;
  private readonly headers: Record<string, string>;
  private readonly timeout: number;
  private lastRequestId = 0;

  public readonly url: string;

  constructor(options: JsonRpcClientOptions, logger: Logger, client?: AxiosInstance) {
    this.url = options.url;
    this.timeout = options.timeout;
    this.headers = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
      ...options.headers,
    };
    this.logger = logger;
    this.client = client ?? this.createAxiosClient();
  }

  protected createAxiosClient(): AxiosInstance {
    return Axios.create({
      timeout: this.timeout,
      maxRedirects: constants.HTTP_MAX_REDIRECTS,
    });
  }

  /**
   * Sends `method` with `params` and returns the `result` member of the response.
   *
   * @throws ProverError TRANSPORT when no response arrives, PROTOCOL on a non-2xx status or an
   * error envelope, DECODE when the body is not a JSON-RPC response, TIMEOUT when `signal` aborts
   */
  async call(method: string, params: readonly JsonRpcParam[], signal?: AbortSignal): Promise<unknown> {
    const id = ++this.lastRequestId;
    const body = JSONBigInt.stringify({
      jsonrpc: constants.JSON_RPC_VERSION,
      id,
      method,
      params: params.map((param) => (typeof param === 'bigint' ? new BN(param.toString()) : param)),
    });

    if (this.logger.isLevelEnabled('debug')) {
      this.logger.debug(`Sending ${method} request to ${this.url}: ${body}`);
    }

    const axiosRequestConfig: AxiosRequestConfig = {
      headers: this.headers,
      timeout: this.timeout,
      signal,
      responseType: 'text',
      // keep the raw body; it is parsed below with json-bigint
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    };

    const start = Date.now();
    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.post<unknown>(this.url, body, axiosRequestConfig);
    } catch (error: unknown) {
      if (Axios.isCancel(error)) {
        throw predefined.REQUEST_ABORTED(method, this.url);
      }
      throw predefined.TRANSPORT_FAILURE(method, this.url, error);
    }

    const rawBody = typeof response.data === 'string' ? response.data : JSON.stringify(response.data ?? '');
    if (this.logger.isLevelEnabled('debug')) {
      this.logger.debug(
        `Received response from ${this.url}: method=${method}, status=${response.status}, duration=${
          Date.now() - start
        }ms, body=${rawBody}`,
      );
    }

    if (response.status < 200 || response.status >= 300) {
      throw predefined.HTTP_STATUS_FAILURE(method, this.url, response.status, rawBody);
    }

    let payload: unknown;
    try {
      payload = typeof response.data === 'string' ? JSONBigInt.parse(response.data) : response.data;
    } catch (error: unknown) {
      throw predefined.RESPONSE_DECODE_FAILED(method, 'response body is not valid JSON', error);
    }

    const envelope = decodeResult(JsonRpcResponseSchema, payload, method);
    if (envelope.error) {
      throw predefined.RPC_ERROR_RESPONSE(method, this.url, envelope.error.code, envelope.error.message);
    }

    return envelope.result ?? null;
  }
}
