// SPDX-License-Identifier: Apache-2.0

import { AxiosInstance } from 'axios';
import { BigNumber as BN } from 'bignumber.js';
import { setTimeout as delay } from 'node:timers/promises';
import { Logger } from 'pino';

import constants from '../constants';
import { isProverError, predefined } from '../errors/ProverError';
import { PROOF_STATUS_STATES, ProofStatus, WaitForProofOptions } from '../types/proof';
import { decodeResult, ProofStatusResultSchema } from '../types/schemas';
import { TransactionCoordinates } from '../types/transaction';
import { JsonRpcClient, JsonRpcParam } from './jsonRpcClient';

export interface ProofServiceClientOptions {
  apiKey: string;
  apiUrl: string;
  /** Per-call timeout in milliseconds. */
  requestTimeout: number;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

// Plain decimal notation with an optional exponent; hex and other prefixes are refused.
const DECIMAL_JOB_ID = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Client of the proof service: submits proof requests and polls for their completion.
 */
export class ProofServiceClient {
  /**
   * The logger used for logging all output from this class.
   * @private
   */
  private readonly logger: Logger;

  private readonly rpc: JsonRpcClient;
  private readonly sleep: Sleep;

  constructor(
    options: ProofServiceClientOptions,
    logger: Logger,
    overrides: { client?: AxiosInstance; sleep?: Sleep } = {},
  ) {
    this.logger = logger;
    this.sleep = overrides.sleep ?? defaultSleep;
    this.rpc = new JsonRpcClient(
      {
        url: options.apiUrl,
        timeout: options.requestTimeout,
        headers: { Authorization: `Bearer ${options.apiKey}` },
      },
      logger,
      overrides.client,
    );
  }

  /**
   * Submits a proof request for the log at `coordinates` and returns the job ID as a decimal string.
   */
  async requestProof(coordinates: TransactionCoordinates, signal?: AbortSignal): Promise<string> {
    const method = constants.RPC_METHOD.LOG_REQUEST_PROOF;
    const result = await this.submit(
      method,
      [coordinates.chainId, coordinates.blockNumber, coordinates.txIndex, coordinates.logIndex],
      signal,
    );

    let jobId: string;
    if (typeof result === 'string') {
      jobId = result;
    } else if (typeof result === 'number' && Number.isFinite(result)) {
      jobId = new BN(result).toFixed(0);
    } else if (BN.isBigNumber(result) && result.isFinite()) {
      jobId = result.toFixed(0);
    } else {
      throw predefined.RESPONSE_DECODE_FAILED(method, `unexpected result type: ${describeType(result)}`);
    }

    this.logger.debug(`Proof request submitted, job ID ${jobId}`);
    return jobId;
  }

  /**
   * Takes a single observation of the job's status.
   *
   * @throws ProverError `INVALID_JOB_ID` before any network call when `jobId` is not a decimal number within the range of a double
   */
  async getStatus(jobId: string, signal?: AbortSignal): Promise<ProofStatus> {
    const method = constants.RPC_METHOD.LOG_QUERY_PROOF;
    const trimmed = jobId.trim();
    if (!DECIMAL_JOB_ID.test(trimmed)) {
      throw predefined.INVALID_JOB_ID(jobId);
    }
    const numericJobId = new BN(trimmed);
    if (numericJobId.abs().isGreaterThan(Number.MAX_VALUE)) {
      throw predefined.INVALID_JOB_ID(jobId);
    }

    const result = await this.submit(method, [numericJobId], signal);
    const decoded = decodeResult(ProofStatusResultSchema, result, method);
    const state = PROOF_STATUS_STATES.get(decoded.status) ?? null;

    if (state === 'completed') {
      if (decoded.proof === undefined || decoded.proof === null) {
        throw predefined.RESPONSE_DECODE_FAILED(method, `job ${jobId} is ${decoded.status} but carries no proof`);
      }
      return { status: decoded.status, state, proof: decoded.proof };
    }

    if (state === 'failed') {
      return decoded.error
        ? { status: decoded.status, state, errorMessage: decoded.error }
        : { status: decoded.status, state };
    }

    return { status: decoded.status, state };
  }

  /**
   * Polls the job every `interval` ms until it completes, fails, or `maxAttempts` observations
   * have been taken. No sleep follows the last observation.
   */
  async waitForProof(jobId: string, options: WaitForProofOptions): Promise<ProofStatus> {
    const { maxAttempts, interval, signal } = options;
    if (!Number.isInteger(maxAttempts) || maxAttempts <= 0) {
      throw predefined.INVALID_POLLING_OPTIONS(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }
    if (!Number.isInteger(interval) || interval <= 0) {
      throw predefined.INVALID_POLLING_OPTIONS(`interval must be a positive integer, got ${interval}`);
    }

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (signal?.aborted) {
        throw predefined.POLLING_ABORTED(jobId, attempt - 1);
      }

      this.logger.debug(`Polling attempt ${attempt}/${maxAttempts} for job ${jobId}`);

      let status: ProofStatus;
      try {
        status = await this.getStatus(jobId, signal);
      } catch (error: unknown) {
        if (signal?.aborted) {
          throw predefined.POLLING_ABORTED(jobId, attempt);
        }
        throw error;
      }

      switch (status.state) {
        case 'completed':
          return status;
        case 'failed':
          throw predefined.PROOF_GENERATION_FAILED(status.errorMessage);
        case 'pending':
        case 'processing':
          break;
        default:
          throw predefined.UNKNOWN_JOB_STATUS(status.status);
      }

      if (attempt < maxAttempts) {
        this.logger.debug(`Job ${jobId} is ${status.status}, waiting ${interval}ms`);
        try {
          await this.sleep(interval, signal);
        } catch (error: unknown) {
          if (signal?.aborted) {
            throw predefined.POLLING_ABORTED(jobId, attempt);
          }
          throw error;
        }
      }
    }

    throw predefined.POLLING_TIMEOUT(maxAttempts);
  }

  private async submit(method: string, params: readonly JsonRpcParam[], signal?: AbortSignal): Promise<unknown> {
    try {
      return await this.rpc.call(method, params, signal);
    } catch (error: unknown) {
      if (isProverError(error) && error.isRemoteFailure()) {
        throw predefined.PROOF_SUBMISSION_FAILED(error);
      }
      throw error;
    }
  }
}

const describeType = (value: unknown): string => {
  if (value === null) {
    return 'null';
  }
  return Array.isArray(value) ? 'array' : typeof value;
};
