// SPDX-License-Identifier: Apache-2.0

export enum ErrorKind {
  TRANSPORT = 'TRANSPORT',
  PROTOCOL = 'PROTOCOL',
  DECODE = 'DECODE',
  VALIDATION = 'VALIDATION',
  DOMAIN = 'DOMAIN',
  TIMEOUT = 'TIMEOUT',
}

export enum ErrorCode {
  REMOTE_CALL_FAILED = 'REMOTE_CALL_FAILED',
  REQUEST_ABORTED = 'REQUEST_ABORTED',
  RESPONSE_DECODE_FAILED = 'RESPONSE_DECODE_FAILED',
  INVALID_HEX = 'INVALID_HEX',
  PROOF_SUBMISSION_FAILED = 'PROOF_SUBMISSION_FAILED',
  INVALID_JOB_ID = 'INVALID_JOB_ID',
  INVALID_NUMERIC_INPUT = 'INVALID_NUMERIC_INPUT',
  INVALID_POLLING_OPTIONS = 'INVALID_POLLING_OPTIONS',
  LOG_INDEX_OUT_OF_RANGE = 'LOG_INDEX_OUT_OF_RANGE',
  MISSING_ARGUMENT = 'MISSING_ARGUMENT',
  VALUE_OVERFLOW = 'VALUE_OVERFLOW',
  NO_LOGS = 'NO_LOGS',
  NO_MATCHING_LOG = 'NO_MATCHING_LOG',
  MISSING_CHAIN_ID = 'MISSING_CHAIN_ID',
  TRANSACTION_NOT_FOUND = 'TRANSACTION_NOT_FOUND',
  RECEIPT_NOT_FOUND = 'RECEIPT_NOT_FOUND',
  PROOF_GENERATION_FAILED = 'PROOF_GENERATION_FAILED',
  UNKNOWN_JOB_STATUS = 'UNKNOWN_JOB_STATUS',
  POLLING_TIMEOUT = 'POLLING_TIMEOUT',
  POLLING_ABORTED = 'POLLING_ABORTED',
}

export interface ProverErrorDetails {
  httpStatus?: number;
  rpcCode?: number;
  endpoint?: string;
  operation?: string;
}

export class ProverError extends Error {
  public readonly kind: ErrorKind;
  public readonly code: ErrorCode;
  public readonly details: ProverErrorDetails;

  constructor(args: {
    kind: ErrorKind;
    code: ErrorCode;
    message: string;
    details?: ProverErrorDetails;
    cause?: unknown;
  }) {
    super(args.message, args.cause === undefined ? undefined : { cause: args.cause });
    this.name = 'ProverError';
    this.kind = args.kind;
    this.code = args.code;
    this.details = args.details ?? {};
    Object.setPrototypeOf(this, ProverError.prototype);
  }

  public isRemoteFailure(): boolean {
    return this.kind === ErrorKind.TRANSPORT || this.kind === ErrorKind.PROTOCOL;
  }
}

export const isProverError = (error: unknown): error is ProverError => error instanceof ProverError;

const describeCall = (operation: string, endpoint: string) => `${operation} request to ${endpoint}`;

export const predefined = {
  TRANSPORT_FAILURE: (operation: string, endpoint: string, cause: unknown) =>
    new ProverError({
      kind: ErrorKind.TRANSPORT,
      code: ErrorCode.REMOTE_CALL_FAILED,
      message: `${describeCall(operation, endpoint)} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      details: { operation, endpoint },
      cause,
    }),
  HTTP_STATUS_FAILURE: (operation: string, endpoint: string, httpStatus: number, body: string) =>
    new ProverError({
      kind: ErrorKind.PROTOCOL,
      code: ErrorCode.REMOTE_CALL_FAILED,
      message: `${describeCall(operation, endpoint)} failed with status ${httpStatus}: ${body}`,
      details: { operation, endpoint, httpStatus },
    }),
  RPC_ERROR_RESPONSE: (operation: string, endpoint: string, rpcCode: number, rpcMessage: string) =>
    new ProverError({
      kind: ErrorKind.PROTOCOL,
      code: ErrorCode.REMOTE_CALL_FAILED,
      message: `${describeCall(operation, endpoint)} returned error ${rpcCode}: ${rpcMessage}`,
      details: { operation, endpoint, rpcCode },
    }),
  REQUEST_ABORTED: (operation: string, endpoint: string) =>
    new ProverError({
      kind: ErrorKind.TIMEOUT,
      code: ErrorCode.REQUEST_ABORTED,
      message: `${describeCall(operation, endpoint)} was aborted`,
      details: { operation, endpoint },
    }),
  RESPONSE_DECODE_FAILED: (operation: string, reason: string, cause?: unknown) =>
    new ProverError({
      kind: ErrorKind.DECODE,
      code: ErrorCode.RESPONSE_DECODE_FAILED,
      message: `failed to decode ${operation} response: ${reason}`,
      details: { operation },
      cause,
    }),
  INVALID_HEX: (value: string) =>
    new ProverError({
      kind: ErrorKind.DECODE,
      code: ErrorCode.INVALID_HEX,
      message: `invalid hex value: ${value}`,
    }),
  PROOF_SUBMISSION_FAILED: (cause: ProverError) =>
    new ProverError({
      kind: cause.kind,
      code: ErrorCode.PROOF_SUBMISSION_FAILED,
      message: `proof service call failed: ${cause.message}`,
      details: cause.details,
      cause,
    }),
  INVALID_JOB_ID: (jobId: string) =>
    new ProverError({
      kind: ErrorKind.VALIDATION,
      code: ErrorCode.INVALID_JOB_ID,
      message: `invalid job ID: ${jobId}`,
    }),
  INVALID_NUMERIC_INPUT: (name: string, value: string) =>
    new ProverError({
      kind: ErrorKind.VALIDATION,
      code: ErrorCode.INVALID_NUMERIC_INPUT,
      message: `invalid ${name}: ${value}`,
    }),
  INVALID_POLLING_OPTIONS: (reason: string) =>
    new ProverError({
      kind: ErrorKind.VALIDATION,
      code: ErrorCode.INVALID_POLLING_OPTIONS,
      message: `invalid polling options: ${reason}`,
    }),
  LOG_INDEX_OUT_OF_RANGE: (logIndex: number, logCount: number) =>
    new ProverError({
      kind: ErrorKind.VALIDATION,
      code: ErrorCode.LOG_INDEX_OUT_OF_RANGE,
      message: `log index ${logIndex} is out of range, transaction has ${logCount} logs`,
    }),
  MISSING_ARGUMENT: (message: string) =>
    new ProverError({
      kind: ErrorKind.VALIDATION,
      code: ErrorCode.MISSING_ARGUMENT,
      message,
    }),
  VALUE_OVERFLOW: (value: string, bits: number) =>
    new ProverError({
      kind: ErrorKind.VALIDATION,
      code: ErrorCode.VALUE_OVERFLOW,
      message: `value too large for uint${bits}: ${value}`,
    }),
  NO_LOGS: () =>
    new ProverError({
      kind: ErrorKind.DOMAIN,
      code: ErrorCode.NO_LOGS,
      message: 'no logs found in transaction receipt',
    }),
  NO_MATCHING_LOG: (eventSignature: string) =>
    new ProverError({
      kind: ErrorKind.DOMAIN,
      code: ErrorCode.NO_MATCHING_LOG,
      message: `no log found with event signature: ${eventSignature}`,
    }),
  MISSING_CHAIN_ID: () =>
    new ProverError({
      kind: ErrorKind.DOMAIN,
      code: ErrorCode.MISSING_CHAIN_ID,
      message: 'chain ID not found in transaction, please provide it with --chain-id flag',
    }),
  TRANSACTION_NOT_FOUND: (hash: string) =>
    new ProverError({
      kind: ErrorKind.DOMAIN,
      code: ErrorCode.TRANSACTION_NOT_FOUND,
      message: `transaction ${hash} not found`,
    }),
  RECEIPT_NOT_FOUND: (hash: string) =>
    new ProverError({
      kind: ErrorKind.DOMAIN,
      code: ErrorCode.RECEIPT_NOT_FOUND,
      message: `receipt for transaction ${hash} not found`,
    }),
  PROOF_GENERATION_FAILED: (remoteMessage?: string) =>
    new ProverError({
      kind: ErrorKind.DOMAIN,
      code: ErrorCode.PROOF_GENERATION_FAILED,
      message: `proof generation failed: ${remoteMessage || 'no error message provided'}`,
    }),
  UNKNOWN_JOB_STATUS: (status: string) =>
    new ProverError({
      kind: ErrorKind.DOMAIN,
      code: ErrorCode.UNKNOWN_JOB_STATUS,
      message: `unknown job status: ${status}`,
    }),
  POLLING_TIMEOUT: (maxAttempts: number) =>
    new ProverError({
      kind: ErrorKind.TIMEOUT,
      code: ErrorCode.POLLING_TIMEOUT,
      message: `max polling attempts (${maxAttempts}) reached without completion`,
    }),
  POLLING_ABORTED: (jobId: string, attempts: number) =>
    new ProverError({
      kind: ErrorKind.TIMEOUT,
      code: ErrorCode.POLLING_ABORTED,
      message: `waiting for job ${jobId} was cancelled after ${attempts} attempt(s)`,
    }),
};
