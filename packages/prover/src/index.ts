// SPDX-License-Identifier: Apache-2.0

export { BlockchainRpcClient, JsonRpcClient, ProofServiceClient } from './lib/clients';
export type {
  BlockchainRpcClientOptions,
  JsonRpcClientOptions,
  JsonRpcParam,
  ProofServiceClientOptions,
  Sleep,
} from './lib/clients';
export { ErrorCode, ErrorKind, isProverError, predefined, ProverError } from './lib/errors/ProverError';
export type { ProverErrorDetails } from './lib/errors/ProverError';
export { BlockchainResolver } from './lib/services/blockchainResolver';
export type { BlockchainRpcClientFactory, ResolveOptions } from './lib/services/blockchainResolver';
export { createTransactionCoordinates, PROOF_STATUS_STATES } from './lib/types';
export type {
  LogEntry,
  ProofState,
  ProofStatus,
  Transaction,
  TransactionCoordinates,
  TransactionReceipt,
  WaitForProofOptions,
} from './lib/types';
export { hexToUint64, parseDecimalUint } from './formatters';
