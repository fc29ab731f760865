// SPDX-License-Identifier: Apache-2.0

export * from './blockchainRpcClient';
export * from './jsonRpcClient';
export * from './proofServiceClient';
