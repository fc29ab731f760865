// SPDX-License-Identifier: Apache-2.0

import {
  BlockchainResolver,
  createTransactionCoordinates,
  parseDecimalUint,
  predefined,
  ProofServiceClient,
  TransactionCoordinates,
} from '@log-prover/prover';

import type { RequestArguments } from '../cli';
import { renderProof } from '../output';
import type { CommandContext } from './context';

export interface RequestCommandServices {
  proofService: ProofServiceClient;
  resolver: BlockchainResolver;
}

const resolveCoordinates = async (
  args: RequestArguments,
  context: CommandContext,
  resolver: BlockchainResolver,
): Promise<TransactionCoordinates> => {
  if (args.txHash) {
    const rpcUrl = context.config.rpcUrl;
    if (!rpcUrl) {
      throw predefined.MISSING_ARGUMENT('RPC URL is required when using transaction hash');
    }

    return resolver.resolve(args.txHash, rpcUrl, {
      logIndex: args.logIndex === undefined ? undefined : Number(parseDecimalUint('log index', args.logIndex, 32)),
      eventSignature: args.eventSignature,
      chainId: args.chainId === undefined ? undefined : parseDecimalUint('chain ID', args.chainId, 64),
      signal: context.signal,
    });
  }

  if (
    args.chainId === undefined ||
    args.blockNumber === undefined ||
    args.txIndex === undefined ||
    args.logIndex === undefined
  ) {
    throw predefined.MISSING_ARGUMENT('chain-id, block-number, tx-index, and log-index are required');
  }

  return createTransactionCoordinates({
    chainId: parseDecimalUint('chain ID', args.chainId, 64),
    blockNumber: parseDecimalUint('block number', args.blockNumber, 64),
    txIndex: parseDecimalUint('transaction index', args.txIndex, 32),
    logIndex: parseDecimalUint('log index', args.logIndex, 32),
  });
};

/**
 * `request`: submits a proof request and, with `--wait`, prints the proof once it is ready.
 */
export const runRequest = async (
  args: RequestArguments,
  context: CommandContext,
  services: RequestCommandServices,
): Promise<void> => {
  const { config, logger, stdout, signal } = context;
  const coordinates = await resolveCoordinates(args, context, services.resolver);

  if (logger.isLevelEnabled('debug')) {
    logger.debug(
      `Requesting proof for chainId=${coordinates.chainId}, blockNumber=${coordinates.blockNumber}, txIndex=${coordinates.txIndex}, logIndex=${coordinates.logIndex}`,
    );
  }
  const jobId = await services.proofService.requestProof(coordinates, signal);

  if (config.debug) {
    stdout.write(`Job ID: ${jobId}\n`);
  } else if (!args.wait) {
    stdout.write(`${jobId}\n`);
  }

  if (!args.wait) {
    return;
  }

  logger.debug(`Waiting for proof (max ${config.maxAttempts} attempts, ${config.pollInterval}ms interval)`);
  const status = await services.proofService.waitForProof(jobId, {
    maxAttempts: config.maxAttempts,
    interval: config.pollInterval,
    signal,
  });

  stdout.write(renderProof(status.proof, config.debug && !args.raw));
};
