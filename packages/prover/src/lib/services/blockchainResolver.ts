// SPDX-License-Identifier: Apache-2.0

import { keccak256, toUtf8Bytes } from 'ethers';
import { Logger } from 'pino';

import { hexToUint64, numberTo0x } from '../../formatters';
import { BlockchainRpcClient } from '../clients/blockchainRpcClient';
import constants from '../constants';
import { predefined } from '../errors/ProverError';
import { createTransactionCoordinates, LogEntry, TransactionCoordinates } from '../types/transaction';

export interface ResolveOptions {
  /** Position of the log in the receipt; takes precedence over `eventSignature`. */
  logIndex?: number;
  /** e.g. `Transfer(address,address,uint256)` */
  eventSignature?: string;
  /** Used only when the transaction does not report its own chain ID. */
  chainId?: bigint;
  signal?: AbortSignal;
}

export type BlockchainRpcClientFactory = (url: string) => BlockchainRpcClient;

/**
 * Resolves a transaction hash into the coordinates of one of its logs.
 */
export class BlockchainResolver {
  private readonly logger: Logger;
  private readonly createClient: BlockchainRpcClientFactory;

  constructor(logger: Logger, options: { timeout: number; clientFactory?: BlockchainRpcClientFactory }) {
    this.logger = logger;
    this.createClient =
      options.clientFactory ?? ((url: string) => new BlockchainRpcClient({ url, timeout: options.timeout }, logger));
  }

  /**
   * Keccak-256 hash of an event signature, i.e. the value of `topics[0]` for logs of that event.
   */
  static computeEventTopicHash(eventSignature: string): string {
    return keccak256(toUtf8Bytes(eventSignature.trim())).toLowerCase();
  }

  async resolve(txHash: string, rpcEndpoint: string, options: ResolveOptions = {}): Promise<TransactionCoordinates> {
    const client = this.createClient(rpcEndpoint);
    this.logger.debug(`Fetching transaction ${txHash} from ${rpcEndpoint}`);
    const transaction = await client.fetchTransaction(txHash, options.signal);
    const receipt = await client.fetchReceipt(txHash, options.signal);

    const logIndex = this.selectLogIndex(receipt.logs, options);

    let chainId: bigint;
    if (transaction.chainId) {
      chainId = hexToUint64(transaction.chainId);
    } else if (options.chainId !== undefined) {
      chainId = options.chainId;
    } else {
      throw predefined.MISSING_CHAIN_ID();
    }

    const coordinates = createTransactionCoordinates({
      chainId,
      blockNumber: hexToUint64(receipt.blockNumber),
      txIndex: hexToUint64(receipt.transactionIndex),
      logIndex,
    });

    if (this.logger.isLevelEnabled('debug')) {
      this.logger.debug(
        `Resolved ${txHash}: chainId=${coordinates.chainId}, blockNumber=${numberTo0x(
          coordinates.blockNumber,
        )}, txIndex=${coordinates.txIndex}, logIndex=${coordinates.logIndex}`,
      );
    }

    return coordinates;
  }

  private selectLogIndex(logs: readonly LogEntry[], options: ResolveOptions): number {
    if (logs.length === 0) {
      throw predefined.NO_LOGS();
    }

    if (options.logIndex !== undefined) {
      if (!Number.isInteger(options.logIndex)) {
        throw predefined.INVALID_NUMERIC_INPUT('log index', String(options.logIndex));
      }
      if (options.logIndex < 0 || options.logIndex >= logs.length) {
        throw predefined.LOG_INDEX_OUT_OF_RANGE(options.logIndex, logs.length);
      }
      return options.logIndex;
    }

    if (options.eventSignature) {
      const topicHash = BlockchainResolver.computeEventTopicHash(options.eventSignature);
      const index = logs.findIndex((log) => log.topics.length > 0 && log.topics[0].toLowerCase() === topicHash);
      if (index === -1) {
        throw predefined.NO_MATCHING_LOG(options.eventSignature);
      }
      this.logger.debug(`Found log matching ${options.eventSignature} at index ${index}`);
      return index;
    }

    return constants.DEFAULT_LOG_INDEX;
  }
}
