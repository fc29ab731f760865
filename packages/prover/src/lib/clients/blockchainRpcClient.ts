// SPDX-License-Identifier: Apache-2.0

import { AxiosInstance } from 'axios';
import { Logger } from 'pino';

import { prepend0x } from '../../formatters';
import constants from '../constants';
import { predefined } from '../errors/ProverError';
import { decodeResult, TransactionReceiptSchema, TransactionSchema } from '../types/schemas';
import { Transaction, TransactionReceipt } from '../types/transaction';
import { JsonRpcClient } from './jsonRpcClient';

export interface BlockchainRpcClientOptions {
  url: string;
  timeout: number;
}

/**
 * Reads transactions and receipts from an Ethereum JSON-RPC node.
 */
export class BlockchainRpcClient {
  private readonly rpc: JsonRpcClient;

  constructor(options: BlockchainRpcClientOptions, logger: Logger, client?: AxiosInstance) {
    this.rpc = new JsonRpcClient({ url: options.url, timeout: options.timeout }, logger, client);
  }

  get url(): string {
    return this.rpc.url;
  }

  async fetchTransaction(txHash: string, signal?: AbortSignal): Promise<Transaction> {
    const method = constants.RPC_METHOD.ETH_GET_TRANSACTION_BY_HASH;
    const hash = prepend0x(txHash);
    const result = await this.rpc.call(method, [hash], signal);
    if (result === null) {
      throw predefined.TRANSACTION_NOT_FOUND(hash);
    }

    return decodeResult(TransactionSchema, result, method);
  }

  async fetchReceipt(txHash: string, signal?: AbortSignal): Promise<TransactionReceipt> {
    const method = constants.RPC_METHOD.ETH_GET_TRANSACTION_RECEIPT;
    const hash = prepend0x(txHash);
    const result = await this.rpc.call(method, [hash], signal);
    if (result === null) {
      throw predefined.RECEIPT_NOT_FOUND(hash);
    }

    return decodeResult(TransactionReceiptSchema, result, method);
  }
}
