// SPDX-License-Identifier: Apache-2.0

import type { z } from 'zod';

import { MAX_UINT32, MAX_UINT64 } from '../../formatters';
import { predefined } from '../errors/ProverError';
import type { LogEntrySchema, TransactionReceiptSchema, TransactionSchema } from './schemas';

/**
 * Everything the proof service needs to locate a single log.
 */
export interface TransactionCoordinates {
  readonly chainId: bigint;
  readonly blockNumber: bigint;
  readonly txIndex: number;
  readonly logIndex: number;
}

/** A receipt log; its index is its position in the receipt's log list. */
export type LogEntry = z.infer<typeof LogEntrySchema>;
export type Transaction = z.infer<typeof TransactionSchema>;
export type TransactionReceipt = z.infer<typeof TransactionReceiptSchema>;

const checkUint64 = (value: bigint): bigint => {
  if (value < 0n || value > MAX_UINT64) {
    throw predefined.VALUE_OVERFLOW(value.toString(), 64);
  }
  return value;
};

const checkUint32 = (value: bigint | number): number => {
  if (typeof value === 'number' && !Number.isInteger(value)) {
    throw predefined.INVALID_NUMERIC_INPUT('index', String(value));
  }
  const asBigInt = typeof value === 'bigint' ? value : BigInt(value);
  if (asBigInt < 0n || asBigInt > MAX_UINT32) {
    throw predefined.VALUE_OVERFLOW(asBigInt.toString(), 32);
  }
  return Number(asBigInt);
};

/**
 * Builds a frozen set of coordinates, rejecting values outside their unsigned range.
 */
export const createTransactionCoordinates = (fields: {
  chainId: bigint;
  blockNumber: bigint;
  txIndex: bigint | number;
  logIndex: bigint | number;
}): TransactionCoordinates => {
  return Object.freeze({
    chainId: checkUint64(fields.chainId),
    blockNumber: checkUint64(fields.blockNumber),
    txIndex: checkUint32(fields.txIndex),
    logIndex: checkUint32(fields.logIndex),
  });
};
