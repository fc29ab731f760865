// SPDX-License-Identifier: Apache-2.0

import { z } from 'zod';

import { predefined } from '../errors/ProverError';

// =============================================================================
// JSON-RPC envelope
// =============================================================================

export const JsonRpcErrorSchema = z.object({
  code: z.number(),
  message: z.string(),
  data: z.unknown().optional(),
});

export const JsonRpcResponseSchema = z.object({
  jsonrpc: z.string().optional(),
  id: z.union([z.number(), z.string(), z.null()]).optional(),
  result: z.unknown().optional(),
  error: JsonRpcErrorSchema.nullish(),
});

// =============================================================================
// Ethereum JSON-RPC results
// =============================================================================

export const LogEntrySchema = z.object({
  topics: z.array(z.string()),
  address: z.string().optional(),
  data: z.string().optional(),
  logIndex: z.string().optional(),
  transactionIndex: z.string().optional(),
});

export const TransactionSchema = z.object({
  hash: z.string(),
  blockNumber: z.string().nullish(),
  blockHash: z.string().nullish(),
  from: z.string().optional(),
  to: z.string().nullish(),
  chainId: z.string().nullish(),
});

export const TransactionReceiptSchema = z.object({
  transactionHash: z.string(),
  transactionIndex: z.string(),
  blockNumber: z.string(),
  blockHash: z.string(),
  status: z.string().optional(),
  logs: z.array(LogEntrySchema),
});

// =============================================================================
// Proof service results
// =============================================================================

export const ProofStatusResultSchema = z.object({
  status: z.string(),
  proof: z.unknown().optional(),
  error: z.string().nullish(),
});

/**
 * Parses `value` with `schema`, turning validation issues into a DECODE error for `operation`.
 */
export const decodeResult = <T extends z.ZodTypeAny>(schema: T, value: unknown, operation: string): z.infer<T> => {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw predefined.RESPONSE_DECODE_FAILED(operation, reason, parsed.error);
  }
  return parsed.data;
};
