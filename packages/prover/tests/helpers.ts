// SPDX-License-Identifier: Apache-2.0

import { isProverError, ProverError } from '../src/lib/errors/ProverError';

/**
 * Runs `action` and returns the ProverError it fails with; anything else fails the test.
 */
export const captureError = async (action: () => unknown): Promise<ProverError> => {
  try {
    await action();
  } catch (error: unknown) {
    if (isProverError(error)) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ProverError to be thrown');
};

export const TRANSFER_TOPIC = '0xddf252ad1be2c89b69c2b068fc378daa952ba7f163c4a11628f55a4df523b3ef';
export const APPROVAL_TOPIC = '0x8c5be1e5ebec7d5bd14f71427d1e84f3dd0314c0f7b2291e5b200ac8c7c3b925';
