// SPDX-License-Identifier: Apache-2.0

import JSONBigInt from 'json-bigint';

/**
 * Anything results can be written to, such as `process.stdout`.
 */
export interface OutputStream {
  write(chunk: string): unknown;
}

/**
 * Raw rendering: a string proof is printed as-is, anything else as compact JSON.
 * No trailing newline.
 */
export const renderRawProof = (proof: unknown): string => {
  return typeof proof === 'string' ? proof : JSONBigInt.stringify(proof);
};

/**
 * Two-space indented JSON followed by a newline.
 */
export const renderPrettyProof = (proof: unknown): string => {
  return `${JSONBigInt.stringify(proof, null, 2)}\n`;
};

export const renderProof = (proof: unknown, pretty: boolean): string => {
  return pretty ? renderPrettyProof(proof) : renderRawProof(proof);
};
