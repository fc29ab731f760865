// SPDX-License-Identifier: Apache-2.0

import { predefined } from './lib/errors/ProverError';

const EMPTY_HEX = '0x';
const HEX_DIGITS_REGEX = /^[0-9a-fA-F]+$/;
const DECIMAL_DIGITS_REGEX = /^[0-9]+$/;

export const MAX_UINT32 = 0xffffffffn;
export const MAX_UINT64 = 0xffffffffffffffffn;

const strip0x = (input: string): string => {
  return input.startsWith(EMPTY_HEX) ? input.substring(2) : input;
};

const prepend0x = (input: string): string => {
  return input.startsWith(EMPTY_HEX) ? input : EMPTY_HEX + input;
};

/**
 * Parses a quantity as returned by an Ethereum JSON-RPC node.
 *
 * @throws ProverError `INVALID_HEX` if the value is not hexadecimal, `VALUE_OVERFLOW` past 64 bits
 */
const hexToUint64 = (hex: string): bigint => {
  if (hex === '0x0') {
    return 0n;
  }

  const digits = strip0x(hex);
  if (!HEX_DIGITS_REGEX.test(digits)) {
    throw predefined.INVALID_HEX(hex);
  }

  const value = BigInt(EMPTY_HEX + digits);
  if (value > MAX_UINT64) {
    throw predefined.VALUE_OVERFLOW(hex, 64);
  }

  return value;
};

/**
 * Parses an unsigned decimal integer supplied by the user, such as a block number flag.
 */
const parseDecimalUint = (name: string, value: string, bits: 32 | 64): bigint => {
  if (!DECIMAL_DIGITS_REGEX.test(value)) {
    throw predefined.INVALID_NUMERIC_INPUT(name, value);
  }

  const parsed = BigInt(value);
  if (parsed > (bits === 32 ? MAX_UINT32 : MAX_UINT64)) {
    throw predefined.VALUE_OVERFLOW(value, bits);
  }

  return parsed;
};

const numberTo0x = (input: number | bigint): string => {
  return EMPTY_HEX + input.toString(16);
};

export { hexToUint64, numberTo0x, parseDecimalUint, prepend0x, strip0x };
