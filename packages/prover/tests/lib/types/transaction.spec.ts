// SPDX-License-Identifier: Apache-2.0

import { expect } from 'chai';

import { ErrorCode } from '../../../src/lib/errors/ProverError';
import { createTransactionCoordinates } from '../../../src/lib/types';
import { captureError } from '../../helpers';

describe('createTransactionCoordinates', () => {
  it('should build frozen coordinates', () => {
    const coordinates = createTransactionCoordinates({ chainId: 1n, blockNumber: 17000000n, txIndex: 5n, logIndex: 2 });

    expect(coordinates).to.deep.equal({ chainId: 1n, blockNumber: 17000000n, txIndex: 5, logIndex: 2 });
    expect(Object.isFrozen(coordinates)).to.be.true;
  });

  it('should reject an index wider than 32 bits', async () => {
    const error = await captureError(() =>
      createTransactionCoordinates({ chainId: 1n, blockNumber: 1n, txIndex: 4294967296n, logIndex: 0 }),
    );
    expect(error.code).to.equal(ErrorCode.VALUE_OVERFLOW);
    expect(error.message).to.equal('value too large for uint32: 4294967296');
  });

  it('should reject a negative block number', async () => {
    const error = await captureError(() =>
      createTransactionCoordinates({ chainId: 1n, blockNumber: -1n, txIndex: 0, logIndex: 0 }),
    );
    expect(error.code).to.equal(ErrorCode.VALUE_OVERFLOW);
  });

  it('should reject a fractional index', async () => {
    const error = await captureError(() =>
      createTransactionCoordinates({ chainId: 1n, blockNumber: 1n, txIndex: 0, logIndex: 1.5 }),
    );
    expect(error.code).to.equal(ErrorCode.INVALID_NUMERIC_INPUT);
    expect(error.message).to.equal('invalid index: 1.5');
  });
});
