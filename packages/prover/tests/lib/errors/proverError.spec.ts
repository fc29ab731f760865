// SPDX-License-Identifier: Apache-2.0

import { expect } from 'chai';

import { ErrorCode, ErrorKind, isProverError, predefined, ProverError } from '../../../src/lib/errors/ProverError';

describe('ProverError', () => {
  it('should be an Error carrying kind and code', () => {
    const error = predefined.NO_LOGS();

    expect(error).to.be.instanceOf(Error);
    expect(error).to.be.instanceOf(ProverError);
    expect(error.name).to.equal('ProverError');
    expect(error.kind).to.equal(ErrorKind.DOMAIN);
    expect(error.code).to.equal(ErrorCode.NO_LOGS);
    expect(isProverError(error)).to.be.true;
    expect(isProverError(new Error('plain'))).to.be.false;
  });

  it('should only flag transport and protocol failures as remote', () => {
    const cause = new Error('connect ECONNREFUSED');

    expect(predefined.TRANSPORT_FAILURE('eth_chainId', 'http://node.test', cause).isRemoteFailure()).to.be.true;
    expect(predefined.HTTP_STATUS_FAILURE('eth_chainId', 'http://node.test', 502, 'bad gateway').isRemoteFailure()).to
      .be.true;
    expect(predefined.RESPONSE_DECODE_FAILED('eth_chainId', 'bad shape').isRemoteFailure()).to.be.false;
    expect(predefined.POLLING_TIMEOUT(3).isRemoteFailure()).to.be.false;
  });

  it('should keep the wrapped error as cause', () => {
    const cause = new Error('connect ECONNREFUSED');
    const error = predefined.TRANSPORT_FAILURE('eth_chainId', 'http://node.test', cause);

    expect(error.cause).to.equal(cause);
    expect(error.message).to.equal('eth_chainId request to http://node.test failed: connect ECONNREFUSED');
    expect(error.details).to.deep.equal({ operation: 'eth_chainId', endpoint: 'http://node.test' });
  });

  it('should keep kind and details when wrapping a submission failure', () => {
    const remote = predefined.RPC_ERROR_RESPONSE('log_requestProof', 'https://proof.example.test', -32000, 'busy');
    const error = predefined.PROOF_SUBMISSION_FAILED(remote);

    expect(error.code).to.equal(ErrorCode.PROOF_SUBMISSION_FAILED);
    expect(error.kind).to.equal(ErrorKind.PROTOCOL);
    expect(error.details.rpcCode).to.equal(-32000);
    expect(error.cause).to.equal(remote);
    expect(error.message).to.equal(
      'proof service call failed: log_requestProof request to https://proof.example.test returned error -32000: busy',
    );
  });
});
