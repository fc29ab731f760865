// SPDX-License-Identifier: Apache-2.0

import axios, { AxiosInstance } from 'axios';
import MockAdapter from 'axios-mock-adapter';
import { BigNumber as BN } from 'bignumber.js';
import { expect } from 'chai';
import pino from 'pino';

import { JsonRpcClient, JsonRpcParam } from '../../../src/lib/clients';
import { ErrorCode, ErrorKind } from '../../../src/lib/errors/ProverError';
import { captureError } from '../../helpers';

describe('JsonRpcClient', function () {
  const logger = pino({ level: 'silent' });
  const url = 'http://rpc.test';

  let instance: AxiosInstance, mock: MockAdapter, client: JsonRpcClient;

  before(() => {
    instance = axios.create();
  });

  beforeEach(() => {
    mock = new MockAdapter(instance);
    client = new JsonRpcClient({ url, timeout: 1000, headers: { Authorization: 'Bearer test-secret' } }, logger, instance);
  });

  it('should post a JSON-RPC 2.0 envelope and return the result', async () => {
    mock.onPost(url).reply(200, { jsonrpc: '2.0', id: 1, result: '0x1' });

    const result = await client.call('eth_chainId', []);

    expect(result).to.equal('0x1');
    expect(mock.history.post.length).to.equal(1);
    expect(mock.history.post[0].data).to.equal('{"jsonrpc":"2.0","id":1,"method":"eth_chainId","params":[]}');
  });

  it('should send the configured headers', async () => {
    mock.onPost(url).reply(200, { jsonrpc: '2.0', id: 1, result: '0x1' });

    await client.call('eth_chainId', []);

    const headers = mock.history.post[0].headers;
    expect(headers?.Authorization).to.equal('Bearer test-secret');
    expect(headers?.['Content-Type']).to.equal('application/json');
  });

  it('should increase the request id with every call', async () => {
    mock.onPost(url).reply(200, { jsonrpc: '2.0', id: 1, result: '0x1' });

    await client.call('eth_chainId', []);
    await client.call('eth_chainId', []);

    expect(JSON.parse(mock.history.post[0].data).id).to.equal(1);
    expect(JSON.parse(mock.history.post[1].data).id).to.equal(2);
  });

  it('should write bigint params as exact JSON integers', async () => {
    mock.onPost(url).reply(200, { jsonrpc: '2.0', id: 1, result: null });

    await client.call('log_requestProof', [18446744073709551615n, 9007199254740993n, 5, 2]);

    expect(mock.history.post[0].data).to.equal(
      '{"jsonrpc":"2.0","id":1,"method":"log_requestProof","params":[18446744073709551615,9007199254740993,5,2]}',
    );
  });

  it('should write BigNumber params as exact JSON integers', async () => {
    mock.onPost(url).reply(200, { jsonrpc: '2.0', id: 1, result: null });
    const params: JsonRpcParam[] = [new BN('18446744073709551615')];

    await client.call('log_queryProof', params);

    expect(mock.history.post[0].data).to.equal(
      '{"jsonrpc":"2.0","id":1,"method":"log_queryProof","params":[18446744073709551615]}',
    );
  });

  it('should keep large integers in the response exact', async () => {
    mock.onPost(url).reply(200, '{"jsonrpc":"2.0","id":1,"result":18446744073709551615}');

    const result = await client.call('log_requestProof', []);

    expect(BN.isBigNumber(result) && result.toFixed(0)).to.equal('18446744073709551615');
  });

  it('should return null for a missing result', async () => {
    mock.onPost(url).reply(200, { jsonrpc: '2.0', id: 1 });

    expect(await client.call('eth_getTransactionByHash', ['0x01'])).to.be.null;
  });

  it('should report a non-2xx status as a protocol error', async () => {
    mock.onPost(url).reply(500, 'internal error');

    const error = await captureError(() => client.call('eth_chainId', []));

    expect(error.kind).to.equal(ErrorKind.PROTOCOL);
    expect(error.code).to.equal(ErrorCode.REMOTE_CALL_FAILED);
    expect(error.details.httpStatus).to.equal(500);
    expect(error.message).to.equal('eth_chainId request to http://rpc.test failed with status 500: internal error');
  });

  it('should report an error envelope as a protocol error', async () => {
    mock.onPost(url).reply(200, { jsonrpc: '2.0', id: 1, error: { code: -32601, message: 'method not found' } });

    const error = await captureError(() => client.call('eth_foo', []));

    expect(error.kind).to.equal(ErrorKind.PROTOCOL);
    expect(error.details.rpcCode).to.equal(-32601);
    expect(error.message).to.equal('eth_foo request to http://rpc.test returned error -32601: method not found');
  });

  it('should report a network failure as a transport error', async () => {
    mock.onPost(url).networkError();

    const error = await captureError(() => client.call('eth_chainId', []));

    expect(error.kind).to.equal(ErrorKind.TRANSPORT);
    expect(error.message).to.equal('eth_chainId request to http://rpc.test failed: Network Error');
  });

  it('should report a timeout as a transport error', async () => {
    mock.onPost(url).timeout();

    const error = await captureError(() => client.call('eth_chainId', []));

    expect(error.kind).to.equal(ErrorKind.TRANSPORT);
    expect(error.code).to.equal(ErrorCode.REMOTE_CALL_FAILED);
  });

  it('should report a body that is not JSON as a decode error', async () => {
    mock.onPost(url).reply(200, 'not json');

    const error = await captureError(() => client.call('eth_chainId', []));

    expect(error.kind).to.equal(ErrorKind.DECODE);
    expect(error.message).to.equal('failed to decode eth_chainId response: response body is not valid JSON');
  });

  it('should report a body that is not an envelope as a decode error', async () => {
    mock.onPost(url).reply(200, '[1,2]');

    const error = await captureError(() => client.call('eth_chainId', []));

    expect(error.kind).to.equal(ErrorKind.DECODE);
    expect(error.code).to.equal(ErrorCode.RESPONSE_DECODE_FAILED);
  });

  it('should not send a request once the signal is aborted', async () => {
    mock.onPost(url).reply(200, { jsonrpc: '2.0', id: 1, result: '0x1' });
    const controller = new AbortController();
    controller.abort();

    const error = await captureError(() => client.call('eth_chainId', [], controller.signal));

    expect(error.kind).to.equal(ErrorKind.TIMEOUT);
    expect(error.code).to.equal(ErrorCode.REQUEST_ABORTED);
    expect(error.message).to.equal('eth_chainId request to http://rpc.test was aborted');
    expect(mock.history.post.length).to.equal(0);
  });
});
