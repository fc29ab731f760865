// SPDX-License-Identifier: Apache-2.0

enum RPC_METHOD {
  ETH_GET_TRANSACTION_BY_HASH = 'eth_getTransactionByHash',
  ETH_GET_TRANSACTION_RECEIPT = 'eth_getTransactionReceipt',
  LOG_REQUEST_PROOF = 'log_requestProof',
  LOG_QUERY_PROOF = 'log_queryProof',
}

export default {
  JSON_RPC_VERSION: '2.0',
  HTTP_MAX_REDIRECTS: 5,

  RPC_METHOD,

  DEFAULT_LOG_INDEX: 0,
};
