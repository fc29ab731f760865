// SPDX-License-Identifier: Apache-2.0

/**
 * Immutable configuration handed to every collaborator at construction time.
 */
export interface ProverConfig {
  readonly apiKey: string;
  readonly apiUrl: string;
  readonly debug: boolean;
  readonly logLevel: string;
  /** Maximum number of status observations while waiting for a proof. */
  readonly maxAttempts: number;
  /** Delay between status observations, in milliseconds. */
  readonly pollInterval: number;
  /** Overall timeout of a single HTTP call, in milliseconds. */
  readonly requestTimeout: number;
  readonly rpcUrl?: string;
}
