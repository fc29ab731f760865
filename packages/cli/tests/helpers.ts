// SPDX-License-Identifier: Apache-2.0

import type { ProverConfig } from '@log-prover/config-service';

import type { OutputStream } from '../src/output';

export class MemoryStream implements OutputStream {
  private readonly chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get text(): string {
    return this.chunks.join('');
  }
}

export const testConfig = (overrides: Partial<ProverConfig> = {}): ProverConfig => ({
  apiKey: 'test-secret',
  apiUrl: 'https://proof.example.test',
  debug: false,
  logLevel: 'silent',
  maxAttempts: 3,
  pollInterval: 100,
  requestTimeout: 1000,
  ...overrides,
});
