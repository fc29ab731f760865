// SPDX-License-Identifier: Apache-2.0

import type { ProverConfig } from '@log-prover/config-service';
import type { Logger } from 'pino';

import type { OutputStream } from '../output';

export interface CommandContext {
  readonly config: ProverConfig;
  readonly logger: Logger;
  readonly stdout: OutputStream;
  /** Aborted on SIGINT. */
  readonly signal?: AbortSignal;
}
