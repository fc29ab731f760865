// SPDX-License-Identifier: Apache-2.0

import type { OutputStream } from '../output';

export const VERSION = '0.1.0';

export const runVersion = (stdout: OutputStream): void => {
  stdout.write(`log-prover v${VERSION}\n`);
};
