// SPDX-License-Identifier: Apache-2.0

import pino, { Logger } from 'pino';

/**
 * Root logger of the command-line tool. Output goes to stderr so stdout only carries results.
 */
export const createLogger = (level: string): Logger =>
  pino({
    name: 'log-prover',
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        destination: 2,
        colorize: true,
        translateTime: true,
        ignore: 'pid,hostname',
      },
    },
  });
