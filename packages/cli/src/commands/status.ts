// SPDX-License-Identifier: Apache-2.0

import { ProofServiceClient } from '@log-prover/prover';

import { renderProof, renderRawProof } from '../output';
import type { CommandContext } from './context';

/**
 * `status <jobId>`: prints the job's status string, followed by the proof once the job has completed.
 */
export const runStatus = async (
  jobId: string,
  raw: boolean,
  context: CommandContext,
  proofService: ProofServiceClient,
): Promise<void> => {
  const { config, stdout, signal } = context;
  const status = await proofService.getStatus(jobId, signal);
  const completed = status.state === 'completed' && status.proof !== undefined;

  if (!config.debug) {
    stdout.write(`${status.status}\n`);
    if (completed) {
      stdout.write(renderRawProof(status.proof));
    }
    return;
  }

  stdout.write(`Status: ${status.status}\n`);
  if (status.errorMessage) {
    stdout.write(`Error: ${status.errorMessage}\n`);
  }
  if (completed) {
    stdout.write('Proof is ready!\n');
    stdout.write(renderProof(status.proof, !raw));
  }
};
