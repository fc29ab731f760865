// SPDX-License-Identifier: Apache-2.0

export type ProofState = 'pending' | 'processing' | 'completed' | 'failed';

/**
 * Status strings reported by the proof service. `complete` and `completed`
 * have both been observed for finished jobs.
 */
export const PROOF_STATUS_STATES: ReadonlyMap<string, ProofState> = new Map<string, ProofState>([
  ['pending', 'pending'],
  ['processing', 'processing'],
  ['complete', 'completed'],
  ['completed', 'completed'],
  ['failed', 'failed'],
]);

/**
 * Snapshot of one `log_queryProof` observation.
 */
export interface ProofStatus {
  /** Status string exactly as reported by the service. */
  readonly status: string;
  /** `null` when the status string is not one the client knows. */
  readonly state: ProofState | null;
  /** Proof payload as parsed from the response; present iff `state` is `completed`. */
  readonly proof?: unknown;
  /** Present only when `state` is `failed` and the service supplied a message. */
  readonly errorMessage?: string;
}

export interface WaitForProofOptions {
  maxAttempts: number;
  /** Delay between observations, in milliseconds. */
  interval: number;
  signal?: AbortSignal;
}
