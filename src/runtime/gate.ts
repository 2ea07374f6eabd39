import type { JobStatus } from '../pipeline/types.js';

export type GateDecision = 'admit' | 'skip' | 'wait';

/**
 * Admission decision for one job, given the current status of every job.
 *
 * - `skip` as soon as any prerequisite is failed or skipped; a skipped job in
 *   turn makes its own dependents skip, so failure propagates down any chain.
 * - `wait` while any prerequisite is still pending or running.
 * - `admit` once every prerequisite succeeded (immediately for no `needs`).
 *
 * Pure: evaluated separately for every job, siblings never influence each other.
 */
export function admit(
  job: { needs: readonly string[] },
  statuses: ReadonlyMap<string, JobStatus>,
): GateDecision {
  let waiting = false;

  for (const dep of job.needs) {
    const status = statuses.get(dep) ?? 'pending';
    if (status === 'failed' || status === 'skipped') return 'skip';
    if (status !== 'succeeded') waiting = true;
  }

  return waiting ? 'wait' : 'admit';
}
