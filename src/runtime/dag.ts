/**
 * Job dependency graph.
 *
 * Nodes are jobs, edges are `needs` references. Built once per run and
 * read-only afterwards; job status lives with the scheduler.
 */
import { CyclicDependencyError, UnknownDependencyError } from '../shared/errors.js';
import type { JobDefinition } from '../pipeline/types.js';

export interface DagNode {
  id: string;
  needs: string[];
  /** Jobs that list this one in `needs`, in declaration order. */
  dependents: string[];
}

export type JobGraph = ReadonlyMap<string, DagNode>;

/**
 * Build the job graph, rejecting unknown `needs` references and cycles.
 * Iteration order follows the order the jobs were declared in.
 */
export function buildDag(jobs: Iterable<Pick<JobDefinition, 'id' | 'needs'>>): JobGraph {
  const dag = new Map<string, DagNode>();

  for (const job of jobs) {
    dag.set(job.id, { id: job.id, needs: [...job.needs], dependents: [] });
  }

  for (const node of dag.values()) {
    for (const dep of node.needs) {
      const upstream = dag.get(dep);
      if (!upstream) {
        throw new UnknownDependencyError(node.id, dep);
      }
      upstream.dependents.push(node.id);
    }
  }

  validateAcyclic(dag);
  return dag;
}

function validateAcyclic(dag: JobGraph): void {
  const visited = new Set<string>();
  const stack: string[] = [];
  const onStack = new Set<string>();

  function visit(jobId: string): void {
    if (onStack.has(jobId)) {
      const start = stack.indexOf(jobId);
      throw new CyclicDependencyError([...stack.slice(start), jobId]);
    }
    if (visited.has(jobId)) return;

    visited.add(jobId);
    stack.push(jobId);
    onStack.add(jobId);

    for (const dep of dag.get(jobId)?.needs ?? []) {
      visit(dep);
    }

    stack.pop();
    onStack.delete(jobId);
  }

  for (const jobId of dag.keys()) {
    visit(jobId);
  }
}

/**
 * Every job downstream of `jobId`, at any depth.
 */
export function getTransitiveDependents(dag: JobGraph, jobId: string): string[] {
  const found = new Set<string>();
  const queue = [...(dag.get(jobId)?.dependents ?? [])];

  while (queue.length > 0) {
    const next = queue.shift();
    if (next === undefined || found.has(next)) continue;
    found.add(next);
    queue.push(...(dag.get(next)?.dependents ?? []));
  }

  return [...found];
}

/**
 * Get topological order of jobs
 */
export function getTopologicalOrder(dag: JobGraph): string[] {
  const order: string[] = [];
  const visited = new Set<string>();

  function visit(jobId: string): void {
    if (visited.has(jobId)) return;
    visited.add(jobId);

    for (const dep of dag.get(jobId)?.needs ?? []) {
      visit(dep);
    }

    order.push(jobId);
  }

  for (const jobId of dag.keys()) {
    visit(jobId);
  }

  return order;
}

/**
 * Get parallel execution layers (jobs that can run together)
 */
export function getParallelLayers(dag: JobGraph): string[][] {
  const layers: string[][] = [];
  const assigned = new Set<string>();

  while (assigned.size < dag.size) {
    const layer: string[] = [];

    for (const [jobId, node] of dag) {
      if (assigned.has(jobId)) continue;

      // Check if all dependencies are in previous layers
      if (node.needs.every((dep) => assigned.has(dep))) {
        layer.push(jobId);
      }
    }

    if (layer.length === 0) {
      // buildDag rejects cycles, so only a hand-built graph gets here
      throw new CyclicDependencyError([...dag.keys()].filter((id) => !assigned.has(id)));
    }

    for (const jobId of layer) {
      assigned.add(jobId);
    }

    layers.push(layer);
  }

  return layers;
}
