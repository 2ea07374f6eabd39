/**
 * Error taxonomy for pipeline definition, scheduling and execution.
 *
 * A cache miss is not an error (restore returns null) and a gate skip is a
 * job status, not an exception; neither has a class here.
 */

export class PipelineError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'PipelineError';
  }
}

/**
 * The pipeline definition failed validation, or a template expression in it
 * could not be resolved.
 */
export class DefinitionError extends PipelineError {
  constructor(message: string, public readonly path?: string) {
    super(message, 'definition_invalid');
    this.name = 'DefinitionError';
  }
}

export class UnknownDependencyError extends PipelineError {
  constructor(public readonly jobId: string, public readonly dependency: string) {
    super(`Job '${jobId}' needs unknown job '${dependency}'`, 'unknown_dependency');
    this.name = 'UnknownDependencyError';
  }
}

export class CyclicDependencyError extends PipelineError {
  /** @param cycle job ids along the cycle, first id repeated at the end */
  constructor(public readonly cycle: string[]) {
    super(`Circular dependency detected in job graph: ${cycle.join(' -> ')}`, 'cyclic_dependency');
    this.name = 'CyclicDependencyError';
  }
}

/**
 * A step's underlying operation failed. Local to its job: aborts the remaining
 * steps and fails the job, never retried by the scheduler.
 */
export class StepFailure extends PipelineError {
  constructor(message: string, public readonly exitCode?: number) {
    super(message, 'step_failure');
    this.name = 'StepFailure';
  }
}

export type PublishSink = 'artifact' | 'registry';

export class PublishFailure extends StepFailure {
  constructor(message: string, public readonly sink: PublishSink, exitCode?: number) {
    super(message, exitCode);
    this.name = 'PublishFailure';
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, public readonly field?: string) {
    super(message, 'configuration_invalid');
    this.name = 'ConfigurationError';
  }
}

/** The pipeline file itself is wrong: bad shape, unknown `needs`, or a cycle. */
export function isDefinitionProblem(err: unknown): err is PipelineError {
  return (
    err instanceof DefinitionError || err instanceof UnknownDependencyError || err instanceof CyclicDependencyError
  );
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
