import { readFileSync, existsSync } from 'node:fs';
import { load } from 'js-yaml';
import type { ZodError } from 'zod';
import { PipelineSchema } from './schema.js';
import type { JobDefinition, PipelineDefinition } from './types.js';
import { DefinitionError, errorMessage } from '../shared/errors.js';

function describeZodError(error: ZodError): { message: string; path: string } {
  const issue = error.issues[0];
  const path = issue ? issue.path.join('.') : '';
  return { message: issue?.message ?? 'invalid pipeline definition', path };
}

/**
 * Parse and validate a YAML pipeline definition. Dependency references are
 * checked later, when the job graph is built.
 */
export function parsePipelineDefinition(source: string, origin = '<inline>'): PipelineDefinition {
  let raw: unknown;
  try {
    raw = load(source, { filename: origin });
  } catch (err) {
    // js-yaml rejects duplicate mapping keys, so duplicate job ids land here
    throw new DefinitionError(`${origin}: ${errorMessage(err)}`);
  }

  const parsed = PipelineSchema.safeParse(raw);
  if (!parsed.success) {
    const { message, path } = describeZodError(parsed.error);
    throw new DefinitionError(`${origin}: ${path ? `${path}: ` : ''}${message}`, path);
  }

  const jobs: Record<string, JobDefinition> = {};
  for (const [id, job] of Object.entries(parsed.data.jobs)) {
    jobs[id] = {
      id,
      name: job.name ?? id,
      runs_on: job.runs_on,
      needs: Array.from(new Set(job.needs)),
      steps: job.steps,
    };
  }

  return { name: parsed.data.name, on: parsed.data.on, jobs };
}

export function loadPipelineDefinition(filePath: string): PipelineDefinition {
  if (!existsSync(filePath)) {
    throw new DefinitionError(`Pipeline definition not found: ${filePath}`);
  }
  return parsePipelineDefinition(readFileSync(filePath, 'utf8'), filePath);
}
