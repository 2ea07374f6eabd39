import { z } from 'zod';

export const WorkspaceConfigSchema = z.object({
  project_id: z.string().min(1),
  pipeline_file: z.string().min(1).default('pipeline.yaml'),
  vault_provider: z.enum(['dev', 'file', 'env']).default('file'),
  docker_bin: z.string().min(1).default('docker'),
  toolchain: z
    .object({
      manager: z.literal('rustup').default('rustup'),
      build_command: z.string().min(1).default('cargo'),
    })
    .default({}),
  concurrency: z
    .object({
      max_parallel: z.number().int().min(0).default(0),
    })
    .default({}),
  retry: z
    .object({
      attempts: z.number().int().min(1).max(10).default(3),
      delay_ms: z.number().int().min(0).default(1000),
    })
    .default({}),
  created_at: z.string(),
  version: z.string(),
});
