import { z } from 'zod';

const name = z.string().min(1).optional();

const CheckoutSourceSchema = z.object({
  kind: z.literal('checkout-source'),
  name,
});

const InstallToolchainSchema = z.object({
  kind: z.literal('install-toolchain'),
  name,
  version: z.string().min(1),
  override: z.boolean().default(false),
});

const RestoreOrSeedCacheSchema = z.object({
  kind: z.literal('restore-or-seed-cache'),
  name,
  key: z.string().min(1),
  paths: z.array(z.string().min(1)).min(1),
});

const InvokeBuildSchema = z.object({
  kind: z.literal('invoke-build'),
  name,
  mode: z.enum(['test', 'release']),
  args: z.array(z.string()).default([]),
});

const UploadArtifactSchema = z.object({
  kind: z.literal('upload-artifact'),
  name,
  artifact: z.string().regex(/^[A-Za-z0-9._-]+$/, 'artifact names may only contain letters, digits, ".", "_" and "-"'),
  path: z.string().min(1),
});

const AuthenticateRegistrySchema = z.object({
  kind: z.literal('authenticate-registry'),
  name,
  username: z.string().min(1),
  secret: z.string().min(1),
  registry: z.string().min(1).optional(),
});

const BuildContainerImageSchema = z.object({
  kind: z.literal('build-container-image'),
  name,
  tag: z.string().min(1),
  context: z.string().min(1).default('.'),
});

const PushContainerImageSchema = z.object({
  kind: z.literal('push-container-image'),
  name,
  tag: z.string().min(1),
});

export const StepSchema = z.discriminatedUnion('kind', [
  CheckoutSourceSchema,
  InstallToolchainSchema,
  RestoreOrSeedCacheSchema,
  InvokeBuildSchema,
  UploadArtifactSchema,
  AuthenticateRegistrySchema,
  BuildContainerImageSchema,
  PushContainerImageSchema,
]);

export const JobSchema = z.object({
  name: z.string().min(1).optional(),
  runs_on: z.string().min(1).default('ubuntu-latest'),
  needs: z
    .union([z.string().min(1), z.array(z.string().min(1))])
    .optional()
    .transform((needs) => (needs === undefined ? [] : Array.isArray(needs) ? needs : [needs])),
  steps: z.array(StepSchema).min(1),
});

const RESERVED_JOB_IDS = new Set(['__proto__', 'constructor', 'prototype']);

export const PipelineSchema = z.object({
  name: z.string().min(1),
  on: z.object({
    push: z.object({
      branch: z.string().min(1),
    }),
  }),
  jobs: z
    .record(
      z
        .string()
        .regex(/^[A-Za-z0-9_-]+$/, 'job ids may only contain letters, digits, "_" and "-"')
        .refine((id) => !RESERVED_JOB_IDS.has(id), (id) => ({ message: `job id '${id}' is reserved` })),
      JobSchema,
    )
    .refine((jobs) => Object.keys(jobs).length > 0, 'a pipeline needs at least one job'),
});

export type PipelineInput = z.input<typeof PipelineSchema>;
