import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { globSync } from 'glob';
import { DefinitionError } from '../shared/errors.js';
import { sha256Hex } from '../shared/redact.js';

export interface ToolchainInfo {
  version: string;
  /** Short identity of the installed compiler build. */
  hash: string;
}

export interface CacheKeyContext {
  os: string;
  toolchain?: ToolchainInfo;
  /** Root for hashFiles() patterns. */
  workspaceDir: string;
}

const EXPRESSION = /\{\{\s*(.*?)\s*\}\}/g;
const HASH_FILES = /^hashFiles\((.*)\)$/;
const QUOTED_ARG = /'([^']*)'|"([^"]*)"/g;

/**
 * SHA-256 over the per-file SHA-256 digests of every file matching `patterns`
 * under `cwd`, in sorted path order. Empty string when nothing matches.
 */
export function hashFiles(cwd: string, patterns: string[]): string {
  const files = globSync(patterns, {
    cwd,
    nodir: true,
    ignore: ['.git/**', '**/node_modules/**'],
    posix: true,
  }).sort();

  if (files.length === 0) return '';

  const digests = files.map((file) => sha256Hex(readFileSync(join(cwd, file))));
  return sha256Hex(digests.join(''));
}

function parseHashFilesArgs(raw: string, template: string): string[] {
  const args: string[] = [];
  for (const match of raw.matchAll(QUOTED_ARG)) {
    const value = match[1] ?? match[2];
    if (value) args.push(value);
  }
  if (args.length === 0) {
    throw new DefinitionError(`hashFiles() needs at least one quoted pattern in cache key '${template}'`);
  }
  return args;
}

function requireToolchain(ctx: CacheKeyContext, template: string): ToolchainInfo {
  if (!ctx.toolchain) {
    throw new DefinitionError(
      `Cache key '${template}' uses the toolchain, but no install-toolchain step ran before it`,
    );
  }
  return ctx.toolchain;
}

/**
 * Render a cache key template. Supported expressions: `os`, `toolchain.version`,
 * `toolchain.hash` and `hashFiles('<glob>', ...)`.
 */
export function renderCacheKey(template: string, ctx: CacheKeyContext): string {
  const key = template.replace(EXPRESSION, (_match, expr: string) => {
    if (expr === 'os') return ctx.os;
    if (expr === 'toolchain.version') return requireToolchain(ctx, template).version;
    if (expr === 'toolchain.hash') return requireToolchain(ctx, template).hash;

    const hashFilesCall = HASH_FILES.exec(expr);
    if (hashFilesCall) {
      return hashFiles(ctx.workspaceDir, parseHashFilesArgs(hashFilesCall[1] ?? '', template));
    }

    throw new DefinitionError(`Unknown expression '{{ ${expr} }}' in cache key '${template}'`);
  });

  if (key.trim() === '' || /\s/.test(key)) {
    throw new DefinitionError(`Cache key '${template}' rendered to an invalid key '${key}'`);
  }
  return key;
}
