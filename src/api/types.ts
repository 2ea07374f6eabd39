import type Database from 'better-sqlite3';
import type { PushEvent } from '../pipeline/types.js';

export type DispatchResult = { triggered: false } | { triggered: true; runId: string };

/** Starts runs for incoming pushes without waiting for them to finish. */
export interface RunDispatcher {
  dispatch(event: PushEvent): DispatchResult;
  /** Resolves once every run started so far has finished. */
  drain(): Promise<void>;
}

export interface RouteOpts {
  db: Database.Database;
  dispatcher: RunDispatcher;
  /** Shared secret for `X-Hub-Signature-256`; unset accepts unsigned pushes. */
  webhookSecret?: string;
}
