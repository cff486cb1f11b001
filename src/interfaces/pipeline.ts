import { CheckErrorKind } from '../utils/errors';
import { FactCheckResult } from './factCheckResult';

export const PIPELINE_STATES = [
  'Received',
  'CacheHit',
  'Extracting',
  'Querying',
  'Searching',
  'Synthesizing',
  'Ranking',
  'Explaining',
  'Completed',
  'Failed',
] as const;
export type PipelineState = (typeof PIPELINE_STATES)[number];

export const FRESH_RUN_ORDER: readonly PipelineState[] = [
  'Received',
  'Extracting',
  'Querying',
  'Searching',
  'Synthesizing',
  'Ranking',
  'Explaining',
  'Completed',
];

export const CACHED_RUN_ORDER: readonly PipelineState[] = ['Received', 'CacheHit', 'Completed'];

export interface FailureSummary {
  kind: CheckErrorKind;
  stage?: PipelineState;
  message: string;
}

export interface ProgressEvent {
  runId: string;
  sequence: number;
  state: PipelineState;
  at: string;
  result?: FactCheckResult;
  error?: FailureSummary;
}

export interface RunOptions {
  signal?: AbortSignal;
  onEvent?: (event: ProgressEvent) => void;
  /** Run every stage even when a fresh result is cached; the new result replaces it. */
  skipCache?: boolean;
}

/** A result plus how it was obtained; kept apart so cached results stay identical. */
export interface CheckOutcome {
  result: FactCheckResult;
  cached: boolean;
  /** Wall time of the run; 0 for a cache hit. */
  processingMs: number;
}

/** Anything that can turn raw claim text into a verdict. */
export interface ClaimChecker {
  check(rawText: string, options?: RunOptions): Promise<FactCheckResult>;
  run(rawText: string, options?: RunOptions): Promise<CheckOutcome>;
}
