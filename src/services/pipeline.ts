import crypto from 'crypto';
import { Claim, SearchQuery } from '../interfaces/claim';
import { EvidenceSet } from '../interfaces/evidence';
import { FactCheckResult, Verdict } from '../interfaces/factCheckResult';
import { CheckOutcome, ClaimChecker, FailureSummary, PipelineState, ProgressEvent, RunOptions } from '../interfaces/pipeline';
import { abortable, abortAfter, abortReason, DeadlineExceeded, linkedController } from '../utils/abort';
import {
  CheckError,
  errorMessage,
  ExtractionFailure,
  InternalError,
  PipelineCancelled,
  ValidationError,
} from '../utils/errors';
import { logError, logInfo, logWarn } from '../utils/logger';
import { normalizeClaimText } from '../utils/normalize';
import { ClaimExtractor } from './claimExtractor';
import { aggregate } from './evidenceAggregator';
import { EvidenceSynthesizer, Synthesis } from './evidenceSynthesizer';
import {
  Explanation,
  ExplanationGenerator,
  fallbackCorrection,
  fallbackExplanationEn,
  fallbackExplanationHi,
} from './explanationGenerator';
import { planQueries } from './queryPlanner';
import { ResultCache } from './resultCache';
import { rankSeverity } from './severityRanker';
import { SourceAdapter } from './sources/sourceAdapter';
import { TrendingRecorder } from './trendingStore';

export interface PipelineDeps {
  extractor: ClaimExtractor;
  synthesizer: EvidenceSynthesizer;
  explainer: ExplanationGenerator;
  adapters: readonly SourceAdapter[];
  cache: ResultCache;
  trending: TrendingRecorder;
  planner?: (claim: Claim) => SearchQuery[];
}

export interface PipelineSettings {
  maxClaimLength: number;
  perSourceTimeoutMs: number;
  searchBudgetMs: number;
  pipelineBudgetMs: number;
  now?: () => number;
  newRunId?: () => string;
}

/** Per-run context passed through every stage. */
interface RunContext {
  readonly runId: string;
  readonly signal?: AbortSignal;
  readonly onEvent?: (event: ProgressEvent) => void;
  /** Aborted on caller cancellation or when the run deadline passes. */
  readonly deadline: AbortSignal;
  readonly deadlineAt: number;
  sequence: number;
}

export function toFailureSummary(err: unknown): FailureSummary {
  if (err instanceof CheckError) {
    return { kind: err.kind, stage: err.stage, message: err.message };
  }
  return { kind: 'InternalError', message: 'The check could not be completed' };
}

/**
 * Orchestrates one claim check: cache lookup, extraction, query planning,
 * evidence search, synthesis, ranking and explanation, emitting one progress
 * event per state in order. Runs share nothing but the cache and trending store.
 */
export class FactCheckPipeline implements ClaimChecker {
  private readonly now: () => number;
  private readonly newRunId: () => string;
  private readonly planner: (claim: Claim) => SearchQuery[];

  constructor(private readonly deps: PipelineDeps, private readonly settings: PipelineSettings) {
    this.now = settings.now ?? Date.now;
    this.newRunId = settings.newRunId ?? (() => crypto.randomUUID());
    this.planner = deps.planner ?? (claim => planQueries(claim));
  }

  get sourceIds(): string[] {
    return this.deps.adapters.map(adapter => adapter.id);
  }

  /** Rejects empty or oversized input before a run starts. */
  validate(rawText: string): string {
    if (!rawText.trim()) {
      throw new ValidationError('Claim text must not be empty');
    }
    if (rawText.length > this.settings.maxClaimLength) {
      throw new ValidationError(`Claim text must be at most ${this.settings.maxClaimLength} characters`);
    }
    const normalized = normalizeClaimText(rawText);
    if (!normalized) {
      throw new ValidationError('Claim text must contain words, not only punctuation');
    }
    return normalized;
  }

  async check(rawText: string, options: RunOptions = {}): Promise<FactCheckResult> {
    const outcome = await this.run(rawText, options);
    return outcome.result;
  }

  async run(rawText: string, options: RunOptions = {}): Promise<CheckOutcome> {
    const normalized = this.validate(rawText);
    const { signal, onEvent } = options;
    const startedAt = this.now();
    if (signal?.aborted) {
      throw new PipelineCancelled();
    }

    const run = linkedController(signal);
    const clearDeadline = abortAfter(run, this.settings.pipelineBudgetMs, 'claim check');
    const ctx: RunContext = {
      runId: this.newRunId(),
      signal,
      onEvent,
      deadline: run.signal,
      deadlineAt: this.now() + this.settings.pipelineBudgetMs,
      sequence: 0,
    };

    try {
      const { result, cached } = await this.execute(ctx, rawText, normalized, options.skipCache === true);
      return { result, cached, processingMs: cached ? 0 : Math.max(0, this.now() - startedAt) };
    } catch (err) {
      if (signal?.aborted) {
        logInfo('Pipeline', `Run ${ctx.runId} cancelled`);
        throw err instanceof PipelineCancelled ? err : new PipelineCancelled();
      }
      const failure = err instanceof CheckError ? err : new InternalError(errorMessage(err), { cause: err });
      logError(`Run ${ctx.runId} failed`, failure);
      this.emit(ctx, 'Failed', { error: toFailureSummary(failure) });
      throw failure;
    } finally {
      clearDeadline();
    }
  }

  private async execute(
    ctx: RunContext,
    rawText: string,
    normalized: string,
    skipCache: boolean
  ): Promise<{ result: FactCheckResult; cached: boolean }> {
    this.transition(ctx, 'Received');

    const cached = skipCache ? null : await abortable(this.deps.cache.get(normalized), ctx.deadline);
    if (cached) {
      this.transition(ctx, 'CacheHit');
      this.transition(ctx, 'Completed', cached);
      this.recordTrending(cached);
      return { result: cached, cached: true };
    }

    this.transition(ctx, 'Extracting');
    const claim = await this.extract(ctx, rawText);

    this.transition(ctx, 'Querying');
    const queries = this.planner(claim);

    this.transition(ctx, 'Searching');
    const remaining = Math.max(0, ctx.deadlineAt - this.now());
    const search = await aggregate(queries, this.deps.adapters, {
      perSourceTimeoutMs: this.settings.perSourceTimeoutMs,
      overallBudgetMs: Math.min(this.settings.searchBudgetMs, remaining),
      signal: ctx.signal,
    });

    this.transition(ctx, 'Synthesizing');
    const synthesis = await this.synthesize(ctx, claim, search.evidence);
    // An empty evidence set can only ever be unverifiable
    const verdict: Verdict = synthesis.evidence.length === 0 ? 'unverifiable' : synthesis.verdict;
    const confidence =
      verdict === synthesis.verdict ? synthesis.confidence : this.deps.synthesizer.policy.unverifiableConfidence;

    this.transition(ctx, 'Ranking');
    const severity = rankSeverity(claim.crisisCategory, verdict, claim.rawText);

    this.transition(ctx, 'Explaining');
    const explanation = await this.explain(ctx, claim, synthesis.evidence, verdict, confidence);

    const result: FactCheckResult = Object.freeze({
      claim,
      evidenceSet: synthesis.evidence,
      verdict,
      confidence,
      severity,
      explanationEn: explanation.explanationEn,
      explanationHi: explanation.explanationHi,
      correction: explanation.correction,
      sourcesConsulted: Object.freeze([...search.sourcesConsulted]),
      createdAt: new Date(this.now()).toISOString(),
    });

    this.transition(ctx, 'Completed', result);
    logInfo('Pipeline', `Run ${ctx.runId} completed: ${verdict} (${confidence}), severity ${severity}`);
    await this.deps.cache.put(normalized, result);
    this.recordTrending(result);
    return { result, cached: false };
  }

  private async extract(ctx: RunContext, rawText: string): Promise<Claim> {
    try {
      return await this.deps.extractor.extract(rawText, ctx.deadline);
    } catch (err) {
      if (err instanceof DeadlineExceeded && !ctx.signal?.aborted) {
        throw new ExtractionFailure('Claim extraction ran out of time', { cause: err });
      }
      throw err;
    }
  }

  private async synthesize(ctx: RunContext, claim: Claim, evidence: EvidenceSet): Promise<Synthesis> {
    try {
      return await this.deps.synthesizer.synthesize(claim, evidence, ctx.deadline);
    } catch (err) {
      if (!(err instanceof DeadlineExceeded) || ctx.signal?.aborted) {
        throw err;
      }
      logWarn('Pipeline', `Run ${ctx.runId} ran out of time during synthesis; reporting unverifiable`);
      const policy = this.deps.synthesizer.policy;
      return {
        verdict: 'unverifiable',
        confidence: policy.unverifiableConfidence,
        evidence,
        tally: { supports: 0, refutes: 0, other: 0, total: 0, stancedCount: 0, stancedKinds: 0 },
        reasoning: '',
      };
    }
  }

  private async explain(
    ctx: RunContext,
    claim: Claim,
    evidence: EvidenceSet,
    verdict: Verdict,
    confidence: number
  ): Promise<Explanation> {
    try {
      return await this.deps.explainer.explain(claim, evidence, verdict, confidence, ctx.deadline);
    } catch (err) {
      if (!(err instanceof DeadlineExceeded) || ctx.signal?.aborted) {
        throw err;
      }
      logWarn('Pipeline', `Run ${ctx.runId} ran out of time during explanation; using templates`);
      return {
        explanationEn: fallbackExplanationEn(verdict),
        explanationHi: fallbackExplanationHi(verdict),
        correction: fallbackCorrection(verdict, claim.assertion),
      };
    }
  }

  /** Emits the next state unless the caller has gone away. */
  private transition(ctx: RunContext, state: PipelineState, result?: FactCheckResult): void {
    if (ctx.signal?.aborted) {
      throw abortReason(ctx.signal);
    }
    this.emit(ctx, state, result ? { result } : {});
  }

  private emit(ctx: RunContext, state: PipelineState, extra: Pick<ProgressEvent, 'result' | 'error'>): void {
    if (!ctx.onEvent) {
      return;
    }
    const event: ProgressEvent = { runId: ctx.runId, sequence: ctx.sequence++, state, at: new Date(this.now()).toISOString(), ...extra };
    try {
      ctx.onEvent(event);
    } catch (err) {
      logWarn('Pipeline', `Progress listener threw on ${state}`, err);
    }
  }

  private recordTrending(result: FactCheckResult): void {
    try {
      this.deps.trending.record(result);
    } catch (err) {
      logError('Trending store write failed', { error: err });
    }
  }
}
