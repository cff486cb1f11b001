import { describe, expect, it } from 'vitest';
import { CACHED_RUN_ORDER, FRESH_RUN_ORDER, ProgressEvent } from '../../../src/interfaces/pipeline';
import { ClaimExtractor } from '../../../src/services/claimExtractor';
import { EvidenceSynthesizer } from '../../../src/services/evidenceSynthesizer';
import { ExplanationGenerator } from '../../../src/services/explanationGenerator';
import { FactCheckPipeline, PipelineDeps, toFailureSummary } from '../../../src/services/pipeline';
import { ResultCache } from '../../../src/services/resultCache';
import { SourceAdapter } from '../../../src/services/sources/sourceAdapter';
import { TrendingRecorder, TrendingStore } from '../../../src/services/trendingStore';
import { ExtractionFailure, PipelineCancelled, SynthesisFailure, ValidationError } from '../../../src/utils/errors';
import { normalizeClaimText } from '../../../src/utils/normalize';
import { EXTRACTION_PROMPT, FakeLanguageModel, hang, ScriptedAdapter, SYNTHESIS_PROMPT } from '../../helpers/fakes';
import {
  encyclopediaItem,
  factCheckItem,
  failing,
  LEMON,
  lemonAdapters,
  lemonExtraction,
  lemonModel,
  newsItem,
  NOW,
  returning,
} from '../../helpers/scenario';

interface Harness {
  pipeline: FactCheckPipeline;
  cache: ResultCache;
  trending: TrendingStore;
  events: ProgressEvent[];
  onEvent: (event: ProgressEvent) => void;
}

function harness(
  llm: FakeLanguageModel,
  adapters: SourceAdapter[],
  overrides: { pipelineBudgetMs?: number; trending?: TrendingRecorder } = {}
): Harness {
  const cache = new ResultCache({ maxEntries: 10, defaultTtlMs: 60_000, now: () => NOW });
  const trending = new TrendingStore({ maxEntries: 10, halfLifeMs: 60_000, now: () => NOW });
  const deps: PipelineDeps = {
    extractor: new ClaimExtractor(llm),
    synthesizer: new EvidenceSynthesizer(llm, { now: () => NOW }),
    explainer: new ExplanationGenerator(llm),
    adapters,
    cache,
    trending: overrides.trending ?? trending,
  };
  let runs = 0;
  const pipeline = new FactCheckPipeline(deps, {
    maxClaimLength: 100,
    perSourceTimeoutMs: 1000,
    searchBudgetMs: 2000,
    pipelineBudgetMs: overrides.pipelineBudgetMs ?? 5000,
    now: () => NOW,
    newRunId: () => `run-${++runs}`,
  });
  const events: ProgressEvent[] = [];
  return { pipeline, cache, trending, events, onEvent: event => events.push(event) };
}

describe('FactCheckPipeline', () => {
  it('checks the lemon claim end to end', async () => {
    const h = harness(lemonModel(), lemonAdapters());
    const result = await h.pipeline.check(LEMON, { onEvent: h.onEvent });

    expect(result.verdict).toBe('false');
    expect(result.confidence).toBe(0.601);
    expect(result.severity).toBe('high');
    expect(result.claim.crisisCategory).toBe('health');
    expect(result.correction).toContain('DOES NOT cure');
    expect(result.explanationEn.startsWith('Verdict: FALSE.\n')).toBe(true);
    expect(result.explanationHi.startsWith('निर्णय: असत्य।\n')).toBe(true);
    expect(result.evidenceSet.map(item => item.url)).toEqual([factCheckItem.url, encyclopediaItem.url, newsItem.url]);
    expect(result.sourcesConsulted).toEqual(['googleFactCheck', 'wikipedia', 'newsApi']);
    expect(result.createdAt).toBe('2026-01-15T00:00:00.000Z');
    expect(Object.isFrozen(result)).toBe(true);
  });

  it('emits one event per state in order, ending with the result', async () => {
    const h = harness(lemonModel(), lemonAdapters());
    const result = await h.pipeline.check(LEMON, { onEvent: h.onEvent });

    expect(h.events.map(event => event.state)).toEqual(FRESH_RUN_ORDER);
    expect(h.events.map(event => event.sequence)).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
    expect(new Set(h.events.map(event => event.runId))).toEqual(new Set(['run-1']));
    expect(h.events[7].result).toBe(result);
    expect(h.events.slice(0, 7).every(event => event.result === undefined)).toBe(true);
  });

  it('answers a repeated claim from the cache', async () => {
    const llm = lemonModel();
    const h = harness(llm, lemonAdapters());
    const first = await h.pipeline.check(LEMON);
    const second = await h.pipeline.check(`  "${LEMON.toUpperCase()}"  `, { onEvent: h.onEvent });

    expect(second).toBe(first);
    expect(h.events.map(event => event.state)).toEqual(CACHED_RUN_ORDER);
    expect(llm.callsMatching(EXTRACTION_PROMPT)).toBe(1);
    expect(h.trending.entry(first.claim.normalizedText)?.seenCount).toBe(2);
  });

  it('reports whether a run was answered from the cache', async () => {
    const h = harness(lemonModel(), lemonAdapters());
    const fresh = await h.pipeline.run(LEMON);
    const repeat = await h.pipeline.run(LEMON);

    expect(fresh.cached).toBe(false);
    expect(repeat).toEqual({ result: fresh.result, cached: true, processingMs: 0 });
    expect(repeat.result).toBe(fresh.result);
    expect(Object.keys(fresh.result)).not.toContain('cached');
  });

  it('runs every stage and replaces the cached result when asked to skip the cache', async () => {
    const llm = lemonModel();
    const h = harness(llm, lemonAdapters());
    const first = await h.pipeline.check(LEMON);
    const outcome = await h.pipeline.run(LEMON, { skipCache: true, onEvent: h.onEvent });

    expect(outcome.cached).toBe(false);
    expect(outcome.result).not.toBe(first);
    expect(outcome.result).toEqual(first);
    expect(h.events.map(event => event.state)).toEqual(FRESH_RUN_ORDER);
    expect(llm.callsMatching(EXTRACTION_PROMPT)).toBe(2);
    expect(await h.cache.get(normalizeClaimText(LEMON))).toBe(outcome.result);
  });

  it('completes as unverifiable when every source is unreachable', async () => {
    const llm = lemonModel();
    const h = harness(llm, [
      new ScriptedAdapter('googleFactCheck', 'factCheckRegistry', 0.9, failing('googleFactCheck')),
      new ScriptedAdapter('wikipedia', 'encyclopedia', 0.75, failing('wikipedia')),
    ]);
    const result = await h.pipeline.check(LEMON, { onEvent: h.onEvent });

    expect(result.verdict).toBe('unverifiable');
    expect(result.confidence).toBe(0.1);
    expect(result.severity).toBe('medium');
    expect(result.evidenceSet).toEqual([]);
    expect(result.sourcesConsulted).toEqual([]);
    expect(h.events.at(-1)?.state).toBe('Completed');
    expect(llm.callsMatching(SYNTHESIS_PROMPT)).toBe(0);
  });

  it('still reaches a verdict when all but one source fails', async () => {
    const h = harness(lemonModel(), [
      new ScriptedAdapter('googleFactCheck', 'factCheckRegistry', 0.9, failing('googleFactCheck')),
      new ScriptedAdapter('wikipedia', 'encyclopedia', 0.75, returning(encyclopediaItem)),
      new ScriptedAdapter('newsApi', 'news', 0.7, failing('newsApi')),
    ]);
    const result = await h.pipeline.check(LEMON);

    expect(result.verdict).toBe('false');
    expect(result.confidence).toBe(0.65);
    expect(result.sourcesConsulted).toEqual(['wikipedia']);
  });

  it('fails the run when extraction fails twice', async () => {
    const llm = new FakeLanguageModel().on(EXTRACTION_PROMPT, () => ({ claim: '' }));
    const h = harness(llm, lemonAdapters());

    await expect(h.pipeline.check(LEMON, { onEvent: h.onEvent })).rejects.toBeInstanceOf(ExtractionFailure);
    expect(h.events.map(event => event.state)).toEqual(['Received', 'Extracting', 'Failed']);
    expect(h.events[2].error).toEqual({
      kind: 'ExtractionFailure',
      stage: 'Extracting',
      message: 'Could not extract a verifiable claim from the input',
    });
    expect(llm.callsMatching(EXTRACTION_PROMPT)).toBe(2);
    expect(h.cache.size).toBe(0);
  });

  it('fails the run when synthesis fails', async () => {
    const broken = new FakeLanguageModel()
      .on(EXTRACTION_PROMPT, lemonExtraction)
      .on(SYNTHESIS_PROMPT, () => ({ verdict: 'false' }));
    const h = harness(broken, lemonAdapters());

    await expect(h.pipeline.check(LEMON, { onEvent: h.onEvent })).rejects.toBeInstanceOf(SynthesisFailure);
    expect(h.events.at(-2)?.state).toBe('Synthesizing');
    expect(h.events.at(-1)?.error?.kind).toBe('SynthesisFailure');
  });

  it.each([
    ['   ', 'Claim text must not be empty'],
    ['x'.repeat(101), 'Claim text must be at most 100 characters'],
    ['?!...', 'Claim text must contain words, not only punctuation'],
  ])('rejects invalid input %# before the run starts', async (text, message) => {
    const h = harness(lemonModel(), lemonAdapters());
    const attempt = h.pipeline.check(text, { onEvent: h.onEvent });

    await expect(attempt).rejects.toBeInstanceOf(ValidationError);
    await expect(attempt).rejects.toThrow(message);
    expect(h.events).toEqual([]);
  });

  it('stops without a Failed event when the caller cancels', async () => {
    const adapters = lemonAdapters();
    const h = harness(lemonModel(), adapters);
    const controller = new AbortController();
    const attempt = h.pipeline.check(LEMON, {
      signal: controller.signal,
      onEvent: event => {
        h.events.push(event);
        if (event.state === 'Searching') {
          controller.abort();
        }
      },
    });

    await expect(attempt).rejects.toBeInstanceOf(PipelineCancelled);
    expect(h.events.map(event => event.state)).toEqual(['Received', 'Extracting', 'Querying', 'Searching']);
    expect(adapters.every(adapter => adapter.calls.length === 0)).toBe(true);
  });

  it('rejects a run whose signal is already aborted', async () => {
    const h = harness(lemonModel(), lemonAdapters());
    const controller = new AbortController();
    controller.abort();

    await expect(h.pipeline.check(LEMON, { signal: controller.signal, onEvent: h.onEvent })).rejects.toBeInstanceOf(
      PipelineCancelled
    );
    expect(h.events).toEqual([]);
  });

  it('degrades to unverifiable with template text when the run deadline passes', async () => {
    const slow = new FakeLanguageModel().on(EXTRACTION_PROMPT, lemonExtraction).on(SYNTHESIS_PROMPT, hang);
    const h = harness(slow, lemonAdapters(), { pipelineBudgetMs: 200 });
    const result = await h.pipeline.check(LEMON, { onEvent: h.onEvent });

    expect(result.verdict).toBe('unverifiable');
    expect(result.confidence).toBe(0.1);
    expect(result.severity).toBe('medium');
    expect(result.explanationEn).toBe('Verdict: UNVERIFIABLE. See sources.');
    expect(result.explanationHi).toBe('निर्णय: असत्यापित। स्रोत देखें।');
    expect(h.events.at(-1)?.state).toBe('Completed');
  });

  it('does not fail a run because a listener or the trending store throws', async () => {
    const h = harness(lemonModel(), lemonAdapters(), {
      trending: {
        record: () => {
          throw new Error('trending unavailable');
        },
      },
    });
    const result = await h.pipeline.check(LEMON, {
      onEvent: () => {
        throw new Error('listener bug');
      },
    });

    expect(result.verdict).toBe('false');
  });

  it('reports the configured source ids', () => {
    expect(harness(lemonModel(), lemonAdapters()).pipeline.sourceIds).toEqual(['googleFactCheck', 'wikipedia', 'newsApi']);
  });
});

describe('toFailureSummary', () => {
  it('hides the details of unexpected errors', () => {
    expect(toFailureSummary(new TypeError('x is undefined'))).toEqual({
      kind: 'InternalError',
      message: 'The check could not be completed',
    });
  });
});
