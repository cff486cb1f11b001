import { EvidenceItem } from '../interfaces/evidence';
import { FactCheckResult } from '../interfaces/factCheckResult';
import { CheckOutcome, ProgressEvent } from '../interfaces/pipeline';
import { overallReliability, sourceDiversity } from '../services/evidenceMetrics';

function presentEvidence(item: EvidenceItem) {
  return {
    source: item.sourceId,
    source_kind: item.sourceKind,
    title: item.title,
    url: item.url,
    snippet: item.snippet,
    publisher: item.publisher ?? null,
    published_at: item.publishedAt ?? null,
    stance: item.stance,
    source_weight: item.sourceWeight,
  };
}

/** Public JSON shape of a result, shared by the HTTP API and the CLI. */
export function toResponse(result: FactCheckResult) {
  return {
    claim: result.claim.assertion,
    raw_claim: result.claim.rawText,
    crisis_category: result.claim.crisisCategory,
    verdict: result.verdict,
    confidence: result.confidence,
    severity: result.severity,
    explanation: result.explanationEn,
    explanation_hindi: result.explanationHi,
    correction: result.correction,
    evidence: result.evidenceSet.map(presentEvidence),
    overall_reliability: overallReliability(result.evidenceSet),
    source_diversity: sourceDiversity(result.evidenceSet),
    sources_consulted: [...result.sourcesConsulted],
    created_at: result.createdAt,
  };
}

/** A result as returned by the check endpoints, with how it was obtained. */
export function toCheckResponse(outcome: CheckOutcome) {
  return {
    ...toResponse(outcome.result),
    cached: outcome.cached,
    processing_time_seconds: Math.round(outcome.processingMs / 10) / 100,
  };
}

/** Compact listing shape for trending, history and similar-claim lists. */
export function toSummary(result: FactCheckResult) {
  return {
    claim: result.claim.assertion,
    verdict: result.verdict,
    severity: result.severity,
    confidence: result.confidence,
    correction: result.correction,
  };
}

export function toEventPayload(event: ProgressEvent) {
  return {
    run_id: event.runId,
    sequence: event.sequence,
    state: event.state,
    at: event.at,
    ...(event.result ? { result: toResponse(event.result) } : {}),
    ...(event.error ? { error: event.error } : {}),
  };
}
