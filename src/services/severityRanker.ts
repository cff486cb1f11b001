import { CrisisCategory } from '../interfaces/claim';
import { Severity, SEVERITIES, Verdict } from '../interfaces/factCheckResult';

/** Keyword classes the ranker matches against the claim text. */
export interface SeverityPolicy {
  /** Instructions whose acting-on would put someone in immediate physical risk. */
  actionDirectives: {
    evacuation: RegExp[];
    treatment: RegExp[];
    emergencyServices: RegExp[];
  };
  /** True statements that can still set off panic. */
  panic: RegExp[];
  /** Cosmetic inaccuracies: dates, counts, minor figures. */
  cosmetic: RegExp[];
}

export const DEFAULT_SEVERITY_POLICY: Readonly<SeverityPolicy> = Object.freeze({
  actionDirectives: {
    evacuation: [
      /\bevacuat\w*/i,
      /\b(flee|leave|abandon)\b.{0,40}\b(home|homes|house|city|town|village|area)\b/i,
      /\b(stay|remain)\s+(indoors|inside|at home)\b/i,
      /\b(do not|don't|dont|never)\s+(leave|evacuate|go out)\b/i,
      /\b(shelter|relief camp)s?\b.{0,40}\b(closed|full|unsafe|open)\b/i,
      /\b(route|road|bridge|highway)s?\b.{0,40}\b(closed|blocked|open|safe|unsafe|washed away)\b/i,
      /\bsafe (zone|area|route)s?\b/i,
      /\bcurfew\b/i,
    ],
    treatment: [
      /\b(dose|dosage|doses)\b/i,
      /\b(inject|injecting|injection)\b/i,
      /\b(take|drink|swallow|consume|gargle with)\s+\d+/i,
      /\b(stop|quit)\s+(taking|using)\b/i,
      /\b(avoid|skip|don't go to|do not go to)\s+(the\s+)?(hospital|doctor|vaccin\w*|treatment)\b/i,
      /\b(bleach|chlorine dioxide|methanol|kerosene|turpentine|mms)\b/i,
      /\boxygen (cylinder|concentrator|level)s?\b/i,
      /\bself[- ]medicat\w*/i,
    ],
    emergencyServices: [
      /\b(ambulance|ambulances|fire brigade|fire service|rescue team|ndrf|sdrf)\b.{0,40}\b(not|no longer|stopped|unavailable|suspended|busy)\b/i,
      /\b(hospital|hospitals|icu|emergency ward)s?\b.{0,40}\b(closed|full|shut|refusing|not admitting)\b/i,
      /\b(helpline|emergency number|112|108|911)\b.{0,40}\b(down|not working|fake|changed)\b/i,
      /\b(police|army)\b.{0,40}\b(withdrawn|not responding|left)\b/i,
    ],
  },
  panic: [
    /\b(death toll|dead|deaths|killed|casualties)\b/i,
    /\b(shortage|run out|running out|no (food|water|fuel|medicine))\b/i,
    /\b(dam|levee|embankment)\b.{0,40}\b(burst|breach|collapse|fail)\w*/i,
    /\b(aftershock|tsunami|outbreak|spreading|pandemic|riot)\w*/i,
    /\b(lockdown|martial law|shoot at sight)\b/i,
  ],
  cosmetic: [
    /\b(in|on|since)\s+(19|20)\d{2}\b/i,
    /\b(date|year|anniversary|founded|established)\b/i,
    /\b(about|around|approximately|nearly|over)\s+\d[\d,.]*\s*(percent|%|people|km|kilometres|kilometers|million|crore|lakh)?\b/i,
  ],
});

const IN_CRISIS: ReadonlySet<CrisisCategory> = new Set<CrisisCategory>(['health', 'naturalDisaster', 'civilUnrest']);

function matchesAny(patterns: readonly RegExp[], text: string): boolean {
  return patterns.some(pattern => pattern.test(text));
}

export function matchesActionDirective(text: string, policy: SeverityPolicy = DEFAULT_SEVERITY_POLICY): boolean {
  const { evacuation, treatment, emergencyServices } = policy.actionDirectives;
  return matchesAny(evacuation, text) || matchesAny(treatment, text) || matchesAny(emergencyServices, text);
}

/** Higher is more severe. */
export function severityOrder(severity: Severity): number {
  return SEVERITIES.length - SEVERITIES.indexOf(severity);
}

function highest(candidates: Severity[]): Severity {
  return candidates.reduce((top, candidate) => (severityOrder(candidate) > severityOrder(top) ? candidate : top), 'low');
}

/**
 * Danger of believing the claim as checked. Every rule that fires contributes a
 * candidate and the highest one wins. Pure; never fails.
 */
export function rankSeverity(
  category: CrisisCategory,
  verdict: Verdict,
  claimText: string,
  policy: SeverityPolicy = DEFAULT_SEVERITY_POLICY
): Severity {
  const inCrisis = IN_CRISIS.has(category);
  const directive = matchesActionDirective(claimText, policy);
  const panic = matchesAny(policy.panic, claimText);
  const cosmetic = matchesAny(policy.cosmetic, claimText);
  const candidates: Severity[] = [];

  switch (verdict) {
    case 'false':
    case 'mostlyFalse':
      if (inCrisis && directive) {
        candidates.push('critical');
      } else if (inCrisis || directive) {
        candidates.push('high');
      } else {
        candidates.push(cosmetic ? 'low' : 'medium');
      }
      break;
    case 'mixed':
      candidates.push(inCrisis && directive ? 'high' : 'medium');
      break;
    case 'mostlyTrue':
      candidates.push('medium');
      if (inCrisis && panic) {
        candidates.push('high');
      }
      break;
    case 'true':
      candidates.push(inCrisis && panic ? 'high' : 'low');
      break;
    case 'unverifiable':
      if (inCrisis && directive) {
        candidates.push('high');
      } else {
        candidates.push(inCrisis ? 'medium' : 'low');
      }
      break;
  }
  return highest(candidates);
}
