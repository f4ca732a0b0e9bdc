/**
 * Source Record Types
 * Cases, scripts and documented resolution steps
 */

/**
 * Kind of record a chunk can be derived from
 */
export type SourceKind = 'case' | 'script' | 'article';

export const SOURCE_KINDS: readonly SourceKind[] = ['case', 'script', 'article'];

/**
 * A support case (ticket) with its resolution
 */
export interface SupportCase {
  id: string;
  subject: string;
  /** The customer's question or complaint */
  description: string;
  resolution: string;
  steps: string[];
  status: string;
  tier: string;
  module: string;
  category: string;
  conversationId: string | null;
  scriptId: string | null;
  /** Knowledge article already linked to the case, if any */
  kbArticleId: string | null;
  transcript: string | null;
  resolvedAt: Date | null;
}

/**
 * A scripted troubleshooting procedure
 */
export interface SupportScript {
  id: string;
  title: string | null;
  body: string;
}

/**
 * Documented resolution steps appended after a case is worked
 */
export interface CaseStepsEntry {
  id: string;
  caseId: string;
  stepsText: string;
  resolutionSummary: string;
  createdAt: Date;
}

/**
 * Parameters for documenting a case resolution
 */
export interface RecordResolutionParams {
  stepsText: string;
  resolutionSummary: string;
}

/**
 * Resolution text the learning loop works from: the case's own
 * resolution, else the latest documented resolution summary
 * `caseSteps` are in recording order
 */
export function effectiveResolution(
  supportCase: SupportCase,
  caseSteps: readonly CaseStepsEntry[]
): string {
  const own = supportCase.resolution.trim();
  if (own) {
    return own;
  }
  const documented = caseSteps
    .map((entry) => entry.resolutionSummary.trim())
    .filter((summary) => summary.length > 0);
  return documented[documented.length - 1] ?? '';
}

/**
 * Case with its resolution filled in from documented steps
 */
export function withEffectiveResolution(
  supportCase: SupportCase,
  caseSteps: readonly CaseStepsEntry[]
): SupportCase {
  return { ...supportCase, resolution: effectiveResolution(supportCase, caseSteps) };
}
