/**
 * Plain-text rendering of a comparison for terminals and logs
 */

import type { ComparisonResult, RankedCandidate } from '@/types/index.js';

const SCRIPT_PREVIEW_CHARS = 150;

const NO_MATCH_MESSAGES: Record<NonNullable<ComparisonResult['reason']>, string> = {
  no_candidates: 'No similar cases found.',
  judged_no_match: 'No relevant matches found. The issue may require escalation or a new solution.',
  invalid_response: 'Could not interpret the comparison. Treating as no match.',
  judgment_unavailable: 'Comparison is currently unavailable. Treating as no match.',
  retrieval_error: 'Similar cases could not be retrieved. Treating as no match.',
};

function formatRanked(item: RankedCandidate): string[] {
  const { candidate } = item;
  const lines = [
    `RANK ${item.rank}: ${candidate.sourceId}`,
    `  Module: ${candidate.module} | Category: ${candidate.category}`,
    `  Rationale: ${item.rationale}`,
    `  KB Article: ${candidate.kbArticleId ?? 'None'}`,
    `  Script: ${candidate.scriptId ?? 'None'}`,
  ];

  if (candidate.scriptId !== null && candidate.scriptText) {
    const preview = candidate.scriptText
      .slice(0, SCRIPT_PREVIEW_CHARS)
      .replace(/\n/g, ' ');
    lines.push(`  Script Preview: ${preview}...`);
  }

  return lines;
}

export function formatComparison(result: ComparisonResult): string {
  if (result.winner === null) {
    return NO_MATCH_MESSAGES[result.reason ?? 'judged_no_match'];
  }

  const lines = ['=== RANKED RESULTS ===', ''];
  for (const item of result.ranked) {
    lines.push(...formatRanked(item), '');
  }
  return lines.join('\n');
}
