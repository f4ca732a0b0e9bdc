/**
 * Draft Types
 * Candidate knowledge articles awaiting review
 */

import type { GapOutcome } from './gap.js';
import type { SupportCase } from './source.js';

export interface DraftProvenance {
  caseId: string;
  conversationId: string | null;
  scriptId: string | null;
}

/**
 * Proposed article. Immutable once created; corrections produce a new
 * draft with an incremented draftVersion.
 */
export interface Draft {
  id: string;
  triggerCaseId: string;
  /** Null when the draft creates a new article */
  targetArticleId: string | null;
  /** Active version of the target seen at extraction time */
  targetArticleVersion: number | null;
  title: string;
  body: string;
  steps: string[];
  draftVersion: number;
  provenance: DraftProvenance;
  evidenceSnippet: string;
  supersedesDraftId: string | null;
  extraction: 'judgment' | 'fallback';
  createdAt: Date;
}

export type NewDraft = Omit<Draft, 'id' | 'createdAt'>;

export interface ExtractDraftParams {
  case: SupportCase;
  outcome: GapOutcome;
}

export interface ReextractParams {
  draftId: string;
  feedback?: string;
}
