/**
 * Knowledge Article Types
 * Published articles and their append-only provenance
 */

import type { ReviewDecision } from './review.js';

/**
 * Article status - only one version per article is active
 */
export type ArticleStatus = 'active' | 'superseded';

/**
 * One published version of a knowledge article
 */
export interface KnowledgeArticle {
  articleId: string;
  version: number;
  title: string;
  body: string;
  steps: string[];
  status: ArticleStatus;
  draftId: string;
  decisionId: string;
  publishedAt: Date;
  supersededAt: Date | null;
}

export type LineageSourceKind =
  | 'case'
  | 'conversation'
  | 'script'
  | 'article'
  | 'draft';

export type LineageRelationship =
  | 'created_from'
  | 'updated_from'
  | 'derived_from_conversation'
  | 'references_script'
  | 'supersedes'
  | 'extracted_as';

/**
 * Provenance edge from an article version to a source
 * Never updated or deleted
 */
export interface LineageRow {
  id: string;
  articleId: string;
  articleVersion: number;
  sourceKind: LineageSourceKind;
  sourceId: string;
  relationship: LineageRelationship;
  evidenceSnippet: string;
  createdAt: Date;
}

export type NewLineageRow = Omit<
  LineageRow,
  'id' | 'createdAt' | 'articleId' | 'articleVersion'
>;

/**
 * (articleId, version) of a freshly published article
 */
export interface PublishedArticleRef {
  articleId: string;
  version: number;
}

/**
 * Everything the publish transaction writes
 */
export interface PublishArticleParams {
  articleId: string;
  version: number;
  /** Active version read at decision time; null when the article is new */
  expectedPriorVersion: number | null;
  title: string;
  body: string;
  steps: string[];
  draftId: string;
  decisionId: string;
  lineage: NewLineageRow[];
}

/**
 * Outcome of the publish transaction
 */
export type PublishOutcome =
  | { status: 'published'; article: KnowledgeArticle; lineage: LineageRow[] }
  | { status: 'conflict'; currentVersion: number | null };

/**
 * Everything recorded about how one version came to be
 */
export interface VersionProvenance {
  version: number;
  status: ArticleStatus;
  publishedAt: Date;
  draftId: string;
  decisionId: string;
  lineage: LineageRow[];
  /** Full review log of the draft, oldest first */
  decisions: ReviewDecision[];
}
