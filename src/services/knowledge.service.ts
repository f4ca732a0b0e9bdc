/**
 * KnowledgeService Implementation
 * Publisher and read side of the versioned knowledge base
 *
 * SCOPE: Knowledge articles and their lineage
 *
 * Owns: knowledge_articles, article_lineage
 *
 * GUARDRAILS:
 * - publish requires 'knowledge:publish' and an approved, effective
 *   decision for the draft
 * - The active-version check, the supersede, the insert and the lineage
 *   rows are one transaction; a changed active version is
 *   PUBLISH_CONFLICT and is never retried against a newer version
 * - Versions of an article increase by one; at most one is active
 * - Lineage is append-only
 * - AI_ACTOR may read but never publish
 *
 * Dependencies: AuditService, review decision log
 */

import type {
  ActorContext,
  AuditEvent,
  Draft,
  KnowledgeArticle,
  LineageRow,
  NewLineageRow,
  PaginatedResult,
  PaginationParams,
  PublishArticleParams,
  PublishedArticleRef,
  PublishOutcome,
  Result,
  ReviewDecision,
  VersionProvenance,
} from '@/types/index.js';
import {
  success,
  failure,
  errorMessage,
  hasPermission,
  PERMISSIONS,
} from '@/types/index.js';

/**
 * Database abstraction interface for KnowledgeService
 */
export interface KnowledgeServiceDb {
  /** Single transaction: check, supersede, insert, lineage */
  publishArticleVersion: (params: PublishArticleParams) => Promise<PublishOutcome>;
  getActiveArticle: (articleId: string) => Promise<KnowledgeArticle | null>;
  getArticleVersion: (
    articleId: string,
    version: number
  ) => Promise<KnowledgeArticle | null>;
  /** Oldest first */
  getVersionHistory: (articleId: string) => Promise<KnowledgeArticle[]>;
  listActiveArticles: (
    params: PaginationParams
  ) => Promise<PaginatedResult<KnowledgeArticle>>;
  getArticleByDraftId: (draftId: string) => Promise<KnowledgeArticle | null>;
  getLineage: (articleId: string) => Promise<LineageRow[]>;
}

/**
 * Review decision log reads
 */
export interface KnowledgeServiceDecisions {
  getEffectiveDecision: (draftId: string) => Promise<ReviewDecision | null>;
  listDecisions: (draftId: string) => Promise<ReviewDecision[]>;
}

/**
 * Minimal AuditService interface
 */
export interface KnowledgeServiceAudit {
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
}

export interface PublishParams {
  decision: ReviewDecision;
  draft: Draft;
}

/**
 * KnowledgeService interface
 */
export interface KnowledgeService {
  publish(
    actor: ActorContext,
    params: PublishParams
  ): Promise<Result<PublishedArticleRef>>;
  getActiveArticle(
    actor: ActorContext,
    articleId: string
  ): Promise<Result<KnowledgeArticle>>;
  getArticleVersion(
    actor: ActorContext,
    articleId: string,
    version: number
  ): Promise<Result<KnowledgeArticle>>;
  getVersionHistory(
    actor: ActorContext,
    articleId: string
  ): Promise<Result<KnowledgeArticle[]>>;
  getLineage(
    actor: ActorContext,
    articleId: string,
    version?: number
  ): Promise<Result<LineageRow[]>>;
  getProvenance(
    actor: ActorContext,
    articleId: string
  ): Promise<Result<VersionProvenance[]>>;
}

/**
 * Provenance rows written with a new version
 */
export function buildLineage(
  draft: Draft,
  decision: ReviewDecision
): NewLineageRow[] {
  const { provenance } = draft;
  const rows: NewLineageRow[] = [
    {
      sourceKind: 'case',
      sourceId: provenance.caseId,
      relationship:
        decision.expectedPriorVersion === null ? 'created_from' : 'updated_from',
      evidenceSnippet: draft.evidenceSnippet,
    },
  ];

  if (provenance.conversationId !== null) {
    rows.push({
      sourceKind: 'conversation',
      sourceId: provenance.conversationId,
      relationship: 'derived_from_conversation',
      evidenceSnippet: '',
    });
  }

  if (provenance.scriptId !== null) {
    rows.push({
      sourceKind: 'script',
      sourceId: provenance.scriptId,
      relationship: 'references_script',
      evidenceSnippet: '',
    });
  }

  if (decision.articleId !== null && decision.expectedPriorVersion !== null) {
    rows.push({
      sourceKind: 'article',
      sourceId: decision.articleId,
      relationship: 'supersedes',
      evidenceSnippet: `Supersedes version ${decision.expectedPriorVersion}`,
    });
  }

  rows.push({
    sourceKind: 'draft',
    sourceId: draft.id,
    relationship: 'extracted_as',
    evidenceSnippet: draft.title,
  });

  return rows;
}

/**
 * Create KnowledgeService instance
 */
export function createKnowledgeService(deps: {
  db: KnowledgeServiceDb;
  decisions: KnowledgeServiceDecisions;
  auditService: KnowledgeServiceAudit;
}): KnowledgeService {
  const { db, decisions, auditService } = deps;

  function canRead(actor: ActorContext): boolean {
    return actor.type === 'ai' || hasPermission(actor, PERMISSIONS.KNOWLEDGE_READ);
  }

  function readDenied() {
    return failure('PERMISSION_DENIED', 'Missing knowledge:read permission');
  }

  return {
    async publish(
      actor: ActorContext,
      params: PublishParams
    ): Promise<Result<PublishedArticleRef>> {
      if (actor.type === 'ai') {
        return failure('PERMISSION_DENIED', 'AI cannot publish knowledge');
      }
      if (!hasPermission(actor, PERMISSIONS.KNOWLEDGE_PUBLISH)) {
        return failure('PERMISSION_DENIED', 'Missing knowledge:publish permission');
      }

      const { decision, draft } = params;

      if (decision.draftId !== draft.id) {
        return failure('VALIDATION_ERROR', 'Decision does not belong to this draft', {
          decisionId: decision.id,
          draftId: draft.id,
        });
      }
      if (decision.decision !== 'approved') {
        return failure('INVALID_STATE', `Draft ${draft.id} is not approved`);
      }

      const { articleId, assignedVersion, expectedPriorVersion } = decision;
      if (articleId === null || assignedVersion === null) {
        return failure('INVALID_STATE', 'Approved decision has no assigned version', {
          decisionId: decision.id,
        });
      }
      if (assignedVersion !== (expectedPriorVersion ?? 0) + 1) {
        return failure('INVALID_STATE', 'Assigned version does not follow the prior version', {
          assignedVersion,
          expectedPriorVersion,
        });
      }

      const effective = await decisions.getEffectiveDecision(draft.id);
      if (effective?.id !== decision.id) {
        return failure('INVALID_STATE', 'Decision has been superseded', {
          decisionId: decision.id,
          effectiveDecisionId: effective?.id ?? null,
        });
      }

      const existing = await db.getArticleByDraftId(draft.id);
      if (existing !== null) {
        return failure('ALREADY_EXISTS', `Draft ${draft.id} is already published`, {
          articleId: existing.articleId,
          version: existing.version,
        });
      }

      let outcome: PublishOutcome;
      try {
        outcome = await db.publishArticleVersion({
          articleId,
          version: assignedVersion,
          expectedPriorVersion,
          title: draft.title,
          body: draft.body,
          steps: draft.steps,
          draftId: draft.id,
          decisionId: decision.id,
          lineage: buildLineage(draft, decision),
        });
      } catch (error) {
        return failure('INTERNAL_ERROR', `Failed to publish: ${errorMessage(error)}`, {
          articleId,
          version: assignedVersion,
        });
      }

      if (outcome.status === 'conflict') {
        return failure(
          'PUBLISH_CONFLICT',
          `Active version of ${articleId} changed since the decision`,
          {
            articleId,
            expectedPriorVersion,
            currentVersion: outcome.currentVersion,
          }
        );
      }

      await auditService.log(actor, {
        action: 'knowledge.published',
        resourceType: 'knowledge_article',
        resourceId: articleId,
        details: {
          version: assignedVersion,
          draftId: draft.id,
          decisionId: decision.id,
          lineageRows: outcome.lineage.length,
        },
      });

      return success({ articleId, version: assignedVersion });
    },

    async getActiveArticle(
      actor: ActorContext,
      articleId: string
    ): Promise<Result<KnowledgeArticle>> {
      if (!canRead(actor)) {
        return readDenied();
      }
      const article = await db.getActiveArticle(articleId);
      if (article === null) {
        return failure('NOT_FOUND', `Article not found: ${articleId}`);
      }
      return success(article);
    },

    async getArticleVersion(
      actor: ActorContext,
      articleId: string,
      version: number
    ): Promise<Result<KnowledgeArticle>> {
      if (!canRead(actor)) {
        return readDenied();
      }
      const article = await db.getArticleVersion(articleId, version);
      if (article === null) {
        return failure('NOT_FOUND', `Article version not found: ${articleId} v${version}`);
      }
      return success(article);
    },

    async getVersionHistory(
      actor: ActorContext,
      articleId: string
    ): Promise<Result<KnowledgeArticle[]>> {
      if (!canRead(actor)) {
        return readDenied();
      }
      const versions = await db.getVersionHistory(articleId);
      if (versions.length === 0) {
        return failure('NOT_FOUND', `Article not found: ${articleId}`);
      }
      return success(versions);
    },

    async getLineage(
      actor: ActorContext,
      articleId: string,
      version?: number
    ): Promise<Result<LineageRow[]>> {
      if (!canRead(actor)) {
        return readDenied();
      }
      const rows = await db.getLineage(articleId);
      return success(
        version === undefined ? rows : rows.filter((r) => r.articleVersion === version)
      );
    },

    /**
     * Reconstructed from the lineage and decision logs only
     */
    async getProvenance(
      actor: ActorContext,
      articleId: string
    ): Promise<Result<VersionProvenance[]>> {
      if (!canRead(actor)) {
        return readDenied();
      }

      const versions = await db.getVersionHistory(articleId);
      if (versions.length === 0) {
        return failure('NOT_FOUND', `Article not found: ${articleId}`);
      }
      const lineage = await db.getLineage(articleId);

      const provenance: VersionProvenance[] = [];
      for (const article of versions) {
        provenance.push({
          version: article.version,
          status: article.status,
          publishedAt: article.publishedAt,
          draftId: article.draftId,
          decisionId: article.decisionId,
          lineage: lineage.filter((r) => r.articleVersion === article.version),
          decisions: await decisions.listDecisions(article.draftId),
        });
      }
      return success(provenance);
    },
  };
}
