/**
 * KnowledgeService Database Adapter
 * Implements KnowledgeServiceDb interface using Supabase
 *
 * Publishing runs in the publish_article_version function
 * (supabase/migrations) so the optimistic check, supersede, insert and
 * lineage rows commit together.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type {
  KnowledgeArticle,
  LineageRelationship,
  LineageRow,
  LineageSourceKind,
  PaginatedResult,
  PaginationParams,
  PublishArticleParams,
  PublishOutcome,
} from '@/types/index.js';

import type { KnowledgeServiceDb } from './knowledge.service.js';

/**
 * Database row type for knowledge_articles
 */
interface KnowledgeArticleRow {
  article_id: string;
  version: number;
  title: string;
  body: string;
  steps: string[] | null;
  status: string;
  draft_id: string;
  decision_id: string;
  published_at: string;
  superseded_at: string | null;
}

/**
 * Database row type for article_lineage
 */
interface LineageRowRecord {
  id: string;
  article_id: string;
  article_version: number;
  source_kind: LineageSourceKind;
  source_id: string;
  relationship: LineageRelationship;
  evidence_snippet: string;
  created_at: string;
}

/**
 * JSON returned by publish_article_version
 */
type PublishRpcResult =
  | { status: 'published'; article: KnowledgeArticleRow; lineage: LineageRowRecord[] }
  | { status: 'conflict'; current_version: number | null };

/**
 * Map database row to KnowledgeArticle entity
 */
function mapRowToArticle(row: KnowledgeArticleRow): KnowledgeArticle {
  return {
    articleId: row.article_id,
    version: row.version,
    title: row.title,
    body: row.body,
    steps: row.steps ?? [],
    status: row.status === 'active' ? 'active' : 'superseded',
    draftId: row.draft_id,
    decisionId: row.decision_id,
    publishedAt: new Date(row.published_at),
    supersededAt: row.superseded_at !== null ? new Date(row.superseded_at) : null,
  };
}

/**
 * Map database row to LineageRow entity
 */
function mapRowToLineage(row: LineageRowRecord): LineageRow {
  return {
    id: row.id,
    articleId: row.article_id,
    articleVersion: row.article_version,
    sourceKind: row.source_kind,
    sourceId: row.source_id,
    relationship: row.relationship,
    evidenceSnippet: row.evidence_snippet,
    createdAt: new Date(row.created_at),
  };
}

/**
 * Create KnowledgeServiceDb instance
 */
export function createKnowledgeServiceDb(
  supabase: SupabaseClient
): KnowledgeServiceDb {
  return {
    async publishArticleVersion(
      params: PublishArticleParams
    ): Promise<PublishOutcome> {
      const { data, error } = await supabase.rpc('publish_article_version', {
        p_article_id: params.articleId,
        p_version: params.version,
        p_expected_prior_version: params.expectedPriorVersion,
        p_title: params.title,
        p_body: params.body,
        p_steps: params.steps,
        p_draft_id: params.draftId,
        p_decision_id: params.decisionId,
        p_lineage: params.lineage.map((row) => ({
          source_kind: row.sourceKind,
          source_id: row.sourceId,
          relationship: row.relationship,
          evidence_snippet: row.evidenceSnippet,
        })),
      });

      if (error !== null) {
        throw new Error(`Failed to publish article version: ${error.message}`);
      }

      const result = data as PublishRpcResult;
      if (result.status === 'conflict') {
        return { status: 'conflict', currentVersion: result.current_version };
      }
      return {
        status: 'published',
        article: mapRowToArticle(result.article),
        lineage: result.lineage.map(mapRowToLineage),
      };
    },

    async getActiveArticle(articleId: string): Promise<KnowledgeArticle | null> {
      const { data, error } = await supabase
        .from('knowledge_articles')
        .select()
        .eq('article_id', articleId)
        .eq('status', 'active')
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to get active article: ${error.message}`);
      }
      return data !== null ? mapRowToArticle(data as KnowledgeArticleRow) : null;
    },

    async getArticleVersion(
      articleId: string,
      version: number
    ): Promise<KnowledgeArticle | null> {
      const { data, error } = await supabase
        .from('knowledge_articles')
        .select()
        .eq('article_id', articleId)
        .eq('version', version)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to get article version: ${error.message}`);
      }
      return data !== null ? mapRowToArticle(data as KnowledgeArticleRow) : null;
    },

    async getVersionHistory(articleId: string): Promise<KnowledgeArticle[]> {
      const { data, error } = await supabase
        .from('knowledge_articles')
        .select()
        .eq('article_id', articleId)
        .order('version', { ascending: true });

      if (error !== null) {
        throw new Error(`Failed to get version history: ${error.message}`);
      }
      return ((data ?? []) as KnowledgeArticleRow[]).map(mapRowToArticle);
    },

    async listActiveArticles(
      params: PaginationParams
    ): Promise<PaginatedResult<KnowledgeArticle>> {
      let query = supabase
        .from('knowledge_articles')
        .select()
        .eq('status', 'active')
        .order('article_id', { ascending: true })
        .limit(params.limit + 1);

      if (params.cursor !== undefined) {
        query = query.gt('article_id', params.cursor);
      }

      const { data, error } = await query;
      if (error !== null) {
        throw new Error(`Failed to list active articles: ${error.message}`);
      }

      const rows = ((data ?? []) as KnowledgeArticleRow[]).map(mapRowToArticle);
      const hasMore = rows.length > params.limit;
      const items = rows.slice(0, params.limit);
      const last = items[items.length - 1];

      const result: PaginatedResult<KnowledgeArticle> = { items, hasMore };
      if (hasMore && last !== undefined) {
        result.nextCursor = last.articleId;
      }
      return result;
    },

    async getArticleByDraftId(draftId: string): Promise<KnowledgeArticle | null> {
      const { data, error } = await supabase
        .from('knowledge_articles')
        .select()
        .eq('draft_id', draftId)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to get article by draft: ${error.message}`);
      }
      return data !== null ? mapRowToArticle(data as KnowledgeArticleRow) : null;
    },

    async getLineage(articleId: string): Promise<LineageRow[]> {
      const { data, error } = await supabase
        .from('article_lineage')
        .select()
        .eq('article_id', articleId)
        .order('article_version', { ascending: true })
        .order('created_at', { ascending: true });

      if (error !== null) {
        throw new Error(`Failed to get lineage: ${error.message}`);
      }
      return ((data ?? []) as LineageRowRecord[]).map(mapRowToLineage);
    },
  };
}
