/**
 * DraftService Database Adapter
 * Implements DraftServiceDb interface using Supabase
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type { Draft, DraftProvenance, NewDraft } from '@/types/index.js';

import type { DraftServiceDb } from './draft.service.js';

/**
 * Postgres unique_violation
 */
const UNIQUE_VIOLATION = '23505';

/**
 * Database row type for knowledge_drafts
 */
interface DraftRow {
  id: string;
  trigger_case_id: string;
  target_article_id: string | null;
  target_article_version: number | null;
  title: string;
  body: string;
  steps: string[] | null;
  draft_version: number;
  provenance: DraftProvenance;
  evidence_snippet: string;
  supersedes_draft_id: string | null;
  extraction: string;
  created_at: string;
}

/**
 * Map database row to Draft entity
 */
function mapRowToDraft(row: DraftRow): Draft {
  return {
    id: row.id,
    triggerCaseId: row.trigger_case_id,
    targetArticleId: row.target_article_id,
    targetArticleVersion: row.target_article_version,
    title: row.title,
    body: row.body,
    steps: row.steps ?? [],
    draftVersion: row.draft_version,
    provenance: row.provenance,
    evidenceSnippet: row.evidence_snippet,
    supersedesDraftId: row.supersedes_draft_id,
    extraction: row.extraction === 'fallback' ? 'fallback' : 'judgment',
    createdAt: new Date(row.created_at),
  };
}

/**
 * Create DraftServiceDb instance
 */
export function createDraftServiceDb(supabase: SupabaseClient): DraftServiceDb {
  return {
    async insertDraft(draft: NewDraft): Promise<Draft | null> {
      const { data, error } = await supabase
        .from('knowledge_drafts')
        .insert({
          trigger_case_id: draft.triggerCaseId,
          target_article_id: draft.targetArticleId,
          target_article_version: draft.targetArticleVersion,
          title: draft.title,
          body: draft.body,
          steps: draft.steps,
          draft_version: draft.draftVersion,
          provenance: draft.provenance,
          evidence_snippet: draft.evidenceSnippet,
          supersedes_draft_id: draft.supersedesDraftId,
          extraction: draft.extraction,
        })
        .select()
        .single();

      if (error !== null) {
        if (error.code === UNIQUE_VIOLATION) {
          return null;
        }
        throw new Error(`Failed to insert draft: ${error.message}`);
      }
      return mapRowToDraft(data as DraftRow);
    },

    async getDraft(draftId: string): Promise<Draft | null> {
      const { data, error } = await supabase
        .from('knowledge_drafts')
        .select()
        .eq('id', draftId)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to get draft: ${error.message}`);
      }
      return data !== null ? mapRowToDraft(data as DraftRow) : null;
    },

    async getLatestDraftForCase(caseId: string): Promise<Draft | null> {
      const { data, error } = await supabase
        .from('knowledge_drafts')
        .select()
        .eq('trigger_case_id', caseId)
        .order('draft_version', { ascending: false })
        .limit(1)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to get latest draft: ${error.message}`);
      }
      return data !== null ? mapRowToDraft(data as DraftRow) : null;
    },

    async listDraftsForCase(caseId: string): Promise<Draft[]> {
      const { data, error } = await supabase
        .from('knowledge_drafts')
        .select()
        .eq('trigger_case_id', caseId)
        .order('draft_version', { ascending: true });

      if (error !== null) {
        throw new Error(`Failed to list drafts: ${error.message}`);
      }
      return ((data ?? []) as DraftRow[]).map(mapRowToDraft);
    },
  };
}
