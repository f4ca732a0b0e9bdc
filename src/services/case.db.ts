/**
 * CaseService Database Adapter
 * Implements CaseServiceDb interface using Supabase
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type {
  CaseStepsEntry,
  PaginatedResult,
  PaginationParams,
  RecordResolutionParams,
  SupportCase,
  SupportScript,
} from '@/types/index.js';

import type { CaseServiceDb } from './case.service.js';

/**
 * Database row type for support_cases
 */
interface SupportCaseRow {
  id: string;
  subject: string | null;
  description: string | null;
  resolution: string | null;
  steps: string[] | null;
  status: string | null;
  tier: string | null;
  module: string | null;
  category: string | null;
  conversation_id: string | null;
  script_id: string | null;
  kb_article_id: string | null;
  transcript: string | null;
  resolved_at: string | null;
}

/**
 * Database row type for support_scripts
 */
interface SupportScriptRow {
  id: string;
  title: string | null;
  body: string | null;
}

/**
 * Database row type for case_steps
 */
interface CaseStepsRow {
  id: string;
  case_id: string;
  steps_text: string;
  resolution_summary: string;
  created_at: string;
}

/**
 * Map database row to SupportCase entity
 */
function mapRowToCase(row: SupportCaseRow): SupportCase {
  return {
    id: row.id,
    subject: row.subject ?? '',
    description: row.description ?? '',
    resolution: row.resolution ?? '',
    steps: row.steps ?? [],
    status: row.status ?? '',
    tier: row.tier ?? '',
    module: row.module ?? '',
    category: row.category ?? '',
    conversationId: row.conversation_id,
    scriptId: row.script_id,
    kbArticleId: row.kb_article_id,
    transcript: row.transcript,
    resolvedAt: row.resolved_at !== null ? new Date(row.resolved_at) : null,
  };
}

function mapRowToScript(row: SupportScriptRow): SupportScript {
  return {
    id: row.id,
    title: row.title,
    body: row.body ?? '',
  };
}

function mapRowToSteps(row: CaseStepsRow): CaseStepsEntry {
  return {
    id: row.id,
    caseId: row.case_id,
    stepsText: row.steps_text,
    resolutionSummary: row.resolution_summary,
    createdAt: new Date(row.created_at),
  };
}

/**
 * Keyset page over a text primary key
 */
function toPage<T extends { id: string }>(
  rows: T[],
  limit: number
): PaginatedResult<T> {
  const hasMore = rows.length > limit;
  const items = rows.slice(0, limit);
  const last = items[items.length - 1];

  const result: PaginatedResult<T> = { items, hasMore };
  if (hasMore && last !== undefined) {
    result.nextCursor = last.id;
  }
  return result;
}

/**
 * Create CaseServiceDb instance
 */
export function createCaseServiceDb(supabase: SupabaseClient): CaseServiceDb {
  return {
    async getCase(caseId: string): Promise<SupportCase | null> {
      const { data, error } = await supabase
        .from('support_cases')
        .select()
        .eq('id', caseId)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to get case: ${error.message}`);
      }
      return data !== null ? mapRowToCase(data as SupportCaseRow) : null;
    },

    async getScript(scriptId: string): Promise<SupportScript | null> {
      const { data, error } = await supabase
        .from('support_scripts')
        .select()
        .eq('id', scriptId)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to get script: ${error.message}`);
      }
      return data !== null ? mapRowToScript(data as SupportScriptRow) : null;
    },

    async listCases(
      params: PaginationParams
    ): Promise<PaginatedResult<SupportCase>> {
      let query = supabase
        .from('support_cases')
        .select()
        .order('id', { ascending: true })
        .limit(params.limit + 1);

      if (params.cursor !== undefined) {
        query = query.gt('id', params.cursor);
      }

      const { data, error } = await query;
      if (error !== null) {
        throw new Error(`Failed to list cases: ${error.message}`);
      }

      return toPage((data as SupportCaseRow[]).map(mapRowToCase), params.limit);
    },

    async listScripts(
      params: PaginationParams
    ): Promise<PaginatedResult<SupportScript>> {
      let query = supabase
        .from('support_scripts')
        .select()
        .order('id', { ascending: true })
        .limit(params.limit + 1);

      if (params.cursor !== undefined) {
        query = query.gt('id', params.cursor);
      }

      const { data, error } = await query;
      if (error !== null) {
        throw new Error(`Failed to list scripts: ${error.message}`);
      }

      return toPage(
        (data as SupportScriptRow[]).map(mapRowToScript),
        params.limit
      );
    },

    async addCaseSteps(
      caseId: string,
      params: RecordResolutionParams
    ): Promise<CaseStepsEntry> {
      const { data, error } = await supabase
        .from('case_steps')
        .insert({
          case_id: caseId,
          steps_text: params.stepsText,
          resolution_summary: params.resolutionSummary,
        })
        .select()
        .single();

      if (error !== null) {
        throw new Error(`Failed to record case steps: ${error.message}`);
      }
      return mapRowToSteps(data as CaseStepsRow);
    },

    async listCaseSteps(caseId: string): Promise<CaseStepsEntry[]> {
      const { data, error } = await supabase
        .from('case_steps')
        .select()
        .eq('case_id', caseId)
        .order('created_at', { ascending: true });

      if (error !== null) {
        throw new Error(`Failed to list case steps: ${error.message}`);
      }
      return (data as CaseStepsRow[]).map(mapRowToSteps);
    },
  };
}
