/**
 * AuditService Database Adapter
 * Implements AuditServiceDb interface using Supabase
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type { AuditActorType, AuditLog } from '@/types/index.js';

import type { AuditLogEntry, AuditServiceDb } from './audit.service.js';

/**
 * Database row type
 */
interface AuditLogRow {
  id: string;
  timestamp: string;
  actor_id: string | null;
  actor_type: string;
  action: string;
  resource_type: string;
  resource_id: string | null;
  details: Record<string, unknown> | null;
  request_id: string | null;
}

const ACTOR_TYPES: readonly AuditActorType[] = [
  'user',
  'admin',
  'system',
  'ai',
  'anonymous',
];

function toActorType(value: string): AuditActorType {
  return ACTOR_TYPES.find((t) => t === value) ?? 'anonymous';
}

/**
 * Map database row to AuditLog entity
 */
function mapRowToAuditLog(row: AuditLogRow): AuditLog {
  return {
    id: row.id,
    timestamp: new Date(row.timestamp),
    actorId: row.actor_id,
    actorType: toActorType(row.actor_type),
    action: row.action,
    resourceType: row.resource_type,
    resourceId: row.resource_id,
    details: row.details ?? {},
    requestId: row.request_id,
  };
}

/**
 * Create AuditServiceDb implementation using Supabase
 */
export function createAuditServiceDb(supabase: SupabaseClient): AuditServiceDb {
  return {
    async insertLog(entry: AuditLogEntry): Promise<{ id: string }> {
      const { data, error } = await supabase
        .from('audit_logs')
        .insert({
          actor_id: entry.actorId,
          actor_type: entry.actorType,
          action: entry.action,
          resource_type: entry.resourceType,
          resource_id: entry.resourceId,
          details: entry.details,
          request_id: entry.requestId,
        })
        .select('id')
        .single();

      if (error !== null) {
        throw new Error(`Failed to insert audit log: ${error.message}`);
      }

      return { id: (data as { id: string }).id };
    },

    async getLogsByResource(
      resourceType: string,
      resourceId: string
    ): Promise<AuditLog[]> {
      const { data, error } = await supabase
        .from('audit_logs')
        .select('*')
        .eq('resource_type', resourceType)
        .eq('resource_id', resourceId)
        .order('timestamp', { ascending: false });

      if (error !== null) {
        throw new Error(`Failed to get logs by resource: ${error.message}`);
      }

      return ((data ?? []) as AuditLogRow[]).map(mapRowToAuditLog);
    },
  };
}
