/**
 * AuditService Implementation
 *
 * Purpose: Immutable audit logging of every state change in the
 * learning loop (resolutions, drafts, decisions, publishes, re-indexes).
 * Owns: audit_logs
 * Dependencies: None (lowest level service)
 */

import type {
  ActorContext,
  AuditEvent,
  AuditLog,
  Result,
} from '@/types/index.js';
import {
  success,
  failure,
  errorMessage,
  hasPermission,
  PERMISSIONS,
} from '@/types/index.js';

/**
 * Row written for one audit event
 */
export interface AuditLogEntry {
  actorId: string | null;
  actorType: string;
  action: string;
  resourceType: string;
  resourceId: string | null;
  details: Record<string, unknown>;
  requestId: string | null;
}

/**
 * Database abstraction interface for AuditService
 * Allows mocking in tests
 */
export interface AuditServiceDb {
  insertLog: (entry: AuditLogEntry) => Promise<{ id: string }>;
  getLogsByResource: (
    resourceType: string,
    resourceId: string
  ) => Promise<AuditLog[]>;
}

/**
 * AuditService interface
 */
export interface AuditService {
  log(actor: ActorContext, event: AuditEvent): Promise<Result<void>>;
  getResourceHistory(
    actor: ActorContext,
    resourceType: string,
    resourceId: string
  ): Promise<Result<AuditLog[]>>;
}

/**
 * Build log entry from actor and event
 */
function buildLogEntry(actor: ActorContext, event: AuditEvent): AuditLogEntry {
  return {
    actorId: actor.userId ?? null,
    actorType: actor.type,
    action: event.action,
    resourceType: event.resourceType,
    resourceId: event.resourceId ?? null,
    details: event.details ?? {},
    requestId: actor.requestId,
  };
}

/**
 * Create AuditService instance
 */
export function createAuditService(deps: { db: AuditServiceDb }): AuditService {
  const { db } = deps;

  return {
    /**
     * Log an audit event
     * This is the ONLY way to write to audit_logs
     * No permission check - all services can log
     */
    async log(actor: ActorContext, event: AuditEvent): Promise<Result<void>> {
      try {
        await db.insertLog(buildLogEntry(actor, event));
        return success(undefined);
      } catch (error) {
        console.error(
          `Audit log write failed (${event.action}):`,
          errorMessage(error)
        );
        return failure('INTERNAL_ERROR', 'Failed to write audit log');
      }
    },

    /**
     * History of one resource, newest first
     * Requires: 'knowledge:read' permission
     */
    async getResourceHistory(
      actor: ActorContext,
      resourceType: string,
      resourceId: string
    ): Promise<Result<AuditLog[]>> {
      if (!hasPermission(actor, PERMISSIONS.KNOWLEDGE_READ)) {
        return failure(
          'PERMISSION_DENIED',
          'Actor lacks knowledge:read permission'
        );
      }

      const logs = await db.getLogsByResource(resourceType, resourceId);
      return success(logs);
    },
  };
}
