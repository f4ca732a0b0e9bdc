/**
 * Audit Types
 * Types for the AuditService
 */

/**
 * Actor types for audit logging
 */
export type AuditActorType = 'user' | 'admin' | 'system' | 'ai' | 'anonymous';

/**
 * Event to be logged to the audit system
 * Used as input to AuditService.log()
 */
export interface AuditEvent {
  action: string; // e.g., 'knowledge.published', 'review.decided'
  resourceType: string; // e.g., 'knowledge_article', 'draft'
  resourceId?: string;
  details?: Record<string, unknown>;
}

/**
 * Full audit log record (from database)
 */
export interface AuditLog {
  id: string;
  timestamp: Date;
  actorId: string | null; // NULL for system actions
  actorType: AuditActorType;
  action: string;
  resourceType: string;
  resourceId: string | null;
  details: Record<string, unknown>;
  requestId: string | null;
}
