/**
 * Actor Types
 * Every service method receives the actor performing the call
 */

/**
 * Actor Context - Who is performing the action
 */
export interface ActorContext {
  type: 'user' | 'admin' | 'system' | 'ai' | 'anonymous';
  userId?: string;
  sessionId?: string;
  requestId: string;
  permissions: string[];
  ip?: string;
  userAgent?: string;
}

/**
 * System actor for the automated learning pipeline and scripts
 * Has all permissions - use with caution
 */
export const SYSTEM_ACTOR: ActorContext = {
  type: 'system',
  requestId: 'system',
  permissions: ['*'],
};

/**
 * AI actor for agent-initiated reads
 * CRITICAL: AI has NO direct permissions - it may retrieve and compare,
 * never review or publish
 */
export const AI_ACTOR: ActorContext = {
  type: 'ai',
  requestId: 'ai',
  permissions: [],
};

/**
 * Permission codes understood by the engine
 */
export const PERMISSIONS = {
  KNOWLEDGE_READ: 'knowledge:read',
  KNOWLEDGE_REVIEW: 'knowledge:review',
  KNOWLEDGE_PUBLISH: 'knowledge:publish',
  CASES_WRITE: 'cases:write',
} as const;

export type PermissionCode = (typeof PERMISSIONS)[keyof typeof PERMISSIONS];

/**
 * Check a permission the way every service does:
 * system actors pass, then exact code, wildcard or any admin: grant
 */
export function hasPermission(
  actor: ActorContext,
  permission: PermissionCode
): boolean {
  if (actor.type === 'system') {
    return true;
  }
  return (
    actor.permissions.includes(permission) ||
    actor.permissions.includes('*') ||
    actor.permissions.some((p) => p.startsWith('admin:'))
  );
}

/**
 * Actor id recorded on audit rows and human decisions
 */
export function getActorUserId(actor: ActorContext): string {
  if (actor.type === 'system') {
    return 'system';
  }
  if (actor.type === 'ai') {
    return 'ai';
  }
  return actor.userId ?? 'unknown';
}
