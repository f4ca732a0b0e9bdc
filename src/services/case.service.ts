/**
 * CaseService Implementation
 *
 * SCOPE: Support cases, scripts and documented resolution steps
 *
 * Owns: support_cases (read), support_scripts (read), case_steps
 *
 * GUARDRAILS:
 * - Reading cases requires 'knowledge:read' or 'cases:write'
 * - recordResolution requires 'cases:write'
 * - case_steps is append-only
 * - AI_ACTOR may read cases but never document a resolution
 *
 * Dependencies: AuditService
 */

import type {
  ActorContext,
  AuditEvent,
  CaseStepsEntry,
  PaginatedResult,
  PaginationParams,
  RecordResolutionParams,
  Result,
  SupportCase,
  SupportScript,
} from '@/types/index.js';
import {
  success,
  failure,
  hasPermission,
  PERMISSIONS,
} from '@/types/index.js';

/**
 * Database abstraction interface for CaseService
 */
export interface CaseServiceDb {
  getCase: (caseId: string) => Promise<SupportCase | null>;
  getScript: (scriptId: string) => Promise<SupportScript | null>;
  listCases: (params: PaginationParams) => Promise<PaginatedResult<SupportCase>>;
  listScripts: (
    params: PaginationParams
  ) => Promise<PaginatedResult<SupportScript>>;
  addCaseSteps: (
    caseId: string,
    params: RecordResolutionParams
  ) => Promise<CaseStepsEntry>;
  listCaseSteps: (caseId: string) => Promise<CaseStepsEntry[]>;
}

/**
 * Minimal AuditService interface
 */
export interface CaseServiceAudit {
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
}

/**
 * CaseService interface
 */
export interface CaseService {
  getCase(actor: ActorContext, caseId: string): Promise<Result<SupportCase>>;
  recordResolution(
    actor: ActorContext,
    caseId: string,
    params: RecordResolutionParams
  ): Promise<Result<CaseStepsEntry>>;
  listCaseSteps(
    actor: ActorContext,
    caseId: string
  ): Promise<Result<CaseStepsEntry[]>>;
}

/**
 * Create CaseService instance
 */
export function createCaseService(deps: {
  db: CaseServiceDb;
  auditService: CaseServiceAudit;
}): CaseService {
  const { db, auditService } = deps;

  function canRead(actor: ActorContext): boolean {
    return (
      actor.type === 'ai' ||
      hasPermission(actor, PERMISSIONS.KNOWLEDGE_READ) ||
      hasPermission(actor, PERMISSIONS.CASES_WRITE)
    );
  }

  return {
    async getCase(
      actor: ActorContext,
      caseId: string
    ): Promise<Result<SupportCase>> {
      if (!canRead(actor)) {
        return failure('PERMISSION_DENIED', 'Missing knowledge:read permission');
      }

      const supportCase = await db.getCase(caseId);
      if (supportCase === null) {
        return failure('NOT_FOUND', `Case not found: ${caseId}`);
      }
      return success(supportCase);
    },

    async recordResolution(
      actor: ActorContext,
      caseId: string,
      params: RecordResolutionParams
    ): Promise<Result<CaseStepsEntry>> {
      if (actor.type === 'ai') {
        return failure('PERMISSION_DENIED', 'AI cannot document resolutions');
      }
      if (!hasPermission(actor, PERMISSIONS.CASES_WRITE)) {
        return failure('PERMISSION_DENIED', 'Missing cases:write permission');
      }

      const stepsText = params.stepsText.trim();
      const resolutionSummary = params.resolutionSummary.trim();
      if (!stepsText && !resolutionSummary) {
        return failure(
          'VALIDATION_ERROR',
          'Steps or a resolution summary are required'
        );
      }

      const supportCase = await db.getCase(caseId);
      if (supportCase === null) {
        return failure('NOT_FOUND', `Case not found: ${caseId}`);
      }

      const entry = await db.addCaseSteps(caseId, {
        stepsText,
        resolutionSummary,
      });

      await auditService.log(actor, {
        action: 'case.resolution_recorded',
        resourceType: 'support_case',
        resourceId: caseId,
        details: { caseStepsId: entry.id },
      });

      return success(entry);
    },

    async listCaseSteps(
      actor: ActorContext,
      caseId: string
    ): Promise<Result<CaseStepsEntry[]>> {
      if (!canRead(actor)) {
        return failure('PERMISSION_DENIED', 'Missing knowledge:read permission');
      }
      const entries = await db.listCaseSteps(caseId);
      return success(entries);
    },
  };
}
