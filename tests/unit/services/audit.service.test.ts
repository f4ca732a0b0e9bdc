/**
 * AuditService Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import type { AuditService } from '@/services/audit.service.js';
import { createAuditService } from '@/services/audit.service.js';
import type { AuditEvent, AuditLog } from '@/types/index.js';
import { SYSTEM_ACTOR, AI_ACTOR } from '@/types/index.js';

import { AGENT, READER, TEST_REQUEST_ID } from '../../fixtures/index.js';

const createTestEvent = (overrides?: Partial<AuditEvent>): AuditEvent => ({
  action: 'knowledge.published',
  resourceType: 'knowledge_article',
  resourceId: 'KB-001',
  details: { version: 2 },
  ...overrides,
});

const createTestAuditLog = (overrides?: Partial<AuditLog>): AuditLog => ({
  id: 'log_test123',
  timestamp: new Date('2026-04-01T10:00:00.000Z'),
  actorId: 'publisher_1',
  actorType: 'user',
  action: 'knowledge.published',
  resourceType: 'knowledge_article',
  resourceId: 'KB-001',
  details: { version: 2 },
  requestId: TEST_REQUEST_ID,
  ...overrides,
});

describe('AuditService', () => {
  let auditService: AuditService;
  let mockDb: {
    insertLog: ReturnType<typeof vi.fn>;
    getLogsByResource: ReturnType<typeof vi.fn>;
  };

  beforeEach(() => {
    mockDb = {
      insertLog: vi.fn().mockResolvedValue({ id: 'log_test123' }),
      getLogsByResource: vi.fn().mockResolvedValue([]),
    };
    auditService = createAuditService({ db: mockDb });
  });

  // ─────────────────────────────────────────────────────────────
  // log
  // ─────────────────────────────────────────────────────────────

  describe('log', () => {
    it('should write the actor and event as one row', async () => {
      const result = await auditService.log(AGENT, createTestEvent());

      expect(result.success).toBe(true);
      expect(mockDb.insertLog).toHaveBeenCalledWith({
        actorId: 'agent_1',
        actorType: 'user',
        action: 'knowledge.published',
        resourceType: 'knowledge_article',
        resourceId: 'KB-001',
        details: { version: 2 },
        requestId: TEST_REQUEST_ID,
      });
    });

    it('should record system actions without an actor id', async () => {
      await auditService.log(
        SYSTEM_ACTOR,
        createTestEvent({ action: 'knowledge.index_rebuilt', resourceType: 'knowledge_chunks' })
      );

      expect(mockDb.insertLog).toHaveBeenCalledWith(
        expect.objectContaining({ actorId: null, actorType: 'system', requestId: 'system' })
      );
    });

    it('should default missing resource id and details', async () => {
      await auditService.log(AI_ACTOR, { action: 'comparison.ran', resourceType: 'question' });

      expect(mockDb.insertLog).toHaveBeenCalledWith(
        expect.objectContaining({ resourceId: null, details: {} })
      );
    });

    it('should report a failed write without throwing', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      mockDb.insertLog.mockRejectedValue(new Error('connection refused'));

      const result = await auditService.log(AGENT, createTestEvent());

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('INTERNAL_ERROR');
        expect(result.error.message).toBe('Failed to write audit log');
      }
    });
  });

  // ─────────────────────────────────────────────────────────────
  // getResourceHistory
  // ─────────────────────────────────────────────────────────────

  describe('getResourceHistory', () => {
    it('should return the resource history', async () => {
      const logs = [createTestAuditLog()];
      mockDb.getLogsByResource.mockResolvedValue(logs);

      const result = await auditService.getResourceHistory(
        READER,
        'knowledge_article',
        'KB-001'
      );

      expect(result).toEqual({ success: true, data: logs });
      expect(mockDb.getLogsByResource).toHaveBeenCalledWith('knowledge_article', 'KB-001');
    });

    it('should deny actors without knowledge:read', async () => {
      const result = await auditService.getResourceHistory(
        AI_ACTOR,
        'knowledge_article',
        'KB-001'
      );

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('PERMISSION_DENIED');
      }
      expect(mockDb.getLogsByResource).not.toHaveBeenCalled();
    });
  });
});
