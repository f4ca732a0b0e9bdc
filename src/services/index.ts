/**
 * Service Layer Exports
 *
 * Services are the ONLY gateway to the database.
 * All business logic lives here.
 */

// AuditService
export type { AuditService, AuditServiceDb, AuditLogEntry } from './audit.service.js';
export { createAuditService } from './audit.service.js';
export { createAuditServiceDb } from './audit.db.js';

// CaseService
export type {
  CaseService,
  CaseServiceDb,
  CaseServiceAudit,
} from './case.service.js';
export { createCaseService } from './case.service.js';
export { createCaseServiceDb } from './case.db.js';

// ChunkingService
export type { ChunkingService } from './chunking.service.js';
export {
  createChunkingService,
  caseIndexText,
  articleIndexText,
} from './chunking.service.js';

// EmbeddingService
export type {
  EmbeddingService,
  EmbeddingServiceClient,
  EmbeddingCache,
} from './embedding.service.js';
export {
  createEmbeddingService,
  createOpenAIEmbeddingClient,
} from './embedding.service.js';

// IndexingService (re-indexer + embedding index)
export type {
  IndexingService,
  VectorIndexDb,
  IndexingArticleSource,
  IndexingCaseSource,
  IndexingServiceAudit,
} from './indexing.service.js';
export { createIndexingService } from './indexing.service.js';
export { createVectorIndexDb } from './vector-index.db.js';

// RetrievalService
export type {
  RetrievalService,
  RetrievalEmbedding,
  RetrievalIndex,
  RetrievalCaseStore,
} from './retrieval.service.js';
export {
  createRetrievalService,
  dedupeBySource,
  EMPTY_INDEX,
} from './retrieval.service.js';

// JudgmentService
export type { JudgmentService } from './judgment.service.js';
export {
  createJudgmentService,
  stripCodeFences,
  backoffDelay,
} from './judgment.service.js';

// ComparatorService
export type {
  ComparatorService,
  CompareParams,
  AskParams,
  ComparisonJudgment,
} from './comparator.service.js';
export {
  createComparatorService,
  comparisonJudgmentSchema,
  normalizeComparison,
  toComparatorPayload,
} from './comparator.service.js';

// GapDetectorService
export type {
  GapDetectorService,
  GapArticleSource,
} from './gap-detector.service.js';
export {
  createGapDetectorService,
  gapJudgmentSchema,
} from './gap-detector.service.js';

// DraftService
export type {
  DraftService,
  DraftServiceDb,
  DraftServiceSources,
  DraftServiceAudit,
} from './draft.service.js';
export {
  createDraftService,
  draftJudgmentSchema,
  fallbackDraftContent,
} from './draft.service.js';
export { createDraftServiceDb } from './draft.db.js';

// ReviewService
export type {
  ReviewService,
  ReviewServiceDb,
  ReviewServiceSources,
  ReviewServiceAudit,
} from './review.service.js';
export {
  createReviewService,
  defaultAcceptanceCriteria,
  generateArticleId,
  reviewJudgmentSchema,
  runCriteria,
} from './review.service.js';
export { createReviewServiceDb } from './review.db.js';

// KnowledgeService (publisher)
export type {
  KnowledgeService,
  KnowledgeServiceDb,
  KnowledgeServiceDecisions,
  KnowledgeServiceAudit,
  PublishParams,
} from './knowledge.service.js';
export { createKnowledgeService, buildLineage } from './knowledge.service.js';
export { createKnowledgeServiceDb } from './knowledge.db.js';

// LearningLoopService
export type {
  LearningLoopService,
  LearningLoopCases,
  LearningLoopAudit,
} from './learning-loop.service.js';
export { createLearningLoopService } from './learning-loop.service.js';
