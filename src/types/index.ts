/**
 * Core type definitions
 * This file exports all shared types used across the engine
 */

export type { Result, Success, Failure } from './result.js';
export {
  success,
  failure,
  isSuccess,
  isFailure,
  errorMessage,
  ERROR_CODES,
} from './result.js';
export type { ActorContext, PermissionCode } from './auth.js';
export {
  SYSTEM_ACTOR,
  AI_ACTOR,
  PERMISSIONS,
  hasPermission,
  getActorUserId,
} from './auth.js';
export type { PaginationParams, PaginatedResult } from './pagination.js';
export type { AuditActorType, AuditEvent, AuditLog } from './audit.js';
export type {
  SourceKind,
  SupportCase,
  SupportScript,
  CaseStepsEntry,
  RecordResolutionParams,
} from './source.js';
export { SOURCE_KINDS, effectiveResolution, withEffectiveResolution } from './source.js';
export type { TextChunk, Chunk, ChunkMatch, ChunkingOptions } from './chunk.js';
export { chunkId } from './chunk.js';
export type {
  ReplaceChunksParams,
  ReplaceChunksOutcome,
  SourceIndexReport,
  RebuildFailure,
  RebuildReport,
} from './indexing.js';
export type { RetrieveParams, RetrievalHit, CandidateCase } from './retrieval.js';
export type {
  NoMatchReason,
  ComparisonWinner,
  RankedCandidate,
  ComparisonResult,
  HookContext,
  HookStage,
  ComparatorHooks,
} from './comparison.js';
export type {
  ArticleStatus,
  KnowledgeArticle,
  LineageSourceKind,
  LineageRelationship,
  LineageRow,
  NewLineageRow,
  PublishedArticleRef,
  PublishArticleParams,
  PublishOutcome,
  VersionProvenance,
} from './article.js';
export type {
  NearestArticle,
  GapOutcome,
  GapOutcomeKind,
  DetectGapParams,
  GapPolicy,
} from './gap.js';
export type {
  DraftProvenance,
  Draft,
  NewDraft,
  ExtractDraftParams,
  ReextractParams,
} from './draft.js';
export type {
  ReviewVerdict,
  ReviewerKind,
  DraftStatus,
  CriterionResult,
  AcceptanceCriterion,
  ReviewDecision,
  NewReviewDecision,
  OverrideParams,
} from './review.js';
export type { LLMRole, LLMMessage, LLMRequest, LLMResponse, LLMClient } from './llm.js';
export type {
  JudgmentTask,
  JudgmentRequest,
  JudgmentRetryPolicy,
} from './judgment.js';
export { JUDGMENT_ERROR_CODES } from './judgment.js';
export type {
  EmbeddingConfig,
  EmbeddingResult,
  BatchEmbeddingResult,
} from './embedding.js';
export { DEFAULT_EMBEDDING_CONFIG } from './embedding.js';
export type { EngineConfig } from './engine-config.js';
export {
  DEFAULT_ENGINE_CONFIG,
  COMPARATOR_EXCERPT_CHARS,
} from './engine-config.js';
export type {
  LearningStage,
  ReindexReport,
  LearningOutcome,
  PublishDraftOutcome,
} from './learning.js';
