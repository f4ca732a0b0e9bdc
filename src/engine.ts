/**
 * Learning Engine
 *
 * Wires the database adapters and the LLM into the full service graph.
 * The HTTP server, the CLI scripts and the tests all build the engine
 * through this one function so the graph is assembled the same way.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import {
  createAuditService,
  createAuditServiceDb,
  createCaseService,
  createCaseServiceDb,
  createChunkingService,
  createComparatorService,
  createDraftService,
  createDraftServiceDb,
  createEmbeddingService,
  createGapDetectorService,
  createIndexingService,
  createJudgmentService,
  createKnowledgeService,
  createKnowledgeServiceDb,
  createLearningLoopService,
  createRetrievalService,
  createReviewService,
  createReviewServiceDb,
  createVectorIndexDb,
} from './services/index.js';
import type {
  AuditService,
  AuditServiceDb,
  CaseService,
  CaseServiceDb,
  ComparatorService,
  DraftService,
  DraftServiceDb,
  EmbeddingCache,
  EmbeddingService,
  EmbeddingServiceClient,
  GapDetectorService,
  IndexingService,
  JudgmentService,
  KnowledgeService,
  KnowledgeServiceDb,
  LearningLoopService,
  RetrievalService,
  ReviewService,
  ReviewServiceDb,
  VectorIndexDb,
} from './services/index.js';
import type {
  AcceptanceCriterion,
  ComparatorHooks,
  EmbeddingConfig,
  EngineConfig,
  GapPolicy,
  LLMClient,
} from './types/index.js';
import { DEFAULT_ENGINE_CONFIG } from './types/index.js';

/**
 * Every persistence port the engine needs
 */
export interface EngineStores {
  auditDb: AuditServiceDb;
  caseDb: CaseServiceDb;
  vectorIndexDb: VectorIndexDb;
  draftDb: DraftServiceDb;
  reviewDb: ReviewServiceDb;
  knowledgeDb: KnowledgeServiceDb;
}

export interface LearningEngineDeps {
  stores: EngineStores;
  llm: LLMClient;
  embeddingClient: EmbeddingServiceClient;
  embeddingConfig?: EmbeddingConfig;
  embeddingCache?: EmbeddingCache;
  config?: Partial<EngineConfig>;
  hooks?: ComparatorHooks;
  gapPolicy?: GapPolicy;
  criteria?: AcceptanceCriterion[];
  newArticleId?: () => string;
  sleep?: (ms: number) => Promise<void>;
}

export interface LearningEngine {
  config: EngineConfig;
  auditService: AuditService;
  caseService: CaseService;
  embeddingService: EmbeddingService;
  retrievalService: RetrievalService;
  judgmentService: JudgmentService;
  comparatorService: ComparatorService;
  gapDetectorService: GapDetectorService;
  draftService: DraftService;
  reviewService: ReviewService;
  knowledgeService: KnowledgeService;
  indexingService: IndexingService;
  learningLoopService: LearningLoopService;
}

/**
 * Supabase-backed stores
 */
export function createSupabaseStores(supabase: SupabaseClient): EngineStores {
  return {
    auditDb: createAuditServiceDb(supabase),
    caseDb: createCaseServiceDb(supabase),
    vectorIndexDb: createVectorIndexDb(supabase),
    draftDb: createDraftServiceDb(supabase),
    reviewDb: createReviewServiceDb(supabase),
    knowledgeDb: createKnowledgeServiceDb(supabase),
  };
}

export function createLearningEngine(deps: LearningEngineDeps): LearningEngine {
  const { stores, llm } = deps;
  const { auditDb, caseDb, vectorIndexDb, draftDb, reviewDb, knowledgeDb } =
    stores;
  const config: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, ...deps.config };

  const auditService = createAuditService({ db: auditDb });
  const caseService = createCaseService({ db: caseDb, auditService });

  const chunking = createChunkingService(config.chunking);
  const embeddingService = createEmbeddingService({
    client: deps.embeddingClient,
    ...(deps.embeddingConfig !== undefined && { config: deps.embeddingConfig }),
    ...(deps.embeddingCache !== undefined && { cache: deps.embeddingCache }),
  });

  const retrievalService = createRetrievalService({
    embeddingService,
    index: vectorIndexDb,
    caseStore: caseDb,
    config,
  });

  const judgmentService = createJudgmentService({
    llm,
    model: config.judgmentModel,
    temperature: config.judgmentTemperature,
    retry: config.judgmentRetry,
    ...(deps.sleep !== undefined && { sleep: deps.sleep }),
  });

  const comparatorService = createComparatorService({
    judgmentService,
    retrievalService,
    excerptChars: config.comparatorExcerptChars,
    ...(deps.hooks !== undefined && { hooks: deps.hooks }),
  });

  const gapDetectorService = createGapDetectorService({
    judgmentService,
    retrievalService,
    articles: knowledgeDb,
    ...(deps.gapPolicy !== undefined && { policy: deps.gapPolicy }),
  });

  const draftService = createDraftService({
    db: draftDb,
    sources: {
      getCase: caseDb.getCase,
      listCaseSteps: caseDb.listCaseSteps,
      getActiveArticle: knowledgeDb.getActiveArticle,
      getEffectiveDecision: reviewDb.getEffectiveDecision,
    },
    judgmentService,
    auditService,
    config,
  });

  const reviewService = createReviewService({
    db: reviewDb,
    sources: {
      getDraft: draftDb.getDraft,
      getCase: caseDb.getCase,
      listCaseSteps: caseDb.listCaseSteps,
      getActiveArticle: knowledgeDb.getActiveArticle,
      isDraftPublished: async (draftId) =>
        (await knowledgeDb.getArticleByDraftId(draftId)) !== null,
    },
    judgmentService,
    auditService,
    config,
    ...(deps.criteria !== undefined && { criteria: deps.criteria }),
    ...(deps.newArticleId !== undefined && { newArticleId: deps.newArticleId }),
  });

  const knowledgeService = createKnowledgeService({
    db: knowledgeDb,
    decisions: reviewDb,
    auditService,
  });

  const indexingService = createIndexingService({
    index: vectorIndexDb,
    chunking,
    embeddingService,
    articles: knowledgeDb,
    cases: caseDb,
    auditService,
  });

  const learningLoopService = createLearningLoopService({
    cases: caseDb,
    comparatorService,
    gapDetectorService,
    draftService,
    reviewService,
    knowledgeService,
    indexingService,
    auditService,
  });

  return {
    config,
    auditService,
    caseService,
    embeddingService,
    retrievalService,
    judgmentService,
    comparatorService,
    gapDetectorService,
    draftService,
    reviewService,
    knowledgeService,
    indexingService,
    learningLoopService,
  };
}
