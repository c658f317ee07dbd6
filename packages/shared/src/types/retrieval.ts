import type { FactId, Visibility } from './fact.js';

export type ConfidenceLabel = 'high' | 'medium' | 'low';

export interface RetrievalCandidate {
  fact_id: FactId;
  topic: string;
  content: string;
  visibility: Visibility;
  score: number;
}

export interface Answered {
  kind: 'answered';
  fact_id: FactId;
  topic: string;
  content: string;
  visibility: Visibility;
  score: number;
  candidates: RetrievalCandidate[];
  query_text: string;
}

export interface KnowledgeGap {
  kind: 'knowledge_gap';
  best_score: number | null;
  best_fact_id: FactId | null;
  query_text: string;
}

export type RetrievalResult = Answered | KnowledgeGap;
