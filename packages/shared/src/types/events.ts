import type { FactId } from './fact.js';

export interface AlertThresholdCrossed {
  type: 'alert_threshold_crossed';
  fact_id: FactId;
  topic: string;
  flag_count: number;
  threshold: number;
  occurred_at: Date;
}

export interface KnowledgeGapReported {
  type: 'knowledge_gap';
  question: string;
  best_score: number | null;
  best_fact_id: FactId | null;
  occurred_at: Date;
}

export type FactChangeAction = 'created' | 'replaced' | 'forgotten';

// Audit trail entry for a committed write
export interface FactChanged {
  type: 'fact_changed';
  action: FactChangeAction;
  fact_id: FactId;
  topic: string;
  actor_id: string | null;
  // Set on 'replaced': the id the new fact took over from
  previous_id: FactId | null;
  occurred_at: Date;
}

export type CurationEvent = AlertThresholdCrossed | KnowledgeGapReported | FactChanged;
