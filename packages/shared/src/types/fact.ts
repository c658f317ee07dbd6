export type FactId = number;

export type Visibility = 'public' | 'sensitive';

export type CurationStatus = 'active' | 'flagged';

export interface FactMetadata {
  upvotes: number;
  downvotes: number;
  flag_count: number;
  visibility: Visibility;
  author_id: string | null;
  last_editor_id: string | null;
}

export interface Fact {
  id: FactId;
  topic: string;
  content: string;
  embedding: number[];
  metadata: FactMetadata;
  created_at: Date;
}

// Fact without its vector, as returned to callers over the wire
export type FactSummary = Omit<Fact, 'embedding'>;

export type VoteDirection = 'up' | 'down';

export interface VoteCounts {
  fact_id: FactId;
  upvotes: number;
  downvotes: number;
}

export interface FlagResult {
  fact_id: FactId;
  flag_count: number;
  threshold_crossed: boolean;
  alert_delivered: boolean | null;
}
