export type {
  FactId,
  Visibility,
  CurationStatus,
  FactMetadata,
  Fact,
  FactSummary,
  VoteDirection,
  VoteCounts,
  FlagResult,
} from './types/fact.js';
export type { Alias } from './types/alias.js';
export type { ConfigKey, ConfigEntry } from './types/config.js';
export type {
  ConfidenceLabel,
  RetrievalCandidate,
  Answered,
  KnowledgeGap,
  RetrievalResult,
} from './types/retrieval.js';
export type {
  AlertThresholdCrossed,
  KnowledgeGapReported,
  FactChangeAction,
  FactChanged,
  CurationEvent,
} from './types/events.js';
