export type ConfigKey =
  | 'confidence_threshold'
  | 'duplicate_threshold'
  | 'flag_alert_threshold'
  | 'retrieval_candidates';

export interface ConfigEntry {
  key: string;
  value: string;
}
