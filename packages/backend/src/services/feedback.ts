import type { CurationStatus, Fact, FactId, FlagResult, Visibility, VoteCounts, VoteDirection } from '@curator/shared';
import type { FactStore } from './facts.js';
import type { ConfigCache } from './config-cache.js';
import type { NotificationSink } from './notifications.js';
import { UnknownFactError, error_message } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

const log = logger.child({ component: 'feedback' });

export interface FeedbackDeps {
  store: FactStore;
  config: ConfigCache;
  alerts: NotificationSink;
}

export interface FeedbackEngine {
  vote(fact_id: FactId, direction: VoteDirection): Promise<VoteCounts>;
  flag(fact_id: FactId): Promise<FlagResult>;
  clear_flags(fact_id: FactId): Promise<Fact>;
  set_visibility(fact_id: FactId, visibility: Visibility): Promise<Fact>;
  curation_status(fact: Fact): Promise<CurationStatus>;
}

// Only the increment that lands exactly on the threshold counts as a crossing
export function crosses_threshold(flag_count: number, threshold: number): boolean {
  return flag_count - 1 < threshold && flag_count >= threshold;
}

/**
 * Vote and flag counters. Counts are additive: deduplicating votes per voter
 * belongs to the caller. Each increment is one atomic store update.
 */
export function create_feedback_engine(deps: FeedbackDeps): FeedbackEngine {
  const { store, config, alerts } = deps;

  async function vote(fact_id: FactId, direction: VoteDirection): Promise<VoteCounts> {
    const counts = await store.increment_vote(fact_id, direction);
    if (!counts) {
      throw new UnknownFactError(fact_id);
    }
    log.debug('vote recorded', { fact_id, direction, upvotes: counts.upvotes, downvotes: counts.downvotes });
    return counts;
  }

  async function flag(fact_id: FactId): Promise<FlagResult> {
    const threshold = await config.get_number('flag_alert_threshold');
    const increment = await store.increment_flag(fact_id);
    if (!increment) {
      throw new UnknownFactError(fact_id);
    }

    const threshold_crossed = crosses_threshold(increment.flag_count, threshold);
    if (!threshold_crossed) {
      return { fact_id, flag_count: increment.flag_count, threshold_crossed, alert_delivered: null };
    }

    log.warn('flag threshold crossed', { fact_id, flag_count: increment.flag_count, threshold });
    let alert_delivered = true;
    try {
      await alerts.emit({
        type: 'alert_threshold_crossed',
        fact_id,
        topic: increment.topic,
        flag_count: increment.flag_count,
        threshold,
        occurred_at: new Date(),
      });
    } catch (error) {
      alert_delivered = false;
      log.error('flag alert delivery failed', { fact_id, error: error_message(error) });
    }

    return { fact_id, flag_count: increment.flag_count, threshold_crossed, alert_delivered };
  }

  async function clear_flags(fact_id: FactId): Promise<Fact> {
    const fact = await store.reset_flags(fact_id);
    if (!fact) {
      throw new UnknownFactError(fact_id);
    }
    log.info('flags cleared', { fact_id });
    return fact;
  }

  async function set_visibility(fact_id: FactId, visibility: Visibility): Promise<Fact> {
    const fact = await store.set_visibility(fact_id, visibility);
    if (!fact) {
      throw new UnknownFactError(fact_id);
    }
    return fact;
  }

  async function curation_status(fact: Fact): Promise<CurationStatus> {
    const threshold = await config.get_number('flag_alert_threshold');
    return fact.metadata.flag_count >= threshold ? 'flagged' : 'active';
  }

  return { vote, flag, clear_flags, set_visibility, curation_status };
}
