import type { CurationEvent } from '@curator/shared';
import { logger } from '../lib/logger.js';
import { error_message } from '../lib/errors.js';
import { with_timeout } from '../lib/timeout.js';

export interface NotificationSink {
  emit(event: CurationEvent): Promise<void>;
}

export function create_log_sink(): NotificationSink {
  const log = logger.child({ component: 'notifications' });
  return {
    async emit(event) {
      switch (event.type) {
        case 'alert_threshold_crossed':
          log.warn('fact flagged for review', {
            fact_id: event.fact_id,
            topic: event.topic,
            flag_count: event.flag_count,
            threshold: event.threshold,
          });
          break;
        case 'knowledge_gap':
          log.info('knowledge gap reported', {
            question: event.question,
            best_score: event.best_score,
            best_fact_id: event.best_fact_id,
          });
          break;
        case 'fact_changed':
          log.info('fact changed', {
            action: event.action,
            fact_id: event.fact_id,
            topic: event.topic,
            actor_id: event.actor_id,
            previous_id: event.previous_id,
          });
          break;
      }
    },
  };
}

export interface WebhookSinkOptions {
  timeout_ms?: number;
  fetch_impl?: typeof fetch;
}

// Each POST is abandoned, and the emit rejects, once `timeout_ms` passes
export function create_webhook_sink(url: string, options: WebhookSinkOptions = {}): NotificationSink {
  const timeout_ms = options.timeout_ms ?? 5000;
  const fetch_impl = options.fetch_impl ?? fetch;
  return {
    async emit(event) {
      const body = JSON.stringify({ ...event, occurred_at: event.occurred_at.toISOString() });
      const response = await with_timeout(
        'alert webhook',
        (signal) =>
          fetch_impl(url, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body,
            signal,
          }),
        timeout_ms,
      );
      if (!response.ok) {
        throw new Error(`Webhook responded with ${response.status}`);
      }
    },
  };
}

// Delivers to every sink; fails if any sink failed, after all have been tried
export function create_fanout_sink(sinks: NotificationSink[]): NotificationSink {
  return {
    async emit(event) {
      const results = await Promise.allSettled(sinks.map((sink) => sink.emit(event)));
      const failures = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
      if (failures.length > 0) {
        throw new Error(
          `Notification delivery failed for ${failures.length} of ${sinks.length} sinks: ` +
            failures.map((f) => error_message(f.reason)).join('; '),
        );
      }
    },
  };
}
