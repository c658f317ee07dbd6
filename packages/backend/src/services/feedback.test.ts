import { describe, it, expect } from 'vitest';
import { build_test_engine, TEST_SETTINGS } from '../test/engine.js';
import { MemoryConfigStore } from '../test/memory-stores.js';
import { axis } from '../test/fake-embeddings.js';
import { create_feedback_engine, crosses_threshold } from './feedback.js';
import { create_webhook_sink } from './notifications.js';
import { ConfigCache } from './config-cache.js';
import { UnknownFactError } from '../lib/errors.js';

async function engine_with_fact(config_values: Record<string, string> = {}) {
  const built = build_test_engine(config_values);
  built.store.seed({
    topic: 'fire station',
    content: 'The fire station is at grid E4.',
    embedding: axis(0),
    visibility: 'public',
    author_id: null,
  });
  return built;
}

describe('vote', () => {
  it('accumulates up and down votes', async () => {
    const { engine } = await engine_with_fact();

    await engine.feedback.vote(1, 'up');
    await engine.feedback.vote(1, 'up');

    await expect(engine.feedback.vote(1, 'down')).resolves.toEqual({ fact_id: 1, upvotes: 2, downvotes: 1 });
  });

  it('loses no votes under concurrency', async () => {
    const { engine, store } = await engine_with_fact();

    await Promise.all(Array.from({ length: 10 }, () => engine.feedback.vote(1, 'up')));

    expect(store.all()[0]?.metadata.upvotes).toBe(10);
  });

  it('throws UnknownFactError for a missing fact', async () => {
    const { engine } = build_test_engine();

    await expect(engine.feedback.vote(5, 'up')).rejects.toBeInstanceOf(UnknownFactError);
  });
});

describe('flag', () => {
  it('alerts once, on the flag that reaches the threshold', async () => {
    const { engine, sink } = await engine_with_fact();

    const first = await engine.feedback.flag(1);
    const second = await engine.feedback.flag(1);
    const third = await engine.feedback.flag(1);
    const fourth = await engine.feedback.flag(1);

    expect(first).toEqual({ fact_id: 1, flag_count: 1, threshold_crossed: false, alert_delivered: null });
    expect(second).toEqual({ fact_id: 1, flag_count: 2, threshold_crossed: false, alert_delivered: null });
    expect(third).toEqual({ fact_id: 1, flag_count: 3, threshold_crossed: true, alert_delivered: true });
    expect(fourth).toEqual({ fact_id: 1, flag_count: 4, threshold_crossed: false, alert_delivered: null });
    expect(sink.events).toHaveLength(1);
    expect(sink.events[0]).toMatchObject({
      type: 'alert_threshold_crossed',
      fact_id: 1,
      topic: 'fire station',
      flag_count: 3,
      threshold: 3,
    });
  });

  it('alerts again after flags are cleared', async () => {
    const { engine, sink } = await engine_with_fact();
    for (let i = 0; i < 3; i += 1) await engine.feedback.flag(1);

    const cleared = await engine.feedback.clear_flags(1);
    for (let i = 0; i < 3; i += 1) await engine.feedback.flag(1);

    expect(cleared.metadata.flag_count).toBe(0);
    expect(sink.events).toHaveLength(2);
  });

  it('crosses exactly once when flags arrive concurrently', async () => {
    const { engine, sink } = await engine_with_fact();

    const results = await Promise.all(Array.from({ length: 5 }, () => engine.feedback.flag(1)));

    expect(results.filter((r) => r.threshold_crossed)).toHaveLength(1);
    expect(results.map((r) => r.flag_count).sort()).toEqual([1, 2, 3, 4, 5]);
    expect(sink.events).toHaveLength(1);
  });

  it('keeps the flag when the alert cannot be delivered', async () => {
    const { engine, store, sink } = await engine_with_fact({ flag_alert_threshold: '1' });
    sink.failure = new Error('webhook down');

    const result = await engine.feedback.flag(1);

    expect(result).toEqual({ fact_id: 1, flag_count: 1, threshold_crossed: true, alert_delivered: false });
    expect(store.all()[0]?.metadata.flag_count).toBe(1);
  });

  it('reports an undelivered alert when the webhook stalls', async () => {
    const { store } = await engine_with_fact();
    const feedback = create_feedback_engine({
      store,
      config: new ConfigCache(new MemoryConfigStore({ flag_alert_threshold: '1' }), TEST_SETTINGS),
      alerts: create_webhook_sink('http://hooks.test/curation', {
        fetch_impl: () => new Promise<Response>(() => undefined),
        timeout_ms: 20,
      }),
    });

    const result = await feedback.flag(1);

    expect(result).toEqual({ fact_id: 1, flag_count: 1, threshold_crossed: true, alert_delivered: false });
    expect(store.all()[0]?.metadata.flag_count).toBe(1);
  });

  it('throws UnknownFactError for a missing fact', async () => {
    const { engine } = build_test_engine();

    await expect(engine.feedback.flag(5)).rejects.toBeInstanceOf(UnknownFactError);
    await expect(engine.feedback.clear_flags(5)).rejects.toBeInstanceOf(UnknownFactError);
  });
});

describe('curation_status', () => {
  it('is flagged once the flag count reaches the threshold', async () => {
    const { engine, store } = await engine_with_fact({ flag_alert_threshold: '2' });
    await engine.feedback.flag(1);
    const [after_one] = store.all();
    await engine.feedback.flag(1);
    const [after_two] = store.all();
    if (!after_one || !after_two) throw new Error('fact missing');

    await expect(engine.feedback.curation_status(after_one)).resolves.toBe('active');
    await expect(engine.feedback.curation_status(after_two)).resolves.toBe('flagged');
  });
});

describe('set_visibility', () => {
  it('updates the fact visibility', async () => {
    const { engine } = await engine_with_fact();

    const fact = await engine.feedback.set_visibility(1, 'sensitive');

    expect(fact.metadata.visibility).toBe('sensitive');
    await expect(engine.feedback.set_visibility(9, 'public')).rejects.toBeInstanceOf(UnknownFactError);
  });
});

describe('crosses_threshold', () => {
  it('is true only at the threshold', () => {
    expect(crosses_threshold(2, 3)).toBe(false);
    expect(crosses_threshold(3, 3)).toBe(true);
    expect(crosses_threshold(4, 3)).toBe(false);
  });
});
