import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { createEvent } from '../events/event';
import type { RuntimeEvent } from '../events/types';
import { OutputComponent } from './output-component';
import { createTestHarness, waitUntil, type TestHarness } from './test-harness';
import type { OutputRenderer } from './types';

class RecordingRenderer implements OutputRenderer {
  public readonly rendered: RuntimeEvent[] = [];
  public failWith?: Error;

  public render(event: RuntimeEvent): void {
    if (this.failWith) {
      throw this.failWith;
    }

    this.rendered.push(event);
  }
}

function speak(text: string): RuntimeEvent {
  return createEvent({
    type: 'speak',
    payload: { text },
    source: 'nlp',
    correlationId: `c-${text}`,
  });
}

describe('OutputComponent', () => {
  let harness: TestHarness;
  let renderer: RecordingRenderer;

  beforeEach(() => {
    harness = createTestHarness();
    renderer = new RecordingRenderer();
  });

  afterEach(async () => {
    await harness.close();
  });

  test('should render consumed events in order and publish nothing', async () => {
    const speaker = new OutputComponent(harness.logger, {
      name: 'speaker',
      consumes: ['speak', 'display-text'],
      renderer,
    });
    harness.manager.registerComponent(speaker);
    await harness.manager.startAllComponents();

    const events = [speak('one'), speak('two'), speak('three')];
    for (const event of events) {
      await harness.bus.publish(event);
    }
    await waitUntil(() => renderer.rendered.length === 3);

    expect(renderer.rendered.map((event) => event.id)).toEqual(
      events.map((event) => event.id),
    );
    expect(speaker.getRole()).toBe('output');
    expect(speaker.getSubscribedEventTypes()).toEqual(['speak', 'display-text']);
    expect(speaker.getRenderedCount()).toBe(3);
    expect(harness.bus.getHistory({ source: 'speaker' })).toEqual([]);
  });

  test('should acknowledge rendered events when asked to', async () => {
    const monitor = harness.observe('monitor', ['output-ack']);
    harness.manager.registerComponent(
      new OutputComponent(harness.logger, {
        name: 'display',
        consumes: ['speak'],
        renderer,
        acknowledge: true,
      }),
    );
    await harness.manager.startAllComponents();

    const event = speak('hello');
    await harness.bus.publish(event);
    await waitUntil(() => monitor.received.length === 1);

    expect(monitor.received[0].source).toBe('display');
    expect(monitor.received[0].correlationId).toBe('c-hello');
    expect(monitor.received[0].payload).toEqual({
      eventId: event.id,
      eventType: 'speak',
      renderer: 'display',
    });
  });

  test('should report render failures to the bus', async () => {
    renderer.failWith = new Error('display disconnected');
    harness.manager.registerComponent(
      new OutputComponent(harness.logger, {
        name: 'display',
        consumes: ['speak'],
        renderer,
      }),
    );
    await harness.manager.startAllComponents();

    await harness.bus.publish(speak('lost'));
    await waitUntil(() => harness.bus.getSubscriberStatus('display')?.failed === 1);

    expect(renderer.rendered).toEqual([]);
    expect(harness.manager.getComponentState('display')).toBe('running');
  });
});
