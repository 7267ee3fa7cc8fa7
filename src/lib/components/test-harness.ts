/**
 * In-process runtime for component tests: a bus and a manager sharing a
 * locator, logging to an ArraySink
 */

import { Logger } from '../logger';
import type { ArraySink } from '../logger';
import { MessageBus } from '../message-bus';
import type { MessageBusOptions } from '../message-bus';
import { LifecycleManager } from '../lifecycle-manager/lifecycle-manager';
import { TestComponent } from '../lifecycle-manager/test-components';
import { ServiceKeys, ServiceLocator } from '../service-locator';
import type { EventType } from '../events/types';
import { sleep } from '../sleep';

export interface TestHarness {
  logger: Logger;
  arraySink: ArraySink;
  locator: ServiceLocator;
  bus: MessageBus;
  manager: LifecycleManager;
  /** Register a component that records every event of `eventTypes` */
  observe(name: string, eventTypes: EventType[]): TestComponent;
  close(): Promise<void>;
}

export function createTestHarness(busOptions: MessageBusOptions = {}): TestHarness {
  const { logger, arraySink } = Logger.createTestOptimizedLogger();
  const locator = new ServiceLocator();
  const bus = new MessageBus(logger, busOptions);
  locator.register(ServiceKeys.MESSAGE_BUS, bus);
  const manager = new LifecycleManager(logger, locator);

  return {
    logger,
    arraySink,
    locator,
    bus,
    manager,
    observe(name, eventTypes) {
      const observer = new TestComponent(logger, {
        name,
        role: 'output',
        subscribesTo: eventTypes,
      });
      manager.registerComponent(observer);
      return observer;
    },
    async close() {
      await manager.stopAllComponents();
      await bus.shutdown({ drain: false });
    },
  };
}

export async function waitUntil(
  predicate: () => boolean,
  timeoutMS = 1000,
): Promise<void> {
  const deadline = Date.now() + timeoutMS;

  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error('Condition not met in time');
    }

    await sleep(5);
  }
}
