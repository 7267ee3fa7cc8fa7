import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { Logger } from '../logger';
import type { ArraySink } from '../logger';
import { ConfigurationError, InitializationFailure, ShutdownTimeout } from '../errors';
import { createEvent, createResponseEvent, isEventOfType } from '../events/event';
import type { ComponentStatusPayload } from '../events/types';
import { MessageBus, UnknownSubscriberError } from '../message-bus';
import { ServiceKeys, ServiceLocator } from '../service-locator';
import { sleep } from '../sleep';
import { LifecycleManager } from './lifecycle-manager';
import type { LifecycleManagerEventMap } from './events';
import {
  ComponentInitializationError,
  ComponentInitializeTimeoutError,
  ComponentNotInitializedError,
  ComponentShutdownTimeoutError,
  DependencyCycleError,
  InvalidComponentNameError,
  MissingDependencyError,
} from './errors';
import { HealthCheckedComponent, TestComponent } from './test-components';
import type { TestComponentOptions } from './test-components';

async function waitUntil(predicate: () => boolean, timeoutMS = 1000): Promise<void> {
  const deadline = Date.now() + timeoutMS;

  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error('Condition not met in time');
    }

    await sleep(5);
  }
}

function collect<K extends keyof LifecycleManagerEventMap>(
  manager: LifecycleManager,
  event: K,
): Array<LifecycleManagerEventMap[K]> {
  const seen: Array<LifecycleManagerEventMap[K]> = [];
  manager.on(event, (data) => {
    seen.push(data);
  });
  return seen;
}

describe('LifecycleManager', () => {
  let logger: Logger;
  let arraySink: ArraySink;
  let locator: ServiceLocator;
  let bus: MessageBus;
  let manager: LifecycleManager;
  let journal: string[];

  function component(
    name: string,
    dependencies: string[] = [],
    options: Omit<TestComponentOptions, 'name' | 'dependencies' | 'journal'> = {},
  ): TestComponent {
    return new TestComponent(logger, { name, dependencies, journal, ...options });
  }

  beforeEach(() => {
    ({ logger, arraySink } = Logger.createTestOptimizedLogger());
    locator = new ServiceLocator();
    bus = new MessageBus(logger);
    locator.register(ServiceKeys.MESSAGE_BUS, bus);
    manager = new LifecycleManager(logger, locator);
    journal = [];
  });

  afterEach(async () => {
    manager.stopHealthMonitor();
    await manager.stopAllComponents();
    await bus.shutdown({ drain: false });
  });

  describe('component names', () => {
    test('should accept kebab-case names', () => {
      for (const name of ['keyboard', 'speech-output', 'nlp-v2', 'input1']) {
        expect(() => component(name)).not.toThrow();
      }
    });

    test('should reject names that are not kebab-case', () => {
      for (const name of ['Keyboard', 'speech_output', 'SpeechOutput', '', 'my input', '-nlp', 'nlp-', '1input']) {
        expect(() => component(name)).toThrow(InvalidComponentNameError);
      }
    });
  });

  describe('registration', () => {
    test('should register components in order', () => {
      const result = manager.registerComponent(component('keyboard'));
      manager.registerComponent(component('nlp', ['keyboard']));

      expect(result).toEqual({
        success: true,
        componentName: 'keyboard',
        registrationIndex: 0,
        dependencies: [],
      });
      expect(manager.getComponentNames()).toEqual(['keyboard', 'nlp']);
      expect(manager.getComponentState('nlp')).toBe('registered');
      expect(manager.getSystemState()).toBe('ready');
    });

    test('should reject duplicate names and duplicate instances', () => {
      const keyboard = component('keyboard');
      manager.registerComponent(keyboard);

      const sameInstance = manager.registerComponent(keyboard);
      const sameName = manager.registerComponent(component('keyboard'));

      expect(sameInstance.success).toBe(false);
      expect(sameInstance.code).toBe('duplicate_instance');
      expect(sameName.success).toBe(false);
      expect(sameName.code).toBe('duplicate_name');
      expect(sameName.error).toBeInstanceOf(ConfigurationError);
      expect(manager.getComponentCount()).toBe(1);
    });

    test('should reject timeouts that are not positive', () => {
      const fromOptions = manager.registerComponent(component('keyboard'), {
        initializeTimeoutMS: 0,
      });
      const fromComponent = manager.registerComponent(
        component('speaker', [], { shutdownTimeoutMS: -1 }),
      );

      expect(fromOptions).toMatchObject({
        success: false,
        code: 'invalid_timeout',
        reason: 'Component "keyboard" has initializeTimeoutMS 0; timeouts must be positive',
      });
      expect(fromOptions.error).toBeInstanceOf(ConfigurationError);
      expect(fromComponent.code).toBe('invalid_timeout');
      expect(manager.getComponentCount()).toBe(0);
    });

    test('should fall back to bounded defaults for non-positive manager timeouts', async () => {
      const bounded = new LifecycleManager(logger, locator, {
        initializeTimeoutMS: 0,
        shutdownTimeoutMS: -5,
      });
      const hung = component('hung', [], { hangOnInitialize: true });
      bounded.registerComponent(hung, { initializeTimeoutMS: 30 });

      expect(
        arraySink.logs
          .filter((entry) => entry.type === 'warn')
          .map((entry) => entry.message),
      ).toEqual(
        expect.arrayContaining([
          'initializeTimeoutMS must be positive, using 30000ms instead of 0',
          'shutdownTimeoutMS must be positive, using 5000ms instead of -5',
        ]),
      );

      const result = await bounded.startAllComponents();

      expect(result.success).toBe(false);
      expect(result.errors[0]).toBeInstanceOf(ComponentInitializationError);
      expect(hung.initializeAborted).toBe(true);
      bounded.detachFromBus();
    });

    test('should reject a component that closes a dependency cycle', () => {
      const rejected = collect(manager, 'component:registration-rejected');

      manager.registerComponent(component('a', ['b']));
      manager.registerComponent(component('b', ['c']));
      const result = manager.registerComponent(component('c', ['a']));

      expect(result.success).toBe(false);
      expect(result.code).toBe('dependency_cycle');
      expect(result.error).toBeInstanceOf(DependencyCycleError);
      expect(result.error).toBeInstanceOf(ConfigurationError);
      expect(result.error?.message).toBe(
        'Circular dependency detected: c -> a -> b -> c',
      );
      expect(manager.hasComponent('c')).toBe(false);
      expect(rejected).toEqual([
        {
          name: 'c',
          reason: 'dependency_cycle',
          message: 'Circular dependency detected: c -> a -> b -> c',
          cycle: ['c', 'a', 'b'],
        },
      ]);
    });

    test('should reject a component that depends on itself', () => {
      const result = manager.registerComponent(component('loop', ['loop']));

      expect(result.code).toBe('dependency_cycle');
      expect(result.reason).toBe('Circular dependency detected: loop -> loop');
    });

    test('should merge extra dependencies from registration options', () => {
      manager.registerComponent(component('keyboard'));
      const result = manager.registerComponent(component('nlp'), {
        extraDependencies: ['keyboard'],
      });

      expect(result.dependencies).toEqual(['keyboard']);
      expect(manager.getStartupLayers().layers).toEqual([['keyboard'], ['nlp']]);
    });

    test('should unregister only components that are not running', async () => {
      manager.registerComponent(component('keyboard'));
      await manager.startAllComponents();

      expect(manager.unregisterComponent('keyboard').code).toBe('component_running');
      expect(manager.unregisterComponent('ghost').code).toBe('component_not_found');

      await manager.stopAllComponents();

      expect(manager.unregisterComponent('keyboard')).toEqual({
        success: true,
        componentName: 'keyboard',
      });
      expect(manager.hasComponent('keyboard')).toBe(false);
    });
  });

  describe('dependency graph', () => {
    test('should compute Kahn layers in registration order', () => {
      manager.registerComponent(component('speech', ['nlp']));
      manager.registerComponent(component('keyboard'));
      manager.registerComponent(component('display', ['nlp']));
      manager.registerComponent(component('nlp', ['keyboard']));

      expect(manager.getStartupLayers()).toEqual({
        success: true,
        layers: [['keyboard'], ['nlp'], ['speech', 'display']],
      });
      expect(manager.getStartupOrder().startupOrder).toEqual([
        'keyboard',
        'nlp',
        'speech',
        'display',
      ]);
    });

    test('should report missing dependencies', () => {
      manager.registerComponent(component('nlp', ['keyboard', 'microphone']));
      manager.registerComponent(component('speech', ['nlp']));

      expect(manager.validateDependencies()).toEqual({
        valid: false,
        missingDependencies: [
          { componentName: 'nlp', missingDependency: 'keyboard' },
          { componentName: 'nlp', missingDependency: 'microphone' },
        ],
        summary: { totalMissing: 2, componentsWithMissing: 1 },
      });
    });
  });

  describe('startAllComponents', () => {
    test('should start layers in order, members concurrently', async () => {
      manager.registerComponent(component('keyboard'));
      manager.registerComponent(component('nlp', ['keyboard']));
      manager.registerComponent(component('speech', ['nlp'], { initializeDelayMS: 30 }));
      manager.registerComponent(component('display', ['nlp']));

      const result = await manager.startAllComponents();

      expect(result.success).toBe(true);
      expect(result.errors).toEqual([]);
      expect(journal).toEqual([
        'initialize:keyboard',
        'initialize:nlp',
        'initialize:speech',
        'initialize:display',
      ]);
      // display finished while speech was still initializing
      expect(result.startedComponents).toEqual(['keyboard', 'nlp', 'display', 'speech']);
      expect(manager.getSystemState()).toBe('running');
    });

    test('should never run a component before its dependencies', async () => {
      const changes = collect(manager, 'component:state-changed');
      manager.registerComponent(component('nlp', ['keyboard']));
      manager.registerComponent(component('keyboard', [], { initializeDelayMS: 10 }));

      await manager.startAllComponents();

      const running = changes
        .filter((change) => change.state === 'running')
        .map((change) => change.name);
      const nlpInitializing = changes.findIndex(
        (change) => change.name === 'nlp' && change.state === 'initializing',
      );
      const keyboardRunning = changes.findIndex(
        (change) => change.name === 'keyboard' && change.state === 'running',
      );

      expect(running).toEqual(['keyboard', 'nlp']);
      expect(keyboardRunning).toBeLessThan(nlpInitializing);
    });

    test('should leave dependents registered when initialize returns false', async () => {
      const a = component('a', [], { initializeResult: false });
      const b = component('b', ['a']);
      manager.registerComponent(a);
      manager.registerComponent(b);

      const result = await manager.startAllComponents();

      expect(result.success).toBe(false);
      expect(result.code).toBe('initialization_failed');
      expect(result.startedComponents).toEqual([]);
      expect(result.failedComponents).toEqual(['a']);
      expect(result.notStartedComponents).toEqual(['b']);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toBeInstanceOf(ComponentInitializationError);
      expect(result.errors[0]).toBeInstanceOf(InitializationFailure);
      expect(result.errors[0].message).toBe(
        'Component "a" failed to initialize: initialize() returned false',
      );
      expect(manager.getComponentState('a')).toBe('failed');
      expect(manager.getComponentState('b')).toBe('registered');
      expect(manager.getRunningComponentCount()).toBe(0);
      expect(b.initializeCalls).toBe(0);
    });

    test('should roll back started components in reverse order', async () => {
      manager.registerComponent(component('a'));
      manager.registerComponent(component('b', ['a']));
      manager.registerComponent(
        component('c', ['b'], { initializeError: new Error('no device') }),
      );

      const result = await manager.startAllComponents();

      expect(result.success).toBe(false);
      expect(result.errors[0].message).toBe('Component "c" failed to initialize: no device');
      expect(result.errors[0].additionalInfo).toEqual({ name: 'c', reason: 'threw' });
      expect(journal).toEqual([
        'initialize:a',
        'initialize:b',
        'initialize:c',
        'shutdown:b',
        'shutdown:a',
      ]);
      expect(manager.getComponentState('a')).toBe('stopped');
      expect(manager.getComponentState('b')).toBe('stopped');
      expect(manager.getComponentState('c')).toBe('failed');
      expect(manager.getStartOrder()).toEqual([]);
    });

    test('should stop siblings of a failed layer member', async () => {
      const sibling = component('sibling');
      manager.registerComponent(component('broken', [], { initializeResult: false }));
      manager.registerComponent(sibling);

      const result = await manager.startAllComponents();

      expect(result.failedComponents).toEqual(['broken']);
      expect(sibling.shutdownCalls).toBe(1);
      expect(manager.getComponentState('sibling')).toBe('stopped');
    });

    test('should time out a hanging initialize', async () => {
      const slow = component('slow', [], {
        hangOnInitialize: true,
        initializeTimeoutMS: 20,
      });
      manager.registerComponent(slow);

      const result = await manager.startAllComponents();

      expect(result.success).toBe(false);
      expect(result.errors[0].additionalInfo).toEqual({ name: 'slow', reason: 'timeout' });
      expect(result.errors[0].cause).toBeInstanceOf(ComponentInitializeTimeoutError);
      expect(slow.initializeAborted).toBe(true);
      expect(manager.getComponentState('slow')).toBe('failed');
    });

    test('should fail before starting anything when a dependency is missing', async () => {
      const nlp = component('nlp', ['keyboard']);
      manager.registerComponent(nlp);

      const result = await manager.startAllComponents();

      expect(result.code).toBe('missing_dependency');
      expect(result.errors[0]).toBeInstanceOf(MissingDependencyError);
      expect(result.errors[0].message).toBe(
        'Component "nlp" depends on "keyboard", but it is not registered.',
      );
      expect(nlp.initializeCalls).toBe(0);
    });

    test('should refuse to start while a failed component is registered', async () => {
      manager.registerComponent(component('a', [], { initializeResult: false }));
      await manager.startAllComponents();

      const retry = await manager.startAllComponents();
      expect(retry.code).toBe('component_failed');

      manager.unregisterComponent('a');
      manager.registerComponent(component('a'));

      expect((await manager.startAllComponents()).success).toBe(true);
    });

    test('should roll back when shutdown is requested mid-startup', async () => {
      manager.registerComponent(component('a', [], { initializeDelayMS: 30 }));
      manager.registerComponent(component('b', ['a']));

      const startup = manager.startAllComponents();
      const shutdown = manager.stopAllComponents();

      const startResult = await startup;
      const shutdownResult = await shutdown;

      expect(startResult.code).toBe('shutdown_requested');
      expect(shutdownResult.stoppedComponents).toEqual([]);
      expect(manager.getComponentState('a')).toBe('stopped');
      expect(manager.getComponentState('b')).toBe('registered');
      expect(journal).toEqual(['initialize:a', 'shutdown:a']);
    });
  });

  describe('stopAllComponents', () => {
    test('should stop in exact reverse of the achieved start order', async () => {
      manager.registerComponent(component('keyboard'));
      manager.registerComponent(component('nlp', ['keyboard']));
      manager.registerComponent(component('speech', ['nlp'], { initializeDelayMS: 30 }));
      manager.registerComponent(component('display', ['nlp']));
      await manager.startAllComponents();
      journal.length = 0;

      const result = await manager.stopAllComponents();

      expect(result.success).toBe(true);
      expect(result.stoppedComponents).toEqual(['speech', 'display', 'nlp', 'keyboard']);
      expect(journal).toEqual([
        'shutdown:speech',
        'shutdown:display',
        'shutdown:nlp',
        'shutdown:keyboard',
      ]);
      expect(manager.getStartOrder()).toEqual([]);
    });

    test('should force stopped on timeout and keep going', async () => {
      const timeouts = collect(manager, 'component:shutdown-timeout');
      const stuck = component('stuck', ['base'], {
        hangOnShutdown: true,
        shutdownTimeoutMS: 20,
      });
      manager.registerComponent(component('base'));
      manager.registerComponent(stuck);
      await manager.startAllComponents();

      const result = await manager.stopAllComponents();

      expect(result.success).toBe(false);
      expect(result.timedOutComponents).toEqual(['stuck']);
      expect(result.stoppedComponents).toEqual(['stuck', 'base']);
      expect(manager.getComponentState('stuck')).toBe('stopped');
      expect(stuck.shutdownAborted).toBe(true);
      expect(timeouts[0].error).toBeInstanceOf(ComponentShutdownTimeoutError);
      expect(timeouts[0].error).toBeInstanceOf(ShutdownTimeout);
    });

    test('should force stopped when shutdown throws', async () => {
      manager.registerComponent(
        component('leaky', [], { shutdownError: new Error('socket busy') }),
      );
      await manager.startAllComponents();

      const result = await manager.stopAllComponents();

      expect(result.failedComponents).toEqual(['leaky']);
      expect(manager.getComponentState('leaky')).toBe('stopped');
      expect(manager.getComponentStatus('leaky')?.lastError?.message).toBe('socket busy');
    });

    test('should abort offloaded work and drop subscriptions', async () => {
      const worker = component('worker', [], { subscribesTo: ['text-input'] });
      manager.registerComponent(worker);
      await manager.startAllComponents();

      const work = worker.startLongWork();
      expect(worker.getOffloadedWorkCount()).toBe(1);
      expect(bus.hasSubscribers('text-input')).toBe(true);

      await manager.stopAllComponents();

      await expect(work).resolves.toBe('aborted');
      expect(worker.getOffloadedWorkCount()).toBe(0);
      expect(bus.hasSubscribers('text-input')).toBe(false);
    });
  });

  describe('individual components', () => {
    test('should refuse to stop a component with running dependents unless forced', async () => {
      manager.registerComponent(component('keyboard'));
      manager.registerComponent(component('nlp', ['keyboard']));
      await manager.startAllComponents();

      const refused = await manager.stopComponent('keyboard');
      expect(refused.code).toBe('has_running_dependents');

      const forced = await manager.stopComponent('keyboard', { force: true });
      expect(forced.success).toBe(true);
      expect(manager.getComponentState('keyboard')).toBe('stopped');
      expect(manager.getComponentState('nlp')).toBe('running');
    });

    test('should only start a component whose dependencies are running', async () => {
      manager.registerComponent(component('keyboard'));
      manager.registerComponent(component('nlp', ['keyboard']));

      expect((await manager.startComponent('nlp')).code).toBe('dependency_not_running');
      expect((await manager.startComponent('keyboard')).success).toBe(true);
      expect((await manager.startComponent('nlp')).success).toBe(true);
      expect((await manager.startComponent('nlp')).code).toBe('component_already_running');
      expect(manager.getStartOrder()).toEqual(['keyboard', 'nlp']);
    });

    test('should restart a running component', async () => {
      const nlp = component('nlp');
      manager.registerComponent(nlp);
      await manager.startAllComponents();

      const result = await manager.restartComponent('nlp');

      expect(result.success).toBe(true);
      expect(result.status?.state).toBe('running');
      expect(nlp.initializeCalls).toBe(2);
      expect(nlp.shutdownCalls).toBe(1);
      expect(journal).toEqual(['initialize:nlp', 'shutdown:nlp', 'initialize:nlp']);
    });

    test('should keep failed absorbing', async () => {
      manager.registerComponent(component('a', [], { initializeResult: false }));
      await manager.startAllComponents();

      expect((await manager.startComponent('a')).code).toBe('component_failed');
      expect(manager.getSystemState()).toBe('failed');
    });
  });

  describe('bus integration', () => {
    test('should only let registered components subscribe', () => {
      expect(() => bus.subscribe('text-input', 'stranger', () => undefined)).toThrow(
        UnknownSubscriberError,
      );
    });

    test('should route events to handleEvent and publish responses', async () => {
      const nlp = component('nlp', [], {
        subscribesTo: ['text-input'],
        onEvent: (event) =>
          createResponseEvent(event, {
            type: 'nlp-response',
            payload: { text: 'hello there', intent: 'greet' },
            source: 'nlp',
          }),
      });
      const speech = component('speech', ['nlp'], { subscribesTo: ['nlp-response'] });
      manager.registerComponent(nlp);
      manager.registerComponent(speech);
      await manager.startAllComponents();

      await bus.publish(
        createEvent({
          type: 'text-input',
          payload: { text: 'hi' },
          source: 'keyboard',
          correlationId: 'conversation-1',
        }),
      );
      await waitUntil(() => speech.received.length === 1);

      expect(nlp.received.map((event) => event.type)).toEqual(['text-input']);
      expect(speech.received[0].payload).toEqual({ text: 'hello there', intent: 'greet' });
      expect(speech.received[0].correlationId).toBe('conversation-1');
      expect(speech.received[0].source).toBe('nlp');
    });

    test('should let components publish through their context', async () => {
      const display = component('display', [], { subscribesTo: ['display-text'] });
      const producer = component('producer');
      manager.registerComponent(display);
      manager.registerComponent(producer);
      await manager.startAllComponents();

      const accepted = await producer.publishFromComponent('ready', 'boot');
      await waitUntil(() => display.received.length === 1);

      expect(accepted).toBe(1);
      expect(display.received[0].source).toBe('producer');
      expect(display.received[0].correlationId).toBe('boot');
    });

    test('should publish component-status events for every transition', async () => {
      const monitor = component('monitor', [], { subscribesTo: ['component-status'] });
      manager.registerComponent(monitor);
      manager.registerComponent(component('worker', ['monitor']));

      await manager.startAllComponents();
      await waitUntil(() => monitor.received.length === 3);

      const statusEvents = monitor.received.filter((event) =>
        isEventOfType(event, 'component-status'),
      );
      const payloads: ComponentStatusPayload[] = [];

      for (const event of statusEvents) {
        expect(event.source).toBe('lifecycle-manager');

        if (isEventOfType(event, 'component-status')) {
          const { name, previousState, state } = event.payload;
          payloads.push({ name, previousState, state });
        }
      }

      expect(payloads).toEqual([
        { name: 'monitor', previousState: 'initializing', state: 'running' },
        { name: 'worker', previousState: 'registered', state: 'initializing' },
        { name: 'worker', previousState: 'initializing', state: 'running' },
      ]);
    });

    test('should degrade after three handler failures and recover', async () => {
      let failing = true;
      const changes = collect(manager, 'component:state-changed');
      const flaky = component('flaky', [], {
        subscribesTo: ['text-input'],
        onEvent: () => {
          if (failing) {
            throw new Error('model unavailable');
          }
        },
      });
      manager.registerComponent(flaky);
      await manager.startAllComponents();

      for (const text of ['one', 'two', 'three']) {
        await bus.publish(createEvent({ type: 'text-input', payload: { text }, source: 'keyboard' }));
      }
      await waitUntil(() => manager.getComponentState('flaky') === 'degraded');

      expect(manager.getComponentStatus('flaky')?.lastError?.message).toContain(
        'model unavailable',
      );
      expect(manager.getSystemState()).toBe('degraded');

      failing = false;
      await bus.publish(createEvent({ type: 'text-input', payload: { text: 'four' }, source: 'keyboard' }));
      await waitUntil(() => manager.getComponentState('flaky') === 'running');

      expect(
        changes
          .filter((change) => change.name === 'flaky')
          .map((change) => `${change.previousState}->${change.state}`),
      ).toEqual([
        'registered->initializing',
        'initializing->running',
        'running->degraded',
        'degraded->running',
      ]);
    });
  });

  describe('BaseComponent contract', () => {
    test('should refuse events before initialization', async () => {
      const nlp = component('nlp');
      const event = createEvent({ type: 'text-input', payload: { text: 'x' }, source: 'k' });

      await expect(nlp.receive(event)).rejects.toBeInstanceOf(ComponentNotInitializedError);
    });

    test('should refuse to publish before it is registered', () => {
      const producer = component('producer');

      expect(() => producer.publishFromComponent('x')).toThrow(ComponentNotInitializedError);
    });
  });

  describe('health checks', () => {
    test('should report each outcome', async () => {
      const probe = new HealthCheckedComponent(logger, {
        name: 'probe',
        healthCheckTimeoutMS: 20,
      });
      manager.registerComponent(probe);
      manager.registerComponent(component('plain'));
      await manager.startAllComponents();

      expect((await manager.checkComponentHealth('probe')).code).toBe('ok');
      expect((await manager.checkComponentHealth('plain')).code).toBe('no_handler');
      expect((await manager.checkComponentHealth('ghost')).code).toBe('not_found');

      probe.health = { healthy: false, message: 'queue full' };
      const unhealthy = await manager.checkComponentHealth('probe');
      expect(unhealthy.code).toBe('unhealthy');
      expect(unhealthy.message).toBe('queue full');

      probe.healthDelayMS = 200;
      const timedOut = await manager.checkComponentHealth('probe');
      expect(timedOut.code).toBe('timeout');
      expect(timedOut.timedOut).toBe(true);
    });

    test('should aggregate a health report', async () => {
      const probe = new HealthCheckedComponent(logger, { name: 'probe' });
      probe.health = false;
      manager.registerComponent(probe);
      manager.registerComponent(component('plain'));
      await manager.startAllComponents();

      const report = await manager.checkAllHealth();

      expect(report.healthy).toBe(false);
      expect(report.code).toBe('degraded');
      expect(report.components.map((result) => result.code)).toEqual(['unhealthy', 'no_handler']);
    });

    test('should run the monitor periodically', async () => {
      const probe = new HealthCheckedComponent(logger, { name: 'probe' });
      probe.health = { healthy: false, message: 'disk full' };
      manager.registerComponent(probe);
      await manager.startAllComponents();

      const report = new Promise<LifecycleManagerEventMap['lifecycle-manager:health-report']>(
        (resolve) => {
          manager.once('lifecycle-manager:health-report', resolve);
        },
      );

      expect(manager.startHealthMonitor(0)).toBe(false);
      expect(manager.startHealthMonitor(10)).toBe(true);

      expect((await report).healthy).toBe(false);
      expect(
        arraySink.logs.some(
          (entry) => entry.entityName === 'probe' && entry.message === 'Unhealthy: disk full',
        ),
      ).toBe(true);

      manager.stopHealthMonitor();
      expect(manager.isHealthMonitorRunning()).toBe(false);
    });
  });
});
