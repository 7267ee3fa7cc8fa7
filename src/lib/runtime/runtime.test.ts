import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, describe, expect, test, vi } from 'vitest';
import { InvalidConfigurationError } from '../config';
import { Logger, type ArraySink } from '../logger';
import { ServiceKeys, createServiceKey } from '../service-locator';
import {
  ComponentRegistrationError,
  DependencyCycleError,
  MissingDependencyError,
} from '../lifecycle-manager/errors';
import { TestComponent } from '../lifecycle-manager/test-components';
import { Runtime } from './runtime';
import { RuntimeStartupError } from './errors';
import type { RuntimeOptions } from './types';

describe('Runtime', () => {
  const runtimes: Runtime[] = [];
  let arraySink: ArraySink;

  function createRuntime(options: Omit<RuntimeOptions, 'logger'> = {}): Runtime {
    const testLogger = Logger.createTestOptimizedLogger();
    arraySink = testLogger.arraySink;

    const runtime = new Runtime({ ...options, logger: testLogger.logger });
    runtimes.push(runtime);

    return runtime;
  }

  afterEach(async () => {
    await Promise.all(runtimes.map((runtime) => runtime.stop()));
    runtimes.length = 0;
  });

  describe('construction', () => {
    test('should apply configuration defaults', () => {
      const runtime = createRuntime();

      expect(runtime.config.bus.queueCapacity).toBe(1000);
      expect(runtime.config.bus.backpressure).toBe('drop-oldest');
      expect(runtime.config.bus.failureThreshold).toBe(3);
      expect(runtime.policy.getLevel()).toBe('moderate');
      expect(Object.isFrozen(runtime.config)).toBe(true);
    });

    test('should register core services and seal the locator', () => {
      const extraKey = createServiceKey<string>('greeting');
      const runtime = createRuntime({
        registerServices: (locator) => locator.register(extraKey, 'hello'),
      });

      expect(runtime.locator.get(ServiceKeys.MESSAGE_BUS)).toBe(runtime.bus);
      expect(runtime.locator.get(ServiceKeys.ROOT_LOGGER)).toBe(runtime.logger);
      expect(runtime.locator.get(ServiceKeys.RUNTIME_CONFIG)).toBe(runtime.config);
      expect(runtime.locator.get(extraKey)).toBe('hello');
      expect(runtime.locator.isSealed()).toBe(true);
    });

    test('should apply environment overrides', () => {
      const runtime = createRuntime({
        config: { security: { permissionLevel: 'safe' } },
        env: { SWITCHYARD_PERMISSION_LEVEL: 'elevated' },
      });

      expect(runtime.policy.getLevel()).toBe('elevated');
    });

    test('should reject invalid configuration', () => {
      expect(() => createRuntime({ config: { bus: { queueCapacity: 0 } } })).toThrow(
        InvalidConfigurationError,
      );
      expect(() =>
        createRuntime({ env: { SWITCHYARD_BACKPRESSURE: 'drop-everything' } }),
      ).toThrow(InvalidConfigurationError);
    });

    test('should load configuration from a file', async () => {
      const directory = await mkdtemp(join(tmpdir(), 'runtime-test-'));

      try {
        const path = join(directory, 'config.json');
        await writeFile(
          path,
          JSON.stringify({ bus: { queueCapacity: 8, backpressure: 'drop-newest' } }),
        );

        const { logger } = Logger.createTestOptimizedLogger();
        const runtime = await Runtime.fromConfigFile(path, { logger });
        runtimes.push(runtime);

        expect(runtime.config.bus.queueCapacity).toBe(8);
        expect(runtime.config.bus.backpressure).toBe('drop-newest');
      } finally {
        await rm(directory, { recursive: true, force: true });
      }
    });
  });

  describe('addComponent', () => {
    test('should skip components disabled by configuration', () => {
      const runtime = createRuntime({
        config: { components: { speaker: { enabled: false } } },
      });
      const factory = vi.fn(
        ({ name, logger }: { name: string; logger: Logger }) =>
          new TestComponent(logger, { name }),
      );

      const result = runtime.addComponent('speaker', factory);

      expect(result).toEqual({
        success: false,
        componentName: 'speaker',
        code: 'component_disabled',
        reason: 'Component "speaker" is disabled by configuration',
      });
      expect(factory).not.toHaveBeenCalled();
      expect(runtime.isComponentDisabled('speaker')).toBe(true);
      expect(runtime.manager.hasComponent('speaker')).toBe(false);
    });

    test('should hand configured options to the factory', () => {
      const runtime = createRuntime({
        config: { components: { speaker: { options: { voice: 'calm' } } } },
      });
      const seen: { options?: Readonly<Record<string, unknown>> } = {};

      runtime.addComponent('speaker', (context) => {
        seen.options = context.options;
        expect(context.policy).toBe(runtime.policy);
        expect(context.locator).toBe(runtime.locator);
        return new TestComponent(context.logger, { name: context.name });
      });

      expect(seen.options).toEqual({ voice: 'calm' });
    });

    test('should throw when the factory builds a differently named component', () => {
      const runtime = createRuntime();

      expect(() =>
        runtime.addComponent('speaker', ({ logger }) =>
          new TestComponent(logger, { name: 'display' }),
        ),
      ).toThrow(ComponentRegistrationError);
    });

    test('should add configured dependencies', async () => {
      const journal: string[] = [];
      const runtime = createRuntime({
        config: { components: { display: { dependencies: ['nlp'] } } },
      });

      const added = runtime.addComponent('display', ({ logger, name }) =>
        new TestComponent(logger, { name, journal }),
      );
      runtime.addComponent('nlp', ({ logger, name }) =>
        new TestComponent(logger, { name, journal }),
      );

      expect(added).toMatchObject({ success: true, dependencies: ['nlp'] });

      const result = await runtime.start();

      expect(result.success).toBe(true);
      expect(result.startedComponents).toEqual(['nlp', 'display']);
      expect(journal).toEqual(['initialize:nlp', 'initialize:display']);
    });
  });

  describe('start', () => {
    test('should throw for a dependency cycle closed at registration', async () => {
      const runtime = createRuntime({
        config: { components: { nlp: { dependencies: ['speech'] } } },
      });
      const nlp = new TestComponent(runtime.logger, { name: 'nlp' });

      runtime.addComponent('nlp', () => nlp);
      const rejected = runtime.addComponent('speech', ({ logger, name }) =>
        new TestComponent(logger, { name, dependencies: ['nlp'] }),
      );

      expect(rejected.success).toBe(false);

      const error = await runtime.start().then(
        () => undefined,
        (reason: unknown) => reason,
      );

      expect(error).toBeInstanceOf(RuntimeStartupError);

      if (!(error instanceof RuntimeStartupError)) {
        return;
      }

      expect(error.errCode).toBe('ConfigurationFailed');
      expect(error.category).toBe('ConfigurationError');
      expect(error.additionalInfo.failure).toBe('configuration');
      expect(error.additionalInfo.errors[0]).toBeInstanceOf(DependencyCycleError);
      expect(nlp.initializeCalls).toBe(0);
    });

    test('should throw for a missing dependency', async () => {
      const runtime = createRuntime();

      runtime.addComponent('display', ({ logger, name }) =>
        new TestComponent(logger, { name, dependencies: ['ghost'] }),
      );

      const error = await runtime.start().then(
        () => undefined,
        (reason: unknown) => reason,
      );

      expect(error).toBeInstanceOf(RuntimeStartupError);

      if (!(error instanceof RuntimeStartupError)) {
        return;
      }

      expect(error.additionalInfo.errors[0]).toBeInstanceOf(MissingDependencyError);
      expect(error.additionalInfo.startup?.code).toBe('missing_dependency');
    });

    test('should throw for initialization failures of the first startup only', async () => {
      const runtime = createRuntime();

      runtime.addComponent('microphone', ({ logger, name }) =>
        new TestComponent(logger, { name, initializeError: new Error('no device') }),
      );

      const error = await runtime.start().then(
        () => undefined,
        (reason: unknown) => reason,
      );

      expect(error).toBeInstanceOf(RuntimeStartupError);

      if (!(error instanceof RuntimeStartupError)) {
        return;
      }

      expect(error.errCode).toBe('InitializationFailed');
      expect(error.category).toBe('InitializationFailure');
      expect(error.additionalInfo.startup?.failedComponents).toEqual(['microphone']);

      const retry = await runtime.start();

      expect(retry.success).toBe(false);
      expect(retry.code).toBe('component_failed');

      runtime.manager.unregisterComponent('microphone');
      runtime.addComponent('microphone', ({ logger, name }) =>
        new TestComponent(logger, { name }),
      );

      const recovered = await runtime.start();

      expect(recovered.success).toBe(true);
      expect(runtime.getStatus().state).toBe('running');
    });

    test('should warn about configured components that were never added', async () => {
      const runtime = createRuntime({
        config: { components: { camera: { enabled: true } } },
      });

      await runtime.start();

      expect(
        arraySink.logs.some(
          (entry) =>
            entry.type === 'warn' &&
            entry.message === 'Configuration mentions unknown component camera',
        ),
      ).toBe(true);
    });

    test('should run the health monitor when configured', async () => {
      const runtime = createRuntime({
        config: { lifecycle: { healthCheckIntervalMS: 50 } },
      });

      runtime.addComponent('display', ({ logger, name }) =>
        new TestComponent(logger, { name }),
      );

      await runtime.start();
      expect(runtime.manager.isHealthMonitorRunning()).toBe(true);

      await runtime.stop();
      expect(runtime.manager.isHealthMonitorRunning()).toBe(false);
    });

    test('should leave the health monitor off by default', async () => {
      const runtime = createRuntime();

      await runtime.start();

      expect(runtime.manager.isHealthMonitorRunning()).toBe(false);
    });
  });

  describe('stop', () => {
    test('should stop components in reverse order and close the bus', async () => {
      const journal: string[] = [];
      const runtime = createRuntime();

      runtime.addComponent('nlp', ({ logger, name }) =>
        new TestComponent(logger, { name, journal }),
      );
      runtime.addComponent('display', ({ logger, name }) =>
        new TestComponent(logger, { name, journal, dependencies: ['nlp'] }),
      );

      await runtime.start();
      const result = await runtime.stop();

      expect(result.components.stoppedComponents).toEqual(['display', 'nlp']);
      expect(result.bus.timedOut).toBe(false);
      expect(journal.slice(2)).toEqual(['shutdown:display', 'shutdown:nlp']);
      expect(runtime.bus.isClosed).toBe(true);
      expect(runtime.getStatus()).toMatchObject({
        state: 'ready',
        started: true,
        stopped: true,
      });
    });

    test('should share one stop between callers', async () => {
      const runtime = createRuntime();

      const first = runtime.stop();
      const second = runtime.stop();

      expect(second).toBe(first);
      await first;
    });

    test('should refuse to start once stopped', async () => {
      const runtime = createRuntime();

      await runtime.stop();

      await expect(runtime.start()).rejects.toMatchObject({
        errCode: 'AlreadyStopped',
      });
    });

    test('should stop before the logger exits', async () => {
      const runtime = createRuntime();
      const component = new TestComponent(runtime.logger, { name: 'display' });

      runtime.addComponent('display', () => component);
      runtime.attachToLoggerExit();
      await runtime.start();

      runtime.logger.exit(0);

      await vi.waitFor(() => {
        expect(runtime.logger.didExit).toBe(true);
      });

      expect(runtime.isStopped()).toBe(true);
      expect(component.shutdownCalls).toBe(1);
      expect(runtime.bus.isClosed).toBe(true);
    });
  });
});
