import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { EventEmitter } from 'events';
import { AgentMetrics } from '../metrics';
import { PluginRegistry } from '../plugins/plugin-registry';
import { PluginOrchestrator, createPlugin } from '../plugins/orchestrator';
import { ProcessPlugin } from '../plugins/process-plugin';
import { ScriptPlugin } from '../plugins/script-plugin';
import type {
  Plugin,
  PluginContext,
  PluginDefinition,
  PluginState,
  PluginType,
} from '../plugins/types';

function makeDefinition(id: string, overrides: Partial<PluginDefinition> = {}): PluginDefinition {
  return {
    id,
    type: 'process',
    executable: `/usr/bin/${id}`,
    arguments: [],
    restartPolicy: 'OnFailure',
    enabled: true,
    stopOnDisconnect: false,
    ...overrides,
  };
}

/** Scriptable plugin that records every lifecycle call */
class FakePlugin extends EventEmitter implements Plugin {
  readonly type: PluginType;
  state: PluginState = 'Disabled';

  healthy = true;
  healthThrows = false;
  startResult = true;
  stopThrows = false;
  startGate: Promise<void> | null = null;

  starts: PluginContext[] = [];
  stops = 0;
  healthChecks = 0;

  constructor(readonly id: string, readonly definition: PluginDefinition) {
    super();
    this.type = definition.type;
  }

  async start(context: PluginContext): Promise<boolean> {
    this.starts.push(context);
    if (this.startGate) await this.startGate;
    this.state = this.startResult ? 'Running' : 'Error';
    return this.startResult;
  }

  async stop(): Promise<void> {
    this.stops++;
    if (this.stopThrows) throw new Error('stop failed');
    this.state = 'Stopped';
  }

  async checkHealth(): Promise<boolean> {
    this.healthChecks++;
    if (this.healthThrows) throw new Error('probe exploded');
    return this.healthy;
  }
}

const baseContext: PluginContext = { installFolder: '/opt/agent', variables: {} };

/** A promise held open until the test calls open() */
function gate(): { wait: Promise<void>; open: () => void } {
  let open: () => void = () => undefined;
  const wait = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { wait, open };
}

const settle = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe('PluginOrchestrator', () => {
  let registry: PluginRegistry;
  let metrics: AgentMetrics;
  let created: Map<string, FakePlugin>;
  let now: number;
  let orchestrator: PluginOrchestrator;

  function plugin(id: string): FakePlugin {
    const found = created.get(id);
    assert.ok(found, `no plugin created for ${id}`);
    return found;
  }

  beforeEach(() => {
    registry = new PluginRegistry();
    metrics = new AgentMetrics();
    created = new Map();
    now = 0;
    orchestrator = new PluginOrchestrator(registry, {
      metrics,
      clock: () => now,
      createPlugin: (instanceId, definition) => {
        const fake = new FakePlugin(instanceId, definition);
        created.set(instanceId, fake);
        return fake;
      },
    });
  });

  describe('startInstance', () => {
    it('is idempotent for a running instance', async () => {
      registry.registerDefinition(makeDefinition('p1'));

      assert.strictEqual(await orchestrator.startInstance('p1', baseContext), true);
      assert.strictEqual(await orchestrator.startInstance('p1', baseContext), true);

      assert.strictEqual(created.size, 1);
      assert.strictEqual(plugin('p1').starts.length, 1);
      assert.strictEqual(registry.getInstances().length, 1);
    });

    it('returns false for an unknown definition', async () => {
      assert.strictEqual(await orchestrator.startInstance('missing', baseContext), false);
      assert.strictEqual(registry.getInstances().length, 0);
    });

    it('keys per-device instances by definitionId:deviceId', async () => {
      registry.registerDefinition(makeDefinition('logcat'));
      await orchestrator.startInstance('logcat', { ...baseContext, variables: { deviceId: 'emulator-5554' } });
      await orchestrator.startInstance('logcat', { ...baseContext, variables: { deviceId: 'R58M123ABC' } });

      assert.deepStrictEqual(orchestrator.getStatus(), [
        { id: 'logcat:emulator-5554', definitionId: 'logcat', type: 'process', state: 'Running' },
        { id: 'logcat:R58M123ABC', definitionId: 'logcat', type: 'process', state: 'Running' },
      ]);
    });

    it('resolves the health timeout from definition, then context, then default', async () => {
      registry.registerDefinition(makeDefinition('a', { healthCheckTimeoutSeconds: 2 }));
      registry.registerDefinition(makeDefinition('b'));
      registry.registerDefinition(makeDefinition('c'));

      await orchestrator.startInstance('a', { ...baseContext, healthCheckTimeoutSeconds: 7 });
      await orchestrator.startInstance('b', { ...baseContext, healthCheckTimeoutSeconds: 7 });
      await orchestrator.startInstance('c', baseContext);

      assert.strictEqual(plugin('a').starts[0].healthCheckTimeoutSeconds, 2);
      assert.strictEqual(plugin('b').starts[0].healthCheckTimeoutSeconds, 7);
      assert.strictEqual(plugin('c').starts[0].healthCheckTimeoutSeconds, 5);
    });

    it('copies the caller variables', async () => {
      registry.registerDefinition(makeDefinition('p1'));
      const variables: Record<string, unknown> = { serial: 'A' };
      await orchestrator.startInstance('p1', { installFolder: '/opt/agent', variables });
      variables.serial = 'B';

      assert.deepStrictEqual(plugin('p1').starts[0].variables, { serial: 'A' });
    });

    it('starts an Error instance again in place', async () => {
      registry.registerDefinition(makeDefinition('p1'));
      orchestrator = new PluginOrchestrator(registry, {
        createPlugin: (instanceId, definition) => {
          const fake = new FakePlugin(instanceId, definition);
          fake.startResult = false;
          created.set(instanceId, fake);
          return fake;
        },
      });

      assert.strictEqual(await orchestrator.startInstance('p1', baseContext), false);
      assert.strictEqual(plugin('p1').state, 'Error');

      plugin('p1').startResult = true;
      assert.strictEqual(await orchestrator.startInstance('p1', baseContext), true);
      assert.strictEqual(created.size, 1);
      assert.strictEqual(plugin('p1').starts.length, 2);
      assert.strictEqual(registry.getInstance('p1'), plugin('p1'));
    });

    it('shares one launch between concurrent starts of a new instance', async () => {
      registry.registerDefinition(makeDefinition('p1'));
      const starting = gate();
      orchestrator = new PluginOrchestrator(registry, {
        createPlugin: (instanceId, definition) => {
          const fake = new FakePlugin(instanceId, definition);
          fake.startGate = starting.wait;
          created.set(instanceId, fake);
          return fake;
        },
      });

      const pending = Promise.all([
        orchestrator.startInstance('p1', baseContext),
        orchestrator.startInstance('p1', baseContext),
      ]);
      starting.open();

      assert.deepStrictEqual(await pending, [true, true]);
      assert.strictEqual(created.size, 1);
      assert.strictEqual(registry.getInstances().length, 1);
      assert.strictEqual(plugin('p1').starts.length, 1);
    });

    it('hands a failed in-flight launch to every concurrent caller', async () => {
      registry.registerDefinition(makeDefinition('p1'));
      const starting = gate();
      orchestrator = new PluginOrchestrator(registry, {
        createPlugin: (instanceId, definition) => {
          const fake = new FakePlugin(instanceId, definition);
          fake.startGate = starting.wait;
          fake.startResult = false;
          created.set(instanceId, fake);
          return fake;
        },
      });

      const pending = Promise.all([
        orchestrator.startInstance('p1', baseContext),
        orchestrator.startInstance('p1', baseContext),
      ]);
      starting.open();

      assert.deepStrictEqual(await pending, [false, false]);
      assert.strictEqual(plugin('p1').starts.length, 1);
    });

    it('starts a Stopped instance once under concurrent starts', async () => {
      registry.registerDefinition(makeDefinition('p1'));
      await orchestrator.startInstance('p1', baseContext);
      const worker = plugin('p1');
      await worker.stop();

      const starting = gate();
      worker.startGate = starting.wait;
      const pending = Promise.all([
        orchestrator.startInstance('p1', baseContext),
        orchestrator.startInstance('p1', baseContext),
      ]);
      starting.open();

      assert.deepStrictEqual(await pending, [true, true]);
      assert.strictEqual(worker.starts.length, 2);
      assert.strictEqual(worker.state, 'Running');
      assert.strictEqual(registry.getInstances().length, 1);
    });

    it('returns false when the factory throws', async () => {
      registry.registerDefinition(makeDefinition('p1'));
      orchestrator = new PluginOrchestrator(registry, {
        createPlugin: () => { throw new Error('bad type'); },
      });

      assert.strictEqual(await orchestrator.startInstance('p1', baseContext), false);
      assert.strictEqual(registry.getInstances().length, 0);
    });
  });

  describe('stopInstance / stopAll', () => {
    it('stops and removes an instance', async () => {
      registry.registerDefinition(makeDefinition('p1'));
      await orchestrator.startInstance('p1', baseContext);

      assert.strictEqual(await orchestrator.stopInstance('p1'), true);
      assert.strictEqual(plugin('p1').stops, 1);
      assert.strictEqual(registry.getInstance('p1'), undefined);
    });

    it('returns false for an unknown instance', async () => {
      assert.strictEqual(await orchestrator.stopInstance('nope'), false);
    });

    it('removes the instance even when stop throws', async () => {
      registry.registerDefinition(makeDefinition('p1'));
      await orchestrator.startInstance('p1', baseContext);
      plugin('p1').stopThrows = true;

      assert.strictEqual(await orchestrator.stopInstance('p1'), false);
      assert.strictEqual(registry.getInstance('p1'), undefined);
    });

    it('stopAll clears every instance', async () => {
      registry.registerDefinition(makeDefinition('a'));
      registry.registerDefinition(makeDefinition('b'));
      await orchestrator.startEnabledDefinitions(baseContext);

      await orchestrator.stopAll();

      assert.deepStrictEqual(orchestrator.getStatus(), []);
      assert.strictEqual(plugin('a').stops, 1);
      assert.strictEqual(plugin('b').stops, 1);
    });
  });

  describe('startEnabledDefinitions', () => {
    beforeEach(() => {
      registry.registerDefinition(makeDefinition('a'));
      registry.registerDefinition(makeDefinition('b', { enabled: false }));
      registry.registerDefinition(makeDefinition('c', { triggerOn: 'device-connected' }));
    });

    it('starts every enabled definition by default', async () => {
      assert.strictEqual(await orchestrator.startEnabledDefinitions(baseContext), 2);
      assert.deepStrictEqual(orchestrator.getStatus().map((s) => s.id), ['a', 'c']);
    });

    it('can leave device-triggered definitions alone', async () => {
      assert.strictEqual(await orchestrator.startEnabledDefinitions(baseContext, { includeTriggered: false }), 1);
      assert.deepStrictEqual(orchestrator.getStatus().map((s) => s.id), ['a']);
    });
  });

  describe('runHealthChecks', () => {
    it('throttles checks to the global interval', async () => {
      registry.registerDefinition(makeDefinition('p1'));
      await orchestrator.startInstance('p1', baseContext);

      now = 0;
      await orchestrator.runHealthChecks();
      now = 2000;
      await orchestrator.runHealthChecks();
      assert.strictEqual(plugin('p1').healthChecks, 1);

      now = 10_000;
      await orchestrator.runHealthChecks();
      assert.strictEqual(plugin('p1').healthChecks, 2);
    });

    it('restarts an unhealthy instance with its original context, within the backoff', async () => {
      registry.registerDefinition(makeDefinition('p1', { healthCheckIntervalSeconds: 1 }));
      const context: PluginContext = { installFolder: '/opt/agent', variables: { serial: 'A' } };
      await orchestrator.startInstance('p1', context);
      const worker = plugin('p1');
      worker.healthy = false;

      now = 0;
      await orchestrator.runHealthChecks();
      assert.strictEqual(worker.stops, 1);
      assert.strictEqual(worker.starts.length, 2);
      assert.deepStrictEqual(worker.starts[1], worker.starts[0]);

      now = 2000;
      await orchestrator.runHealthChecks();
      assert.strictEqual(worker.stops, 1);
      assert.strictEqual(worker.starts.length, 2);

      now = 6000;
      await orchestrator.runHealthChecks();
      assert.strictEqual(worker.stops, 2);
      assert.strictEqual(worker.starts.length, 3);

      const snapshot = metrics.snapshot();
      assert.deepStrictEqual(snapshot.pluginUnhealthy, { p1: 3 });
      assert.deepStrictEqual(snapshot.pluginRestarts, { p1: 2 });
    });

    it('joins a start that arrives while a restart is in flight', async () => {
      registry.registerDefinition(makeDefinition('p1'));
      await orchestrator.startInstance('p1', baseContext);
      const worker = plugin('p1');
      worker.healthy = false;

      const starting = gate();
      worker.startGate = starting.wait;
      const checks = orchestrator.runHealthChecks();
      await settle();
      assert.strictEqual(worker.stops, 1);
      assert.strictEqual(worker.starts.length, 2);

      const joined = orchestrator.startInstance('p1', baseContext);
      starting.open();

      assert.strictEqual(await joined, true);
      await checks;
      assert.strictEqual(worker.starts.length, 2);
      assert.strictEqual(worker.state, 'Running');
      assert.deepStrictEqual(metrics.snapshot().pluginRestarts, { p1: 1 });
    });

    it('only records unhealthy instances under the Never policy', async () => {
      registry.registerDefinition(makeDefinition('p1', { restartPolicy: 'Never' }));
      await orchestrator.startInstance('p1', baseContext);
      plugin('p1').healthy = false;

      await orchestrator.runHealthChecks();

      assert.strictEqual(plugin('p1').stops, 0);
      assert.strictEqual(plugin('p1').starts.length, 1);
      assert.deepStrictEqual(metrics.snapshot().pluginUnhealthy, { p1: 1 });
      assert.deepStrictEqual(metrics.snapshot().pluginRestarts, {});
    });

    it('skips instances that are not Running', async () => {
      registry.registerDefinition(makeDefinition('p1'));
      await orchestrator.startInstance('p1', baseContext);
      plugin('p1').state = 'Error';

      await orchestrator.runHealthChecks();
      assert.strictEqual(plugin('p1').healthChecks, 0);
    });

    it('treats a throwing probe as unhealthy and keeps checking the rest', async () => {
      registry.registerDefinition(makeDefinition('a'));
      registry.registerDefinition(makeDefinition('b'));
      await orchestrator.startEnabledDefinitions(baseContext);
      plugin('a').healthThrows = true;

      await orchestrator.runHealthChecks();

      assert.strictEqual(plugin('a').stops, 1);
      assert.strictEqual(plugin('a').starts.length, 2);
      assert.strictEqual(plugin('b').healthChecks, 1);
      assert.strictEqual(plugin('b').stops, 0);
    });
  });

  describe('monitor loop', () => {
    it('starts and stops', async () => {
      orchestrator.startMonitoring({ intervalSeconds: 60 });
      assert.strictEqual(orchestrator.monitoring, true);

      await orchestrator.stopMonitoring();
      assert.strictEqual(orchestrator.monitoring, false);
    });

    it('does not start with an already aborted signal', () => {
      const controller = new AbortController();
      controller.abort();
      orchestrator.startMonitoring({}, controller.signal);
      assert.strictEqual(orchestrator.monitoring, false);
    });

    it('ends when the caller signal aborts', async () => {
      const controller = new AbortController();
      orchestrator.startMonitoring({ intervalSeconds: 60 }, controller.signal);
      controller.abort();

      await orchestrator.stopMonitoring();
      assert.strictEqual(orchestrator.monitoring, false);
    });
  });
});

describe('createPlugin', () => {
  it('builds a worker by type', () => {
    assert.ok(createPlugin('a', makeDefinition('a')) instanceof ProcessPlugin);
    assert.ok(createPlugin('b', makeDefinition('b', { type: 'script' })) instanceof ScriptPlugin);
  });
});
