import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { AgentMetrics } from '../metrics';
import { PortAllocator } from '../ports/port-allocator';
import { SessionManager, sessionIdFor } from '../sessions/session-manager';
import type { SessionProcess, SessionSpawner } from '../sessions/session-manager';
import type { LaunchSpec } from '../plugins/child-process';
import type { Device } from '../devices/types';

function makeDevice(overrides: Partial<Device> = {}): Device {
  return {
    id: 'emulator-5554',
    platform: 'Android',
    type: 'Emulator',
    name: 'sdk_gphone64',
    state: 'Connected',
    connectedAt: '2026-03-01T10:00:00.000Z',
    lastSeen: '2026-03-01T10:00:00.000Z',
    ...overrides,
  };
}

class FakeProcess implements SessionProcess {
  stopped = 0;
  private listeners: Array<(code: number | null) => void> = [];

  constructor(readonly pid: number) {}

  async stop(): Promise<void> {
    this.stopped++;
  }

  onExit(listener: (code: number | null) => void): void {
    this.listeners.push(listener);
  }

  exit(code: number | null): void {
    for (const listener of this.listeners) listener(code);
  }
}

const alwaysFree = async (): Promise<boolean> => true;
const fixedNow = (): Date => new Date('2026-03-01T12:00:00.000Z');

describe('SessionManager', () => {
  let ports: PortAllocator;
  let metrics: AgentMetrics;
  let launches: LaunchSpec[];
  let processes: FakeProcess[];
  let spawner: SessionSpawner;
  let sessions: SessionManager;

  beforeEach(() => {
    ports = new PortAllocator({ start: 4723, end: 4733 }, { probe: alwaysFree });
    metrics = new AgentMetrics();
    launches = [];
    processes = [];
    spawner = async (launch) => {
      launches.push(launch);
      const proc = new FakeProcess(1000 + processes.length);
      processes.push(proc);
      return proc;
    };
    sessions = new SessionManager(ports, { installFolder: '/opt/agent', metrics, spawner, now: fixedNow });
  });

  it('gives an Android session the appium and system ports', async () => {
    const session = await sessions.startSession(makeDevice());

    assert.deepStrictEqual(session, {
      sessionId: 'appium_emulator_5554',
      appiumPort: 4723,
      systemPort: 4724,
      startedAt: '2026-03-01T12:00:00.000Z',
      processId: 1000,
      status: 'Running',
    });
    assert.deepStrictEqual(ports.getAllocated(), [4723, 4724]);
    assert.strictEqual(metrics.snapshot().sessionsStarted, 1);
  });

  it('gives an iOS session three consecutive ports', async () => {
    await sessions.startSession(makeDevice());
    const session = await sessions.startSession(makeDevice({ id: '00008110-000A', platform: 'iOS', type: 'Physical' }));

    assert.ok(session);
    assert.strictEqual(session.sessionId, 'appium_00008110_000A');
    assert.strictEqual(session.appiumPort, 4725);
    assert.strictEqual(session.wdaLocalPort, 4726);
    assert.strictEqual(session.mjpegServerPort, 4727);
    assert.strictEqual(session.systemPort, undefined);
  });

  it('expands the server command line with the session variables', async () => {
    await sessions.startSession(makeDevice());

    assert.strictEqual(launches[0].command, '/opt/agent/bin/appium');
    assert.deepStrictEqual(launches[0].args, ['--address', '127.0.0.1', '--port', '4723']);
  });

  it('accepts a custom server template', async () => {
    sessions = new SessionManager(ports, {
      installFolder: '/opt/agent',
      spawner,
      server: { arguments: ['-p', '{appiumPort}', '--default-capabilities', '{"udid":"{deviceId}"}', '{systemPort}'] },
    });
    await sessions.startSession(makeDevice());

    assert.strictEqual(launches[0].command, '/opt/agent/bin/appium');
    assert.deepStrictEqual(launches[0].args, ['-p', '4723', '--default-capabilities', '{"udid":"emulator-5554"}', '4724']);
  });

  it('returns the tracked session on a second start', async () => {
    const first = await sessions.startSession(makeDevice());
    const second = await sessions.startSession(makeDevice());

    assert.deepStrictEqual(second, first);
    assert.strictEqual(launches.length, 1);
    assert.strictEqual(sessions.activeCount, 1);
  });

  it('launches one server for concurrent starts of a device', async () => {
    const device = makeDevice();
    const [first, second] = await Promise.all([sessions.startSession(device), sessions.startSession(device)]);

    assert.ok(first);
    assert.deepStrictEqual(second, first);
    assert.strictEqual(first.appiumPort, 4723);
    assert.strictEqual(launches.length, 1);
    assert.deepStrictEqual(ports.getAllocated(), [4723, 4724]);

    assert.strictEqual(await sessions.stopSession(device), true);
    assert.deepStrictEqual(ports.getAllocated(), []);
    assert.deepStrictEqual(processes.map((p) => p.stopped), [1]);
  });

  it('stops a session that was still starting', async () => {
    const device = makeDevice();
    const starting = sessions.startSession(device);

    assert.strictEqual(await sessions.stopSession(device), true);
    assert.strictEqual((await starting)?.appiumPort, 4723);
    assert.strictEqual(processes[0].stopped, 1);
    assert.strictEqual(sessions.activeCount, 0);
    assert.deepStrictEqual(ports.getAllocated(), []);
  });

  it('returns null and records port exhaustion', async () => {
    ports = new PortAllocator({ start: 4723, end: 4724 }, { probe: alwaysFree });
    sessions = new SessionManager(ports, { installFolder: '/opt/agent', metrics, spawner });

    const session = await sessions.startSession(makeDevice({ platform: 'iOS' }));

    assert.strictEqual(session, null);
    const snapshot = metrics.snapshot();
    assert.strictEqual(snapshot.portAllocationFailures, 1);
    assert.deepStrictEqual(snapshot.sessionFailureReasons, { 'port-exhaustion': 1 });
    assert.strictEqual(launches.length, 0);
  });

  it('releases the ports when the launch fails', async () => {
    sessions = new SessionManager(ports, {
      installFolder: '/opt/agent',
      metrics,
      spawner: async () => { throw new Error('spawn ENOENT'); },
    });

    assert.strictEqual(await sessions.startSession(makeDevice()), null);
    assert.deepStrictEqual(ports.getAllocated(), []);
    assert.deepStrictEqual(metrics.snapshot().sessionFailureReasons, { 'launch-failed': 1 });
    assert.strictEqual(sessions.activeCount, 0);
  });

  it('marks the session Failed when the server exits on its own', async () => {
    await sessions.startSession(makeDevice());
    processes[0].exit(1);

    assert.strictEqual(sessions.getSession('emulator-5554')?.status, 'Failed');
  });

  it('stopSession kills the server and frees its ports', async () => {
    const device = makeDevice();
    await sessions.startSession(device);

    assert.strictEqual(await sessions.stopSession(device), true);
    assert.strictEqual(processes[0].stopped, 1);
    assert.deepStrictEqual(ports.getAllocated(), []);
    assert.strictEqual(sessions.getSession(device.id), undefined);
    assert.strictEqual(metrics.snapshot().sessionsStopped, 1);

    assert.strictEqual(await sessions.stopSession(device), false);
  });

  it('stopSession frees the ports of a session it does not track', async () => {
    await ports.allocateConsecutive(2);
    const device = makeDevice({
      appiumSession: {
        sessionId: 'appium_emulator_5554',
        appiumPort: 4723,
        systemPort: 4724,
        startedAt: '2026-03-01T09:00:00.000Z',
        status: 'Running',
      },
    });

    assert.strictEqual(await sessions.stopSession(device), true);
    assert.deepStrictEqual(ports.getAllocated(), []);
  });

  it('stopAll stops every session', async () => {
    await sessions.startSession(makeDevice());
    await sessions.startSession(makeDevice({ id: 'R58M123ABC', type: 'Physical' }));
    assert.strictEqual(sessions.getActiveSessions().length, 2);

    await sessions.stopAll();

    assert.strictEqual(sessions.activeCount, 0);
    assert.deepStrictEqual(processes.map((p) => p.stopped), [1, 1]);
    assert.deepStrictEqual(ports.getAllocated(), []);
  });

  it('keeps stopping when a server refuses to die', async () => {
    const device = makeDevice();
    await sessions.startSession(device);
    processes[0].stop = async () => { throw new Error('EPERM'); };

    assert.strictEqual(await sessions.stopSession(device), true);
    assert.deepStrictEqual(ports.getAllocated(), []);
  });
});

describe('sessionIdFor', () => {
  it('replaces separators with underscores', () => {
    assert.strictEqual(sessionIdFor('emulator-5554'), 'appium_emulator_5554');
    assert.strictEqual(sessionIdFor('192.168.1.20:5555'), 'appium_192.168.1.20_5555');
    assert.strictEqual(sessionIdFor('My Phone'), 'appium_My_Phone');
  });
});
