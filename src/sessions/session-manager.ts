/**
 * Session Manager
 *
 * Starts and stops the per-device automation server. Each session takes a
 * run of consecutive ports from the allocator:
 *
 *   Android  appium, systemPort
 *   iOS      appium, wdaLocalPort, mjpegServerPort
 *
 * The server command line is a template expanded with the device and port
 * variables. Running out of ports or failing to launch returns null; a
 * failed launch gives its ports back.
 */

import type { Logger } from 'pino';
import { getLogger, errorMessage } from '../logger';
import type { AgentMetrics } from '../metrics';
import type { PortAllocator } from '../ports/port-allocator';
import { expand, expandList } from '../plugins/template';
import {
  LaunchSpec,
  isRunning,
  killTree,
  pipeOutput,
  spawnChild,
  waitForExit,
} from '../plugins/child-process';
import { STOP_WAIT_MS } from '../plugins/types';
import type { PluginContext } from '../plugins/types';
import { SESSION_PORT_COUNT, sessionPorts } from '../devices/types';
import type { AppiumSession, Device } from '../devices/types';

const log = getLogger('SessionManager');

/** Handle on a launched server process */
export interface SessionProcess {
  readonly pid: number | undefined;
  stop(): Promise<void>;
  onExit(listener: (code: number | null) => void): void;
}

export type SessionSpawner = (launch: LaunchSpec, log: Logger) => Promise<SessionProcess>;

export interface SessionServerConfig {
  executable: string;
  arguments: string[];
}

export const DEFAULT_SESSION_SERVER: SessionServerConfig = {
  executable: '{installFolder}/bin/appium',
  arguments: ['--address', '127.0.0.1', '--port', '{appiumPort}'],
};

export interface SessionManagerOptions {
  installFolder: string;
  server?: Partial<SessionServerConfig>;
  metrics?: AgentMetrics;
  spawner?: SessionSpawner;
  now?: () => Date;
}

interface TrackedSession {
  device: Device;
  session: AppiumSession;
  process: SessionProcess;
}

/** Session id derived from the device id */
export function sessionIdFor(deviceId: string): string {
  return `appium_${deviceId.replace(/[:\- ]/g, '_')}`;
}

/** Default spawner: a detached child with output piped to the session log */
export async function spawnSessionProcess(launch: LaunchSpec, sessionLog: Logger): Promise<SessionProcess> {
  const child = await spawnChild(launch);
  pipeOutput(child, sessionLog);
  return {
    pid: child.pid,
    async stop(): Promise<void> {
      if (!isRunning(child)) return;
      await killTree(child);
      if (!(await waitForExit(child, STOP_WAIT_MS))) {
        sessionLog.warn({ pid: child.pid, waitMs: STOP_WAIT_MS }, 'Session process did not exit after kill');
      }
    },
    onExit(listener: (code: number | null) => void): void {
      child.once('exit', (code: number | null) => listener(code));
    },
  };
}

export class SessionManager {
  private ports: PortAllocator;
  private installFolder: string;
  private server: SessionServerConfig;
  private metrics: AgentMetrics | undefined;
  private spawner: SessionSpawner;
  private now: () => Date;
  private sessions = new Map<string, TrackedSession>();
  private starting = new Map<string, Promise<AppiumSession | null>>();

  constructor(ports: PortAllocator, options: SessionManagerOptions) {
    this.ports = ports;
    this.installFolder = options.installFolder;
    this.server = { ...DEFAULT_SESSION_SERVER, ...options.server };
    this.metrics = options.metrics;
    this.spawner = options.spawner ?? spawnSessionProcess;
    this.now = options.now ?? (() => new Date());
  }

  get activeCount(): number {
    return this.sessions.size;
  }

  /**
   * Allocate ports and launch the server for a device.
   * Returns the existing session when one is already tracked; concurrent
   * calls for one device share a single launch.
   */
  async startSession(device: Device): Promise<AppiumSession | null> {
    const existing = this.sessions.get(device.id);
    if (existing) return { ...existing.session };

    const inFlight = this.starting.get(device.id);
    if (inFlight) {
      const session = await inFlight;
      return session ? { ...session } : null;
    }

    const launching = this.launchSession(device);
    this.starting.set(device.id, launching);
    try {
      return await launching;
    } finally {
      this.starting.delete(device.id);
    }
  }

  private async launchSession(device: Device): Promise<AppiumSession | null> {
    const ports = await this.ports.allocateConsecutive(SESSION_PORT_COUNT[device.platform]);
    if (!ports) {
      this.metrics?.recordPortAllocationFailure();
      this.metrics?.recordSessionFailed('port-exhaustion');
      log.error({ deviceId: device.id, platform: device.platform }, 'No ports available for session');
      return null;
    }

    const [appiumPort, secondPort, thirdPort] = ports;
    const session: AppiumSession = device.platform === 'iOS'
      ? { sessionId: sessionIdFor(device.id), appiumPort, wdaLocalPort: secondPort, mjpegServerPort: thirdPort, startedAt: this.now().toISOString(), status: 'Starting' }
      : { sessionId: sessionIdFor(device.id), appiumPort, systemPort: secondPort, startedAt: this.now().toISOString(), status: 'Starting' };

    const context = this.contextFor(device, session);
    const launch: LaunchSpec = {
      command: expand(this.server.executable, context),
      args: expandList(this.server.arguments, context),
      env: process.env,
    };

    let proc: SessionProcess;
    try {
      proc = await this.spawner(launch, log.child({ deviceId: device.id, sessionId: session.sessionId }));
    } catch (err) {
      await this.ports.release(ports);
      this.metrics?.recordSessionFailed('launch-failed');
      log.error({ deviceId: device.id, command: launch.command, error: errorMessage(err) }, 'Failed to launch session server');
      return null;
    }

    session.processId = proc.pid;
    session.status = 'Running';
    this.sessions.set(device.id, { device: { ...device }, session, process: proc });
    proc.onExit((code) => {
      if (this.sessions.get(device.id)?.session === session && session.status === 'Running') {
        session.status = 'Failed';
        log.warn({ deviceId: device.id, sessionId: session.sessionId, code }, 'Session server exited');
      }
    });

    this.metrics?.recordSessionStarted();
    log.info({ deviceId: device.id, sessionId: session.sessionId, ports, pid: proc.pid }, 'Session started');
    return { ...session };
  }

  /**
   * Stop the device's session and release its ports.
   * Returns false when the device has no session.
   */
  async stopSession(device: Device): Promise<boolean> {
    const pending = this.starting.get(device.id);
    if (pending) await pending;

    const tracked = this.sessions.get(device.id);
    if (tracked) {
      this.sessions.delete(device.id);
      await this.stopTracked(tracked);
      return true;
    }

    // Session known only from a persisted device entry: nothing to kill, free the ports.
    if (device.appiumSession) {
      await this.ports.release(sessionPorts(device.appiumSession));
      log.info({ deviceId: device.id, sessionId: device.appiumSession.sessionId }, 'Released ports of untracked session');
      return true;
    }

    log.debug({ deviceId: device.id }, 'No session to stop');
    return false;
  }

  async stopAll(): Promise<void> {
    await Promise.all(this.starting.values());
    const tracked = [...this.sessions.values()];
    this.sessions.clear();
    for (const entry of tracked) {
      await this.stopTracked(entry);
    }
  }

  getSession(deviceId: string): AppiumSession | undefined {
    const tracked = this.sessions.get(deviceId);
    return tracked ? { ...tracked.session } : undefined;
  }

  getActiveSessions(): AppiumSession[] {
    return [...this.sessions.values()].map((t) => ({ ...t.session }));
  }

  private async stopTracked(tracked: TrackedSession): Promise<void> {
    const { device, session } = tracked;
    try {
      await tracked.process.stop();
    } catch (err) {
      log.warn({ deviceId: device.id, sessionId: session.sessionId, error: errorMessage(err) }, 'Error stopping session process');
    }
    await this.ports.release(sessionPorts(session));
    session.status = 'Stopped';
    this.metrics?.recordSessionStopped();
    log.info({ deviceId: device.id, sessionId: session.sessionId }, 'Session stopped');
  }

  private contextFor(device: Device, session: AppiumSession): PluginContext {
    return {
      installFolder: this.installFolder,
      variables: {
        deviceId: device.id,
        deviceName: device.name,
        platform: device.platform,
        sessionId: session.sessionId,
        appiumPort: session.appiumPort,
        wdaLocalPort: session.wdaLocalPort,
        mjpegServerPort: session.mjpegServerPort,
        systemPort: session.systemPort,
      },
    };
  }
}
