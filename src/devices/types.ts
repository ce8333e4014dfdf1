/**
 * Device Types
 *
 * Devices seen by the agent and the automation-server session embedded in each.
 * Timestamps are ISO-8601 strings so the registry file round-trips exactly.
 */

export type DevicePlatform = 'Android' | 'iOS';

export type DeviceType = 'Physical' | 'Emulator' | 'Simulator';

export type DeviceState = 'Connected' | 'Disconnected' | 'Offline' | 'Unauthorized';

export type SessionStatus = 'Starting' | 'Running' | 'Failed' | 'Stopped';

/** Automation-server session bound to one device */
export interface AppiumSession {
  sessionId: string;
  appiumPort: number;
  wdaLocalPort?: number;     // iOS
  mjpegServerPort?: number;  // iOS
  systemPort?: number;       // Android
  startedAt: string;
  processId?: number;
  status: SessionStatus;
}

export interface Device {
  id: string;
  platform: DevicePlatform;
  type: DeviceType;
  name: string;
  state: DeviceState;
  connectedAt: string;
  lastSeen: string;
  disconnectedAt?: string;
  appiumSession?: AppiumSession;
}

/** On-disk registry document */
export interface DeviceRegistryFile {
  lastUpdated: string;
  devices: Device[];
}

/** Ports allocated per session, by platform */
export const SESSION_PORT_COUNT: Record<DevicePlatform, number> = {
  Android: 2,  // appium, systemPort
  iOS: 3,      // appium, wdaLocalPort, mjpegServerPort
};

/** All ports a session holds, in allocation order */
export function sessionPorts(session: AppiumSession): number[] {
  return [
    session.appiumPort,
    session.wdaLocalPort,
    session.mjpegServerPort,
    session.systemPort,
  ].filter((port): port is number => port !== undefined && port > 0);
}
