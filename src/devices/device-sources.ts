/**
 * Device Sources
 *
 * Enumerate attached devices through the platform command-line tools:
 *   Android  `adb devices`, name from `getprop ro.product.model`
 *   iOS      `idevice_id -l`, name from `ideviceinfo -k DeviceName`
 *
 * Commands go through an injectable runner so parsing can be tested
 * without the tools installed.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { getLogger, errorMessage } from '../logger';
import type { DevicePlatform, DeviceType } from './types';

const log = getLogger('DeviceSources');
const execFileAsync = promisify(execFile);

const COMMAND_TIMEOUT_MS = 10_000;

/** A device as reported by a source, before the registry stamps it */
export interface DetectedDevice {
  id: string;
  platform: DevicePlatform;
  type: DeviceType;
  name: string;
}

export interface DeviceSource {
  readonly name: string;
  readonly platform: DevicePlatform;
  listDevices(): Promise<DetectedDevice[]>;
}

/** Runs a command and resolves its stdout */
export type CommandRunner = (command: string, args: string[]) => Promise<string>;

export const runCommandOutput: CommandRunner = async (command, args) => {
  const { stdout } = await execFileAsync(command, args, {
    timeout: COMMAND_TIMEOUT_MS,
    windowsHide: true,
  });
  return stdout;
};

export interface AdbEntry {
  serial: string;
  type: DeviceType;
}

/** Parse `adb devices` output. Only usable devices (state `device`/`emulator`) are returned. */
export function parseAdbDevices(output: string): AdbEntry[] {
  const entries: AdbEntry[] = [];
  for (const raw of output.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith('List of devices') || line.startsWith('*')) continue;
    const [serial, state] = line.split(/\s+/);
    if (!serial || (state !== 'device' && state !== 'emulator')) continue;
    entries.push({
      serial,
      type: serial.startsWith('emulator-') || state === 'emulator' ? 'Emulator' : 'Physical',
    });
  }
  return entries;
}

/** Parse `idevice_id -l` output: one UDID per line */
export function parseIdeviceIds(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export class AdbDeviceSource implements DeviceSource {
  readonly name = 'adb';
  readonly platform: DevicePlatform = 'Android';

  private run: CommandRunner;
  private adbPath: string;

  constructor(run: CommandRunner = runCommandOutput, adbPath = 'adb') {
    this.run = run;
    this.adbPath = adbPath;
  }

  async listDevices(): Promise<DetectedDevice[]> {
    const output = await this.run(this.adbPath, ['devices']);
    const devices: DetectedDevice[] = [];
    for (const entry of parseAdbDevices(output)) {
      devices.push({
        id: entry.serial,
        platform: 'Android',
        type: entry.type,
        name: await this.deviceName(entry.serial),
      });
    }
    return devices;
  }

  private async deviceName(serial: string): Promise<string> {
    try {
      const model = (await this.run(this.adbPath, ['-s', serial, 'shell', 'getprop', 'ro.product.model'])).trim();
      return model || serial;
    } catch (err) {
      log.debug({ serial, error: errorMessage(err) }, 'Could not read Android model name');
      return serial;
    }
  }
}

export class IosDeviceSource implements DeviceSource {
  readonly name = 'idevice';
  readonly platform: DevicePlatform = 'iOS';

  private run: CommandRunner;

  constructor(run: CommandRunner = runCommandOutput) {
    this.run = run;
  }

  async listDevices(): Promise<DetectedDevice[]> {
    const output = await this.run('idevice_id', ['-l']);
    const devices: DetectedDevice[] = [];
    for (const udid of parseIdeviceIds(output)) {
      devices.push({
        id: udid,
        platform: 'iOS',
        type: 'Physical',
        name: await this.deviceName(udid),
      });
    }
    return devices;
  }

  private async deviceName(udid: string): Promise<string> {
    try {
      const name = (await this.run('ideviceinfo', ['-u', udid, '-k', 'DeviceName'])).trim();
      return name || udid;
    } catch (err) {
      log.debug({ udid, error: errorMessage(err) }, 'Could not read iOS device name');
      return udid;
    }
  }
}
