/**
 * Device Registry
 *
 * In-memory store of every device the agent has seen, keyed by serial/UDID,
 * persisted as one JSON document. Writes go to a temp file that is renamed
 * over the target, so a crash mid-write leaves the previous file intact.
 * Saves are serialized; reads hand out copies.
 *
 * A missing or corrupt file at load time leaves the registry empty.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { AsyncMutex } from '../mutex';
import { getLogger, errorMessage } from '../logger';
import { formatZodError } from '../config-schema';
import type { AppiumSession, Device, DeviceRegistryFile } from './types';

const log = getLogger('DeviceRegistry');

export interface DeviceRegistryConfig {
  enabled: boolean;
  filePath: string;
  autoSave: boolean;
  saveIntervalSeconds: number;
}

export const DEFAULT_DEVICE_REGISTRY: DeviceRegistryConfig = {
  enabled: true,
  filePath: 'device-registry.json',
  autoSave: true,
  saveIntervalSeconds: 30,
};

const sessionSchema: z.ZodType<AppiumSession> = z.object({
  sessionId: z.string(),
  appiumPort: z.number().int(),
  wdaLocalPort: z.number().int().optional(),
  mjpegServerPort: z.number().int().optional(),
  systemPort: z.number().int().optional(),
  startedAt: z.string(),
  processId: z.number().int().optional(),
  status: z.enum(['Starting', 'Running', 'Failed', 'Stopped']),
});

const deviceSchema: z.ZodType<Device> = z.object({
  id: z.string().min(1),
  platform: z.enum(['Android', 'iOS']),
  type: z.enum(['Physical', 'Emulator', 'Simulator']),
  name: z.string(),
  state: z.enum(['Connected', 'Disconnected', 'Offline', 'Unauthorized']),
  connectedAt: z.string(),
  lastSeen: z.string(),
  disconnectedAt: z.string().optional(),
  appiumSession: sessionSchema.optional(),
});

const registryFileSchema: z.ZodType<DeviceRegistryFile> = z.object({
  lastUpdated: z.string(),
  devices: z.array(deviceSchema),
});

export class DeviceRegistry {
  readonly config: DeviceRegistryConfig;

  private devices = new Map<string, Device>();
  private _lastUpdated: string;
  private dirty = false;
  private saveMutex = new AsyncMutex();
  private autoSaveTimer: ReturnType<typeof setInterval> | null = null;
  private now: () => Date;

  constructor(config: Partial<DeviceRegistryConfig> = {}, now: () => Date = () => new Date()) {
    this.config = { ...DEFAULT_DEVICE_REGISTRY, ...config };
    this.now = now;
    this._lastUpdated = this.timestamp();
  }

  /** ISO timestamp of the last mutation or load */
  get lastUpdated(): string {
    return this._lastUpdated;
  }

  get size(): number {
    return this.devices.size;
  }

  /** Read the registry file. Missing or invalid files leave the registry empty. */
  async load(): Promise<void> {
    if (!this.config.enabled) return;

    let raw: string;
    try {
      raw = await fs.readFile(this.config.filePath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) {
        log.info({ file: this.config.filePath }, 'No device registry file, starting empty');
      } else {
        log.error({ file: this.config.filePath, error: errorMessage(err) }, 'Failed to read device registry');
      }
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      log.error({ file: this.config.filePath, error: errorMessage(err) }, 'Device registry is not valid JSON, starting empty');
      return;
    }

    const result = registryFileSchema.safeParse(parsed);
    if (!result.success) {
      log.error(
        { file: this.config.filePath, issues: formatZodError(result.error) },
        'Device registry failed validation, starting empty',
      );
      return;
    }

    this.devices.clear();
    for (const device of result.data.devices) {
      this.devices.set(device.id, device);
    }
    this._lastUpdated = result.data.lastUpdated;
    this.dirty = false;
    log.info({ file: this.config.filePath, devices: this.devices.size }, 'Loaded device registry');
  }

  /** Insert or replace a device by id, stamping lastSeen. Returns the stored copy. */
  upsert(device: Device): Device {
    const stored: Device = structuredClone({ ...device, lastSeen: this.timestamp() });
    this.devices.set(stored.id, stored);
    this.touch();
    return structuredClone(stored);
  }

  /** Attach or clear the session of a known device */
  setSession(deviceId: string, session: AppiumSession | undefined): boolean {
    const device = this.devices.get(deviceId);
    if (!device) return false;
    if (session) {
      device.appiumSession = structuredClone(session);
    } else {
      delete device.appiumSession;
    }
    this.touch();
    return true;
  }

  /** Mark a device disconnected and drop its session. The entry is kept. */
  markDisconnected(deviceId: string): boolean {
    const device = this.devices.get(deviceId);
    if (!device) return false;
    const now = this.timestamp();
    device.state = 'Disconnected';
    device.disconnectedAt = now;
    device.lastSeen = now;
    delete device.appiumSession;
    this.touch();
    return true;
  }

  /** Prune a device entry entirely */
  remove(deviceId: string): boolean {
    const removed = this.devices.delete(deviceId);
    if (removed) this.touch();
    return removed;
  }

  get(deviceId: string): Device | undefined {
    const device = this.devices.get(deviceId);
    return device ? structuredClone(device) : undefined;
  }

  getAll(): Device[] {
    return [...this.devices.values()].map((d) => structuredClone(d));
  }

  getConnected(): Device[] {
    return this.getAll().filter((d) => d.state === 'Connected');
  }

  /** Write the registry to disk. Returns false when disabled or on failure. */
  save(): Promise<boolean> {
    if (!this.config.enabled) return Promise.resolve(false);

    return this.saveMutex.runExclusive(async () => {
      const document: DeviceRegistryFile = {
        lastUpdated: this._lastUpdated,
        devices: this.getAll(),
      };
      this.dirty = false;

      const target = this.config.filePath;
      const tempPath = `${target}.${process.pid}.${Date.now()}.tmp`;
      try {
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.writeFile(tempPath, JSON.stringify(document, null, 2), 'utf-8');
        await fs.rename(tempPath, target);
        log.debug({ file: target, devices: document.devices.length }, 'Saved device registry');
        return true;
      } catch (err) {
        this.dirty = true;
        log.error({ file: target, error: errorMessage(err) }, 'Failed to save device registry');
        await fs.rm(tempPath, { force: true }).catch((rmErr: unknown) => {
          log.warn({ file: tempPath, error: errorMessage(rmErr) }, 'Failed to remove temp registry file');
        });
        return false;
      }
    });
  }

  /** Save every saveIntervalSeconds while there are unsaved changes */
  startAutoSave(): void {
    if (!this.config.enabled || !this.config.autoSave || this.autoSaveTimer) return;
    const intervalMs = Math.max(1, this.config.saveIntervalSeconds) * 1000;
    this.autoSaveTimer = setInterval(() => {
      if (!this.dirty) return;
      this.save().catch((err: unknown) => {
        log.error({ error: errorMessage(err) }, 'Auto-save failed');
      });
    }, intervalMs);
    this.autoSaveTimer.unref();
  }

  stopAutoSave(): void {
    if (this.autoSaveTimer) {
      clearInterval(this.autoSaveTimer);
      this.autoSaveTimer = null;
    }
  }

  /** Stop the autosave timer and write a final copy */
  async dispose(): Promise<void> {
    this.stopAutoSave();
    await this.save();
  }

  private touch(): void {
    this._lastUpdated = this.timestamp();
    this.dirty = true;
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
