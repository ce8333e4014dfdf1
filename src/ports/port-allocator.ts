/**
 * Port Allocator
 *
 * Hands out runs of consecutive TCP ports from a fixed inclusive range.
 * A port is eligible when it is not already allocated and a bind probe on
 * loopback succeeds. Scan and commit run under one mutex, so concurrent
 * allocations never return overlapping ports.
 */

import * as net from 'net';
import { AsyncMutex } from '../mutex';
import { getLogger } from '../logger';

const log = getLogger('PortAllocator');

export interface PortRange {
  start: number;
  end: number;
}

/** Resolves true when the port can be bound right now */
export type PortProbe = (port: number, host: string) => Promise<boolean>;

export interface PortAllocatorOptions {
  probe?: PortProbe;
  host?: string;
}

export const DEFAULT_PORT_RANGE: PortRange = {
  start: 4723,
  end: 5000,
};

/** Bind-and-close probe: listen on the port, then release it immediately */
export function probePort(port: number, host = '127.0.0.1'): Promise<boolean> {
  return new Promise((resolve) => {
    const server = net.createServer();
    server.once('error', () => resolve(false));
    server.listen({ port, host, exclusive: true }, () => {
      server.close(() => resolve(true));
    });
  });
}

export class PortAllocator {
  readonly range: PortRange;

  private allocated = new Set<number>();
  private mutex = new AsyncMutex();
  private probe: PortProbe;
  private host: string;

  constructor(range: PortRange = DEFAULT_PORT_RANGE, options: PortAllocatorOptions = {}) {
    if (!Number.isInteger(range.start) || !Number.isInteger(range.end) || range.start > range.end) {
      throw new Error(`Invalid port range ${range.start}-${range.end}`);
    }
    this.range = { ...range };
    this.probe = options.probe ?? probePort;
    this.host = options.host ?? '127.0.0.1';
  }

  /**
   * Allocate the first run of `count` consecutive free ports.
   * Returns null when count <= 0 or no run fits in the range.
   */
  allocateConsecutive(count: number): Promise<number[] | null> {
    return this.mutex.runExclusive(async () => {
      if (!Number.isInteger(count) || count <= 0) return null;

      for (let first = this.range.start; first + count - 1 <= this.range.end; first++) {
        const run = await this.tryRun(first, count);
        if (run) {
          for (const port of run) this.allocated.add(port);
          log.debug({ ports: run }, 'Allocated ports');
          return run;
        }
      }

      log.warn(
        { count, start: this.range.start, end: this.range.end, allocated: this.allocated.size },
        'No consecutive port run available',
      );
      return null;
    });
  }

  /** Return ports to the pool. Ports not currently allocated are ignored. */
  release(ports: Iterable<number>): Promise<void> {
    return this.mutex.runExclusive(() => {
      const released: number[] = [];
      for (const port of ports) {
        if (this.allocated.delete(port)) released.push(port);
      }
      if (released.length > 0) {
        log.debug({ ports: released }, 'Released ports');
      }
    });
  }

  /** Allocated by this allocator, or bound by someone else */
  async isInUse(port: number): Promise<boolean> {
    if (this.allocated.has(port)) return true;
    return !(await this.probe(port, this.host));
  }

  isAllocated(port: number): boolean {
    return this.allocated.has(port);
  }

  /** Sorted copy of the allocated set */
  getAllocated(): number[] {
    return [...this.allocated].sort((a, b) => a - b);
  }

  private async tryRun(first: number, count: number): Promise<number[] | null> {
    const run: number[] = [];
    for (let port = first; port < first + count; port++) {
      if (this.allocated.has(port)) return null;
      if (!(await this.probe(port, this.host))) return null;
      run.push(port);
    }
    return run;
  }
}
