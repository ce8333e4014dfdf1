import { describe, it, after } from 'node:test';
import assert from 'node:assert';
import * as net from 'net';
import { PortAllocator, probePort } from '../ports/port-allocator';

const alwaysFree = async (): Promise<boolean> => true;

describe('PortAllocator', () => {
  it('allocates consecutive runs and reuses released ports', async () => {
    const ports = new PortAllocator({ start: 4723, end: 4733 }, { probe: alwaysFree });

    assert.deepStrictEqual(await ports.allocateConsecutive(3), [4723, 4724, 4725]);
    assert.deepStrictEqual(await ports.allocateConsecutive(2), [4726, 4727]);

    await ports.release([4723, 4724, 4725]);
    assert.deepStrictEqual(ports.getAllocated(), [4726, 4727]);

    assert.deepStrictEqual(await ports.allocateConsecutive(3), [4723, 4724, 4725]);
  });

  it('returns null when the range is too small', async () => {
    const ports = new PortAllocator({ start: 4723, end: 4724 }, { probe: alwaysFree });
    assert.strictEqual(await ports.allocateConsecutive(3), null);
    assert.deepStrictEqual(ports.getAllocated(), []);
  });

  it('can use the last run of the range', async () => {
    const ports = new PortAllocator({ start: 4723, end: 4725 }, { probe: alwaysFree });
    assert.deepStrictEqual(await ports.allocateConsecutive(3), [4723, 4724, 4725]);
    assert.strictEqual(await ports.allocateConsecutive(1), null);
  });

  it('returns null for a non-positive count', async () => {
    const ports = new PortAllocator({ start: 4723, end: 4733 }, { probe: alwaysFree });
    assert.strictEqual(await ports.allocateConsecutive(0), null);
    assert.strictEqual(await ports.allocateConsecutive(-2), null);
  });

  it('skips runs containing a port that fails the bind probe', async () => {
    const busy = new Set([4724]);
    const ports = new PortAllocator(
      { start: 4723, end: 4733 },
      { probe: async (port) => !busy.has(port) },
    );

    assert.deepStrictEqual(await ports.allocateConsecutive(2), [4725, 4726]);
    assert.deepStrictEqual(await ports.allocateConsecutive(1), [4723]);
  });

  it('never hands out overlapping ports to concurrent callers', async () => {
    const ports = new PortAllocator(
      { start: 4723, end: 4760 },
      { probe: async () => { await new Promise((r) => setImmediate(r)); return true; } },
    );

    const results = await Promise.all([
      ports.allocateConsecutive(3),
      ports.allocateConsecutive(2),
      ports.allocateConsecutive(3),
      ports.allocateConsecutive(2),
    ]);

    const all = results.flatMap((r) => r ?? []);
    assert.strictEqual(all.length, 10);
    assert.strictEqual(new Set(all).size, 10);
    assert.deepStrictEqual(results[0], [4723, 4724, 4725]);
    assert.deepStrictEqual(results[1], [4726, 4727]);
  });

  it('release is idempotent', async () => {
    const ports = new PortAllocator({ start: 4723, end: 4733 }, { probe: alwaysFree });
    await ports.allocateConsecutive(2);
    await ports.release([4723, 4724]);
    await ports.release([4723, 4724, 4999]);
    assert.deepStrictEqual(ports.getAllocated(), []);
  });

  it('isInUse reports allocated ports and probe failures', async () => {
    const ports = new PortAllocator(
      { start: 4723, end: 4733 },
      { probe: async (port) => port !== 4730 },
    );
    await ports.allocateConsecutive(1);

    assert.strictEqual(await ports.isInUse(4723), true);
    assert.strictEqual(await ports.isInUse(4730), true);
    assert.strictEqual(await ports.isInUse(4731), false);
  });

  it('rejects an inverted range', () => {
    assert.throws(() => new PortAllocator({ start: 5000, end: 4723 }), /Invalid port range/);
  });
});

describe('probePort', () => {
  const server = net.createServer();

  after(() => {
    if (server.listening) server.close();
  });

  it('reports a bound port as unavailable and a released one as free', async () => {
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
    const address = server.address();
    assert.ok(address !== null && typeof address === 'object');
    const port = address.port;

    assert.strictEqual(await probePort(port), false);

    await new Promise<void>((resolve) => server.close(() => resolve()));
    assert.strictEqual(await probePort(port), true);
  });
});
