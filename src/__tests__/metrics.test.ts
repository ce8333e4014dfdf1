import { describe, it } from 'node:test';
import assert from 'node:assert';
import { AgentMetrics } from '../metrics';

describe('AgentMetrics', () => {
  it('starts at zero with a 100% success rate', () => {
    const metrics = new AgentMetrics();

    assert.strictEqual(metrics.sessionSuccessRate, 100);
    assert.strictEqual(
      metrics.summary(),
      'devices +0/-0 | sessions 0 started, 0 stopped, 0 failed (100% ok) | port exhaustion 0 | plugins 0 unhealthy, 0 restarts',
    );
  });

  it('tracks currently connected devices per platform', () => {
    const metrics = new AgentMetrics();
    metrics.recordDeviceConnected('Android');
    metrics.recordDeviceConnected('Android');
    metrics.recordDeviceConnected('iOS');
    metrics.recordDeviceDisconnected('Android');
    metrics.recordDeviceDisconnected('iOS');
    metrics.recordDeviceDisconnected('iOS');

    const snapshot = metrics.snapshot();
    assert.strictEqual(snapshot.devicesConnected, 3);
    assert.strictEqual(snapshot.devicesDisconnected, 3);
    assert.deepStrictEqual(snapshot.devicesByPlatform, { Android: 1, iOS: 0 });
  });

  it('counts session outcomes and failure reasons', () => {
    const metrics = new AgentMetrics();
    metrics.recordSessionStarted();
    metrics.recordSessionStarted();
    metrics.recordSessionStopped();
    metrics.recordPortAllocationFailure();
    metrics.recordSessionFailed('port-exhaustion');

    assert.strictEqual(metrics.sessionSuccessRate, 66.7);
    assert.deepStrictEqual(metrics.snapshot().sessionFailureReasons, { 'port-exhaustion': 1 });
  });

  it('summarizes plugin health across instances', () => {
    const metrics = new AgentMetrics();
    metrics.recordPluginUnhealthy('logcat:emulator-5554');
    metrics.recordPluginUnhealthy('logcat:emulator-5554');
    metrics.recordPluginUnhealthy('proxy');
    metrics.recordPluginRestart('logcat:emulator-5554');
    metrics.recordDeviceConnected('Android');

    assert.strictEqual(
      metrics.summary(),
      'devices +1/-0 | sessions 0 started, 0 stopped, 0 failed (100% ok) | port exhaustion 0 | plugins 3 unhealthy, 1 restarts',
    );
    assert.deepStrictEqual(metrics.snapshot().pluginRestarts, { 'logcat:emulator-5554': 1 });
  });
});
