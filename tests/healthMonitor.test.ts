import { HealthMonitor, hasModel } from '../src/infrastructure/cluster/HealthMonitor.js';
import { ServerRegistry } from '../src/infrastructure/cluster/ServerRegistry.js';
import { FakeOllamaClient, FakeProbe, server, silentLogger } from './helpers/fakes.js';

describe('HealthMonitor', () => {
  let registry: ServerRegistry;
  let client: FakeOllamaClient;
  let probe: FakeProbe;
  let monitor: HealthMonitor;

  const createMonitor = (verifyModel: boolean = true) =>
    new HealthMonitor(
      registry,
      client,
      probe,
      { intervalMs: 30000, probeTimeoutMs: 30, verifyModel },
      silentLogger
    );

  beforeEach(() => {
    registry = new ServerRegistry([server('A'), server('B'), server('C')], { logger: silentLogger });
    client = new FakeOllamaClient();
    probe = new FakeProbe();
    monitor = createMonitor();
  });

  afterEach(() => {
    monitor.stop();
  });

  describe('Full cycle', () => {
    test('should mark healthy servers and record the cycle', async () => {
      const summary = await monitor.checkAll();

      expect(summary.checked).toBe(3);
      expect(summary.active).toBe(3);
      expect(summary.reactivated).toBe(0);
      expect(summary.results.every((r) => r.healthy)).toBe(true);

      const status = registry.getStatus();
      expect(status.lastHealthCheckAt).toEqual(summary.checkedAt);
      expect(status.healthCheckIntervalMs).toBe(30000);
      expect(registry.get('A')?.lastCheckedAt).toBeInstanceOf(Date);
    });

    test('should count an unreachable server as a failure', async () => {
      probe.set('B', false);

      const summary = await monitor.checkAll();
      const result = summary.results.find((r) => r.server === 'B');

      expect(result).toEqual({
        server: 'B',
        healthy: false,
        reactivated: false,
        deactivated: false,
        error: 'Server B is not reachable',
      });
      expect(registry.get('B')?.consecutiveErrors).toBe(1);
      expect(registry.get('B')?.active).toBe(true);
    });

    test('should not let a hung probe hold up the other servers', async () => {
      probe.set('B', 'hang');

      const summary = await monitor.checkAll();

      expect(summary.results.map((r) => r.healthy)).toEqual([true, false, true]);
      expect(summary.results[1].error).toBe('Timeout after 30ms on B');
    });

    test('should fail a server whose model list cannot be fetched', async () => {
      client.setModels('C', new Error('HTTP error! status: 503'));

      const summary = await monitor.checkAll();

      expect(summary.results[2]).toMatchObject({ server: 'C', healthy: false, error: 'HTTP error! status: 503' });
    });

    test('should fail a server that does not serve its configured model', async () => {
      client.setModels('A', [{ name: 'llama3:latest' }]);

      const summary = await monitor.checkAll();

      expect(summary.results[0].error).toBe('Model gemma3 is not available on A');
    });

    test('should skip the model check when disabled', async () => {
      monitor = createMonitor(false);
      client.setModels('A', [{ name: 'llama3:latest' }]);

      const summary = await monitor.checkAll();

      expect(summary.results[0].healthy).toBe(true);
    });

    test('should deactivate an active server through the error threshold', async () => {
      probe.set('A', false);
      for (let i = 0; i < 4; i++) registry.recordFailure('A');

      const summary = await monitor.checkAll();

      expect(summary.results[0].deactivated).toBe(true);
      expect(summary.active).toBe(2);
    });

    test('should join a cycle that is already running', async () => {
      const [first, second] = await Promise.all([monitor.checkAll(), monitor.checkAll()]);
      expect(first).toBe(second);
    });
  });

  describe('Reconnection', () => {
    beforeEach(() => {
      for (let i = 0; i < 5; i++) registry.recordFailure('B');
    });

    test('should bring a recovered server back into rotation', async () => {
      const summary = await monitor.checkInactive();

      expect(summary.checked).toBe(1);
      expect(summary.reactivated).toBe(1);
      expect(registry.get('B')?.active).toBe(true);
      expect(registry.get('B')?.consecutiveErrors).toBe(0);
    });

    test('should leave a still-broken server out of rotation', async () => {
      probe.set('B', false);

      const summary = await monitor.checkInactive();

      expect(summary.reactivated).toBe(0);
      expect(registry.get('B')?.active).toBe(false);
      expect(registry.get('B')?.consecutiveErrors).toBe(6);
    });

    test('should share a probe already running for the same server', async () => {
      probe.set('B', false);

      const [full, reconnect] = await Promise.all([monitor.checkAll(), monitor.checkInactive()]);

      expect(registry.get('B')?.consecutiveErrors).toBe(6);
      expect(reconnect.results[0]).toBe(full.results[1]);
    });

    test('should not record a full cycle for an inactive-only check', async () => {
      await monitor.checkInactive();
      expect(registry.getStatus().lastHealthCheckAt).toBeUndefined();
    });
  });

  describe('Scheduling', () => {
    test('should check immediately on start and stop cleanly', async () => {
      monitor.start();
      expect(monitor.isRunning()).toBe(true);

      await monitor.checkAll();
      expect(registry.getStatus().lastHealthCheckAt).toBeInstanceOf(Date);

      monitor.stop();
      expect(monitor.isRunning()).toBe(false);
    });
  });
});

describe('hasModel', () => {
  test('should match a bare model name against any tag', () => {
    expect(hasModel([{ name: 'gemma3:latest' }], 'gemma3')).toBe(true);
  });

  test('should match a tagged model name exactly', () => {
    expect(hasModel([{ name: 'gemma3:2b' }], 'gemma3:2b')).toBe(true);
    expect(hasModel([{ name: 'gemma3:latest' }], 'gemma3:2b')).toBe(false);
  });

  test('should not match a different model sharing a prefix', () => {
    expect(hasModel([{ name: 'gemma3-tools:latest' }], 'gemma3')).toBe(false);
  });
});
