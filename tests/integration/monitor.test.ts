import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { WebSocket, WebSocketServer } from 'ws';
import { ReconnectionManager } from '../../src/manager.js';
import { DisconnectMonitor } from '../../src/ws/monitor.js';
import { ErrorCode } from '../../src/errors/index.js';
import type { DisconnectAnalyzedEvent } from '../../src/events.js';
import type { EngineLogger } from '../../src/types/config.js';

function listen(server: WebSocketServer): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.once('listening', () => {
      const address = server.address();
      if (typeof address === 'object' && address !== null) {
        resolve(address.port);
      } else {
        reject(new Error('server has no port'));
      }
    });
  });
}

function connect(port: number, headers: Record<string, string> = {}): Promise<WebSocket> {
  return new Promise((resolve, reject) => {
    const socket = new WebSocket(`ws://127.0.0.1:${port}`, { headers });
    socket.once('open', () => resolve(socket));
    socket.once('error', reject);
  });
}

function closed(socket: WebSocket): Promise<{ code: number; reason: string }> {
  return new Promise((resolve) => {
    socket.once('close', (code, reason) => resolve({ code, reason: reason.toString() }));
  });
}

describe('DisconnectMonitor', () => {
  let logger: EngineLogger;
  let manager: ReconnectionManager;
  let monitor: DisconnectMonitor;
  let server: WebSocketServer;
  let port: number;

  function nextAnalysis(): Promise<DisconnectAnalyzedEvent> {
    return new Promise((resolve) => {
      manager.once('disconnectAnalyzed', resolve);
    });
  }

  beforeEach(async () => {
    logger = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
    manager = new ReconnectionManager({ logger });
    monitor = new DisconnectMonitor(manager);
    server = new WebSocketServer({ host: '127.0.0.1', port: 0 });
    monitor.watch(server);
    port = await listen(server);
  });

  afterEach(async () => {
    vi.useRealTimers();
    for (const client of server.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  });

  it('should plan nothing when the client closes normally', async () => {
    const socket = await connect(port);
    const analyzed = nextAnalysis();

    socket.close(1000);
    const event = await analyzed;

    expect(event.clientId).toBe('client-1');
    expect(event.code).toBe(1000);
    expect(event.reason).toBe('client namespace disconnect');
    expect(event.analysis.cause).toBe('USER_INITIATED');
    expect(event.schedule).toEqual([]);
    expect(event.guidance.autoRetry).toBe(false);
    expect(monitor.isMonitoring('client-1')).toBe(false);
  });

  it('should read the reason from close text and the platform from headers', async () => {
    const socket = await connect(port, { 'x-client-id': 'phone-1', 'x-client-platform': 'android' });
    expect(monitor.isMonitoring('phone-1')).toBe(true);
    const analyzed = nextAnalysis();

    socket.close(4000, 'ping timeout');
    const event = await analyzed;

    expect(event.clientId).toBe('phone-1');
    expect(event.reason).toBe('ping timeout');
    expect(event.analysis.cause).toBe('NETWORK_TIMEOUT');
    expect(event.analysis.contextualFactors).toEqual(['network_instability', 'mobile_network']);
    expect(event.schedule).toHaveLength(8);
  });

  it('should apply client_info messages to the history', async () => {
    const socket = await connect(port, { 'x-client-id': 'tablet' });
    const analyzed = nextAnalysis();

    socket.send(JSON.stringify({ type: 'client_info', networkType: 'mobile' }));
    socket.close(1013);
    const event = await analyzed;

    expect(event.analysis.cause).toBe('RESOURCE_EXHAUSTION');
    expect(event.analysis.maxAttempts).toBe(4);
    expect(event.schedule[0]?.delayMs).toBe(4500);
    expect(event.guidance.tips).toHaveLength(2);
    expect(manager.getHistory().getSnapshot('tablet').networkType).toBe('mobile');
  });

  it('should close a second socket that claims a monitored id', async () => {
    const first = await connect(port, { 'x-client-id': 'same' });
    const second = new WebSocket(`ws://127.0.0.1:${port}`, { headers: { 'x-client-id': 'same' } });

    const { code, reason } = await closed(second);

    expect(code).toBe(1008);
    expect(reason).toBe('duplicate client id');
    expect(logger.warn).toHaveBeenCalledWith(
      'Rejecting duplicate connection for same:',
      expect.objectContaining({
        name: 'MonitorError',
        code: ErrorCode.MONITOR_ALREADY_ATTACHED,
        message: 'Client same is already monitored',
      })
    );
    expect(monitor.isMonitoring('same')).toBe(true);

    const analyzed = nextAnalysis();
    first.close(1000);
    await analyzed;
  });

  it('should count server restarts in later analyses', async () => {
    monitor.recordServerRestart();
    const socket = await connect(port, { 'x-client-id': 'desk' });
    const analyzed = nextAnalysis();

    socket.close(1012);
    const event = await analyzed;

    expect(event.reason).toBe('io server disconnect');
    expect(event.analysis.cause).toBe('SERVER_SHUTDOWN');
    expect(event.analysis.recoverability).toBe('MEDIUM');
    expect(event.schedule.map((e) => e.delayMs)).toEqual([2000, 4000, 6000, 8000, 10000]);
  });

  it('should let cleanup drop the history of closed anonymous clients', async () => {
    for (let i = 0; i < 5; i++) {
      const socket = await connect(port);
      const analyzed = nextAnalysis();
      socket.close(1000);
      await analyzed;
    }
    expect(manager.getHistory().size).toBe(5);

    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(Date.now() + 48 * 60 * 60 * 1000);
    manager.cleanup();

    expect(manager.getHistory().size).toBe(0);
  });
});
