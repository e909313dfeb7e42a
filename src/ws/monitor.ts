/**
 * WebSocket disconnect monitor
 *
 * Watches server-side `ws` sockets, keeps their connection history and, when
 * one closes, turns the close code into a disconnect reason and asks the
 * manager for a reconnection plan.
 */

import type { IncomingMessage } from 'node:http';
import type { RawData, WebSocket, WebSocketServer } from 'ws';
import { ConfigurationError, ErrorCode, MonitorError, ReconnectKitError } from '../errors/index.js';
import { validateEngineConfig, type EngineLogger } from '../types/config.js';
import type { ClientInfo, ConnectionHistoryTracker } from '../history/tracker.js';
import type { ReconnectionManager } from '../manager.js';

const CLOSE_CODE_REASONS: Record<number, string> = {
  1000: 'client namespace disconnect',
  1001: 'transport close',
  1002: 'transport error',
  1003: 'transport error',
  1006: 'transport close',
  1007: 'transport error',
  1008: 'auth failed',
  1009: 'transport error',
  1010: 'transport error',
  1011: 'server error',
  1012: 'io server disconnect',
  1013: 'resource limit',
};

/**
 * Disconnect reason for a WebSocket close code. Unmapped codes fall back to
 * the peer's close text.
 */
export function describeCloseCode(code: number, closeText = ''): string {
  return CLOSE_CODE_REASONS[code] ?? (closeText.trim() || `unknown close code ${code}`);
}

export interface DisconnectMonitorOptions {
  /** Base delay handed to the schedule generator (default: the manager's) */
  baseDelayMs?: number;
  /** Derives a client id for sockets accepted through watch() */
  identify?: (socket: WebSocket, request: IncomingMessage) => string;
}

function headerValue(request: IncomingMessage, name: string): string | undefined {
  const value = request.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Client info carried in `{"type":"client_info", ...}` text messages
 */
function parseClientInfo(data: RawData, isBinary: boolean): ClientInfo | null {
  if (isBinary) return null;

  let message: unknown;
  try {
    message = JSON.parse(data.toString());
  } catch {
    // not a control message
    return null;
  }

  if (typeof message !== 'object' || message === null || !('type' in message) || message.type !== 'client_info') {
    return null;
  }

  const info: ClientInfo = {};
  if ('platform' in message && typeof message.platform === 'string') info.platform = message.platform;
  if ('networkType' in message && typeof message.networkType === 'string') info.networkType = message.networkType;
  return info;
}

export class DisconnectMonitor {
  private sockets: Map<string, WebSocket> = new Map();
  private history: ConnectionHistoryTracker;
  private logger: EngineLogger;
  private baseDelayMs?: number;
  private identify: (socket: WebSocket, request: IncomingMessage) => string;
  private anonymousCount = 0;

  /**
   * @throws ConfigurationError if baseDelayMs is negative or not finite
   */
  constructor(
    private manager: ReconnectionManager,
    options: DisconnectMonitorOptions = {}
  ) {
    const { errors } = validateEngineConfig({ baseDelayMs: options.baseDelayMs });
    if (errors.length > 0) {
      throw new ConfigurationError(`Invalid disconnect monitor options: ${errors.join('; ')}`, {
        problems: errors,
      });
    }

    this.history = manager.getHistory();
    this.logger = manager.getLogger();
    this.baseDelayMs = options.baseDelayMs;
    this.identify = options.identify ?? ((_socket, request) => this.defaultIdentify(request));
  }

  /**
   * Monitor one socket under a client id. Returns a detach function.
   * @throws MonitorError if the id already has a monitored socket
   */
  attach(clientId: string, socket: WebSocket, clientInfo: ClientInfo = {}): () => void {
    if (this.sockets.has(clientId)) {
      throw new MonitorError(`Client ${clientId} is already monitored`, {
        clientId,
        code: ErrorCode.MONITOR_ALREADY_ATTACHED,
      });
    }

    this.sockets.set(clientId, socket);
    this.history.startConnection(clientId, clientInfo);
    this.logger.log(`Monitoring connection for ${clientId}`);

    const onError = (err: Error) => {
      this.history.recordError(clientId, 'socket_error', err.message);
    };
    const onMessage = (data: RawData, isBinary: boolean) => {
      const info = parseClientInfo(data, isBinary);
      if (info) {
        this.history.updateClientInfo(clientId, info);
      }
    };
    const onClose = (code: number, reason: Buffer) => {
      detach();
      this.handleClose(clientId, code, reason.toString());
    };
    const detach = () => {
      socket.off('error', onError);
      socket.off('message', onMessage);
      socket.off('close', onClose);
      if (this.sockets.get(clientId) === socket) {
        this.sockets.delete(clientId);
      }
    };

    socket.on('error', onError);
    socket.on('message', onMessage);
    socket.on('close', onClose);

    return detach;
  }

  /**
   * Attach to every socket a server accepts. Returns an unsubscribe function.
   */
  watch(server: WebSocketServer): () => void {
    const onConnection = (socket: WebSocket, request: IncomingMessage) => {
      const clientId = this.identify(socket, request);
      const clientInfo: ClientInfo = {};
      const platform = headerValue(request, 'x-client-platform');
      const networkType = headerValue(request, 'x-network-type');
      if (platform) clientInfo.platform = platform;
      if (networkType) clientInfo.networkType = networkType;

      try {
        this.attach(clientId, socket, clientInfo);
      } catch (err) {
        this.logger.warn(
          `Rejecting duplicate connection for ${clientId}:`,
          ReconnectKitError.from(err, ErrorCode.MONITOR_ERROR).toJSON()
        );
        socket.close(1008, 'duplicate client id');
      }
    };

    server.on('connection', onConnection);
    return () => {
      server.off('connection', onConnection);
    };
  }

  /**
   * Record a server restart so future analyses see it
   */
  recordServerRestart(): void {
    this.history.recordServerRestart();
  }

  isMonitoring(clientId: string): boolean {
    return this.sockets.has(clientId);
  }

  private handleClose(clientId: string, code: number, closeText: string): void {
    this.history.endConnection(clientId);
    const reason = describeCloseCode(code, closeText);
    const snapshot = this.history.getSnapshot(clientId);
    const plan = this.manager.planReconnection(clientId, reason, snapshot, this.baseDelayMs);

    this.logger.log(
      `Disconnection analysis for ${clientId}: ${plan.analysis.cause} (${plan.analysis.severity} severity, ${plan.analysis.recoverability} recoverability)`
    );
    this.manager.emit('disconnectAnalyzed', { clientId, code, reason, ...plan });
  }

  private defaultIdentify(request: IncomingMessage): string {
    const header = headerValue(request, 'x-client-id');
    if (header) return header;
    this.anonymousCount++;
    return `client-${this.anonymousCount}`;
  }
}
