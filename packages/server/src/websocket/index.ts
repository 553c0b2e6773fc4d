/**
 * WebSocket Live Channel
 * Authenticated connections subscribed to their organization's workflow updates,
 * with heartbeat and typed messages
 */

import type { FastifyInstance } from 'fastify';
import { WebSocket } from 'ws';
import type {
  LiveDelivery,
  LivePayload,
  LiveSubscriber,
  Logger,
  WorkflowRuntimeRegistry,
} from '@flowrelay/runtime';
import type {
  JWTPayload,
  WebSocketMessage,
  WebSocketMessageType,
  WorkflowHistoryStore,
} from '../types/index.js';

// The parts of a ws socket the channel relies on
export type LiveSocket = Pick<WebSocket, 'readyState' | 'send' | 'close' | 'ping' | 'terminate'>;

// Connection state tracking
export interface LiveConnection extends LiveSubscriber {
  socket: LiveSocket;
  subject: string;
  organization: string;
  lastPing: number;
  isAlive: boolean;
}

// Incoming client message
interface ClientMessage {
  type: string;
}

// Heartbeat interval (30 seconds)
const HEARTBEAT_INTERVAL = 30000;
const HEARTBEAT_TIMEOUT = 10000;

const LIVE_MESSAGE_TYPES: Record<LivePayload['type'], WebSocketMessageType> = {
  snapshot: 'workflow_snapshot',
  begin: 'workflow_begin',
  progress: 'workflow_progress',
  end: 'workflow_end',
  error: 'workflow_error',
};

// ============================================================================
// Delivery
// ============================================================================

/**
 * Sends registry payloads as JSON to every open socket of the target connections
 */
export class WebSocketDelivery implements LiveDelivery<LiveConnection> {
  constructor(private readonly logger?: Logger) {}

  async send(connections: readonly LiveConnection[], payload: LivePayload): Promise<void> {
    const message = JSON.stringify(
      createWebSocketMessage(LIVE_MESSAGE_TYPES[payload.type], payload.organization, payload)
    );

    for (const connection of connections) {
      if (connection.socket.readyState !== WebSocket.OPEN) continue;
      try {
        connection.socket.send(message);
      } catch (error) {
        this.logger?.warn({ err: error, connectionId: connection.id }, 'WebSocket send failed');
      }
    }
  }
}

// ============================================================================
// Live Channel
// ============================================================================

export class LiveChannel {
  private readonly connections: Map<string, LiveConnection> = new Map();
  private heartbeatInterval: NodeJS.Timeout | null = null;
  private sequence = 0;

  constructor(
    private readonly registry: WorkflowRuntimeRegistry<WorkflowHistoryStore, LiveConnection>,
    private readonly logger: Logger
  ) {}

  // Register WebSocket routes
  register(app: FastifyInstance): void {
    this.startHeartbeat();

    app.get('/ws', { websocket: true }, (socket, request) => {
      // Extract token from query string for authentication
      const url = new URL(request.url, `http://${request.headers.host ?? 'localhost'}`);
      const token = url.searchParams.get('token');

      if (!token) {
        this.reject(socket, 'Authentication required');
        return;
      }

      let user: JWTPayload;
      try {
        user = app.jwt.verify<JWTPayload>(token);
      } catch {
        this.reject(socket, 'Invalid token');
        return;
      }
      if (typeof user.organization !== 'string' || user.organization.length === 0) {
        this.reject(socket, 'Invalid token');
        return;
      }

      const connection = this.open(socket, user);

      socket.on('message', (raw) => {
        this.handleMessage(connection, raw.toString());
      });

      // Handle pong for heartbeat
      socket.on('pong', () => {
        connection.isAlive = true;
        connection.lastPing = Date.now();
      });

      socket.on('close', (code) => {
        this.logger.info(
          { organization: connection.organization, connectionId: connection.id, code },
          'WebSocket disconnected'
        );
        this.remove(connection);
      });

      socket.on('error', (error) => {
        this.logger.error({ err: error, connectionId: connection.id }, 'WebSocket error');
        this.remove(connection);
      });
    });
  }

  /**
   * Track a verified connection, greet it and subscribe it to its organization
   */
  open(socket: LiveSocket, user: JWTPayload): LiveConnection {
    const connection: LiveConnection = {
      id: `${user.sub}-${Date.now()}-${++this.sequence}`,
      socket,
      subject: user.sub,
      organization: user.organization,
      lastPing: Date.now(),
      isAlive: true,
    };
    this.connections.set(connection.id, connection);

    this.logger.info(
      { organization: connection.organization, connectionId: connection.id },
      'WebSocket connected'
    );

    sendMessage(
      socket,
      createWebSocketMessage('connected', connection.organization, {
        message: 'Connected to live workflow updates',
        connectionId: connection.id,
        organization: connection.organization,
      })
    );

    this.registry.subscribe(connection.organization, connection).catch((error: unknown) => {
      this.logger.error({ err: error, connectionId: connection.id }, 'Failed to send workflow snapshot');
    });

    return connection;
  }

  handleMessage(connection: LiveConnection, raw: string): void {
    let message: ClientMessage;
    try {
      message = parseClientMessage(raw);
    } catch (error) {
      this.logger.debug({ err: error, connectionId: connection.id }, 'Failed to parse WebSocket message');
      sendMessage(
        connection.socket,
        createWebSocketMessage('error', connection.organization, { message: 'Invalid message format' })
      );
      return;
    }

    switch (message.type) {
      case 'ping':
        connection.lastPing = Date.now();
        connection.isAlive = true;
        sendMessage(
          connection.socket,
          createWebSocketMessage('pong', connection.organization, { timestamp: Date.now() })
        );
        break;

      default:
        this.logger.debug({ connectionId: connection.id, type: message.type }, 'Ignored client message');
    }
  }

  remove(connection: LiveConnection): void {
    this.connections.delete(connection.id);
    this.registry.unsubscribe(connection);
  }

  // Terminate connections that missed a heartbeat, ping the others
  checkHeartbeats(now = Date.now()): void {
    for (const connection of this.connections.values()) {
      if (!connection.isAlive || now - connection.lastPing > HEARTBEAT_INTERVAL + HEARTBEAT_TIMEOUT) {
        this.logger.info({ connectionId: connection.id }, 'Terminating inactive connection');
        connection.socket.terminate();
        this.remove(connection);
        continue;
      }

      connection.isAlive = false;
      if (connection.socket.readyState === WebSocket.OPEN) {
        connection.socket.ping();
      }
    }
  }

  startHeartbeat(): void {
    this.stopHeartbeat();
    this.heartbeatInterval = setInterval(() => this.checkHeartbeats(), HEARTBEAT_INTERVAL);
  }

  // Stop heartbeat checker (for cleanup)
  stopHeartbeat(): void {
    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval);
      this.heartbeatInterval = null;
    }
  }

  // Get connection statistics
  getConnectionStats(): {
    totalConnections: number;
    organizationCount: number;
    connectionsByOrganization: Record<string, number>;
  } {
    const stats: Record<string, number> = {};
    for (const connection of this.connections.values()) {
      stats[connection.organization] = (stats[connection.organization] ?? 0) + 1;
    }

    return {
      totalConnections: this.connections.size,
      organizationCount: Object.keys(stats).length,
      connectionsByOrganization: stats,
    };
  }

  // Close all connections (for graceful shutdown)
  closeAllConnections(reason = 'Server shutdown'): void {
    for (const connection of this.connections.values()) {
      connection.socket.close(1000, reason);
      this.registry.unsubscribe(connection);
    }
    this.connections.clear();
    this.stopHeartbeat();
  }

  private reject(socket: LiveSocket, message: string): void {
    sendMessage(socket, createWebSocketMessage('error', '', { message }));
    socket.close(4001, 'Unauthorized');
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

function parseClientMessage(raw: string): ClientMessage {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || !('type' in parsed) || typeof parsed.type !== 'string') {
    throw new Error('Message has no type');
  }
  return { type: parsed.type };
}

// Send a message to a WebSocket
function sendMessage<T>(socket: LiveSocket, message: WebSocketMessage<T>): void {
  if (socket.readyState === WebSocket.OPEN) {
    socket.send(JSON.stringify(message));
  }
}

// Helper to create typed WebSocket messages
export function createWebSocketMessage<T>(
  type: WebSocketMessageType,
  organization: string,
  payload: T
): WebSocketMessage<T> {
  return {
    type,
    organization,
    payload,
    timestamp: new Date().toISOString(),
  };
}
