import WebSocket, { WebSocketServer } from 'ws';
import type { Server as HTTPServer, IncomingMessage } from 'http';
import { randomUUID } from 'crypto';
import type { ChangeNotification } from '@shared/analytics-types';
import type { ChangeNotifier, ChangeObserver } from './change-notifier';

interface ClientData {
  id: string;
  isAlive: boolean;
  missedPings: number;
}

export interface WebSocketOptions {
  heartbeatIntervalMs?: number;
  /** Missed heartbeats tolerated before the socket is terminated. */
  maxMissedPings?: number;
}

const HEARTBEAT_INTERVAL_MS = 30000;
const MAX_MISSED_PINGS = 2;

/**
 * Adapts one socket to the notifier's observer contract. Delivery resolves
 * once ws has flushed the frame and rejects if the socket is not open or the
 * write fails.
 */
export function socketObserver(id: string, ws: WebSocket): ChangeObserver {
  return {
    id,
    deliver: (message: ChangeNotification) =>
      new Promise<void>((resolve, reject) => {
        if (ws.readyState !== WebSocket.OPEN) {
          reject(new Error(`socket is not open (readyState ${ws.readyState})`));
          return;
        }
        ws.send(JSON.stringify(message), (error) => (error ? reject(error) : resolve()));
      }),
  };
}

/**
 * Attach the dashboard notification socket at /ws.
 *
 * Each connection is registered with the notifier as an observer and removed
 * on close, on socket error, or after repeated missed heartbeats. Any message
 * a client sends is answered with PONG.
 */
export function setupWebSocket(
  httpServer: HTTPServer,
  notifier: ChangeNotifier,
  options: WebSocketOptions = {}
): WebSocketServer {
  const heartbeatIntervalMs = options.heartbeatIntervalMs ?? HEARTBEAT_INTERVAL_MS;
  const maxMissedPings = options.maxMissedPings ?? MAX_MISSED_PINGS;

  const wss = new WebSocketServer({
    server: httpServer,
    path: '/ws',
  });

  const clients = new Map<WebSocket, ClientData>();

  const disconnect = (ws: WebSocket) => {
    const client = clients.get(ws);
    if (!client) return;
    clients.delete(ws);
    notifier.unregister(client.id);
  };

  const heartbeatInterval = setInterval(() => {
    clients.forEach((clientData, ws) => {
      if (!clientData.isAlive) {
        clientData.missedPings++;
        if (clientData.missedPings >= maxMissedPings) {
          console.log(`[ws] Client ${clientData.id} failed ${clientData.missedPings} heartbeats, terminating`);
          disconnect(ws);
          ws.terminate();
          return;
        }
      } else {
        clientData.missedPings = 0;
      }

      clientData.isAlive = false;
      ws.ping();
    });
  }, heartbeatIntervalMs);

  wss.on('connection', (ws: WebSocket, request: IncomingMessage) => {
    const clientData: ClientData = { id: randomUUID(), isAlive: true, missedPings: 0 };
    clients.set(ws, clientData);
    notifier.register(socketObserver(clientData.id, ws));
    console.log(`[ws] Client ${clientData.id} connected from ${request.socket.remoteAddress}`);

    ws.send(
      JSON.stringify({
        type: 'CONNECTED',
        message: 'Connected to analytics change notifications',
        timestamp: new Date().toISOString(),
      })
    );

    ws.on('pong', () => {
      clientData.isAlive = true;
    });

    // Client messages carry no commands; every one is a liveness probe.
    ws.on('message', () => {
      ws.send(JSON.stringify({ type: 'PONG', timestamp: new Date().toISOString() }));
    });

    ws.on('close', () => {
      console.log(`[ws] Client ${clientData.id} disconnected`);
      disconnect(ws);
    });

    ws.on('error', (error: Error) => {
      console.error(`[ws] Client ${clientData.id} error:`, error.message);
      disconnect(ws);
    });
  });

  wss.on('error', (error: Error) => {
    console.error('[ws] WebSocket server error:', error);
  });

  wss.on('close', () => {
    clearInterval(heartbeatInterval);
    clients.forEach((_clientData, ws) => {
      disconnect(ws);
      if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
        ws.terminate();
      }
    });
    console.log('[ws] WebSocket server closed');
  });

  console.log('[ws] WebSocket server initialized at /ws');
  return wss;
}

/**
 * Terminate every client, then close the server. ws only emits 'close' once
 * its tracked clients are gone, so they have to be dropped first.
 */
export function closeWebSocketServer(wss: WebSocketServer): Promise<void> {
  for (const ws of wss.clients) ws.terminate();
  return new Promise<void>((resolve) => {
    wss.close(() => resolve());
  });
}
