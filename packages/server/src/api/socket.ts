// ============================================================================
// Radar WebSocket fan-out
// ============================================================================

import type { Server } from 'http';
import { WebSocketServer, WebSocket, type RawData } from 'ws';
import type { RadarEngine } from '../radar/engine.js';
import { CommandError, parseCommand } from './commands.js';
import { describeError } from '../util/errors.js';
import { createLogger } from '../util/log.js';

const log = createLogger('⚡ [WS]');

export interface RadarSocket {
  broadcast(data: unknown): void;
  clientCount(): number;
  close(): Promise<void>;
}

function send(ws: WebSocket, data: unknown) {
  if (ws.readyState === WebSocket.OPEN) ws.send(JSON.stringify(data));
}

function parseMessage(data: RawData): unknown {
  return JSON.parse(data.toString());
}

/**
 * Accepts `{ type: 'command', command }` messages and answers each with an
 * `ack` or an `error`. Every client gets the current frame on connect.
 */
export function attachRadarSocket(server: Server, engine: RadarEngine): RadarSocket {
  const wss = new WebSocketServer({ server, path: '/ws' });

  wss.on('connection', (ws: WebSocket) => {
    log.info('Client connected');
    send(ws, { type: 'radar_frame', frame: engine.frame() });

    ws.on('message', (data) => {
      let msg: unknown;
      try {
        msg = parseMessage(data);
      } catch (e) {
        send(ws, { type: 'error', message: `Invalid JSON: ${describeError(e)}` });
        return;
      }
      handleMessage(ws, msg);
    });

    ws.on('close', () => {
      log.info('Client disconnected');
    });
  });

  function handleMessage(ws: WebSocket, msg: unknown) {
    if (typeof msg !== 'object' || msg === null || !('type' in msg)) {
      send(ws, { type: 'error', message: 'Message type is required' });
      return;
    }
    if (msg.type !== 'command') {
      send(ws, { type: 'error', message: `Unknown message: ${String(msg.type)}` });
      return;
    }
    try {
      const command = parseCommand('command' in msg ? msg.command : undefined);
      engine.apply(command);
      send(ws, { type: 'ack', command });
    } catch (e) {
      if (!(e instanceof CommandError)) log.error(`Command failed: ${describeError(e)}`);
      send(ws, { type: 'error', message: describeError(e) });
    }
  }

  return {
    broadcast(data: unknown) {
      const payload = JSON.stringify(data);
      wss.clients.forEach((client) => {
        if (client.readyState === WebSocket.OPEN) client.send(payload);
      });
    },
    clientCount: () => wss.clients.size,
    close: () => new Promise<void>((resolve, reject) => {
      wss.clients.forEach((client) => client.terminate());
      wss.close((err) => (err ? reject(err) : resolve()));
    }),
  };
}
