// server/src/ws.ts

import type { Server as HttpServer } from 'node:http';
import { WebSocketServer } from 'ws';
import { CONFIG } from './config.js';
import { Connection } from './connection.js';

export function originAllowed(origin: string | undefined, allowed: readonly string[] = CONFIG.httpOrigins): boolean {
  if (!origin) return true; // allow non-browser clients
  if (allowed.includes('*')) return true;
  return allowed.includes(origin);
}

export function attachWs(httpServer: HttpServer): WebSocketServer {
  const wss = new WebSocketServer({ server: httpServer, path: CONFIG.wsPath });

  wss.on('connection', (ws, req) => {
    const origin = req.headers.origin;

    if (!originAllowed(origin)) {
      console.warn(`[ws] reject origin=${origin ?? '(none)'} allowed=${CONFIG.httpOrigins.join(',')}`);
      ws.close(1008, 'bad origin');
      return;
    }

    const conn = new Connection((msg) => {
      if (ws.readyState === ws.OPEN) ws.send(JSON.stringify(msg));
    });
    console.log(`[ws] open origin=${origin ?? '(none)'}`);

    ws.on('message', (data) => {
      conn.handle(data.toString());
    });

    ws.on('close', (code, reason) => {
      conn.close();
      console.log(`[ws] closed code=${code} reason=${reason.toString()}`);
    });
  });

  return wss;
}
