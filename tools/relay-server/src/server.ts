import { MemoryTransport, base64ToBytes, bytesToBase64, describeError } from 'roundgrid-protocol';
import { WebSocketServer } from 'ws';
import type WebSocket from 'ws';
import { type RelayReply, type RelayRequest, isRelayRequest } from './protocol.js';

export interface RelayServer {
  wss: WebSocketServer;
  /** Resolves with the bound port once the server accepts connections */
  listening: Promise<number>;
  close: () => Promise<void>;
}

async function handle(store: MemoryTransport, msg: RelayRequest): Promise<RelayReply> {
  switch (msg.type) {
    case 'put':
      await store.put(msg.correlationId, msg.destination, base64ToBytes(msg.body));
      return { type: 'ok', seq: msg.seq };
    case 'get': {
      const bytes = await store.get(msg.correlationId);
      return { type: 'ok', seq: msg.seq, body: bytes === null ? null : bytesToBase64(bytes) };
    }
    case 'discard':
      await store.discard(msg.correlationId);
      return { type: 'ok', seq: msg.seq };
    case 'list':
      return { type: 'ok', seq: msg.seq, ids: await store.listRequests(msg.address) };
    case 'read': {
      const bytes = await store.readRequest(msg.correlationId);
      return { type: 'ok', seq: msg.seq, body: bytes === null ? null : bytesToBase64(bytes) };
    }
    case 'respond':
      await store.respond(msg.correlationId, base64ToBytes(msg.body));
      return { type: 'ok', seq: msg.seq };
  }
}

export function createRelayServer(port: number): RelayServer {
  const wss = new WebSocketServer({ port });
  const store = new MemoryTransport();
  const sockets = new Set<WebSocket>();

  const listening = new Promise<number>((resolve, reject) => {
    wss.once('listening', () => {
      const address = wss.address();
      resolve(typeof address === 'string' ? port : address.port);
    });
    wss.once('error', reject);
  });

  function reply(ws: WebSocket, message: RelayReply): void {
    if (ws.readyState === ws.OPEN) {
      ws.send(JSON.stringify(message));
    }
  }

  wss.on('connection', (ws: WebSocket) => {
    sockets.add(ws);

    ws.on('message', (raw: Buffer) => {
      let msg: unknown;
      try {
        msg = JSON.parse(raw.toString());
      } catch {
        reply(ws, { type: 'error', error: 'invalid JSON' });
        return;
      }

      if (!isRelayRequest(msg)) {
        const seq =
          typeof msg === 'object' && msg !== null && 'seq' in msg && typeof msg.seq === 'number' ? msg.seq : undefined;
        reply(ws, { type: 'error', seq, error: 'invalid request' });
        return;
      }

      const request = msg;
      handle(store, request).then(
        (result) => reply(ws, result),
        (err: unknown) => reply(ws, { type: 'error', seq: request.seq, error: describeError(err) }),
      );
    });

    ws.on('close', () => {
      sockets.delete(ws);
    });
  });

  return {
    wss,
    listening,
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const ws of sockets) {
          ws.close();
        }
        sockets.clear();
        wss.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
