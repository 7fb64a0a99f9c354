/**
 * Echo Example
 *
 * Starts a tiny hub on 127.0.0.1:5000 that answers negotiation and echoes
 * every invocation back as a completion, then talks to it with a client.
 *
 * Run with: npx tsx examples/echo-client.ts
 */

import { createServer } from 'node:http';
import { WebSocketServer } from 'ws';
import { createHttpConnection, HubConnection, JsonHubProtocol, MessageType } from '../src/index.ts';

const PORT = 5000;

function startHub() {
  const http = createServer((req, res) => {
    // 1. Negotiation: offer WebSockets only
    if (req.method === 'POST' && req.url?.startsWith('/chat/negotiate')) {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(
        JSON.stringify({
          connectionId: 'echo-1',
          connectionToken: 'echo-token',
          negotiateVersion: 1,
          availableTransports: [{ transport: 'WebSockets', transferFormats: ['Text', 'Binary'] }],
        })
      );
      return;
    }
    res.writeHead(404).end();
  });

  // 2. Hub: reply to each invocation with a completion carrying its arguments
  const wss = new WebSocketServer({ server: http, path: '/chat' });
  wss.on('connection', (socket) => {
    socket.on('message', (data) => {
      for (const frame of data.toString().split('\x1e')) {
        if (!frame) continue;
        const message: unknown = JSON.parse(frame);
        if (typeof message === 'object' && message !== null && 'arguments' in message) {
          socket.send(
            JSON.stringify({ type: MessageType.Completion, invocationId: '0', result: message.arguments }) + '\x1e'
          );
        }
      }
    });
  });

  return new Promise<() => void>((resolve) => {
    http.listen(PORT, '127.0.0.1', () =>
      resolve(() => {
        wss.close();
        http.close();
      })
    );
  });
}

async function main() {
  const stop = await startHub();

  // 3. Client: negotiate, dial, and run a hub session
  const connection = await createHttpConnection(`http://127.0.0.1:${PORT}/chat`, {
    headers: () => ({ Authorization: 'Bearer test-secret' }),
  });
  if (!connection) throw new Error('Server offers no supported transport');

  const hub = new HubConnection(connection, new JsonHubProtocol());
  hub.start();

  await hub.sendInvocation('Echo', 'hello', 42);
  const reply = await hub.receive();
  console.log('Received:', reply);

  await hub.close();
  hub.abort();
  stop();
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
