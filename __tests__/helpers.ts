import * as http from 'node:http';
import type { Provider } from '../src/types.js';

export interface MockServer {
  server: http.Server;
  port: number;
  url: string;
}

// Helper: create a simple HTTP server on a free port
export function createMockServer(handler: http.RequestListener): Promise<MockServer> {
  return new Promise((resolve, reject) => {
    const server = http.createServer(handler);
    server.listen(0, '127.0.0.1', () => {
      const addr = server.address();
      if (addr === null || typeof addr === 'string') {
        reject(new Error('expected a TCP address'));
        return;
      }
      resolve({ server, port: addr.port, url: `http://127.0.0.1:${addr.port}` });
    });
  });
}

export function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve) => {
    server.closeAllConnections();
    server.close(() => resolve());
  });
}

export function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = '';
    req.on('data', (c: Buffer) => (body += c.toString('utf-8')));
    req.on('end', () => resolve(body));
    req.on('error', reject);
  });
}

export function makeProvider(overrides: Partial<Provider> & Pick<Provider, 'name'>): Provider {
  return {
    url: 'http://127.0.0.1:1',
    secret: null,
    apiType: 'Ollama',
    models: null,
    ...overrides,
  };
}
