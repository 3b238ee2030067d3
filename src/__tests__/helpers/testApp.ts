import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { createApp } from '../../app';
import type { Services } from '../../services';

export interface TestServer {
  baseUrl: string;
  close(): Promise<void>;
}

export function startTestServer(services: Services): Promise<TestServer> {
  const app = createApp(services);

  return new Promise((resolve, reject) => {
    const server: Server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Test server has no TCP address'));
        return;
      }
      const { port }: AddressInfo = address;
      resolve({
        baseUrl: `http://127.0.0.1:${port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((error) => (error ? fail(error) : done()));
          }),
      });
    });
    server.on('error', reject);
  });
}

export async function postJson(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}
