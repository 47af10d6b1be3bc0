import { once } from 'node:events';
import { createApp, type AppOptions } from './app.js';
import { MockGenerationClient } from '../shared/gemini.client.mock.js';

export interface TestServer {
  baseUrl: string;
  close: () => Promise<void>;
}

// Starts the app on an ephemeral local port; tests talk to it with the global fetch
export const startTestServer = async (overrides: Partial<AppOptions> = {}): Promise<TestServer> => {
  const app = createApp({
    generationClient: new MockGenerationClient(),
    maxUploadBytes: 64 * 1024,
    corsOrigin: null,
    ...overrides
  });
  const server = app.listen(0, '127.0.0.1');
  await once(server, 'listening');

  const address = server.address();
  if (!address || typeof address === 'string') {
    server.close();
    throw new Error('Test server did not bind to a TCP port');
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      })
  };
};
