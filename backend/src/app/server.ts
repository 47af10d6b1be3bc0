import 'dotenv/config';
import { createApp } from './app.js';
import { resolveConfig } from '../shared/config.js';
import { GeminiGenerationClient } from '../shared/gemini.client.js';

const bootstrap = async () => {
  const config = resolveConfig();

  // One client for the whole process, shared by every request
  const generationClient = new GeminiGenerationClient(config.gemini);
  const app = createApp({
    generationClient,
    maxUploadBytes: config.maxUploadBytes,
    corsOrigin: config.corsOrigin
  });

  app.listen(config.port, () => {
    console.log(`Financial Projection API is running on port ${config.port} (model ${config.gemini.model})`);
  });
};

bootstrap().catch((error) => {
  console.error('Failed to start the server:', error);
  process.exit(1);
});
