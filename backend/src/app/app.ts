import express from 'express';
import cors from 'cors';
import { registerAppRoutes } from './setupRoutes.js';
import { createProjectionsModule } from '../modules/projections/projections.module.js';
import type { StructuredGenerationClient } from '../shared/gemini.client.js';

export interface AppOptions {
  generationClient: StructuredGenerationClient;
  maxUploadBytes: number;
  corsOrigin: string | null;
}

export const createApp = ({ generationClient, maxUploadBytes, corsOrigin }: AppOptions) => {
  const app = express();
  app.use(corsOrigin ? cors({ origin: corsOrigin }) : cors());
  app.use(express.json({ limit: '1mb' }));

  const projections = createProjectionsModule(generationClient, maxUploadBytes);
  registerAppRoutes(app, projections.router);
  return app;
};
