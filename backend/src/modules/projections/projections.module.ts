import type { StructuredGenerationClient } from '../../shared/gemini.client.js';
import { createProjectionsRouter } from './projections.router.js';
import { ProjectionsService } from './projections.service.js';

export const createProjectionsModule = (client: StructuredGenerationClient, maxUploadBytes: number) => {
  const service = new ProjectionsService(client);
  return { service, router: createProjectionsRouter(service, { maxUploadBytes }) };
};
