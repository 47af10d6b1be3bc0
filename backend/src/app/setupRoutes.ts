import { Application, Router } from 'express';
import { goalsRouter } from '../modules/goals/goals.router.js';
import { healthRouter } from '../shared/health.router.js';

export const registerAppRoutes = (app: Application, projectionsRouter: Router) => {
  app.get('/', (_req, res) => {
    res.json({ message: 'Financial Projection API is running' });
  });
  app.use('/health', healthRouter);
  app.use('/calculate-goal-requirements', goalsRouter);
  app.use('/', projectionsRouter);
};
