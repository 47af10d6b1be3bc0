import { Router, type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import { z } from 'zod';
import { AppError } from '../../shared/appError.js';
import type { ProjectionsService } from './projections.service.js';
import {
  DEFAULT_GOAL_TIMEFRAME_YEARS,
  type GoalParameters,
  type ProjectionRequest,
  type StatementUpload
} from './projections.types.js';

export const PROFIT_LOSS_FIELD = 'profit_loss_file';
export const BALANCE_SHEET_FIELD = 'balance_sheet_file';

export interface ProjectionsRouterOptions {
  maxUploadBytes: number;
}

const timeframeYears = z.coerce.number().int().positive().default(DEFAULT_GOAL_TIMEFRAME_YEARS);

const PredictQuerySchema = z.object({
  goal_target_revenue: z.coerce.number().positive().optional(),
  goal_timeframe_years: timeframeYears
});

const PredictWithGoalQuerySchema = z.object({
  target_revenue: z.coerce.number().positive(),
  timeframe_years: timeframeYears
});

const handleError = (error: unknown, res: Response) => {
  if (!(error instanceof AppError)) {
    console.error('Unhandled internal server error:', error);
    res.status(500).json({ code: 'unknown', message: 'Internal server error.' });
    return;
  }

  switch (error.code) {
    case 'INVALID_INPUT':
      res.status(400).json({ code: 'invalid-input', message: error.message });
      return;
    case 'EMPTY_UPSTREAM_RESPONSE':
      console.error('Empty response received from AI service.');
      res.status(500).json({ code: 'empty-upstream-response', message: error.message });
      return;
    case 'SCHEMA_VIOLATION':
      console.error('Schema validation failed:', error.details);
      res.status(500).json({
        code: 'schema-violation',
        message: `Schema validation failed: ${error.message}`,
        details: error.details
      });
      return;
    case 'UPSTREAM_TRANSPORT_FAILURE':
      console.error('Generation service call failed:', error.cause);
      res.status(500).json({ code: 'upstream-failure', message: 'Failed to generate the projection.' });
      return;
  }
};

const parseQuery = <S extends z.ZodTypeAny>(schema: S, query: unknown): z.infer<S> => {
  const result = schema.safeParse(query);
  if (!result.success) {
    const detail = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new AppError('INVALID_INPUT', `Invalid query parameters (${detail})`);
  }
  return result.data;
};

const pickUpload = (req: Request, field: string, title: string): StatementUpload => {
  const files = req.files;
  const file = files && !Array.isArray(files) ? files[field]?.[0] : undefined;
  if (!file) {
    throw new AppError('INVALID_INPUT', `${title} file is required`);
  }
  return { filename: file.originalname, content: file.buffer };
};

const readStatements = (req: Request): Pick<ProjectionRequest, 'profitAndLoss' | 'balanceSheet'> => ({
  profitAndLoss: pickUpload(req, PROFIT_LOSS_FIELD, 'Profit and Loss'),
  balanceSheet: pickUpload(req, BALANCE_SHEET_FIELD, 'Balance Sheet')
});

export const createProjectionsRouter = (service: ProjectionsService, options: ProjectionsRouterOptions) => {
  const router = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: options.maxUploadBytes, files: 2 }
  }).fields([
    { name: PROFIT_LOSS_FIELD, maxCount: 1 },
    { name: BALANCE_SHEET_FIELD, maxCount: 1 }
  ]);

  // Multer failures (oversized file, unexpected field) are the caller's fault
  const receiveStatements = (req: Request, res: Response, next: NextFunction) => {
    upload(req, res, (error: unknown) => {
      if (error) {
        const message = error instanceof Error ? error.message : 'Malformed upload';
        handleError(new AppError('INVALID_INPUT', message), res);
        return;
      }
      next();
    });
  };

  const respondWithProjection = async (req: Request, res: Response, goal: GoalParameters | null) => {
    const statements = readStatements(req);
    console.info(
      `Received projection request. Files: ${statements.profitAndLoss.filename}, ${statements.balanceSheet.filename}`
    );
    const projection = await service.generateProjection({ ...statements, goal });
    console.info('AI response successfully parsed and validated.');
    res.json(projection);
  };

  router.post('/predict', receiveStatements, async (req, res) => {
    try {
      const query = parseQuery(PredictQuerySchema, req.query);
      const goal =
        query.goal_target_revenue === undefined
          ? null
          : { targetRevenue: query.goal_target_revenue, timeframeYears: query.goal_timeframe_years };
      await respondWithProjection(req, res, goal);
    } catch (error) {
      handleError(error, res);
    }
  });

  router.post('/predict-with-goal', receiveStatements, async (req, res) => {
    try {
      const query = parseQuery(PredictWithGoalQuerySchema, req.query);
      await respondWithProjection(req, res, {
        targetRevenue: query.target_revenue,
        timeframeYears: query.timeframe_years
      });
    } catch (error) {
      handleError(error, res);
    }
  });

  return router;
};
