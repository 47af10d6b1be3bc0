import { Router, type Response } from 'express';
import { z } from 'zod';
import { AppError } from '../../shared/appError.js';
import { DEFAULT_GOAL_TIMEFRAME_YEARS } from '../projections/projections.types.js';
import { calculateGoalRequirements } from './goals.service.js';
import type { GoalRequirementsPayload } from './goals.types.js';

const router = Router();

const GoalRequirementsBodySchema = z.object({
  current_revenue: z.number(),
  target_revenue: z.number(),
  timeframe_years: z.number().int().default(DEFAULT_GOAL_TIMEFRAME_YEARS)
});

// Rejected calculation inputs (zero revenue, zero timeframe, overflowing ratio) stay 400, not 500
const handleError = (error: unknown, res: Response) => {
  if (error instanceof AppError && error.code === 'INVALID_INPUT') {
    res.status(400).json({ code: 'invalid-input', message: error.message });
    return;
  }
  console.error('Failed to calculate goal requirements:', error);
  res.status(500).json({ code: 'unknown', message: 'Failed to process the request.' });
};

router.post('/', (req, res) => {
  const parsed = GoalRequirementsBodySchema.safeParse(req.body);
  if (!parsed.success) {
    res.status(400).json({
      code: 'invalid-input',
      message: 'Provide current_revenue, target_revenue and timeframe_years as numbers.'
    });
    return;
  }
  const { current_revenue, target_revenue, timeframe_years } = parsed.data;
  try {
    const requirements = calculateGoalRequirements(current_revenue, target_revenue, timeframe_years);
    const payload: GoalRequirementsPayload = {
      current_revenue,
      target_revenue,
      timeframe_years,
      required_cagr: requirements.requiredCagr,
      required_monthly_growth: requirements.requiredMonthlyGrowth,
      growth_multiple: requirements.growthMultiple
    };
    res.json(payload);
  } catch (error) {
    handleError(error, res);
  }
});

export { router as goalsRouter };
