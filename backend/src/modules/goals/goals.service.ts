import { AppError } from '../../shared/appError.js';
import type { GoalRequirements } from './goals.types.js';

const RATE_DECIMALS = 4;
const MULTIPLE_DECIMALS = 2;
const MONTHS_PER_YEAR = 12;

const roundTo = (value: number, decimals: number) => {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
};

const isPositive = (value: number) => Number.isFinite(value) && value > 0;

export const calculateGoalRequirements = (
  currentRevenue: number,
  targetRevenue: number,
  timeframeYears: number
): GoalRequirements => {
  if (!isPositive(currentRevenue)) {
    throw new AppError('INVALID_INPUT', 'Current revenue must be greater than zero');
  }
  if (!isPositive(targetRevenue)) {
    throw new AppError('INVALID_INPUT', 'Target revenue must be greater than zero');
  }
  if (!isPositive(timeframeYears)) {
    throw new AppError('INVALID_INPUT', 'Timeframe must be greater than zero');
  }

  const growthMultiple = targetRevenue / currentRevenue;
  if (!Number.isFinite(growthMultiple)) {
    throw new AppError('INVALID_INPUT', 'Target revenue is too large relative to current revenue');
  }
  return {
    requiredCagr: roundTo(growthMultiple ** (1 / timeframeYears) - 1, RATE_DECIMALS),
    requiredMonthlyGrowth: roundTo(growthMultiple ** (1 / (timeframeYears * MONTHS_PER_YEAR)) - 1, RATE_DECIMALS),
    growthMultiple: roundTo(growthMultiple, MULTIPLE_DECIMALS)
  };
};
