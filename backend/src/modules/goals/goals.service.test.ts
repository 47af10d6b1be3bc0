import test from 'node:test';
import assert from 'node:assert/strict';

import { isAppError } from '../../shared/appError.js';
import { calculateGoalRequirements } from './goals.service.js';

test('goals: doubling revenue in three years needs about 26% a year', () => {
  assert.deepEqual(calculateGoalRequirements(100000, 200000, 3), {
    requiredCagr: 0.2599,
    requiredMonthlyGrowth: 0.0194,
    growthMultiple: 2
  });
});

test('goals: an unchanged target needs no growth', () => {
  assert.deepEqual(calculateGoalRequirements(50000, 50000, 5), {
    requiredCagr: 0,
    requiredMonthlyGrowth: 0,
    growthMultiple: 1
  });
});

test('goals: a lower target gives negative rates', () => {
  const requirements = calculateGoalRequirements(200000, 100000, 1);
  assert.equal(requirements.requiredCagr, -0.5);
  assert.equal(requirements.growthMultiple, 0.5);
});

test('goals: rounds the multiple to two decimals', () => {
  assert.equal(calculateGoalRequirements(300000, 1000000, 2).growthMultiple, 3.33);
});

test('goals: rejects zero current revenue', () => {
  assert.throws(
    () => calculateGoalRequirements(0, 100000, 3),
    (error: unknown) => isAppError(error, 'INVALID_INPUT') && error.message === 'Current revenue must be greater than zero'
  );
});

test('goals: rejects a zero timeframe', () => {
  assert.throws(
    () => calculateGoalRequirements(100000, 200000, 0),
    (error: unknown) => isAppError(error, 'INVALID_INPUT') && error.message === 'Timeframe must be greater than zero'
  );
});

test('goals: rejects a non-positive target', () => {
  assert.throws(
    () => calculateGoalRequirements(100000, -1, 3),
    (error: unknown) => isAppError(error, 'INVALID_INPUT') && error.message === 'Target revenue must be greater than zero'
  );
});

test('goals: rejects a target whose multiple of current revenue overflows', () => {
  assert.throws(
    () => calculateGoalRequirements(1e-320, 1e308, 1),
    (error: unknown) =>
      isAppError(error, 'INVALID_INPUT') &&
      error.message === 'Target revenue is too large relative to current revenue'
  );
});
