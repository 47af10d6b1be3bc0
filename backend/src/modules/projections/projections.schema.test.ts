import test from 'node:test';
import assert from 'node:assert/strict';

import { isAppError } from '../../shared/appError.js';
import { buildGoalProjection, buildMonths, buildStandardProjection } from './projections.fixtures.js';
import { responseJsonSchema, validateProjection } from './projections.schema.js';

const violation = (detail?: string) => (error: unknown) =>
  isAppError(error, 'SCHEMA_VIOLATION') && (detail === undefined || error.details.includes(detail));

// ─── Accepted payloads ──────────────────────────────────────────────────────

test('schema: accepts a complete standard projection', () => {
  const payload = buildStandardProjection();
  const projection = validateProjection(JSON.stringify(payload), 'standard');
  assert.deepEqual(projection, payload);
});

test('schema: strips unknown fields at every level', () => {
  const payload = { ...buildStandardProjection(), model_notes: 'extra' };
  const nested = { ...payload.completion_score, weight: 2 };
  const projection = validateProjection(JSON.stringify({ ...payload, completion_score: nested }), 'standard');
  assert.equal('model_notes' in projection, false);
  assert.deepEqual(projection.completion_score, { score: 0.95, rationale: 'All series were produced.' });
});

test('schema: does not enforce series lengths', () => {
  const payload = buildStandardProjection();
  payload.projections_data.one_year_monthly = buildMonths(2027, 3);
  const projection = validateProjection(JSON.stringify(payload), 'standard');
  assert.equal(projection.projections_data.one_year_monthly.length, 3);
});

test('schema: accepts boundary scores 0 and 1', () => {
  const payload = buildStandardProjection();
  payload.completion_score.score = 1;
  payload.data_quality_score.score = 0;
  const projection = validateProjection(JSON.stringify(payload), 'standard');
  assert.equal(projection.completion_score.score, 1);
  assert.equal(projection.data_quality_score.score, 0);
});

// ─── Rejected payloads ──────────────────────────────────────────────────────

test('schema: rejects a payload without business_name', () => {
  const payload: Record<string, unknown> = { ...buildStandardProjection() };
  delete payload.business_name;
  assert.throws(() => validateProjection(JSON.stringify(payload), 'standard'), violation('business_name: Required'));
});

test('schema: rejects a quality score above 1', () => {
  const payload = buildStandardProjection();
  payload.completion_score.score = 1.5;
  assert.throws(
    () => validateProjection(JSON.stringify(payload), 'standard'),
    violation('completion_score.score: Number must be less than or equal to 1')
  );
});

test('schema: rejects a negative quality score', () => {
  const payload = buildStandardProjection();
  payload.projection_confidence_score.score = -0.1;
  assert.throws(
    () => validateProjection(JSON.stringify(payload), 'standard'),
    violation('projection_confidence_score.score: Number must be greater than or equal to 0')
  );
});

test('schema: rejects a malformed month label', () => {
  const payload = buildStandardProjection();
  payload.projections_data.one_year_monthly[0].month = '2027-13';
  assert.throws(
    () => validateProjection(JSON.stringify(payload), 'standard'),
    violation('projections_data.one_year_monthly.0.month: Invalid')
  );
});

test('schema: rejects a fractional annual year', () => {
  const payload = buildStandardProjection();
  payload.projections_data.ten_years_annual[0].year = 2027.5;
  assert.throws(
    () => validateProjection(JSON.stringify(payload), 'standard'),
    violation('projections_data.ten_years_annual.0.year: Expected integer, received float')
  );
});

test('schema: rejects text that is not JSON', () => {
  assert.throws(
    () => validateProjection('not json', 'standard'),
    (error: unknown) => violation()(error) && error instanceof Error && error.message === 'Model output is not valid JSON.'
  );
});

test('schema: rejects a top-level array', () => {
  assert.throws(
    () => validateProjection('[]', 'standard'),
    violation('expected a top-level object')
  );
});

// ─── Goal variant ───────────────────────────────────────────────────────────

test('schema: goal variant requires the goal section and feasibility score', () => {
  const payload = buildStandardProjection();
  assert.throws(
    () => validateProjection(JSON.stringify(payload), 'goal'),
    (error: unknown) =>
      violation('goal_based_projections: Required')(error) && violation('goal_feasibility_score: Required')(error)
  );
});

test('schema: goal variant accepts a complete goal projection', () => {
  const payload = buildGoalProjection();
  const projection = validateProjection(JSON.stringify(payload), 'goal');
  assert.equal(projection.goal_based_projections.monthly_projections.length, 36);
  assert.equal(projection.goal_feasibility_score.score, 0.4);
});

test('schema: goal variant accepts a goal section without the echoed target fields', () => {
  const payload = buildGoalProjection();
  const { target_revenue, timeframe_years, required_cagr, ...goalSection } = payload.goal_based_projections;
  const projection = validateProjection(
    JSON.stringify({ ...payload, goal_based_projections: goalSection }),
    'goal'
  );
  assert.deepEqual(projection.goal_based_projections, goalSection);
  assert.deepEqual([target_revenue, timeframe_years, required_cagr], [24000, 3, 0.26]);
});

test('schema: standard variant drops goal fields the model was not asked for', () => {
  const projection = validateProjection(JSON.stringify(buildGoalProjection()), 'standard');
  assert.equal('goal_based_projections' in projection, false);
  assert.equal('goal_feasibility_score' in projection, false);
});

// ─── JSON Schema export ─────────────────────────────────────────────────────

test('schema: standard JSON schema omits goal properties', () => {
  const schema = responseJsonSchema('standard');
  const properties = schema.properties;
  assert.ok(properties && typeof properties === 'object');
  assert.equal('business_name' in properties, true);
  assert.equal('goal_based_projections' in properties, false);
  assert.equal('goal_feasibility_score' in properties, false);
});

test('schema: goal JSON schema requires goal properties', () => {
  const schema = responseJsonSchema('goal');
  assert.ok(Array.isArray(schema.required));
  assert.equal(schema.required.includes('goal_based_projections'), true);
  assert.equal(schema.required.includes('goal_feasibility_score'), true);
});
