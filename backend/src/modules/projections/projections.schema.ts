import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { AppError } from '../../shared/appError.js';

// Bump when a field is added or its meaning changes
export const PROJECTION_SCHEMA_VERSION = 3;

const MONTH_LABEL_PATTERN = /^\d{4}-(0[1-9]|1[0-2])$/;
const QUARTER_LABEL_PATTERN = /^\d{4}-Q[1-4]$/;

const money = (description: string) => z.number().describe(description);
const textList = (description: string) => z.array(z.string()).describe(description);

export const QualityScoreSchema = z.object({
  score: z
    .number()
    .min(0)
    .max(1)
    .describe('Confidence from 0.0 to 1.0, where 1.0 is the highest. Use precise decimals such as 0.85.'),
  rationale: z.string().describe('One sentence naming the factors behind the score.')
});

export const GrowthAssumptionsSchema = z.object({
  revenue_cagr: z.number().describe('Revenue compound annual growth rate as a decimal, 0.15 for 15%.'),
  expense_inflation: z.number().describe('Annual expense inflation as a decimal, 0.03 for 3%.'),
  profit_margin_target: z.number().describe('Target net profit margin as a decimal, 0.12 for 12%.')
});

export const FinancialRatiosSchema = z.object({
  gross_margin: z.number().describe('(Revenue - COGS) / Revenue as a decimal.'),
  net_margin: z.number().describe('Net income / Revenue as a decimal.'),
  current_ratio: z.number().describe('Current assets / current liabilities.'),
  debt_to_equity: z.number().describe("Total debt / total shareholders' equity.")
});

const periodFigures = {
  revenue: money('Total revenue for the period in the base currency.'),
  gross_profit: money('Revenue minus cost of goods sold for the period.'),
  expenses: money('Total expenses for the period including COGS, operating costs, interest and taxes.'),
  net_profit: money('Net profit after all expenses for the period.')
};

export const MonthlyProjectionSchema = z.object({
  month: z.string().regex(MONTH_LABEL_PATTERN).describe("Month in YYYY-MM format, e.g. '2027-01'."),
  ...periodFigures
});

export const QuarterlyProjectionSchema = z.object({
  quarter: z.string().regex(QUARTER_LABEL_PATTERN).describe("Quarter in YYYY-QN format, e.g. '2027-Q1'."),
  ...periodFigures
});

export const AnnualProjectionSchema = z.object({
  year: z.number().int().describe('Calendar year of the projection, e.g. 2027.'),
  ...periodFigures
});

export const ProjectionSetSchema = z.object({
  one_year_monthly: z
    .array(MonthlyProjectionSchema)
    .describe('Exactly 12 monthly projections starting in January of next year.'),
  three_years_monthly: z
    .array(MonthlyProjectionSchema)
    .describe('Exactly 36 monthly projections covering three full years.'),
  five_years_quarterly: z
    .array(QuarterlyProjectionSchema)
    .describe('Exactly 20 quarterly projections covering five years.'),
  ten_years_annual: z.array(AnnualProjectionSchema).describe('Exactly 10 annual projections.'),
  fifteen_years_annual: z.array(AnnualProjectionSchema).describe('Exactly 15 annual projections.')
});

export const MethodologySchema = z.object({
  forecasting_methods_used: textList(
    "Forecasting techniques applied, e.g. 'Trend Analysis', 'Seasonal Decomposition'."
  ),
  seasonal_adjustments_applied: z
    .boolean()
    .describe('Whether seasonal patterns were identified and built into the projections.'),
  trend_analysis_period: z.string().describe("Historical period used for trend analysis, e.g. '3 years'."),
  growth_rate_assumptions: GrowthAssumptionsSchema
});

export const GoalProjectionSchema = z.object({
  target_revenue: z.number().describe('Annual revenue target the plan works backward from.').optional(),
  timeframe_years: z.number().int().describe('Years allowed to reach the target.').optional(),
  required_cagr: z.number().describe('Revenue CAGR needed to reach the target, as a decimal.').optional(),
  monthly_projections: z
    .array(MonthlyProjectionSchema)
    .describe('Exactly 36 monthly projections adjusted toward the target.'),
  achievement_summary: z.string().describe('Two or three sentences on whether and how the target is reached.'),
  required_adjustments: textList('Operational or strategic changes needed to follow the goal pathway.'),
  feasibility_analysis: z.string().describe('Narrative assessment of how realistic the target is.')
});

export const ProjectionResponseSchema = z.object({
  executive_summary: z.string().describe('Two or three sentences on the key trends and growth trajectory.'),
  business_name: z.string().describe('Legal or operating name of the business as shown in the statements.'),
  completion_score: QualityScoreSchema.describe('How completely every required projection element was produced.'),
  data_quality_score: QualityScoreSchema.describe('Quality and consistency of the supplied financial data.'),
  projection_confidence_score: QualityScoreSchema.describe('Overall confidence in the projections.'),
  projection_drivers_found: textList('Metrics or business factors that drove the projections.'),
  assumptions_made: textList('Business and economic assumptions behind the projections.'),
  anomalies_found: textList('Outliers or inconsistencies found in the historical data.'),
  methodology: MethodologySchema,
  projections_data: ProjectionSetSchema,
  goal_based_projections: GoalProjectionSchema.optional(),
  goal_feasibility_score: QualityScoreSchema.describe('Likelihood that the revenue goal is achievable.').optional(),
  key_financial_ratios: FinancialRatiosSchema,
  risk_factors: textList('Risks that could materially change the projected performance.'),
  recommendations: textList('Actions that would improve the projected performance or reduce risk.')
});

export const StandardProjectionSchema = ProjectionResponseSchema.omit({
  goal_based_projections: true,
  goal_feasibility_score: true
});

export const GoalProjectionResponseSchema = ProjectionResponseSchema.required({
  goal_based_projections: true,
  goal_feasibility_score: true
});

export type MonthlyProjection = z.infer<typeof MonthlyProjectionSchema>;
export type QuarterlyProjection = z.infer<typeof QuarterlyProjectionSchema>;
export type AnnualProjection = z.infer<typeof AnnualProjectionSchema>;
export type ProjectionSet = z.infer<typeof ProjectionSetSchema>;
export type StandardProjection = z.infer<typeof StandardProjectionSchema>;
export type GoalProjectionResponse = z.infer<typeof GoalProjectionResponseSchema>;
export type ProjectionResponse = StandardProjection | GoalProjectionResponse;

export type ProjectionVariant = 'standard' | 'goal';

const schemaFor = (variant: ProjectionVariant) =>
  variant === 'goal' ? GoalProjectionResponseSchema : StandardProjectionSchema;

/**
 * JSON Schema handed to the model as its structured-output constraint.
 * References are inlined because the generation service does not resolve `$ref`.
 */
export const responseJsonSchema = (variant: ProjectionVariant): Record<string, unknown> =>
  zodToJsonSchema(schemaFor(variant), { $refStrategy: 'none' });

const describeIssue = (issue: z.ZodIssue) =>
  issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;

const parseJson = (rawText: string): unknown => {
  try {
    return JSON.parse(rawText);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new AppError('SCHEMA_VIOLATION', 'Model output is not valid JSON.', [reason], { cause: error });
  }
};

/**
 * Parses model output and checks it against the requested variant.
 * Unknown keys are stripped at every level; list lengths and arithmetic are not checked here.
 */
export function validateProjection(rawText: string, variant: 'goal'): GoalProjectionResponse;
export function validateProjection(rawText: string, variant: 'standard'): StandardProjection;
export function validateProjection(rawText: string, variant: ProjectionVariant): ProjectionResponse;
export function validateProjection(rawText: string, variant: ProjectionVariant): ProjectionResponse {
  const payload = parseJson(rawText);
  if (!payload || typeof payload !== 'object' || Array.isArray(payload)) {
    throw new AppError('SCHEMA_VIOLATION', 'Model output is not a JSON object.', ['expected a top-level object']);
  }

  const result = schemaFor(variant).safeParse(payload);
  if (!result.success) {
    throw new AppError(
      'SCHEMA_VIOLATION',
      'Model output does not match the projection schema.',
      result.error.issues.map(describeIssue)
    );
  }
  return result.data;
}
