import type {
  AnnualProjection,
  GoalProjectionResponse,
  MonthlyProjection,
  QuarterlyProjection,
  StandardProjection
} from './projections.schema.js';

// Flat monthly figures so every quarter and year reconciles exactly
const MONTHLY_FIGURES = { revenue: 1000, gross_profit: 400, expenses: 800, net_profit: 200 };

const scaled = (factor: number) => ({
  revenue: MONTHLY_FIGURES.revenue * factor,
  gross_profit: MONTHLY_FIGURES.gross_profit * factor,
  expenses: MONTHLY_FIGURES.expenses * factor,
  net_profit: MONTHLY_FIGURES.net_profit * factor
});

export const buildMonths = (startYear: number, count: number): MonthlyProjection[] =>
  Array.from({ length: count }, (_, index) => {
    const year = startYear + Math.floor(index / 12);
    const month = String((index % 12) + 1).padStart(2, '0');
    return { month: `${year}-${month}`, ...scaled(1) };
  });

const buildQuarters = (startYear: number, count: number): QuarterlyProjection[] =>
  Array.from({ length: count }, (_, index) => ({
    quarter: `${startYear + Math.floor(index / 4)}-Q${(index % 4) + 1}`,
    ...scaled(3)
  }));

export const buildYears = (startYear: number, count: number): AnnualProjection[] =>
  Array.from({ length: count }, (_, index) => ({ year: startYear + index, ...scaled(12) }));

const score = (value: number, rationale: string) => ({ score: value, rationale });

export const buildStandardProjection = (startYear = 2027): StandardProjection => ({
  executive_summary: 'Revenue grows steadily with stable margins.',
  business_name: 'Sample Trading Ltd',
  completion_score: score(0.95, 'All series were produced.'),
  data_quality_score: score(0.8, 'Statements cover two full years with few gaps.'),
  projection_confidence_score: score(0.7, 'Growth is consistent but the history is short.'),
  projection_drivers_found: ['Stable monthly revenue'],
  assumptions_made: ['Market conditions remain stable'],
  anomalies_found: [],
  methodology: {
    forecasting_methods_used: ['Trend Analysis'],
    seasonal_adjustments_applied: false,
    trend_analysis_period: '2 years',
    growth_rate_assumptions: { revenue_cagr: 0.05, expense_inflation: 0.03, profit_margin_target: 0.2 }
  },
  projections_data: {
    one_year_monthly: buildMonths(startYear, 12),
    three_years_monthly: buildMonths(startYear, 36),
    five_years_quarterly: buildQuarters(startYear, 20),
    ten_years_annual: buildYears(startYear, 10),
    fifteen_years_annual: buildYears(startYear, 15)
  },
  key_financial_ratios: { gross_margin: 0.4, net_margin: 0.2, current_ratio: 1.5, debt_to_equity: 0.6 },
  risk_factors: ['Customer concentration'],
  recommendations: ['Diversify the customer base']
});

export const buildGoalProjection = (startYear = 2027): GoalProjectionResponse => ({
  ...buildStandardProjection(startYear),
  goal_based_projections: {
    target_revenue: 24000,
    timeframe_years: 3,
    required_cagr: 0.26,
    monthly_projections: buildMonths(startYear, 36),
    achievement_summary: 'The target is reachable with faster customer acquisition.',
    required_adjustments: ['Expand the sales team'],
    feasibility_analysis: 'Required growth is well above the historical rate.'
  },
  goal_feasibility_score: score(0.4, 'Required growth is twice the historical rate.')
});
