export interface GoalRequirements {
  // Rates are fractions rounded to two decimals of a percent, e.g. 0.2599 for 25.99%
  requiredCagr: number;
  requiredMonthlyGrowth: number;
  growthMultiple: number;
}

export interface GoalRequirementsPayload {
  current_revenue: number;
  target_revenue: number;
  timeframe_years: number;
  required_cagr: number;
  required_monthly_growth: number;
  growth_multiple: number;
}
