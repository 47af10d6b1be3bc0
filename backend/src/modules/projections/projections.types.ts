export interface StatementUpload {
  filename: string;
  content: Buffer;
}

export interface GoalParameters {
  targetRevenue: number;
  timeframeYears: number;
}

export interface ProjectionRequest {
  profitAndLoss: StatementUpload;
  balanceSheet: StatementUpload;
  goal?: GoalParameters | null;
}

export const DEFAULT_GOAL_TIMEFRAME_YEARS = 3;
