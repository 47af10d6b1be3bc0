import type { GoalParameters } from './projections.types.js';

export interface InstructionOptions {
  projectionStartYear: number;
}

const currencyFormatter = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 0,
  maximumFractionDigits: 2
});

export const formatTargetAmount = (value: number) => currencyFormatter.format(value);

const formatYears = (years: number) => `${years} ${years === 1 ? 'year' : 'years'}`;

const baseBlock = ({ projectionStartYear }: InstructionOptions) => [
  'Use your full reasoning capability to analyse the attached profit and loss statement and balance sheet together, then produce accurate financial projections.',
  '',
  'ANALYSIS REQUIREMENTS:',
  '- Identify historical revenue, cost and margin trends, seasonality and one-off events before projecting.',
  '- Use the balance sheet to judge liquidity, leverage and the capacity to fund growth.',
  '- Record every forecasting technique you apply and every assumption you rely on.',
  '- Flag anomalies, gaps or inconsistencies in the historical data.',
  '',
  'PROJECTION REQUIREMENTS:',
  `Project Revenue, Gross Profit, Expenses and Net Profit for these timeframes, starting January ${projectionStartYear}:`,
  '- 1 year: monthly values (12 data points)',
  '- 3 years: monthly values (36 data points)',
  '- 5 years: quarterly values (20 data points)',
  '- 10 years: annual values (10 data points)',
  '- 15 years: annual values (15 data points)',
  '',
  'MATHEMATICAL CONSISTENCY:',
  '- Gross Profit = Revenue - Cost of Goods Sold for every period.',
  '- Net Profit = Revenue - Expenses for every period, where Expenses include COGS.',
  '- Monthly values must sum to the matching quarter, and quarters to the matching year.',
  '- Overlapping series (1-year and 3-year monthly, 10-year and 15-year annual) must agree on shared periods.',
  '- Use month labels YYYY-MM, quarter labels YYYY-QN and calendar years as integers, in chronological order.'
];

const goalBlock = (goal: GoalParameters) => {
  const target = formatTargetAmount(goal.targetRevenue);
  const timeframe = formatYears(goal.timeframeYears);
  return [
    'GOAL-BASED PROJECTION REQUIREMENTS:',
    `The business wants to reach annual revenue of ${target} within ${timeframe}.`,
    '- Plan backward from the target: state the revenue CAGR required to get from the latest annual revenue to the target.',
    '- Provide a 36-month monthly pathway adjusted toward the target in goal_based_projections.monthly_projections.',
    `- Set goal_based_projections.target_revenue to ${goal.targetRevenue} and goal_based_projections.timeframe_years to ${goal.timeframeYears}.`,
    '- Compare the required growth with historical growth and industry norms and explain the gap.',
    '- List the operational, pricing, cost and funding adjustments needed to follow the pathway.',
    '- Score the likelihood of reaching the target in goal_feasibility_score and explain it in feasibility_analysis.'
  ];
};

const qualityChecklistBlock = () => [
  'QUALITY ASSURANCE CHECKLIST:',
  '- Every required series is present with exactly the stated number of data points.',
  '- All figures reconcile across periods and between overlapping series.',
  '- Quality scores use precise decimals between 0.0 and 1.0, each with a one-sentence rationale.',
  '- Financial ratios are derived from the supplied statements.',
  '- Risks and recommendations are specific to this business, not generic.',
  '- Projections are realistic and defensible; accuracy of Revenue, Gross Profit, Expenses and Net Profit matters most.'
];

/**
 * Builds the instruction sent with the two statements.
 * The goal block is included only when goal parameters are given.
 */
export const buildProjectionInstruction = (goal: GoalParameters | null, options: InstructionOptions) => {
  const blocks = [baseBlock(options), ...(goal ? [goalBlock(goal)] : []), qualityChecklistBlock()];
  return blocks.map((lines) => lines.join('\n')).join('\n\n');
};
