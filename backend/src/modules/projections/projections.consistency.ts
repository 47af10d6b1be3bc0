import {
  ProjectionSetSchema,
  type AnnualProjection,
  type MonthlyProjection,
  type ProjectionResponse,
  type ProjectionSet,
  type QuarterlyProjection
} from './projections.schema.js';

export type ConsistencyIssueKind = 'cardinality' | 'aggregation';

export interface ConsistencyIssue {
  kind: ConsistencyIssueKind;
  series: string;
  message: string;
}

type Figure = 'revenue' | 'gross_profit' | 'expenses' | 'net_profit';
type PeriodFigures = Record<Figure, number>;

const FIGURES: Figure[] = ['revenue', 'gross_profit', 'expenses', 'net_profit'];

export const EXPECTED_SERIES_LENGTHS: Record<keyof ProjectionSet, number> = {
  one_year_monthly: 12,
  three_years_monthly: 36,
  five_years_quarterly: 20,
  ten_years_annual: 10,
  fifteen_years_annual: 15
};

export const EXPECTED_GOAL_SERIES_LENGTH = 36;

const RELATIVE_TOLERANCE = 0.01;
const ABSOLUTE_TOLERANCE_FLOOR = 1;

const withinTolerance = (actual: number, expected: number) =>
  Math.abs(actual - expected) <= Math.max(Math.abs(expected) * RELATIVE_TOLERANCE, ABSOLUTE_TOLERANCE_FLOOR);

const quarterOfMonth = (month: string) => {
  const [year, monthNumber] = month.split('-');
  return `${year}-Q${Math.ceil(Number(monthNumber) / 3)}`;
};

const yearOfQuarter = (quarter: string) => Number(quarter.slice(0, 4));

const groupBy = <T, K>(items: T[], keyOf: (item: T) => K) => {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
};

const compareAggregates = <K>(
  parts: Map<K, PeriodFigures[]>,
  partsPerWhole: number,
  wholes: Map<K, PeriodFigures>,
  describe: (key: K) => string,
  series: string
): ConsistencyIssue[] => {
  const issues: ConsistencyIssue[] = [];
  for (const [key, group] of parts) {
    const whole = wholes.get(key);
    if (!whole || group.length !== partsPerWhole) {
      continue;
    }
    for (const figure of FIGURES) {
      const sum = group.reduce((total, entry) => total + entry[figure], 0);
      if (!withinTolerance(sum, whole[figure])) {
        issues.push({
          kind: 'aggregation',
          series,
          message: `${describe(key)} ${figure} sums to ${sum} but is reported as ${whole[figure]}`
        });
      }
    }
  }
  return issues;
};

const checkMonthsAgainstQuarters = (months: MonthlyProjection[], quarters: QuarterlyProjection[]) =>
  compareAggregates(
    groupBy(months, (entry) => quarterOfMonth(entry.month)),
    3,
    new Map(quarters.map((entry): [string, QuarterlyProjection] => [entry.quarter, entry])),
    (quarter) => `Months of ${quarter}`,
    'three_years_monthly'
  );

const checkQuartersAgainstYears = (quarters: QuarterlyProjection[], years: AnnualProjection[]) =>
  compareAggregates(
    groupBy(quarters, (entry) => yearOfQuarter(entry.quarter)),
    4,
    new Map(years.map((entry): [number, AnnualProjection] => [entry.year, entry])),
    (year) => `Quarters of ${year}`,
    'five_years_quarterly'
  );

const checkLength = (series: string, actual: number, expected: number): ConsistencyIssue[] =>
  actual === expected
    ? []
    : [{ kind: 'cardinality', series, message: `${series} has ${actual} entries, expected ${expected}` }];

/**
 * Best-effort review of a validated projection. Reports list lengths that differ
 * from what the instruction asked for and period totals that do not add up.
 */
export const inspectProjectionConsistency = (projection: ProjectionResponse): ConsistencyIssue[] => {
  const data = projection.projections_data;
  const issues = ProjectionSetSchema.keyof().options.flatMap((series) =>
    checkLength(series, data[series].length, EXPECTED_SERIES_LENGTHS[series])
  );

  if ('goal_based_projections' in projection && projection.goal_based_projections) {
    issues.push(
      ...checkLength(
        'goal_based_projections.monthly_projections',
        projection.goal_based_projections.monthly_projections.length,
        EXPECTED_GOAL_SERIES_LENGTH
      )
    );
  }

  issues.push(...checkMonthsAgainstQuarters(data.three_years_monthly, data.five_years_quarterly));
  issues.push(...checkQuartersAgainstYears(data.five_years_quarterly, data.ten_years_annual));
  return issues;
};
