import { DateTime } from 'luxon';
import { AppError } from '../../shared/appError.js';
import type {
  GenerationSettings,
  GenerationUsage,
  StructuredGenerationClient
} from '../../shared/gemini.client.js';
import { inspectProjectionConsistency } from './projections.consistency.js';
import { buildProjectionInstruction } from './projections.prompt.js';
import {
  PROJECTION_SCHEMA_VERSION,
  responseJsonSchema,
  validateProjection,
  type ProjectionResponse,
  type ProjectionVariant
} from './projections.schema.js';
import type { GoalParameters, ProjectionRequest, StatementUpload } from './projections.types.js';

export const CSV_MIME_TYPE = 'text/csv';
const ACCEPTED_EXTENSION = '.csv';

export const GENERATION_SETTINGS: GenerationSettings = {
  temperature: 0.1,
  topP: 0.8,
  topK: 40,
  reasoningBudgetTokens: 32768
};

const formatCount = (value: number) => value.toLocaleString('en-US');

const logUsage = (usage: GenerationUsage | null) => {
  if (!usage) {
    return;
  }
  const reasoning = usage.reasoningTokens === null ? '' : ` | Reasoning: ${formatCount(usage.reasoningTokens)}`;
  console.info(
    `Tokens - Input: ${formatCount(usage.inputTokens)} | Output: ${formatCount(usage.outputTokens)}${reasoning} | Total: ${formatCount(usage.totalTokens)}`
  );
};

const assertStatement = (upload: StatementUpload, title: string) => {
  if (!upload.filename.toLowerCase().endsWith(ACCEPTED_EXTENSION)) {
    throw new AppError('INVALID_INPUT', `${title} file must be a CSV`);
  }
  if (upload.content.length === 0) {
    throw new AppError('INVALID_INPUT', `${title} file is empty`);
  }
};

const assertGoal = (goal: GoalParameters) => {
  if (!Number.isFinite(goal.targetRevenue) || goal.targetRevenue <= 0) {
    throw new AppError('INVALID_INPUT', 'Target revenue must be a positive number');
  }
  if (!Number.isInteger(goal.timeframeYears) || goal.timeframeYears <= 0) {
    throw new AppError('INVALID_INPUT', 'Timeframe must be a positive whole number of years');
  }
};

export class ProjectionsService {
  constructor(
    private readonly client: StructuredGenerationClient,
    private readonly now: () => DateTime = () => DateTime.now()
  ) {}

  async generateProjection(request: ProjectionRequest): Promise<ProjectionResponse> {
    assertStatement(request.profitAndLoss, 'Profit and Loss');
    assertStatement(request.balanceSheet, 'Balance Sheet');
    const goal = request.goal ?? null;
    if (goal) {
      assertGoal(goal);
    }

    const variant: ProjectionVariant = goal ? 'goal' : 'standard';
    const instruction = buildProjectionInstruction(goal, {
      projectionStartYear: this.now().year + 1
    });

    console.info(`Requesting ${variant} projection (schema v${PROJECTION_SCHEMA_VERSION}).`);
    const result = await this.client
      .generate({
        documents: [
          { label: 'Profit and Loss statement', mimeType: CSV_MIME_TYPE, content: request.profitAndLoss.content },
          { label: 'Balance Sheet', mimeType: CSV_MIME_TYPE, content: request.balanceSheet.content }
        ],
        instruction,
        responseSchema: responseJsonSchema(variant),
        settings: GENERATION_SETTINGS
      })
      .catch((error: unknown) => {
        throw new AppError('UPSTREAM_TRANSPORT_FAILURE', 'Generation service call failed', [], { cause: error });
      });
    logUsage(result.usage);

    if (!result.text?.trim()) {
      throw new AppError('EMPTY_UPSTREAM_RESPONSE', 'Empty response from AI service');
    }

    const projection = validateProjection(result.text, variant);
    for (const issue of inspectProjectionConsistency(projection)) {
      console.warn(`Projection consistency (${issue.kind}): ${issue.message}`);
    }
    return projection;
  }
}
