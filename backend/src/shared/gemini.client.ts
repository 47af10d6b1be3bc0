import { GoogleGenAI, type GenerateContentResponse, type Part } from '@google/genai';
import type { GeminiConfig } from './config.js';

export interface InlineDocument {
  label: string;
  mimeType: string;
  content: Buffer;
}

export interface GenerationSettings {
  temperature: number;
  topP: number;
  topK: number;
  reasoningBudgetTokens: number;
}

export interface StructuredGenerationRequest {
  documents: InlineDocument[];
  instruction: string;
  responseSchema: Record<string, unknown>;
  settings: GenerationSettings;
}

export interface GenerationUsage {
  inputTokens: number;
  outputTokens: number;
  reasoningTokens: number | null;
  totalTokens: number;
}

export interface StructuredGenerationResult {
  text: string | null;
  usage: GenerationUsage | null;
}

export interface StructuredGenerationClient {
  generate(request: StructuredGenerationRequest): Promise<StructuredGenerationResult>;
}

const readUsage = (response: GenerateContentResponse): GenerationUsage | null => {
  const metadata = response.usageMetadata;
  if (!metadata) {
    return null;
  }
  return {
    inputTokens: metadata.promptTokenCount ?? 0,
    outputTokens: metadata.candidatesTokenCount ?? 0,
    reasoningTokens: metadata.thoughtsTokenCount ?? null,
    totalTokens: metadata.totalTokenCount ?? 0
  };
};

// Each document is preceded by its label so the model can tell the statements apart
const toParts = (document: InlineDocument): Part[] => [
  { text: `${document.label}:` },
  {
    inlineData: {
      data: document.content.toString('base64'),
      mimeType: document.mimeType
    }
  }
];

// Thin wrapper over the Gemini SDK so the rest of the app only sees plain text and token counts
export class GeminiGenerationClient implements StructuredGenerationClient {
  private readonly ai: GoogleGenAI;

  constructor(private readonly config: GeminiConfig) {
    this.ai = new GoogleGenAI({ apiKey: config.apiKey });
  }

  async generate(request: StructuredGenerationRequest): Promise<StructuredGenerationResult> {
    const { settings } = request;
    const response = await this.ai.models.generateContent({
      model: this.config.model,
      contents: [...request.documents.flatMap(toParts), { text: request.instruction }],
      config: {
        responseMimeType: 'application/json',
        responseJsonSchema: request.responseSchema,
        temperature: settings.temperature,
        topP: settings.topP,
        topK: settings.topK,
        thinkingConfig: {
          thinkingBudget: settings.reasoningBudgetTokens
        }
      }
    });

    return {
      text: response.text ?? null,
      usage: readUsage(response)
    };
  }
}
