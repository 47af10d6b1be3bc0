import type {
  StructuredGenerationClient,
  StructuredGenerationRequest,
  StructuredGenerationResult
} from './gemini.client.js';

type MockReply = StructuredGenerationResult | Error;

// In-process stand-in for the Gemini client: replays queued replies and records requests
export class MockGenerationClient implements StructuredGenerationClient {
  readonly requests: StructuredGenerationRequest[] = [];
  private readonly replies: MockReply[] = [];

  replyWith(text: string | null) {
    this.replies.push({
      text,
      usage: { inputTokens: 1200, outputTokens: 3400, reasoningTokens: 560, totalTokens: 5160 }
    });
    return this;
  }

  replyWithJson(payload: unknown) {
    return this.replyWith(JSON.stringify(payload));
  }

  failWith(error: Error) {
    this.replies.push(error);
    return this;
  }

  async generate(request: StructuredGenerationRequest): Promise<StructuredGenerationResult> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (!reply) {
      throw new Error('MockGenerationClient has no reply queued');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}
