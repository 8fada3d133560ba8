import type { EmotionAnalysis } from '../../domains/entities';
import { createEmotionAnalysis, createEmotionScore } from '../../domains/entities';
import type {
  ClassifierCallOptions,
  ClassifyDescriptionRequest,
  ClassifyImageRequest,
  IEmotionClassifier,
} from '../../domains/ports';
import { ClassifierError } from '../../application/errors';

export interface MockEmotionClassifierOptions {
  analysis?: EmotionAnalysis;
  insights?: string[];
  failWith?: Error;
}

/**
 * Deterministic offline classifier. Used when no API key is configured and in tests.
 */
export class MockEmotionClassifier implements IEmotionClassifier {
  analysis: EmotionAnalysis | undefined;
  insights: string[];
  failWith: Error | undefined;

  readonly imageRequests: ClassifyImageRequest[] = [];
  readonly descriptionRequests: ClassifyDescriptionRequest[] = [];
  readonly insightRequests: string[][] = [];

  constructor(options: MockEmotionClassifierOptions = {}) {
    this.analysis = options.analysis;
    this.insights = options.insights ?? [];
    this.failWith = options.failWith;
  }

  async classifyImage(request: ClassifyImageRequest): Promise<EmotionAnalysis> {
    this.imageRequests.push(request);
    return this.respond('Mock insight - image analysis', request.transcript);
  }

  async classifyDescription(request: ClassifyDescriptionRequest): Promise<EmotionAnalysis> {
    this.descriptionRequests.push(request);
    return this.respond('Mock insight - text analysis', request.transcript);
  }

  async generateInsights(summaryLines: readonly string[], _options?: ClassifierCallOptions): Promise<string[]> {
    this.insightRequests.push([...summaryLines]);
    if (this.failWith) throw this.failWith;
    return this.insights.length > 0 ? [...this.insights] : ['Mock insight 1', 'Mock insight 2'];
  }

  private respond(narrative: string, transcript?: string | null): EmotionAnalysis {
    if (this.failWith) throw this.failWith;
    if (this.analysis) return this.analysis;
    return createEmotionAnalysis({
      scores: [createEmotionScore('happy', 0.8), createEmotionScore('calm', 0.6)],
      narrative,
      voiceTranscript: transcript ?? null,
    });
  }

  static failing(message = 'Mock error'): MockEmotionClassifier {
    return new MockEmotionClassifier({ failWith: ClassifierError.apiError(message) });
  }
}
