import type { EmotionAnalysis } from '../entities';

export interface ClassifierCallOptions {
  signal?: AbortSignal;
}

export interface ClassifyImageRequest extends ClassifierCallOptions {
  /** JPEG bytes, already prepared for upload */
  image: Buffer;
  voiceTone?: string | null;
  transcript?: string | null;
}

export interface ClassifyDescriptionRequest extends ClassifierCallOptions {
  faceDescription: string;
  voiceTone?: string | null;
  transcript?: string | null;
}

export interface IEmotionClassifier {
  classifyImage(request: ClassifyImageRequest): Promise<EmotionAnalysis>;
  classifyDescription(request: ClassifyDescriptionRequest): Promise<EmotionAnalysis>;
  generateInsights(summaryLines: readonly string[], options?: ClassifierCallOptions): Promise<string[]>;
}
