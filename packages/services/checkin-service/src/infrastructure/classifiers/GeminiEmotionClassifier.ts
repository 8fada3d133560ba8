/**
 * Gemini Emotion Classifier
 *
 * Calls the Generative Language `generateContent` endpoint with a selfie or a
 * face description and validates the model's JSON answer.
 * Requests are never retried; the caller decides whether to try again.
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import type { z } from 'zod';
import {
  ClassifierResponseSchema,
  GenerateContentErrorSchema,
  GenerateContentResponseSchema,
  InsightsResponseSchema,
} from '@moodlens/shared-contracts';
import { DEFAULT_GEMINI_BASE_URL, DEFAULT_GEMINI_MODEL, getLogger } from '../../config/service-config';
import type { EmotionAnalysis } from '../../domains/entities';
import type {
  ClassifierCallOptions,
  ClassifyDescriptionRequest,
  ClassifyImageRequest,
  IEmotionClassifier,
} from '../../domains/ports';
import { ClassifierError } from '../../application/errors';
import { buildDescriptionPrompt, buildImagePrompt, buildInsightsPrompt } from './prompts';
import { parseModelJson, toEmotionAnalysis } from './response-parsing';

const logger = getLogger('gemini-emotion-classifier');

export const GENERATION_CONFIG = {
  temperature: 0.7,
  topK: 40,
  topP: 0.95,
  maxOutputTokens: 1024,
} as const;

type GeminiPart = { text: string } | { inline_data: { mime_type: string; data: string } };

export type GeminiHttpClient = Pick<AxiosInstance, 'post'>;

export interface GeminiClassifierConfig {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  timeoutMs?: number;
  httpClient?: GeminiHttpClient;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class GeminiEmotionClassifier implements IEmotionClassifier {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly endpoint: string;
  private readonly http: GeminiHttpClient;

  constructor(config: GeminiClassifierConfig) {
    if (!config.apiKey.trim()) {
      throw ClassifierError.invalidApiKey();
    }
    this.apiKey = config.apiKey;
    this.model = config.model ?? DEFAULT_GEMINI_MODEL;
    const baseUrl = (config.baseUrl ?? DEFAULT_GEMINI_BASE_URL).replace(/\/+$/, '');
    this.endpoint = `${baseUrl}/models/${this.model}:generateContent`;
    this.http =
      config.httpClient ??
      axios.create({
        timeout: config.timeoutMs ?? 30000,
        headers: { 'Content-Type': 'application/json' },
      });
  }

  async classifyImage(request: ClassifyImageRequest): Promise<EmotionAnalysis> {
    const parts: GeminiPart[] = [
      { inline_data: { mime_type: 'image/jpeg', data: request.image.toString('base64') } },
      { text: buildImagePrompt(request) },
    ];
    const response = await this.generate(parts, ClassifierResponseSchema, request.signal);
    return toEmotionAnalysis(response, request.transcript);
  }

  async classifyDescription(request: ClassifyDescriptionRequest): Promise<EmotionAnalysis> {
    const parts: GeminiPart[] = [{ text: buildDescriptionPrompt(request.faceDescription, request) }];
    const response = await this.generate(parts, ClassifierResponseSchema, request.signal);
    return toEmotionAnalysis(response, request.transcript);
  }

  async generateInsights(summaryLines: readonly string[], options: ClassifierCallOptions = {}): Promise<string[]> {
    const parts: GeminiPart[] = [{ text: buildInsightsPrompt(summaryLines) }];
    const response = await this.generate(parts, InsightsResponseSchema, options.signal);
    return response.insights;
  }

  private async generate<T>(parts: GeminiPart[], schema: z.ZodType<T>, signal?: AbortSignal): Promise<T> {
    const body = {
      contents: [{ parts }],
      generationConfig: GENERATION_CONFIG,
    };

    const startTime = Date.now();
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>(this.endpoint, body, {
        params: { key: this.apiKey },
        signal,
        responseType: 'json',
        validateStatus: () => true,
      });
    } catch (error) {
      if (axios.isCancel(error) || signal?.aborted) {
        throw ClassifierError.cancelled(toError(error));
      }
      logger.warn('Gemini request failed before a response', { model: this.model, error: toError(error).message });
      throw ClassifierError.networkError(toError(error));
    }

    logger.debug('Gemini response received', {
      model: this.model,
      status: response.status,
      durationMs: Date.now() - startTime,
    });

    if (response.status === 429) {
      throw ClassifierError.rateLimited();
    }
    if (response.status === 401 || response.status === 403) {
      throw ClassifierError.invalidApiKey();
    }
    if (response.status !== 200) {
      const apiError = GenerateContentErrorSchema.safeParse(response.data);
      const message = apiError.success ? apiError.data.error.message : `HTTP ${response.status}`;
      logger.warn('Gemini returned an error status', { model: this.model, status: response.status, message });
      throw ClassifierError.apiError(message, undefined, response.status);
    }

    const envelope = GenerateContentResponseSchema.safeParse(response.data);
    if (!envelope.success) {
      throw ClassifierError.decodeError(new Error(envelope.error.issues.map(issue => issue.message).join('; ')));
    }

    const text = envelope.data.candidates[0]?.content.parts[0]?.text;
    if (!text) {
      throw ClassifierError.invalidResponse('first candidate has no text');
    }

    return parseModelJson(text, schema);
  }
}
