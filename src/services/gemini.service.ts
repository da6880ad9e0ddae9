import { GoogleGenerativeAI, GenerateContentRequest, ModelParams } from '@google/generative-ai';
import config from '../config';
import logger, { errorMessage } from '../utils/logger';
import { GenerateOptions, TextGenerator } from '../types';

export interface GeminiSettings {
  apiKey: string;
  model: string;
  fallbackModel: string;
  timeoutMs: number;
}

// Та часть SDK, которой мы пользуемся; GoogleGenerativeAI ей соответствует
export interface ContentModel {
  generateContent(request: GenerateContentRequest): Promise<{ response: { text(): string } }>;
}

export interface ModelProvider {
  getGenerativeModel(params: ModelParams): ContentModel;
}

export class GeminiService implements TextGenerator {
  private genAI?: ModelProvider;
  private model?: ContentModel;

  constructor(
    private readonly settings: GeminiSettings = config.api.gemini,
    provider?: ModelProvider
  ) {
    if (!settings.apiKey && !provider) {
      logger.warn('GEMINI_API_KEY is not set. Generative coaching will use fallback replies.');
      return;
    }

    this.genAI = provider || new GoogleGenerativeAI(settings.apiKey);
    this.model = this.genAI.getGenerativeModel({ model: settings.model });
    logger.info(`Gemini service initialized with model: ${settings.model}`);
  }

  public isReady(): boolean {
    return Boolean(this.model);
  }

  /**
   * Генерирует текст по промпту. Ошибки не глушатся: вызывающая сторона решает, чем их заменить.
   */
  public async generate(prompt: string, options: GenerateOptions): Promise<string> {
    if (!this.genAI || !this.model) {
      throw new Error('Gemini service is not properly initialized');
    }

    try {
      return await this.callModel(this.model, prompt, options);
    } catch (error) {
      logger.error('Error generating text with Gemini', { error: errorMessage(error) });
      const fallback = this.settings.fallbackModel;
      if (!fallback || fallback === this.settings.model) throw error;

      logger.warn(`Retrying with fallback Gemini model: ${fallback}`);
      const altModel = this.genAI.getGenerativeModel({ model: fallback });
      return this.callModel(altModel, prompt, options);
    }
  }

  private async callModel(model: ContentModel, prompt: string, options: GenerateOptions): Promise<string> {
    const timeoutMs = this.settings.timeoutMs || 20000;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`gemini_timeout_${timeoutMs}ms`)), timeoutMs);
    });

    try {
      const work = (async () => {
        const result = await model.generateContent({
          contents: [{ role: 'user', parts: [{ text: prompt }] }],
          generationConfig: { maxOutputTokens: options.maxOutputTokens },
        });
        return result.response.text();
      })();
      return await Promise.race([work, timeout]);
    } finally {
      if (timer) clearTimeout(timer);
    }
  }
}

export default GeminiService;
