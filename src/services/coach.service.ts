import config, { CoachStrategy } from '../config';
import logger, { errorMessage } from '../utils/logger';
import { TextGenerator, TradeAnalysisResult } from '../types';
import { COACH_TEMPLATES, classifyMessage, toTemplateFields } from '../utils/coach-templates';
import { buildCoachPrompt, extractAdvice } from '../utils/coach-prompt';

export const COACH_UNAVAILABLE_REPLY =
  "I'm having trouble analyzing your trades right now. Please try again later.";

/** Returns a number in [0, 1), like Math.random. */
export type RandomSource = () => number;

export interface Coach {
  readonly strategy: CoachStrategy;
  /** Never rejects. */
  respond(userMessage: string, analysis: TradeAnalysisResult): Promise<string>;
}

export function pickIndex(length: number, random: RandomSource): number {
  const i = Math.floor(random() * length);
  return Math.min(Math.max(i, 0), length - 1);
}

export class TemplateCoach implements Coach {
  public readonly strategy = 'template';

  constructor(private readonly random: RandomSource = Math.random) {}

  public async respond(userMessage: string, analysis: TradeAnalysisResult): Promise<string> {
    try {
      const category = classifyMessage(userMessage);
      const templates = COACH_TEMPLATES[category];
      const template = templates[pickIndex(templates.length, this.random)];
      return template(toTemplateFields(analysis));
    } catch (error) {
      logger.error('Template coach failed', { error: errorMessage(error) });
      return COACH_UNAVAILABLE_REPLY;
    }
  }
}

export class GenerativeCoach implements Coach {
  public readonly strategy = 'generative';

  constructor(
    private readonly generator: TextGenerator,
    private readonly maxOutputTokens: number = config.coach.maxOutputTokens
  ) {}

  public async respond(userMessage: string, analysis: TradeAnalysisResult): Promise<string> {
    try {
      if (!this.generator.isReady()) {
        return COACH_UNAVAILABLE_REPLY;
      }
      const prompt = buildCoachPrompt(userMessage, analysis);
      const generated = await this.generator.generate(prompt, { maxOutputTokens: this.maxOutputTokens });
      return extractAdvice(generated);
    } catch (error) {
      logger.error('Error generating coach response', { error: errorMessage(error) });
      return COACH_UNAVAILABLE_REPLY;
    }
  }
}

export interface CoachDeps {
  random?: RandomSource;
  /** Ленивая фабрика: Gemini создаётся только для генеративной стратегии. */
  generator?: () => TextGenerator;
  maxOutputTokens?: number;
}

export function createCoach(strategy: CoachStrategy, deps: CoachDeps = {}): Coach {
  if (strategy === 'generative') {
    if (!deps.generator) {
      throw new Error('Generative coach requires a text generator');
    }
    return new GenerativeCoach(deps.generator(), deps.maxOutputTokens);
  }
  return new TemplateCoach(deps.random);
}
