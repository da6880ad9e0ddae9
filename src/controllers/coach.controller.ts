import { Request, Response } from 'express';
import { matchedData } from 'express-validator';
import { BaseController } from './base.controller';
import { TradeRepository } from '../repositories/trade.repo';
import { Coach } from '../services/coach.service';
import { wrapError } from '../middleware/error.middleware';
import { analyzeTrades, serializeAnalysis } from '../utils/trade-analysis';
import logger from '../utils/logger';
import { ChatMessage, ChatRequestBody, ChatResponseBody, TradeAnalysisResponse } from '../types';

export const NO_MESSAGE_REPLY = "I didn't receive a message to respond to.";

export function lastUserMessage(messages: readonly ChatMessage[]): string | undefined {
  for (let i = messages.length - 1; i >= 0; i--) {
    if (messages[i].role === 'user') return messages[i].content;
  }
  return undefined;
}

export class CoachController extends BaseController {
  constructor(
    private readonly trades: TradeRepository,
    private readonly coach: Coach
  ) {
    super();
  }

  // GET /api/trade-analysis?user_id=...
  public getTradeAnalysis = this.asyncHandler(async (req: Request, res: Response) => {
    const { user_id: userId } = matchedData<{ user_id: string }>(req, { locations: ['query'] });
    try {
      const trades = await this.trades.findByUserId(userId);
      const analysis = analyzeTrades(trades);
      logger.info('Trade analysis computed', { userId, trades: trades.length });
      return this.handleSuccess<TradeAnalysisResponse>(res, serializeAnalysis(analysis));
    } catch (error) {
      throw wrapError('Error analyzing trades', error);
    }
  });

  // POST /api/chat
  public chat = this.asyncHandler(async (req: Request, res: Response) => {
    const body = matchedData<ChatRequestBody>(req, { locations: ['body'] });
    try {
      const message = lastUserMessage(body.messages);
      if (!message) {
        return this.handleSuccess<ChatResponseBody>(res, { response: NO_MESSAGE_REPLY });
      }

      const trades = await this.trades.findByUserId(body.user_id);
      const analysis = analyzeTrades(trades);
      const response = await this.coach.respond(message, analysis);
      logger.info('Coach reply generated', {
        userId: body.user_id,
        strategy: this.coach.strategy,
        trades: trades.length,
      });

      return this.handleSuccess<ChatResponseBody>(res, {
        response,
        analysis: serializeAnalysis(analysis),
      });
    } catch (error) {
      throw wrapError('Error processing chat', error);
    }
  });
}
