import { TradeAnalysisResult } from '../types';

export type MessageCategory = 'win_rate' | 'improvement' | 'strengths' | 'default';

// Порядок важен: побеждает первая совпавшая категория
const CATEGORY_KEYWORDS: ReadonlyArray<[MessageCategory, readonly string[]]> = [
  ['win_rate', ['win rate', 'winning', 'success rate']],
  ['improvement', ['improve', 'better', 'enhance', 'increase', 'boost']],
  ['strengths', ['strength', 'good at', 'excel', 'positive']],
];

export type CoachTemplate = (a: TemplateFields) => string;

export interface TemplateFields {
  winRate: string;
  avgPnl: string;
  strategies: string;
  strengths: string;
  weaknesses: string;
  suggestions: string;
  topSuggestion: string;
}

export const COACH_TEMPLATES: Readonly<Record<MessageCategory, readonly CoachTemplate[]>> = {
  win_rate: [
    (a) => `Your current win rate is ${a.winRate}. ${a.topSuggestion}`,
    (a) => `You're winning ${a.winRate} of your trades with an average P&L of ${a.avgPnl}. Review your losing trades to see what they have in common.`,
    (a) => `A ${a.winRate} win rate tells part of the story. Combined with an average P&L of ${a.avgPnl}, focus on: ${a.suggestions}`,
  ],
  improvement: [
    (a) => `To improve, start here: ${a.suggestions}`,
    (a) => `Areas to work on: ${a.weaknesses}. My suggestions: ${a.suggestions}`,
    (a) => `With a ${a.winRate} win rate and ${a.avgPnl} average P&L, the next step is: ${a.topSuggestion}`,
  ],
  strengths: [
    (a) => `Here's what you do well: ${a.strengths}. Keep building on it.`,
    (a) => `Your strengths so far: ${a.strengths}. Strategies in use: ${a.strategies}.`,
  ],
  default: [
    (a) => `Looking at your trades: win rate ${a.winRate}, average P&L ${a.avgPnl}. Strengths: ${a.strengths}. Weaknesses: ${a.weaknesses}.`,
    (a) => `I can help with your win rate, your strengths, or how to improve. Right now your average P&L is ${a.avgPnl} across strategies: ${a.strategies}.`,
    (a) => `Your win rate is ${a.winRate}. One thing to consider: ${a.topSuggestion}`,
  ],
};

export function classifyMessage(message: string): MessageCategory {
  const text = message.toLowerCase();
  for (const [category, keywords] of CATEGORY_KEYWORDS) {
    if (keywords.some((k) => text.includes(k))) return category;
  }
  return 'default';
}

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

export function formatCurrency(value: number): string {
  const abs = Math.abs(value).toFixed(2);
  return value < 0 && abs !== '0.00' ? `-$${abs}` : `$${abs}`;
}

export function toTemplateFields(analysis: TradeAnalysisResult): TemplateFields {
  return {
    winRate: formatPercent(analysis.winRate),
    avgPnl: formatCurrency(analysis.avgProfitLoss),
    strategies: analysis.strategies.join(', '),
    strengths: analysis.strengths.join(', '),
    weaknesses: analysis.weaknesses.join(', '),
    suggestions: analysis.suggestions.join(', '),
    topSuggestion: analysis.suggestions[0] || '',
  };
}
