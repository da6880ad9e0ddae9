import { TradeAnalysisResponse, TradeAnalysisResult, TradeRecord, TradeRow } from '../types';

export const ONBOARDING_SUGGESTION = 'Start recording your trades to get personalized analysis.';

const EMOTION_KEYWORDS = ['emotion', 'fear', 'greed'];
const PLANNING_KEYWORD = 'plan';

function toNumber(n: unknown): number {
  if (typeof n !== 'number' && typeof n !== 'string') return 0;
  if (typeof n === 'string' && n.trim() === '') return 0;
  const x = Number(n);
  return Number.isFinite(x) ? x : 0;
}

function toText(v: unknown): string | undefined {
  return typeof v === 'string' ? v : undefined;
}

function freeze(result: {
  winRate: number;
  avgProfitLoss: number;
  strategies: string[];
  strengths: string[];
  weaknesses: string[];
  suggestions: string[];
}): TradeAnalysisResult {
  return Object.freeze({
    winRate: result.winRate,
    avgProfitLoss: result.avgProfitLoss,
    strategies: Object.freeze(result.strategies),
    strengths: Object.freeze(result.strengths),
    weaknesses: Object.freeze(result.weaknesses),
    suggestions: Object.freeze(result.suggestions),
  });
}

export function toTradeRecord(row: TradeRow): TradeRecord {
  return {
    pnl: toNumber(row.pnl),
    tradeType: toText(row.trade_type),
    notes: toText(row.notes),
  };
}

export function emptyAnalysis(): TradeAnalysisResult {
  return freeze({
    winRate: 0,
    avgProfitLoss: 0,
    strategies: [],
    strengths: [],
    weaknesses: [],
    suggestions: [ONBOARDING_SUGGESTION],
  });
}

export function uniqueStrategies(trades: readonly TradeRecord[]): string[] {
  const seen = new Set<string>();
  for (const t of trades) {
    const label = (t.tradeType || '').trim();
    if (label) seen.add(label);
  }
  return Array.from(seen);
}

/**
 * Descriptive statistics plus rule-based strengths/weaknesses/suggestions.
 * Keyword checks are plain substring tests on the lower-cased notes, so "explanation" counts as "plan".
 */
export function analyzeTrades(trades: readonly TradeRecord[]): TradeAnalysisResult {
  if (trades.length === 0) return emptyAnalysis();

  const count = trades.length;
  const wins = trades.filter((t) => t.pnl > 0).length;
  const totalPnl = trades.reduce((sum, t) => sum + t.pnl, 0);
  const winRate = wins / count;
  const avgProfitLoss = totalPnl / count;
  const strategies = uniqueStrategies(trades);

  const strengths: string[] = [];
  const weaknesses: string[] = [];
  const suggestions: string[] = [];

  if (winRate > 0.5) {
    strengths.push('Above 50% win rate');
  } else {
    weaknesses.push('Below 50% win rate');
    suggestions.push('Focus on improving your win rate by reviewing losing trades');
  }

  if (avgProfitLoss > 0) {
    strengths.push('Positive average P&L');
  } else {
    weaknesses.push('Negative average P&L');
    suggestions.push('Work on improving your average profit per trade');
  }

  if (strategies.length > 2) {
    strengths.push(`Diverse trading approaches (${strategies.length} different strategies)`);
  } else {
    suggestions.push('Consider exploring more trading strategies to diversify your approach');
  }

  const notes = trades
    .map((t) => t.notes || '')
    .filter(Boolean)
    .join(' ')
    .toLowerCase();

  if (notes) {
    if (EMOTION_KEYWORDS.some((k) => notes.includes(k))) {
      weaknesses.push('Emotional trading noted in multiple trades');
      suggestions.push('Work on emotional discipline during trading');
    }
    if (notes.includes(PLANNING_KEYWORD)) {
      strengths.push('Evidence of trade planning in notes');
    }
  }

  return freeze({ winRate, avgProfitLoss, strategies, strengths, weaknesses, suggestions });
}

export function serializeAnalysis(result: TradeAnalysisResult): TradeAnalysisResponse {
  return {
    win_rate: result.winRate,
    avg_profit_loss: result.avgProfitLoss,
    strategies: [...result.strategies],
    strengths: [...result.strengths],
    weaknesses: [...result.weaknesses],
    suggestions: [...result.suggestions],
  };
}
