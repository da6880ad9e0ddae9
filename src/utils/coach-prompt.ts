import { TradeAnalysisResult } from '../types';
import { formatPercent } from './coach-templates';

export const ADVICE_MARKER = 'Your helpful advice:';
export const MIN_ADVICE_CHARS = 10;

export const SHORT_ADVICE_FALLBACK =
  'Based on your trading performance, I recommend focusing on consistency and keeping detailed trade notes to identify patterns.';

function listOr(items: readonly string[], empty: string): string {
  return items.length ? items.join(', ') : empty;
}

export function buildCoachPrompt(userMessage: string, analysis: TradeAnalysisResult): string {
  return `
You are a professional trading coach giving advice to a trader.
The trader's performance:
- Win rate: ${formatPercent(analysis.winRate)}
- Average P&L: $${analysis.avgProfitLoss.toFixed(2)}
- Strategies used: ${listOr(analysis.strategies, 'None recorded')}
- Strengths: ${listOr(analysis.strengths, 'None identified')}
- Weaknesses: ${listOr(analysis.weaknesses, 'None identified')}

The trader asks: "${userMessage}"

${ADVICE_MARKER}
`;
}

/**
 * Текст после маркера инструкции. Модели, которые повторяют промпт, и модели,
 * которые отвечают только продолжением, обрабатываются одинаково.
 */
export function extractAdvice(generated: string | undefined | null): string {
  const advice = (generated || '').split(ADVICE_MARKER).pop()?.trim() || '';
  if (advice.length < MIN_ADVICE_CHARS) return SHORT_ADVICE_FALLBACK;
  return advice;
}
