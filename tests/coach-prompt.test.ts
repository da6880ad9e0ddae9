import { buildCoachPrompt, extractAdvice, SHORT_ADVICE_FALLBACK } from '../src/utils/coach-prompt';
import { analyzeTrades, emptyAnalysis } from '../src/utils/trade-analysis';

describe('buildCoachPrompt', () => {
  test('embeds analysis fields and the question', () => {
    const analysis = analyzeTrades([
      { pnl: 10, tradeType: 'scalp' },
      { pnl: -5, tradeType: 'swing' },
      { pnl: 20 },
    ]);
    const prompt = buildCoachPrompt('How am I doing?', analysis);
    expect(prompt).toContain('- Win rate: 66.7%');
    expect(prompt).toContain('- Average P&L: $8.33');
    expect(prompt).toContain('- Strategies used: scalp, swing');
    expect(prompt).toContain('- Strengths: Above 50% win rate, Positive average P&L');
    expect(prompt).toContain('- Weaknesses: None identified');
    expect(prompt).toContain('The trader asks: "How am I doing?"');
    expect(prompt.endsWith('Your helpful advice:\n')).toBe(true);
  });

  test('uses placeholders for empty lists', () => {
    const prompt = buildCoachPrompt('hi', emptyAnalysis());
    expect(prompt).toContain('- Win rate: 0.0%');
    expect(prompt).toContain('- Average P&L: $0.00');
    expect(prompt).toContain('- Strategies used: None recorded');
    expect(prompt).toContain('- Strengths: None identified');
  });
});

describe('extractAdvice', () => {
  test('returns text after the last marker', () => {
    const text = 'prompt... Your helpful advice: echo Your helpful advice:  Cut losers faster.  ';
    expect(extractAdvice(text)).toBe('Cut losers faster.');
  });

  test('returns the whole reply when the model does not echo the prompt', () => {
    expect(extractAdvice('  Size down after two losses in a row. ')).toBe('Size down after two losses in a row.');
  });

  test('falls back on missing or short advice', () => {
    expect(extractAdvice(undefined)).toBe(SHORT_ADVICE_FALLBACK);
    expect(extractAdvice('')).toBe(SHORT_ADVICE_FALLBACK);
    expect(extractAdvice('Your helpful advice:   short ')).toBe(SHORT_ADVICE_FALLBACK);
  });
});
