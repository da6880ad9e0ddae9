import { Server } from 'http';
import { createApp } from '../src/app';
import { TemplateCoach } from '../src/services/coach.service';
import { TradeRepository } from '../src/repositories/trade.repo';
import { HttpError } from '../src/middleware/error.middleware';
import { NO_MESSAGE_REPLY } from '../src/controllers/coach.controller';
import { ONBOARDING_SUGGESTION } from '../src/utils/trade-analysis';
import type { TradeRecord } from '../src/types';

class FakeTradeRepository implements TradeRepository {
  public calls: string[] = [];

  constructor(private readonly byUser: Record<string, TradeRecord[]>) {}

  async findByUserId(userId: string): Promise<TradeRecord[]> {
    this.calls.push(userId);
    if (userId === 'broken') {
      throw new HttpError(500, 'permission denied', { upstreamStatus: 401 });
    }
    return this.byUser[userId] || [];
  }
}

describe('HTTP API', () => {
  const trades = new FakeTradeRepository({
    u1: [{ pnl: 10 }, { pnl: -5 }, { pnl: 20 }],
  });
  let server: Server;
  let baseUrl = '';

  beforeAll(async () => {
    const app = createApp({ trades, coach: new TemplateCoach(() => 0) });
    server = await new Promise<Server>((resolve) => {
      const s = app.listen(0, () => resolve(s));
    });
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server is not listening on a port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  beforeEach(() => {
    trades.calls = [];
  });

  async function call(path: string, init?: { method: string; body: unknown }) {
    const res = await fetch(`${baseUrl}${path}`, {
      method: init?.method || 'GET',
      headers: init ? { 'Content-Type': 'application/json' } : undefined,
      body: init ? JSON.stringify(init.body) : undefined,
    });
    const body: unknown = await res.json();
    return { status: res.status, body };
  }

  test('GET /health', async () => {
    const { status, body } = await call('/health');
    expect(status).toBe(200);
    expect(body).toMatchObject({ status: 'healthy' });
  });

  test('GET /api/trade-analysis returns the snake_case analysis', async () => {
    const { status, body } = await call('/api/trade-analysis?user_id=u1');
    expect(status).toBe(200);
    expect(body).toEqual({
      win_rate: expect.closeTo(2 / 3, 10),
      avg_profit_loss: expect.closeTo(25 / 3, 10),
      strategies: [],
      strengths: ['Above 50% win rate', 'Positive average P&L'],
      weaknesses: [],
      suggestions: ['Consider exploring more trading strategies to diversify your approach'],
    });
    expect(trades.calls).toEqual(['u1']);
  });

  test('GET /api/trade-analysis for a user without trades', async () => {
    const { status, body } = await call('/api/trade-analysis?user_id=nobody');
    expect(status).toBe(200);
    expect(body).toMatchObject({ win_rate: 0, avg_profit_loss: 0, suggestions: [ONBOARDING_SUGGESTION] });
  });

  test('GET /api/trade-analysis requires user_id', async () => {
    const { status, body } = await call('/api/trade-analysis');
    expect(status).toBe(400);
    expect(body).toEqual({
      success: false,
      error: 'Validation failed',
      errors: { user_id: 'user_id is required' },
    });
    expect(trades.calls).toEqual([]);
  });

  test('store failures surface as server errors with context', async () => {
    const { status, body } = await call('/api/trade-analysis?user_id=broken');
    expect(status).toBe(500);
    expect(body).toEqual({
      status: 'error',
      statusCode: 500,
      message: 'Error analyzing trades: permission denied',
      upstreamStatus: 401,
    });
  });

  test('POST /api/chat answers the last user message', async () => {
    const { status, body } = await call('/api/chat', {
      method: 'POST',
      body: {
        user_id: 'u1',
        messages: [
          { role: 'user', content: "What's my win rate?" },
          { role: 'assistant', content: 'Let me check.' },
        ],
      },
    });
    expect(status).toBe(200);
    expect(body).toMatchObject({
      response: 'Your current win rate is 66.7%. Consider exploring more trading strategies to diversify your approach',
      analysis: { win_rate: expect.closeTo(2 / 3, 10), strategies: [] },
    });
  });

  test('POST /api/chat without a user message skips the store', async () => {
    const { status, body } = await call('/api/chat', {
      method: 'POST',
      body: { user_id: 'u1', messages: [{ role: 'assistant', content: 'Hi there' }] },
    });
    expect(status).toBe(200);
    expect(body).toEqual({ response: NO_MESSAGE_REPLY });
    expect(trades.calls).toEqual([]);
  });

  test('POST /api/chat validates message roles', async () => {
    const { status, body } = await call('/api/chat', {
      method: 'POST',
      body: { user_id: 'u1', messages: [{ role: 'system', content: 'x' }] },
    });
    expect(status).toBe(400);
    expect(body).toMatchObject({
      errors: { 'messages[0].role': 'messages[*].role must be one of: user | assistant' },
    });
  });

  test('POST /api/chat store failure', async () => {
    const { status, body } = await call('/api/chat', {
      method: 'POST',
      body: { user_id: 'broken', messages: [{ role: 'user', content: 'hi' }] },
    });
    expect(status).toBe(500);
    expect(body).toMatchObject({ message: 'Error processing chat: permission denied' });
  });

  test('malformed JSON bodies are client errors', async () => {
    const res = await fetch(`${baseUrl}/api/chat`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"user_id": "u1", "messages": [',
    });
    const body: unknown = await res.json();
    expect(res.status).toBe(400);
    expect(body).toMatchObject({ status: 'error', statusCode: 400 });
    expect(trades.calls).toEqual([]);
  });

  test('unknown routes return 404', async () => {
    const { status, body } = await call('/api/unknown');
    expect(status).toBe(404);
    expect(body).toMatchObject({ statusCode: 404, message: 'Not Found - /api/unknown' });
  });
});
