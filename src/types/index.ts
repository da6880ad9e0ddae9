// Общие типы

// Сделка в нормализованном виде (строка таблицы trades после toTradeRecord)
export interface TradeRecord {
  pnl: number;
  tradeType?: string;
  notes?: string;
}

// Строка таблицы trades как её отдаёт PostgREST
export interface TradeRow {
  user_id?: string;
  pnl?: number | string | null;
  trade_type?: string | null;
  notes?: string | null;
  [column: string]: unknown;
}

export interface TradeAnalysisResult {
  readonly winRate: number;
  readonly avgProfitLoss: number;
  readonly strategies: readonly string[];
  readonly strengths: readonly string[];
  readonly weaknesses: readonly string[];
  readonly suggestions: readonly string[];
}

// Формат ответа API (snake_case, как у исходного сервиса)
export interface TradeAnalysisResponse {
  win_rate: number;
  avg_profit_loss: number;
  strategies: string[];
  strengths: string[];
  weaknesses: string[];
  suggestions: string[];
}

export type MessageRole = 'user' | 'assistant';

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

export interface ChatRequestBody {
  messages: ChatMessage[];
  user_id: string;
}

export interface ChatResponseBody {
  response: string;
  analysis?: TradeAnalysisResponse;
}

// Типы для валидации
export type ValidationErrors = Record<string, string>;

// Бэкенд генерации текста (Gemini или любой другой)
export interface GenerateOptions {
  maxOutputTokens: number;
}

export interface TextGenerator {
  isReady(): boolean;
  generate(prompt: string, options: GenerateOptions): Promise<string>;
}
