import dotenv from 'dotenv';

dotenv.config();

export type CoachStrategy = 'template' | 'generative';

const COACH_STRATEGIES: readonly CoachStrategy[] = ['template', 'generative'];

function parseStrategy(raw: string | undefined): { strategy: CoachStrategy; invalid?: string } {
  const value = (raw || 'template').trim().toLowerCase();
  const found = COACH_STRATEGIES.find((s) => s === value);
  return found ? { strategy: found } : { strategy: 'template', invalid: value };
}

const coachStrategy = parseStrategy(process.env.COACH_STRATEGY);

const config = {
  // Настройки сервера
  server: {
    port: Number(process.env.PORT || 8000),
    env: process.env.NODE_ENV || 'development',
  },

  // Настройки логгера
  logger: {
    level: process.env.LOG_LEVEL || 'info',
    toFile: String(process.env.LOG_TO_FILE || 'true').toLowerCase() !== 'false',
    file: {
      error: 'logs/error.log',
      combined: 'logs/combined.log',
    },
  },

  // Настройки CORS (как в исходном сервисе: открыт для всех источников)
  cors: {
    origin: process.env.CORS_ORIGIN || '*',
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  },

  // Хранилище сделок
  supabase: {
    url: process.env.SUPABASE_URL || '',
    serviceKey: process.env.SUPABASE_SERVICE_KEY || '',
    tradesTable: process.env.SUPABASE_TRADES_TABLE || 'trades',
  },

  coach: {
    strategy: coachStrategy.strategy,
    invalidStrategy: coachStrategy.invalid,
    maxOutputTokens: Number(process.env.COACH_MAX_OUTPUT_TOKENS || 150),
  },

  api: {
    gemini: {
      apiKey: process.env.GEMINI_API_KEY || process.env.GOOGLE_GEMINI_API_KEY || '',
      model: process.env.GEMINI_MODEL || 'gemini-1.5-flash',
      // Запасная модель, пробуем один раз при ошибке основной
      fallbackModel: process.env.GEMINI_FALLBACK_MODEL || '',
      timeoutMs: Number(process.env.GEMINI_TIMEOUT_MS || 20000),
    },
  },
} as const;

export default config;
