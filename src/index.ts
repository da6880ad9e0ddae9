import config from './config';
import logger, { errorMessage } from './utils/logger';
import { createApp } from './app';
import { SupabaseTradeRepository } from './repositories/trade.repo';
import { createCoach } from './services/coach.service';
import { GeminiService } from './services/gemini.service';

if (config.coach.invalidStrategy) {
  logger.warn(`Unknown COACH_STRATEGY '${config.coach.invalidStrategy}', using 'template'`);
}

const coach = createCoach(config.coach.strategy, {
  generator: () => new GeminiService(),
  maxOutputTokens: config.coach.maxOutputTokens,
});

const app = createApp({
  trades: new SupabaseTradeRepository(),
  coach,
});

// Запуск сервера
const server = app.listen(config.server.port, () => {
  logger.info(`Server is running on port ${config.server.port}`, { coachStrategy: coach.strategy });
});

// Обработка непредвиденных ошибок
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection', { reason: errorMessage(reason) });
});

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
  process.exit(1);
});

// Обработка завершения работы
const shutdown = (signal: string) => {
  logger.info(`${signal} received. Shutting down gracefully`);
  server.close(() => {
    logger.info('Process terminated');
    process.exit(0);
  });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
