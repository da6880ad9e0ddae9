import express, { Express } from 'express';
import cors from 'cors';
import config from './config';
import { requestLogger } from './middleware/logging.middleware';
import { errorHandler, notFound } from './middleware/error.middleware';
import { CoachController } from './controllers/coach.controller';
import { createCoachRoutes } from './routes/coach.routes';
import { TradeRepository } from './repositories/trade.repo';
import { Coach } from './services/coach.service';

export interface AppDeps {
  trades: TradeRepository;
  coach: Coach;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.use(
    cors({
      origin: config.cors.origin,
      methods: [...config.cors.methods],
      allowedHeaders: [...config.cors.allowedHeaders],
    })
  );
  app.use(express.json());
  app.use(requestLogger);

  // Проверка работоспособности
  app.get('/health', (req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  const controller = new CoachController(deps.trades, deps.coach);
  app.use('/api', createCoachRoutes(controller));

  app.use(notFound);
  app.use(errorHandler);

  return app;
}

export default createApp;
