import { Router } from 'express';
import { body, query } from 'express-validator';
import { CoachController } from '../controllers/coach.controller';
import { validate } from '../middleware/validation.middleware';

export function createCoachRoutes(controller: CoachController): Router {
  const router = Router();

  // Статистика по сделкам пользователя
  router.get(
    '/trade-analysis',
    [query('user_id', 'user_id is required').isString().trim().notEmpty()],
    validate,
    controller.getTradeAnalysis
  );

  // Чат с тренером
  router.post(
    '/chat',
    [
      body('user_id', 'user_id is required').isString().trim().notEmpty(),
      body('messages').isArray().withMessage('messages must be an array'),
      body('messages.*.role')
        .isIn(['user', 'assistant'])
        .withMessage("messages[*].role must be one of: user | assistant"),
      body('messages.*.content').isString().withMessage('messages[*].content must be a string'),
    ],
    validate,
    controller.chat
  );

  return router;
}

export default createCoachRoutes;
