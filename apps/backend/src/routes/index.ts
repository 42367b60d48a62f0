import express, { type NextFunction, type Request, type Response, type Router } from 'express';
import { AssistantController } from '@/controllers/assistantController';

type AsyncRequestHandler = (req: Request, res: Response) => Promise<void>;

export const setupRoutes = (assistantController: AssistantController): Router => {
  const router = express.Router();

  // Surface rejections to express' error handler instead of leaving them unhandled.
  const wrap =
    (handler: AsyncRequestHandler) =>
    (req: Request, res: Response, next: NextFunction): void => {
      handler(req, res).catch(next);
    };

  router.get('/health', wrap(assistantController.health));
  router.post('/search', wrap(assistantController.search));
  router.post('/analyze', wrap(assistantController.analyze));
  router.post('/recommend', wrap(assistantController.recommend));

  return router;
};
