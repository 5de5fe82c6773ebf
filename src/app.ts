import express, { type Express } from 'express';
import cors from 'cors';
import { errorHandler, notFound } from './middleware/errorHandler.js';
import { createIngredientsRouter } from './routes/ingredients.js';
import { createRecipesRouter } from './routes/recipes.js';
import { createTagsRouter } from './routes/tags.js';
import { createUserRouter } from './routes/user.js';
import type { AppContext } from './types.js';

export function createApp(ctx: AppContext): Express {
  const app = express();

  // Middleware
  app.use(cors(ctx.config.corsOrigin ? { origin: ctx.config.corsOrigin } : undefined));

  // Uploaded images
  app.use(ctx.config.mediaUrl.replace(/\/+$/, '') || '/', express.static(ctx.config.mediaRoot));

  // Routes
  app.use('/api/user', createUserRouter(ctx));
  app.use('/api/tags', createTagsRouter(ctx));
  app.use('/api/ingredients', createIngredientsRouter(ctx));
  app.use('/api/recipes', createRecipesRouter(ctx));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
