import express, { Router } from 'express';
import { authenticate, currentUser } from '../middleware/auth.js';
import { handle } from '../middleware/errorHandler.js';
import { imageUpload } from '../middleware/upload.js';
import {
  createRecipe,
  deleteRecipe,
  getRecipeDetail,
  listRecipes,
  updateRecipe,
} from '../services/recipeService.js';
import { parseIdList, parseRouteId } from '../utils/query.js';
import type { AppContext, UpdateMode } from '../types.js';

export function createRecipesRouter(ctx: AppContext): Router {
  const router = Router();
  const upload = imageUpload(ctx.config.maxUploadBytes);

  router.use(authenticate(ctx.db));
  router.use(express.json({ limit: ctx.config.jsonBodyLimit }));

  /**
   * GET /api/recipes
   * Query: tags, ingredients (comma-separated ids)
   */
  router.get('/', handle(async (req, res) => {
    res.json(await listRecipes(ctx, currentUser(req), {
      tagIds: parseIdList(req.query.tags, 'tags'),
      ingredientIds: parseIdList(req.query.ingredients, 'ingredients'),
    }));
  }));

  /**
   * POST /api/recipes
   * JSON, or multipart with an `image` file part
   */
  router.post('/', upload, handle(async (req, res) => {
    res.status(201).json(await createRecipe(ctx, currentUser(req), req.body, req.file));
  }));

  router.get('/:id', handle(async (req, res) => {
    res.json(await getRecipeDetail(ctx, currentUser(req), parseRouteId(req.params.id)));
  }));

  const update = (mode: UpdateMode) => handle(async (req, res) => {
    res.json(await updateRecipe(ctx, currentUser(req), parseRouteId(req.params.id), req.body, mode, req.file));
  });
  router.put('/:id', upload, update('full'));
  router.patch('/:id', upload, update('partial'));

  router.delete('/:id', handle(async (req, res) => {
    await deleteRecipe(ctx, currentUser(req), parseRouteId(req.params.id));
    res.status(204).end();
  }));

  return router;
}
