import express, { Router } from 'express';
import { authenticate, currentUser } from '../middleware/auth.js';
import { handle } from '../middleware/errorHandler.js';
import {
  createIngredient,
  deleteIngredient,
  getIngredient,
  listIngredients,
  updateIngredient,
} from '../services/ingredientService.js';
import { parseFlag, parseRouteId } from '../utils/query.js';
import type { AppContext, UpdateMode } from '../types.js';

export function createIngredientsRouter({ config, db }: AppContext): Router {
  const router = Router();

  router.use(authenticate(db));
  router.use(express.json({ limit: config.jsonBodyLimit }));

  /**
   * GET /api/ingredients
   * Query: assigned_only, name
   */
  router.get('/', handle(async (req, res) => {
    const name = typeof req.query.name === 'string' ? req.query.name.trim() : '';
    res.json(await listIngredients(db, currentUser(req), {
      assignedOnly: parseFlag(req.query.assigned_only),
      name: name || undefined,
    }));
  }));

  router.post('/', handle(async (req, res) => {
    res.status(201).json(await createIngredient(db, currentUser(req), req.body));
  }));

  router.get('/:id', handle(async (req, res) => {
    res.json(await getIngredient(db, currentUser(req), parseRouteId(req.params.id)));
  }));

  const update = (mode: UpdateMode) => handle(async (req, res) => {
    res.json(await updateIngredient(db, currentUser(req), parseRouteId(req.params.id), req.body, mode));
  });
  router.put('/:id', update('full'));
  router.patch('/:id', update('partial'));

  router.delete('/:id', handle(async (req, res) => {
    await deleteIngredient(db, currentUser(req), parseRouteId(req.params.id));
    res.status(204).end();
  }));

  return router;
}
