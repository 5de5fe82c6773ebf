import express, { Router } from 'express';
import { authenticate, currentUser } from '../middleware/auth.js';
import { handle } from '../middleware/errorHandler.js';
import { createTag, deleteTag, getTag, listTags, updateTag } from '../services/tagService.js';
import { parseFlag, parseRouteId } from '../utils/query.js';
import type { AppContext, UpdateMode } from '../types.js';

export function createTagsRouter({ config, db }: AppContext): Router {
  const router = Router();

  router.use(authenticate(db));
  router.use(express.json({ limit: config.jsonBodyLimit }));

  /**
   * GET /api/tags
   * Query: assigned_only, name
   */
  router.get('/', handle(async (req, res) => {
    const name = typeof req.query.name === 'string' ? req.query.name.trim() : '';
    res.json(await listTags(db, currentUser(req), {
      assignedOnly: parseFlag(req.query.assigned_only),
      name: name || undefined,
    }));
  }));

  router.post('/', handle(async (req, res) => {
    res.status(201).json(await createTag(db, currentUser(req), req.body));
  }));

  router.get('/:id', handle(async (req, res) => {
    res.json(await getTag(db, currentUser(req), parseRouteId(req.params.id)));
  }));

  const update = (mode: UpdateMode) => handle(async (req, res) => {
    res.json(await updateTag(db, currentUser(req), parseRouteId(req.params.id), req.body, mode));
  });
  router.put('/:id', update('full'));
  router.patch('/:id', update('partial'));

  router.delete('/:id', handle(async (req, res) => {
    await deleteTag(db, currentUser(req), parseRouteId(req.params.id));
    res.status(204).end();
  }));

  return router;
}
