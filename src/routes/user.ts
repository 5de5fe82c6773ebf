import express, { Router } from 'express';
import { authenticate, currentUser } from '../middleware/auth.js';
import { handle } from '../middleware/errorHandler.js';
import { getProfile, obtainToken, registerUser, updateProfile } from '../services/userService.js';
import type { AppContext, UpdateMode } from '../types.js';

export function createUserRouter({ config, db }: AppContext): Router {
  const router = Router();
  const json = express.json({ limit: config.jsonBodyLimit });

  /**
   * POST /api/user/create
   * Register a new user
   */
  router.post('/create', json, handle(async (req, res) => {
    res.status(201).json(await registerUser(db, req.body, config.bcryptRounds));
  }));

  /**
   * POST /api/user/token
   * Exchange email and password for an auth token
   */
  router.post('/token', json, handle(async (req, res) => {
    res.json(await obtainToken(db, req.body));
  }));

  // Everything below requires a token
  const me = Router();
  me.use(authenticate(db));
  me.use(json);

  me.get('/', handle((req, res) => {
    res.json(getProfile(currentUser(req)));
  }));

  const update = (mode: UpdateMode) => handle(async (req, res) => {
    res.json(await updateProfile(db, currentUser(req), req.body, mode, config.bcryptRounds));
  });
  me.put('/', update('full'));
  me.patch('/', update('partial'));

  router.use('/me', me);
  return router;
}
