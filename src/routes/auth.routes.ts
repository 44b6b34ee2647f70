import express, { RequestHandler } from 'express';
import { AuthRequest, requireUser } from '../middleware/auth.middleware';
import type { AuthService } from '../services/auth.service';
import { loginSchema, registerSchema, updateProfileSchema } from '../validators/auth';

export const createAuthRouter = (authService: AuthService, authMiddleware: RequestHandler) => {
  const router = express.Router();

  router.post('/register', async (req, res, next) => {
    try {
      const userData = registerSchema.parse(req.body);
      const user = await authService.register(userData);
      res.status(201).json({
        user,
        message: 'User registered successfully',
      });
    } catch (error) {
      next(error);
    }
  });

  router.post('/login', async (req, res, next) => {
    try {
      const credentials = loginSchema.parse(req.body);
      const result = await authService.login(credentials);
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  router.get('/profile', authMiddleware, async (req: AuthRequest, res, next) => {
    try {
      const user = await authService.getProfile(requireUser(req).id);
      res.json(user);
    } catch (error) {
      next(error);
    }
  });

  router.patch('/profile', authMiddleware, async (req: AuthRequest, res, next) => {
    try {
      const updates = updateProfileSchema.parse(req.body);
      const user = await authService.updateProfile(requireUser(req).id, updates);
      res.json(user);
    } catch (error) {
      next(error);
    }
  });

  return router;
};
