import express from 'express';
import { AuthRequest, requireUser } from '../middleware/auth.middleware';
import type { TagService } from '../services/tag.service';
import { idParamSchema } from '../validators/common';
import { createTagSchema } from '../validators/notes';

export const createTagRouter = (tagService: TagService) => {
  const router = express.Router();

  router.get('/', async (req: AuthRequest, res, next) => {
    try {
      const tags = await tagService.getTags(requireUser(req).id);
      res.json(tags);
    } catch (error) {
      next(error);
    }
  });

  router.post('/', async (req: AuthRequest, res, next) => {
    try {
      const { name } = createTagSchema.parse(req.body);
      const tag = await tagService.createTag(requireUser(req).id, name);
      res.status(201).json(tag);
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id', async (req: AuthRequest, res, next) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      await tagService.deleteTag(id, requireUser(req).id);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
};
