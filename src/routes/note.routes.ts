import express from 'express';
import { AuthRequest, requireUser } from '../middleware/auth.middleware';
import type { NoteService } from '../services/note.service';
import { idParamSchema } from '../validators/common';
import { createNoteSchema, noteListQuerySchema, patchNoteSchema, replaceNoteSchema } from '../validators/notes';

export const createNoteRouter = (noteService: NoteService) => {
  const router = express.Router();

  router.get('/', async (req: AuthRequest, res, next) => {
    try {
      const filters = noteListQuerySchema.parse(req.query);
      const notes = await noteService.getNotes(requireUser(req).id, filters);
      res.json(notes);
    } catch (error) {
      next(error);
    }
  });

  router.post('/', async (req: AuthRequest, res, next) => {
    try {
      const noteData = createNoteSchema.parse(req.body);
      const note = await noteService.createNote(requireUser(req).id, noteData);
      res.status(201).json(note);
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', async (req: AuthRequest, res, next) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const note = await noteService.getNote(id, requireUser(req).id);
      res.json(note);
    } catch (error) {
      next(error);
    }
  });

  router.put('/:id', async (req: AuthRequest, res, next) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const updateData = replaceNoteSchema.parse(req.body);
      const note = await noteService.updateNote(id, requireUser(req).id, updateData);
      res.json(note);
    } catch (error) {
      next(error);
    }
  });

  router.patch('/:id', async (req: AuthRequest, res, next) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const updateData = patchNoteSchema.parse(req.body);
      const note = await noteService.updateNote(id, requireUser(req).id, updateData);
      res.json(note);
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id', async (req: AuthRequest, res, next) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      await noteService.deleteNote(id, requireUser(req).id);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/summarize', async (req: AuthRequest, res, next) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const summary = await noteService.summarizeNote(id, requireUser(req).id);
      res.json(summary);
    } catch (error) {
      next(error);
    }
  });

  return router;
};
