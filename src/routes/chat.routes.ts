import express from 'express';
import { AuthRequest, requireUser } from '../middleware/auth.middleware';
import type { ChatService } from '../services/chat.service';
import { addMessageSchema, aiResponseSchema, contextQuerySchema, createChatSchema, renameChatSchema } from '../validators/chats';
import { idParamSchema, messageParamSchema, searchQuerySchema } from '../validators/common';

export const createChatRouter = (chatService: ChatService) => {
  const router = express.Router();

  router.get('/', async (req: AuthRequest, res, next) => {
    try {
      const { search } = searchQuerySchema.parse(req.query);
      const chats = await chatService.getChats(requireUser(req).id, search);
      res.json(chats);
    } catch (error) {
      next(error);
    }
  });

  router.post('/', async (req: AuthRequest, res, next) => {
    try {
      const chatData = createChatSchema.parse(req.body ?? {});
      const chat = await chatService.createChat(requireUser(req).id, chatData);
      res.status(201).json(chat);
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', async (req: AuthRequest, res, next) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const chat = await chatService.getChatDetail(id, requireUser(req).id);
      res.json(chat);
    } catch (error) {
      next(error);
    }
  });

  router.patch('/:id', async (req: AuthRequest, res, next) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const { title } = renameChatSchema.parse(req.body);
      const chat = await chatService.renameChat(id, requireUser(req).id, title);
      res.json(chat);
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id', async (req: AuthRequest, res, next) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      await chatService.deleteChat(id, requireUser(req).id);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id/messages', async (req: AuthRequest, res, next) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const messages = await chatService.getMessages(id, requireUser(req).id);
      res.json(messages);
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/messages', async (req: AuthRequest, res, next) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const messageData = addMessageSchema.parse(req.body);
      const result = await chatService.addMessage(id, requireUser(req).id, messageData);
      res.status(201).json(result);
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/messages/:messageId/summarize', async (req: AuthRequest, res, next) => {
    try {
      const { id, messageId } = messageParamSchema.parse(req.params);
      const result = await chatService.summarizeMessage(id, requireUser(req).id, messageId);
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/ai_response', async (req: AuthRequest, res, next) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const { message, use_context } = aiResponseSchema.parse(req.body);
      const result = await chatService.getAIResponse(id, requireUser(req).id, message, use_context);
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/update_summary', async (req: AuthRequest, res, next) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const chat = await chatService.updateSummary(id, requireUser(req).id);
      res.json(chat);
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id/context', async (req: AuthRequest, res, next) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const { message } = contextQuerySchema.parse(req.query);
      const context = await chatService.getContext(id, requireUser(req).id, message);
      res.json(context);
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id/statistics', async (req: AuthRequest, res, next) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const statistics = await chatService.getStatistics(id, requireUser(req).id);
      res.json(statistics);
    } catch (error) {
      next(error);
    }
  });

  return router;
};
