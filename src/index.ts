import dotenv from 'dotenv';
dotenv.config();

import { createApp } from './app';
import { createSupabaseAnonClient, createSupabaseClient } from './config/database';
import { loadConfig, missingCredentials } from './config/env';
import { createOpenAIClient } from './config/openai';
import { SupabaseChatRepository } from './repositories/chat.repository';
import { SupabaseNoteRepository } from './repositories/note.repository';
import { SupabaseTagRepository } from './repositories/tag.repository';
import { SupabaseUserRepository } from './repositories/user.repository';
import { SupabaseAuthProvider } from './services/auth.provider';
import { AuthService } from './services/auth.service';
import { ChatService } from './services/chat.service';
import { OpenAICompletionProvider } from './services/completion.provider';
import { NoteService } from './services/note.service';
import { OpenAIService } from './services/openai.service';
import { TagService } from './services/tag.service';
import { logger } from './utils/logger';

const config = loadConfig();

const missing = missingCredentials(config);
for (const name of missing) {
  logger.warn(`${name} not set`);
}
if (missing.some((name) => name.startsWith('SUPABASE_'))) {
  logger.error('Supabase credentials are required to start the server');
  process.exit(1);
}

const db = createSupabaseClient(config);
const ai = new OpenAIService(config.ai, new OpenAICompletionProvider(createOpenAIClient(config.ai)));
const tagRepository = new SupabaseTagRepository(db);

const app = createApp(config, {
  auth: new AuthService(
    new SupabaseAuthProvider(db, createSupabaseAnonClient(config)),
    new SupabaseUserRepository(db)
  ),
  notes: new NoteService(new SupabaseNoteRepository(db), tagRepository, ai),
  tags: new TagService(tagRepository),
  chats: new ChatService(new SupabaseChatRepository(db), ai, {
    contextWindow: config.chat.contextWindow,
    summaryThreshold: config.chat.summaryThreshold,
  }),
});

app.listen(config.server.port, () => {
  logger.info('SmartNotes API listening', {
    port: config.server.port,
    environment: config.server.nodeEnv,
    model: config.ai.model,
  });
});

export default app;
