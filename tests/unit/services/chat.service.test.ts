import { describe, it, expect } from 'vitest';
import { AIServiceUnavailableError, NotFoundError, ValidationError } from '../../../src/errors/appErrors';
import { renderConversation } from '../../../src/services/chatContext';
import { ScriptedProvider, createTestServices, longText, seedUser } from '../../helpers/fakes';

describe('ChatService', () => {
  it('gives new chats a dated default title', async () => {
    const services = createTestServices();
    const user = await seedUser(services);

    const chat = await services.chats.createChat(user.id);

    expect(chat.title).toMatch(/^Chat \d{4}-\d{2}-\d{2} \d{2}:\d{2}$/);
    expect(chat.message_count).toBe(0);
  });

  describe('addMessage', () => {
    it('summarizes the conversation when the count reaches the threshold', async () => {
      const services = createTestServices();
      const user = await seedUser(services);
      const chat = await services.chats.createChat(user.id, { title: 'Study' });

      let count = 0;
      for (let i = 1; i <= 10; i++) {
        const added = await services.chats.addMessage(chat.id, user.id, {
          role: i % 2 === 1 ? 'user' : 'assistant',
          content: `Message ${i}`,
        });
        count = added.message_count;
      }

      const stored = await services.chats.getChat(chat.id, user.id);
      expect(count).toBe(10);
      expect(stored.message_count).toBe(10);
      expect(stored.summary).toBe('Scripted reply.');
      expect(stored.context_summary).toBe('Scripted reply.');
      expect(services.provider.requests).toHaveLength(1);
      expect(services.provider.requests[0].messages[0].content).toContain('approximately 250 words');
      expect(services.provider.requests[0].messages[0].content).toContain('USER: Message 1\n\nASSISTANT: Message 2');
    });

    it('keeps the message when the threshold summary cannot reach the provider', async () => {
      const services = createTestServices({ provider: ScriptedProvider.failing(), summaryThreshold: 3 });
      const user = await seedUser(services);
      const chat = await services.chats.createChat(user.id, { title: 'Offline' });

      for (let i = 1; i <= 3; i++) {
        await services.chats.addMessage(chat.id, user.id, { role: 'user', content: `Entry number ${i} covers what happened during the day` });
      }

      const messages = await services.chats.getMessages(chat.id, user.id);
      const stored = await services.chats.getChat(chat.id, user.id);
      expect(messages).toHaveLength(3);
      expect(stored.message_count).toBe(3);
      expect(stored.summary).toBe(renderConversation(messages));
    });

    it('rejects blank content', async () => {
      const services = createTestServices();
      const user = await seedUser(services);
      const chat = await services.chats.createChat(user.id);

      await expect(services.chats.addMessage(chat.id, user.id, { role: 'user', content: '  ' }))
        .rejects.toBeInstanceOf(ValidationError);
      expect(services.store.messages.size).toBe(0);
    });
  });

  describe('getAIResponse', () => {
    it('stores the user message and the reply', async () => {
      const services = createTestServices({ provider: new ScriptedProvider(['Hi! How can I help?']) });
      const user = await seedUser(services);
      const chat = await services.chats.createChat(user.id, { title: 'Help' });

      const result = await services.chats.getAIResponse(chat.id, user.id, 'Hello there');

      expect(result).toEqual({ response: 'Hi! How can I help?', chat_id: chat.id, message_count: 2 });
      expect(services.provider.requests[0].messages).toEqual([{ role: 'user', content: 'Hello there' }]);
      const messages = await services.chats.getMessages(chat.id, user.id);
      expect(messages.map((m) => [m.role, m.content])).toEqual([
        ['user', 'Hello there'],
        ['assistant', 'Hi! How can I help?'],
      ]);
    });

    it('sends the summary, the last twenty messages and the new message', async () => {
      const provider = new ScriptedProvider(['Earlier topics.', 'Answer.']);
      const services = createTestServices({ provider, summaryThreshold: 1000 });
      const user = await seedUser(services);
      const chat = await services.chats.createChat(user.id, { title: 'Long' });
      for (let i = 1; i <= 25; i++) {
        await services.chats.addMessage(chat.id, user.id, { role: 'user', content: `Message ${i}` });
      }
      await services.chats.updateSummary(chat.id, user.id);

      await services.chats.getAIResponse(chat.id, user.id, 'What next?');

      const sent = provider.requests[1].messages;
      expect(sent).toHaveLength(22);
      expect(sent[0]).toEqual({ role: 'system', content: 'Previous conversation summary: Earlier topics.' });
      expect(sent[1]).toEqual({ role: 'user', content: 'Message 6' });
      expect(sent[20]).toEqual({ role: 'user', content: 'Message 25' });
      expect(sent[21]).toEqual({ role: 'user', content: 'What next?' });
    });

    it('sends only the new message when context is off', async () => {
      const services = createTestServices();
      const user = await seedUser(services);
      const chat = await services.chats.createChat(user.id);
      await services.chats.addMessage(chat.id, user.id, { role: 'user', content: 'Earlier message' });

      await services.chats.getAIResponse(chat.id, user.id, 'Fresh question', false);

      expect(services.provider.requests[0].messages).toEqual([{ role: 'user', content: 'Fresh question' }]);
    });

    it('stores nothing when the provider fails', async () => {
      const services = createTestServices({ provider: ScriptedProvider.failing() });
      const user = await seedUser(services);
      const chat = await services.chats.createChat(user.id);

      const error = await services.chats.getAIResponse(chat.id, user.id, 'Hello?').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AIServiceUnavailableError);
      expect(error).toMatchObject({ message: 'Failed to generate AI response', details: 'provider down' });
      expect(services.store.messages.size).toBe(0);
      expect((await services.chats.getChat(chat.id, user.id)).message_count).toBe(0);
    });
  });

  describe('getContext', () => {
    it('previews the list a turn would send without calling the provider', async () => {
      const services = createTestServices();
      const user = await seedUser(services);
      const chat = await services.chats.createChat(user.id);
      await services.chats.addMessage(chat.id, user.id, { role: 'user', content: 'First' });
      await services.chats.addMessage(chat.id, user.id, { role: 'assistant', content: 'Second' });

      const view = await services.chats.getContext(chat.id, user.id, 'Third');

      expect(view).toEqual({
        chat_id: chat.id,
        context: [
          { role: 'user', content: 'First' },
          { role: 'assistant', content: 'Second' },
          { role: 'user', content: 'Third' },
        ],
        summary: null,
        message_count: 2,
      });
      expect(services.provider.requests).toHaveLength(0);
    });
  });

  describe('updateSummary', () => {
    it('raises provider failures and leaves the chat as it was', async () => {
      const services = createTestServices({ provider: ScriptedProvider.failing() });
      const user = await seedUser(services);
      const chat = await services.chats.createChat(user.id);
      await services.chats.addMessage(chat.id, user.id, { role: 'user', content: longText(3) });

      await expect(services.chats.updateSummary(chat.id, user.id)).rejects.toBeInstanceOf(AIServiceUnavailableError);

      const stored = await services.chats.getChat(chat.id, user.id);
      expect(stored.summary).toBeNull();
      expect(stored.context_summary).toBeNull();
    });

    it('leaves an empty chat alone', async () => {
      const services = createTestServices();
      const user = await seedUser(services);
      const chat = await services.chats.createChat(user.id);

      const updated = await services.chats.updateSummary(chat.id, user.id);

      expect(updated.summary).toBeNull();
      expect(services.provider.requests).toHaveLength(0);
    });
  });

  describe('summarizeMessage', () => {
    it('stores a summary on the message', async () => {
      const services = createTestServices({ provider: new ScriptedProvider(['Short version.']) });
      const user = await seedUser(services);
      const chat = await services.chats.createChat(user.id);
      const { message } = await services.chats.addMessage(chat.id, user.id, { role: 'assistant', content: longText(3) });

      const result = await services.chats.summarizeMessage(chat.id, user.id, message.id);

      expect(result).toEqual({ message_id: message.id, summary: 'Short version.' });
      expect(services.provider.requests[0].messages[0].content).toContain('approximately 50 words');
      expect(services.store.messages.get(message.id)?.summary).toBe('Short version.');
    });

    it('reports an unknown message', async () => {
      const services = createTestServices();
      const user = await seedUser(services);
      const chat = await services.chats.createChat(user.id);

      await expect(services.chats.summarizeMessage(chat.id, user.id, 9999)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  it('counts messages and estimated tokens', async () => {
    const services = createTestServices();
    const user = await seedUser(services);
    const chat = await services.chats.createChat(user.id);
    await services.chats.addMessage(chat.id, user.id, { role: 'user', content: 'abcd' });
    await services.chats.addMessage(chat.id, user.id, { role: 'assistant', content: 'abcdefghi' });

    const stats = await services.chats.getStatistics(chat.id, user.id);

    expect(stats).toMatchObject({
      total_messages: 2,
      user_messages: 1,
      assistant_messages: 1,
      total_tokens: 4,
    });
    expect(stats.last_message_at).not.toBeNull();
  });

  it('finds chats by message content', async () => {
    const services = createTestServices();
    const user = await seedUser(services);
    const physics = await services.chats.createChat(user.id, { title: 'Physics' });
    await services.chats.createChat(user.id, { title: 'Cooking' });
    await services.chats.addMessage(physics.id, user.id, { role: 'user', content: 'Explain quantum tunnelling' });

    const found = await services.chats.getChats(user.id, 'QUANTUM');

    expect(found.map((chat) => chat.title)).toEqual(['Physics']);
  });

  it('hides chats owned by someone else', async () => {
    const services = createTestServices();
    const alice = await seedUser(services, 'alice');
    const bob = await seedUser(services, 'bob');
    const chat = await services.chats.createChat(alice.id);

    await expect(services.chats.getChat(chat.id, bob.id)).rejects.toBeInstanceOf(NotFoundError);
    await expect(services.chats.deleteChat(chat.id, bob.id)).rejects.toBeInstanceOf(NotFoundError);
  });
});
