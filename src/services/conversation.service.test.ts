import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AI_MESSAGES, CHAT_MESSAGES, REGISTRATION_MESSAGES } from '../constants/messages.js';
import type { User } from '../domain/user.js';
import { createMessagingFake, createReplyGeneratorFake } from '../../test/helpers/fakes.js';
import {
  InMemoryChatHistoryRepository,
  InMemoryRegistrationRepository,
  InMemoryUserRepository,
} from '../../test/helpers/in-memory-repositories.js';
import { ConversationService } from './conversation.service.js';
import { RegistrationService } from './registration.service.js';

const NOW = new Date('2026-03-01T10:00:00.000Z');
const clock = () => NOW;
const IN_ONE_HOUR = new Date(NOW.getTime() + 3_600_000);

describe('ConversationService', () => {
  let users: InMemoryUserRepository;
  let chatHistory: InMemoryChatHistoryRepository;
  let registrations: InMemoryRegistrationRepository;
  let messaging: ReturnType<typeof createMessagingFake>;
  let replyGenerator: ReturnType<typeof createReplyGeneratorFake>;
  let service: ConversationService;
  let user: User;

  function buildService(historyLimit?: number): ConversationService {
    return new ConversationService({
      registrationService: new RegistrationService(registrations, users),
      chatHistory,
      replyGenerator,
      messaging,
      historyLimit,
    });
  }

  beforeEach(async () => {
    users = new InMemoryUserRepository(clock);
    chatHistory = new InMemoryChatHistoryRepository(clock);
    registrations = new InMemoryRegistrationRepository(clock);
    messaging = createMessagingFake();
    replyGenerator = createReplyGeneratorFake('Hi there!');
    service = buildService();
    user = await users.ensurePending({ lineUserId: 'U-test-1', displayName: 'Somchai' });
  });

  describe('chat', () => {
    it('stores the user turn then the assistant turn and replies with the generated text', async () => {
      const outcome = await service.handleText(user, 'hello', 'reply-token-1');

      expect(outcome).toEqual({ kind: 'chat', reply: 'Hi there!', delivered: true });
      expect(replyGenerator.generateReply).toHaveBeenCalledWith('hello', []);
      expect(chatHistory.records.map((r) => [r.role, r.content])).toEqual([
        ['user', 'hello'],
        ['assistant', 'Hi there!'],
      ]);
      expect(messaging.replyText).toHaveBeenCalledWith('reply-token-1', 'Hi there!');
    });

    it('passes prior turns oldest first and bounded by the history limit', async () => {
      await chatHistory.append('U-test-1', 'user', 'a');
      await chatHistory.append('U-test-1', 'assistant', 'b');
      await chatHistory.append('U-test-1', 'user', 'c');
      await chatHistory.append('U-test-2', 'user', 'other user');
      service = buildService(2);

      await service.handleText(user, 'd', 'reply-token-1');

      const history = replyGenerator.generateReply.mock.calls[0]?.[1] ?? [];
      expect(history.map((turn) => turn.content)).toEqual(['b', 'c']);
    });

    it('stores the apology when the generator falls back', async () => {
      replyGenerator.generateReply.mockResolvedValueOnce(AI_MESSAGES.CONNECTION_ERROR);

      await service.handleText(user, 'hello', 'reply-token-1');

      expect(chatHistory.records.map((r) => r.content)).toEqual(['hello', AI_MESSAGES.CONNECTION_ERROR]);
      expect(messaging.replyText).toHaveBeenCalledWith('reply-token-1', AI_MESSAGES.CONNECTION_ERROR);
    });

    it('keeps the stored turns when the reply cannot be delivered', async () => {
      messaging.replyText.mockResolvedValueOnce(false);

      const outcome = await service.handleText(user, 'hello', 'reply-token-1');

      expect(outcome).toEqual({ kind: 'chat', reply: 'Hi there!', delivered: false });
      expect(chatHistory.records).toHaveLength(2);
    });
  });

  describe('registration codes', () => {
    it('claims a matching code without touching chat history', async () => {
      registrations.seed({ code: '4821', status: 'pending', expiresAt: IN_ONE_HOUR, shopId: 'shop-42', shopName: 'Noodle House' });

      const outcome = await service.handleText(user, ' 4821 ', 'reply-token-1');

      expect(outcome.kind).toBe('registered');
      expect(messaging.replyText).toHaveBeenCalledWith(
        'reply-token-1',
        'ลงทะเบียนสำเร็จ! 🎉\n\nคุณ Somchai ได้เชื่อมต่อกับร้าน Noodle House เรียบร้อยแล้ว'
      );
      expect(replyGenerator.generateReply).not.toHaveBeenCalled();
      expect(chatHistory.writes).toBe(0);
      expect(registrations.records[0]?.lineDisplayName).toBe('Somchai');
    });

    it('confirms the claim even when marking the user registered fails', async () => {
      registrations.seed({ code: '4821', status: 'pending', expiresAt: IN_ONE_HOUR, shopId: 'shop-42', shopName: 'Noodle House' });
      vi.spyOn(users, 'markRegistered').mockRejectedValueOnce(new Error('write conflict'));

      const outcome = await service.handleText(user, '4821', 'reply-token-1');

      expect(outcome.kind).toBe('registered');
      expect(messaging.replyText).toHaveBeenCalledTimes(1);
      expect(messaging.replyText).toHaveBeenCalledWith(
        'reply-token-1',
        REGISTRATION_MESSAGES.SUCCESS('Noodle House', 'Somchai')
      );
      expect(chatHistory.writes).toBe(0);
    });

    it('uses the default name and shop id when names are missing', async () => {
      registrations.seed({ code: '4821', status: 'pending', expiresAt: IN_ONE_HOUR, shopId: 'shop-42' });
      const anonymous = await users.ensurePending({ lineUserId: 'U-anon' });

      await service.handleText(anonymous, '4821', 'reply-token-1');

      expect(messaging.replyText).toHaveBeenCalledWith(
        'reply-token-1',
        REGISTRATION_MESSAGES.SUCCESS('shop-42', 'คุณ')
      );
    });

    it('treats an unmatched code as ordinary chat', async () => {
      const outcome = await service.handleText(user, '9999', 'reply-token-1');

      expect(outcome).toEqual({ kind: 'chat', reply: 'Hi there!', delivered: true });
      expect(replyGenerator.generateReply).toHaveBeenCalledWith('9999', []);
      expect(chatHistory.records.map((r) => [r.role, r.content])).toEqual([
        ['user', '9999'],
        ['assistant', 'Hi there!'],
      ]);
    });

    it('treats an expired code as ordinary chat', async () => {
      registrations.seed({ code: '4821', status: 'pending', expiresAt: NOW, shopId: 'shop-42' });

      const outcome = await service.handleText(user, '4821', 'reply-token-1');

      expect(outcome.kind).toBe('chat');
      expect((await users.findByLineUserId('U-test-1'))?.status).toBe('pending');
    });
  });

  describe('/clear', () => {
    it('deletes the history and reports the count', async () => {
      await chatHistory.append('U-test-1', 'user', 'a');
      await chatHistory.append('U-test-1', 'assistant', 'b');
      await chatHistory.append('U-test-1', 'user', 'c');

      const outcome = await service.handleText(user, '/clear', 'reply-token-1');

      expect(outcome).toEqual({ kind: 'cleared', deleted: 3, delivered: true });
      expect(messaging.replyText).toHaveBeenCalledWith('reply-token-1', 'ลบประวัติแชท 3 ข้อความแล้ว');
      await expect(chatHistory.recent('U-test-1', 10)).resolves.toEqual([]);
      expect(replyGenerator.generateReply).not.toHaveBeenCalled();
    });

    it('ignores case and surrounding whitespace', async () => {
      const outcome = await service.handleText(user, '  /CLEAR ', 'reply-token-1');

      expect(outcome).toEqual({ kind: 'cleared', deleted: 0, delivered: true });
      expect(messaging.replyText).toHaveBeenCalledWith('reply-token-1', CHAT_MESSAGES.HISTORY_CLEARED(0));
    });

    it('only clears the sender history', async () => {
      await chatHistory.append('U-test-2', 'user', 'keep me');

      await service.handleText(user, '/clear', 'reply-token-1');

      expect(chatHistory.records.map((r) => r.content)).toEqual(['keep me']);
    });
  });

  it('replies with instructions and the user id for the register keyword', async () => {
    const outcome = await service.handleText(user, 'ลงทะเบียน', 'reply-token-1');

    expect(outcome).toEqual({ kind: 'registration-info', delivered: true });
    expect(messaging.replyText).toHaveBeenCalledWith('reply-token-1', [
      REGISTRATION_MESSAGES.INSTRUCTIONS,
      'U-test-1',
    ]);
    expect(chatHistory.writes).toBe(0);
  });

  it('handleUnsupported replies with the fixed text and stores nothing', async () => {
    const outcome = await service.handleUnsupported('reply-token-1');

    expect(outcome).toEqual({ kind: 'unsupported', delivered: true });
    expect(messaging.replyText).toHaveBeenCalledWith(
      'reply-token-1',
      'ขออภัย ตอนนี้รองรับเฉพาะข้อความตัวอักษรเท่านั้น'
    );
    expect(chatHistory.writes).toBe(0);
  });

  it('welcome greets the user by name', async () => {
    const outcome = await service.welcome(user, 'reply-token-1');

    expect(outcome).toEqual({ kind: 'welcomed', delivered: true });
    expect(messaging.replyText).toHaveBeenCalledWith('reply-token-1', CHAT_MESSAGES.WELCOME('Somchai'));
    expect(chatHistory.writes).toBe(0);
  });
});
