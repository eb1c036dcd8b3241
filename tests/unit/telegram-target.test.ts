import { describe, it, expect, vi } from 'vitest';
import { GrammyError, HttpError } from 'grammy';
import { TelegramTarget, classifyTelegramError } from '../../src/notification/channels/telegram.js';

function apiError(code: number, description: string): GrammyError {
  return new GrammyError(
    `Call to 'sendMessage' failed! (${code}: ${description})`,
    { ok: false, error_code: code, description },
    'sendMessage',
    {},
  );
}

describe('classifyTelegramError', () => {
  it('treats blocked and deleted chats as permanent', () => {
    expect(classifyTelegramError(apiError(403, 'Forbidden: bot was blocked by the user'))).toBe('permanent');
    expect(classifyTelegramError(apiError(400, 'Bad Request: chat not found'))).toBe('permanent');
    expect(classifyTelegramError(apiError(403, 'Forbidden: user is deactivated'))).toBe('permanent');
  });

  it('treats rate limits and server errors as transient', () => {
    expect(classifyTelegramError(apiError(429, 'Too Many Requests: retry after 5'))).toBe('transient');
    expect(classifyTelegramError(apiError(502, 'Bad Gateway'))).toBe('transient');
  });

  it('treats network failures as transient', () => {
    expect(classifyTelegramError(new HttpError('Network request failed', new Error('ECONNRESET')))).toBe(
      'transient',
    );
    expect(classifyTelegramError(new Error('anything'))).toBe('transient');
  });
});

describe('TelegramTarget', () => {
  it('sends plain text with link previews disabled', async () => {
    const sendMessage = vi.fn(async () => ({}));
    const target = new TelegramTarget({ sendMessage });

    expect(await target.send('101', 'hello')).toBe('success');
    expect(sendMessage).toHaveBeenCalledWith('101', 'hello', { link_preview_options: { is_disabled: true } });
  });

  it('reports the failure kind instead of throwing', async () => {
    const blocked = new TelegramTarget({
      sendMessage: async () => {
        throw apiError(403, 'Forbidden: bot was blocked by the user');
      },
    });
    const limited = new TelegramTarget({
      sendMessage: async () => {
        throw apiError(429, 'Too Many Requests: retry after 5');
      },
    });

    expect(await blocked.send('101', 'hello')).toBe('permanent_failure');
    expect(await limited.send('101', 'hello')).toBe('transient_failure');
  });
});
