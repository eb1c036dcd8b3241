import { describe, it, expect } from 'vitest';
import { TypedEventEmitter, type AppEvents } from '../../src/shared/events.js';

describe('TypedEventEmitter', () => {
  it('delivers typed payloads to every listener', () => {
    const events = new TypedEventEmitter();
    const stored: Array<AppEvents['candidate:stored']> = [];
    const digests: number[] = [];

    events.on('candidate:stored', (payload) => stored.push(payload));
    events.on('digest:sent', ({ items }) => digests.push(items));

    expect(events.emit('candidate:stored', { link: 'https://quests.test/c/orbit', verdict: 'clean', rankScore: 62.5 })).toBe(true);
    expect(events.emit('digest:sent', { items: 3 })).toBe(true);

    expect(stored).toEqual([{ link: 'https://quests.test/c/orbit', verdict: 'clean', rankScore: 62.5 }]);
    expect(digests).toEqual([3]);
  });

  it('runs a once listener a single time and keeps instances apart', () => {
    const events = new TypedEventEmitter();
    const other = new TypedEventEmitter();
    const seen: string[] = [];

    events.once('source:failed', ({ source }) => seen.push(source));
    events.emit('source:failed', { source: 'quest-platform', error: 'timeout' });
    events.emit('source:failed', { source: 'quest-platform', error: 'timeout' });
    other.emit('source:failed', { source: 'other', error: 'timeout' });

    expect(seen).toEqual(['quest-platform']);
    expect(events.listenerCount('source:failed')).toBe(0);
  });
});
