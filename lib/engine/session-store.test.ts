import { describe, it, expect } from 'vitest';
import { InMemorySessionStore } from './session-store';
import { makeSession } from '../testing/fixtures';

const ticket = {
  evidenceId: 'ev-ticket',
  evidenceIndex: 0,
  discoveredAt: '2026-03-01T12:00:00.000Z',
  bonusPoints: 75,
};

describe('InMemorySessionStore', () => {
  it('returns null for an unknown game', async () => {
    expect(await new InMemorySessionStore().get('game-404')).toBeNull();
  });

  it('hands out copies', async () => {
    const store = new InMemorySessionStore([makeSession()]);
    const session = await store.get('game-1');
    session?.discoveredEvidence.push('ev-ticket');

    expect((await store.get('game-1'))?.discoveredEvidence).toEqual([]);
  });

  it('records a discovery', async () => {
    const store = new InMemorySessionStore([makeSession({ score: 10 })]);

    expect(await store.recordDiscovery('game-1', ticket)).toBe(true);

    const session = await store.get('game-1');
    expect(session?.discoveredEvidence).toEqual(['ev-ticket']);
    expect(session?.score).toBe(85);
    expect(session?.evidenceList[0].discoveredAt).toBe('2026-03-01T12:00:00.000Z');
    expect(session?.updatedAt).toBe('2026-03-01T12:00:00.000Z');
  });

  it('refuses to record the same discovery twice', async () => {
    const store = new InMemorySessionStore([makeSession()]);

    expect(await store.recordDiscovery('game-1', ticket)).toBe(true);
    expect(await store.recordDiscovery('game-1', ticket)).toBe(false);
    expect((await store.get('game-1'))?.score).toBe(75);
  });

  it('refuses discoveries in missing or finished games', async () => {
    const store = new InMemorySessionStore([makeSession({ status: 'completed' })]);
    expect(await store.recordDiscovery('game-1', ticket)).toBe(false);
    expect(await store.recordDiscovery('game-404', ticket)).toBe(false);
  });

  it('throws when the evidence is not at the given index', async () => {
    const store = new InMemorySessionStore([makeSession()]);
    await expect(store.recordDiscovery('game-1', { ...ticket, evidenceIndex: 1 })).rejects.toThrow(
      'Evidence ev-ticket is not at index 1 in game game-1',
    );
  });

  it('counts hints', async () => {
    const store = new InMemorySessionStore([makeSession({ hintsUsed: 2 })]);
    await store.recordHint('game-1', '2026-03-01T12:05:00.000Z');

    const session = await store.get('game-1');
    expect(session?.hintsUsed).toBe(3);
    expect(session?.updatedAt).toBe('2026-03-01T12:05:00.000Z');
  });

  it('refuses to count a hint for a missing game', async () => {
    await expect(new InMemorySessionStore().recordHint('game-404', '2026-03-01T12:05:00.000Z')).rejects.toThrow(
      'Cannot record hint for game game-404: session not found',
    );
  });
});
