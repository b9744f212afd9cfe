import { describe, it, expect } from 'vitest';
import { EvidenceHintService, buildEvidenceHint, findNearbyEvidence, remainingEvidence } from './evidence-hints';
import { InMemorySessionStore } from './session-store';
import { makeEvidence, makeSession, metersNorth, NOW, ORIGIN } from '../testing/fixtures';

describe('buildEvidenceHint', () => {
  it('adds a line about the kind of place', () => {
    const hint = buildEvidenceHint(makeEvidence({ poiName: 'Riverside Park', poiType: 'Park' }));
    expect(hint).toEqual({
      evidenceId: 'ev-ticket',
      hint: 'Try looking near Riverside Park. A green spot where you can feel nature around you.',
      discovered: false,
      poiName: 'Riverside Park',
      poiType: 'Park',
      hintPenalty: 5,
    });
  });

  it('names only the place for other categories', () => {
    expect(buildEvidenceHint(makeEvidence()).hint).toBe('Try looking near Central Library.');
  });
});

describe('remainingEvidence', () => {
  it('leaves out discovered evidence', () => {
    const session = makeSession({ discoveredEvidence: ['ev-glove'] });
    expect(remainingEvidence(session).map((ev) => ev.evidenceId)).toEqual(['ev-ticket', 'ev-letter']);
  });
});

describe('findNearbyEvidence', () => {
  it('lists undiscovered evidence within the game radius, closest first', () => {
    const nearby = findNearbyEvidence(makeSession(), metersNorth(20));

    expect(nearby.map((ev) => ev.evidenceId)).toEqual(['ev-glove', 'ev-ticket']);
    expect(nearby[0].distanceMeters).toBeCloseTo(10, 6);
    expect(nearby[1].distanceMeters).toBeCloseTo(20, 6);
    expect(nearby[0]).toMatchObject({ name: 'Muddy glove', poiName: 'Old Station', poiType: 'station' });
  });

  it('skips evidence already found', () => {
    const session = makeSession({ discoveredEvidence: ['ev-glove'] });
    expect(findNearbyEvidence(session, metersNorth(20)).map((ev) => ev.evidenceId)).toEqual(['ev-ticket']);
  });

  it('uses the radius from the game rules', () => {
    const session = makeSession({ rules: { discoveryRadiusMeters: 15, hintEnabled: true } });
    expect(findNearbyEvidence(session, ORIGIN).map((ev) => ev.evidenceId)).toEqual(['ev-ticket']);
  });
});

describe('EvidenceHintService', () => {
  it('returns a hint and counts it', async () => {
    const sessions = new InMemorySessionStore([makeSession()]);
    const service = new EvidenceHintService(sessions, undefined, () => NOW);

    const result = await service.requestHint('game-1', 'ev-glove');

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.hint.hint).toBe('Try looking near Old Station. A busy transport hub where crowds pass through.');
    }
    const stored = await sessions.get('game-1');
    expect(stored?.hintsUsed).toBe(1);
    expect(stored?.updatedAt).toBe('2026-03-01T12:00:00.000Z');
  });

  it('does not count hints for evidence already found', async () => {
    const sessions = new InMemorySessionStore([makeSession({ discoveredEvidence: ['ev-ticket'] })]);
    const service = new EvidenceHintService(sessions);

    const result = await service.requestHint('game-1', 'ev-ticket');

    expect(result).toEqual({
      ok: true,
      hint: { evidenceId: 'ev-ticket', hint: 'This evidence has already been discovered.', discovered: true },
    });
    expect((await sessions.get('game-1'))?.hintsUsed).toBe(0);
  });

  it('refuses when hints are disabled', async () => {
    const session = makeSession({ rules: { discoveryRadiusMeters: 50, hintEnabled: false } });
    const service = new EvidenceHintService(new InMemorySessionStore([session]));

    expect(await service.requestHint('game-1', 'ev-glove')).toEqual({
      ok: false,
      code: 'HintsDisabled',
      message: 'Hints are disabled for this game.',
    });
  });

  it('refuses in a finished game even for evidence already found', async () => {
    const session = makeSession({ status: 'completed', discoveredEvidence: ['ev-ticket'] });
    const service = new EvidenceHintService(new InMemorySessionStore([session]));

    expect(await service.requestHint('game-1', 'ev-ticket')).toEqual({
      ok: false,
      code: 'GameNotActive',
      message: 'This game is no longer active (status: completed).',
    });
  });

  it('refuses in a finished game', async () => {
    const service = new EvidenceHintService(new InMemorySessionStore([makeSession({ status: 'expired' })]));
    const result = await service.requestHint('game-1', 'ev-glove');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.code).toBe('GameNotActive');
  });

  it('reports unknown games and evidence', async () => {
    const service = new EvidenceHintService(new InMemorySessionStore([makeSession()]));

    const noGame = await service.requestHint('game-404', 'ev-glove');
    const noEvidence = await service.requestHint('game-1', 'ev-missing');

    expect(noGame).toEqual({ ok: false, code: 'GameNotFound', message: 'Game "game-404" was not found.' });
    expect(noEvidence).toEqual({
      ok: false,
      code: 'NotFound',
      message: 'Evidence "ev-missing" was not found in this game.',
    });
  });
});
