import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ConditionalCheckFailedException } from '@aws-sdk/client-dynamodb';
import { GetCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import { DynamoSessionStore } from './session-db';
import { makeSession } from '../../testing/fixtures';

const { send } = vi.hoisted(() => ({ send: vi.fn() }));

vi.mock('./db', () => ({ docClient: { send } }));

function conditionFailed() {
  return new ConditionalCheckFailedException({ message: 'The conditional request failed', $metadata: {} });
}

describe('DynamoSessionStore', () => {
  const store = new DynamoSessionStore('Sessions-test');

  beforeEach(() => {
    send.mockReset();
  });

  it('returns null when the game does not exist', async () => {
    send.mockResolvedValueOnce({});

    expect(await store.get('game-404')).toBeNull();

    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(GetCommand);
    expect(command.input).toEqual({ TableName: 'Sessions-test', Key: { gameId: 'game-404' }, ConsistentRead: true });
  });

  it('fills in defaults for fields older items lack', async () => {
    const { gameId, playerId, status, evidenceList, createdAt, updatedAt } = makeSession();
    send.mockResolvedValueOnce({ Item: { gameId, playerId, status, evidenceList, createdAt, updatedAt } });

    const session = await store.get('game-1');

    expect(session?.discoveredEvidence).toEqual([]);
    expect(session?.score).toBe(0);
    expect(session?.hintsUsed).toBe(0);
    expect(session?.rules).toEqual({ discoveryRadiusMeters: 50, hintEnabled: true });
    expect(session).toEqual(makeSession());
  });

  it('throws on an item that is not a session', async () => {
    send.mockResolvedValueOnce({ Item: { gameId: 'game-1', status: 'paused' } });
    await expect(store.get('game-1')).rejects.toThrow(/^Stored session game-1 is malformed/);
  });

  describe('recordDiscovery', () => {
    const record = {
      evidenceId: 'ev-glove',
      evidenceIndex: 1,
      discoveredAt: '2026-03-01T12:00:00.000Z',
      bonusPoints: 36,
    };

    it('writes the discovery as one conditional update', async () => {
      send.mockResolvedValueOnce({});

      expect(await store.recordDiscovery('game-1', record)).toBe(true);

      expect(send).toHaveBeenCalledTimes(1);
      const command = send.mock.calls[0][0];
      expect(command).toBeInstanceOf(UpdateCommand);
      expect(command.input).toEqual({
        TableName: 'Sessions-test',
        Key: { gameId: 'game-1' },
        UpdateExpression:
          'SET discoveredEvidence = list_append(if_not_exists(discoveredEvidence, :empty), :ids), ' +
          'evidenceList[1].discoveredAt = :at, ' +
          'score = if_not_exists(score, :zero) + :bonus, ' +
          'updatedAt = :at',
        ConditionExpression:
          'attribute_exists(gameId) AND #status = :active AND ' +
          'evidenceList[1].evidenceId = :id AND NOT contains(discoveredEvidence, :id)',
        ExpressionAttributeNames: { '#status': 'status' },
        ExpressionAttributeValues: {
          ':id': 'ev-glove',
          ':ids': ['ev-glove'],
          ':empty': [],
          ':at': '2026-03-01T12:00:00.000Z',
          ':zero': 0,
          ':bonus': 36,
          ':active': 'active',
        },
      });
    });

    it('resolves false when the condition fails', async () => {
      send.mockRejectedValueOnce(conditionFailed());
      expect(await store.recordDiscovery('game-1', record)).toBe(false);
    });

    it('propagates other errors', async () => {
      send.mockRejectedValueOnce(new Error('throttled'));
      await expect(store.recordDiscovery('game-1', record)).rejects.toThrow('throttled');
    });
  });

  describe('recordHint', () => {
    it('increments hintsUsed without touching other fields', async () => {
      send.mockResolvedValueOnce({});

      await store.recordHint('game-1', '2026-03-01T12:05:00.000Z');

      const command = send.mock.calls[0][0];
      expect(command).toBeInstanceOf(UpdateCommand);
      expect(command.input).toEqual({
        TableName: 'Sessions-test',
        Key: { gameId: 'game-1' },
        UpdateExpression: 'SET hintsUsed = if_not_exists(hintsUsed, :zero) + :one, updatedAt = :at',
        ConditionExpression: 'attribute_exists(gameId)',
        ExpressionAttributeValues: { ':zero': 0, ':one': 1, ':at': '2026-03-01T12:05:00.000Z' },
      });
    });

    it('reports a missing session', async () => {
      send.mockRejectedValueOnce(conditionFailed());
      await expect(store.recordHint('game-404', '2026-03-01T12:05:00.000Z')).rejects.toThrow(
        'Cannot record hint for game game-404: session not found',
      );
    });
  });
});
