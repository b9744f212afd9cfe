import { ConditionalCheckFailedException } from '@aws-sdk/client-dynamodb';
import { GetCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import { docClient } from './db';
import { GameSessionSchema } from './session-schema';
import type { GameSession } from '../../types/index';
import type { DiscoveryRecord, SessionStore } from '../../engine/session-store';

/**
 * GameSessions table access, keyed by gameId.
 *
 * Every write is one conditional UpdateCommand, so Lambda containers that
 * handle the same game concurrently never overwrite each other's changes.
 */
export class DynamoSessionStore implements SessionStore {
  private tableName: string;

  constructor(tableName: string) {
    this.tableName = tableName;
  }

  /**
   * Load a session. Returns null if no session exists for this gameId;
   * throws if the stored item does not parse as a session.
   */
  async get(gameId: string): Promise<GameSession | null> {
    const result = await docClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { gameId },
        ConsistentRead: true,
      }),
    );
    if (!result.Item) return null;

    const parsed = GameSessionSchema.safeParse(result.Item);
    if (!parsed.success) {
      throw new Error(`Stored session ${gameId} is malformed: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  async recordDiscovery(gameId: string, record: DiscoveryRecord): Promise<boolean> {
    const evidencePath = `evidenceList[${record.evidenceIndex}]`;
    try {
      await docClient.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: { gameId },
          UpdateExpression:
            'SET discoveredEvidence = list_append(if_not_exists(discoveredEvidence, :empty), :ids), ' +
            `${evidencePath}.discoveredAt = :at, ` +
            'score = if_not_exists(score, :zero) + :bonus, ' +
            'updatedAt = :at',
          ConditionExpression:
            'attribute_exists(gameId) AND #status = :active AND ' +
            `${evidencePath}.evidenceId = :id AND NOT contains(discoveredEvidence, :id)`,
          ExpressionAttributeNames: { '#status': 'status' },
          ExpressionAttributeValues: {
            ':id': record.evidenceId,
            ':ids': [record.evidenceId],
            ':empty': [],
            ':at': record.discoveredAt,
            ':zero': 0,
            ':bonus': record.bonusPoints,
            ':active': 'active',
          },
        }),
      );
      return true;
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) return false;
      throw error;
    }
  }

  async recordHint(gameId: string, updatedAt: string): Promise<void> {
    try {
      await docClient.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: { gameId },
          UpdateExpression: 'SET hintsUsed = if_not_exists(hintsUsed, :zero) + :one, updatedAt = :at',
          ConditionExpression: 'attribute_exists(gameId)',
          ExpressionAttributeValues: { ':zero': 0, ':one': 1, ':at': updatedAt },
        }),
      );
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        throw new Error(`Cannot record hint for game ${gameId}: session not found`);
      }
      throw error;
    }
  }
}
