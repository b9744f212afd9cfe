import * as cdk from 'aws-cdk-lib';
import { Construct } from 'constructs';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';

/**
 * Infrastructure stack -- resources with persistent data that must survive
 * application redeployments.
 *
 * Resources here use custom names and RETAIN removal policies so they survive
 * even if the stack is accidentally deleted.
 */
export class InfrastructureStack extends cdk.Stack {
  /** The DynamoDB table storing game sessions, keyed by gameId. */
  public readonly gameSessionsTable: dynamodb.ITable;

  constructor(scope: Construct, id: string, props?: cdk.StackProps) {
    super(scope, id, props);

    // ============================================
    // DynamoDB Tables
    // ============================================

    this.gameSessionsTable = new dynamodb.Table(this, 'GameSessionsTable', {
      tableName: 'MysteryTrail-GameSessions',
      partitionKey: { name: 'gameId', type: dynamodb.AttributeType.STRING },
      billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
      removalPolicy: cdk.RemovalPolicy.RETAIN,
    });

    // ============================================
    // Outputs
    // ============================================

    new cdk.CfnOutput(this, 'GameSessionsTableName', {
      value: this.gameSessionsTable.tableName,
      description: 'DynamoDB GameSessions table name',
      exportName: 'MysteryTrail-GameSessionsTableName',
    });

    new cdk.CfnOutput(this, 'GameSessionsTableArn', {
      value: this.gameSessionsTable.tableArn,
      description: 'DynamoDB GameSessions table ARN',
      exportName: 'MysteryTrail-GameSessionsTableArn',
    });
  }
}
