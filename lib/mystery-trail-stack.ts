import * as cdk from 'aws-cdk-lib';
import { Construct } from 'constructs';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as apigateway from 'aws-cdk-lib/aws-apigateway';
import * as nodejs from 'aws-cdk-lib/aws-lambda-nodejs';
import { join } from 'path';

export interface MysteryTrailStackProps extends cdk.StackProps {
  gameSessionsTable: dynamodb.ITable;
}

export class MysteryTrailStack extends cdk.Stack {
  constructor(scope: Construct, id: string, props: MysteryTrailStackProps) {
    super(scope, id, props);

    const { gameSessionsTable } = props;

    // ============================================
    // Lambda Environment Variables
    // ============================================

    const lambdaEnvironment = {
      GAME_SESSIONS_TABLE_NAME: gameSessionsTable.tableName,
      PLAYER_HISTORY_MAX_PLAYERS: '10000',
      PLAYER_HISTORY_IDLE_TTL_SECONDS: '3600',
    };

    // ============================================
    // Lambda Functions
    // ============================================

    // Common bundling configuration - use esbuild locally (no Docker required)
    const bundlingConfig = {
      runtime: lambda.Runtime.NODEJS_20_X,
      handler: 'index.handler',
      bundling: {
        minify: false,
        sourceMap: true,
        externalModules: ['@aws-sdk'],
        forceDockerBundling: false,
        format: nodejs.OutputFormat.CJS,
      },
    };

    const healthHandler = new nodejs.NodejsFunction(this, 'HealthHandler', {
      entry: join(__dirname, 'lambda/health/get.ts'),
      ...bundlingConfig,
    });

    // Player history and per-game locks are per container
    const discoverHandler = new nodejs.NodejsFunction(this, 'DiscoverEvidenceHandler', {
      entry: join(__dirname, 'lambda/evidence/discover.ts'),
      environment: lambdaEnvironment,
      ...bundlingConfig,
      timeout: cdk.Duration.seconds(10),
    });

    const hintHandler = new nodejs.NodejsFunction(this, 'EvidenceHintHandler', {
      entry: join(__dirname, 'lambda/evidence/hint.ts'),
      environment: lambdaEnvironment,
      ...bundlingConfig,
    });

    const nearbyHandler = new nodejs.NodejsFunction(this, 'NearbyEvidenceHandler', {
      entry: join(__dirname, 'lambda/evidence/nearby.ts'),
      environment: lambdaEnvironment,
      ...bundlingConfig,
    });

    const qualityHandler = new nodejs.NodejsFunction(this, 'LocationQualityHandler', {
      entry: join(__dirname, 'lambda/location/quality.ts'),
      ...bundlingConfig,
    });

    // ============================================
    // Grant DynamoDB Permissions
    // ============================================

    gameSessionsTable.grantReadWriteData(discoverHandler);
    gameSessionsTable.grantReadWriteData(hintHandler);
    gameSessionsTable.grantReadData(nearbyHandler);

    // ============================================
    // API Gateway
    // ============================================

    const api = new apigateway.RestApi(this, 'MysteryTrailApi', {
      restApiName: 'Mystery Trail API',
      description: 'API for the Mystery Trail location-based mystery game',
      defaultCorsPreflightOptions: {
        allowOrigins: apigateway.Cors.ALL_ORIGINS,
        allowMethods: apigateway.Cors.ALL_METHODS,
        allowHeaders: ['Content-Type'],
      },
    });

    // Health route
    const health = api.root.addResource('health');
    health.addMethod('GET', new apigateway.LambdaIntegration(healthHandler));

    // /games/{gameId}/evidence/...
    const evidence = api.root
      .addResource('games')
      .addResource('{gameId}')
      .addResource('evidence');

    evidence.addResource('nearby').addMethod('GET', new apigateway.LambdaIntegration(nearbyHandler));

    const evidenceItem = evidence.addResource('{evidenceId}');
    evidenceItem.addResource('discover').addMethod('POST', new apigateway.LambdaIntegration(discoverHandler));
    evidenceItem.addResource('hint').addMethod('GET', new apigateway.LambdaIntegration(hintHandler));

    // /location/quality
    api.root
      .addResource('location')
      .addResource('quality')
      .addMethod('POST', new apigateway.LambdaIntegration(qualityHandler));

    // ============================================
    // Outputs
    // ============================================

    new cdk.CfnOutput(this, 'ApiUrl', {
      value: api.url,
      description: 'API Gateway URL',
    });
  }
}
