#!/usr/bin/env node
import * as cdk from 'aws-cdk-lib/core';
import { InfrastructureStack } from '../lib/infrastructure-stack';
import { MysteryTrailStack } from '../lib/mystery-trail-stack';

const app = new cdk.App();

const env = {
  account: process.env.CDK_DEFAULT_ACCOUNT,
  region: process.env.CDK_DEFAULT_REGION ?? 'us-east-1',
};

// Infrastructure stack: persistent data resources (DynamoDB).
// Rarely changes. Safe to deploy independently.
const infra = new InfrastructureStack(app, 'MysteryTrailInfraStack', { env });

// Application stack: stateless resources (Lambdas, API Gateway).
// Can be freely torn down and recreated.
new MysteryTrailStack(app, 'MysteryTrailStack', {
  env,
  gameSessionsTable: infra.gameSessionsTable,
});
