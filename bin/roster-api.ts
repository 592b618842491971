#!/usr/bin/env node
import 'source-map-support/register';
import * as cdk from 'aws-cdk-lib';
import { RosterApiStack } from '../lib/roster-api-stack';

const app = new cdk.App();

const origins = app.node.tryGetContext('corsAllowedOrigins');

new RosterApiStack(app, 'RosterApiStack', {
  env: {
    account: process.env.CDK_DEFAULT_ACCOUNT,
    region: process.env.CDK_DEFAULT_REGION,
  },
  corsAllowedOrigins: typeof origins === 'string' ? origins.split(',') : undefined,
  description: 'Roster API - player roster management with token authentication',
});
