import * as cdk from 'aws-cdk-lib';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as rds from 'aws-cdk-lib/aws-rds';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as apigateway from 'aws-cdk-lib/aws-apigateway';
import * as cloudwatch from 'aws-cdk-lib/aws-cloudwatch';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import { Construct } from 'constructs';
import { METRIC_NAMESPACE } from '../src/utils/metrics';

export interface RosterApiStackProps extends cdk.StackProps {
  /** Origins allowed to call the API from a browser */
  corsAllowedOrigins?: string[];
}

/**
 * Roster API Stack
 *
 * This stack defines the infrastructure for the Roster API:
 * - VPC with 2 AZs and NAT gateway
 * - RDS PostgreSQL (encrypted) with credentials in Secrets Manager
 * - Generated token signing key in Secrets Manager
 * - Lambda functions for the API, documentation and migrations
 * - API Gateway proxy on the /api stage
 * - CloudWatch alarms for monitoring
 */
export class RosterApiStack extends cdk.Stack {
  constructor(scope: Construct, id: string, props: RosterApiStackProps = {}) {
    super(scope, id, props);

    const corsAllowedOrigins = props.corsAllowedOrigins ?? ['http://localhost:4200'];

    // ========================================
    // VPC with 2 AZs and 1 NAT Gateway
    // ========================================
    const vpc = new ec2.Vpc(this, 'RosterVPC', {
      maxAzs: 2,
      natGateways: 1,
      subnetConfiguration: [
        {
          name: 'Public',
          subnetType: ec2.SubnetType.PUBLIC,
          cidrMask: 24,
        },
        {
          name: 'Private',
          subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS,
          cidrMask: 24,
        },
        {
          name: 'Isolated',
          subnetType: ec2.SubnetType.PRIVATE_ISOLATED,
          cidrMask: 24,
        },
      ],
    });

    // ========================================
    // RDS PostgreSQL Instance
    // ========================================
    const dbSecurityGroup = new ec2.SecurityGroup(this, 'DatabaseSecurityGroup', {
      vpc,
      description: 'Security group for RDS PostgreSQL instance',
      allowAllOutbound: false,
    });

    const dbCredentials = new secretsmanager.Secret(this, 'DBCredentials', {
      secretName: 'roster-api/db/credentials',
      description: 'RDS PostgreSQL credentials for the Roster API',
      generateSecretString: {
        secretStringTemplate: JSON.stringify({ username: 'roster_admin' }),
        generateStringKey: 'password',
        excludePunctuation: true,
        includeSpace: false,
        passwordLength: 32,
      },
    });

    const database = new rds.DatabaseInstance(this, 'RosterDatabase', {
      engine: rds.DatabaseInstanceEngine.postgres({
        version: rds.PostgresEngineVersion.VER_15,
      }),
      instanceType: ec2.InstanceType.of(ec2.InstanceClass.T3, ec2.InstanceSize.MICRO),
      vpc,
      vpcSubnets: {
        subnetType: ec2.SubnetType.PRIVATE_ISOLATED,
      },
      securityGroups: [dbSecurityGroup],
      allocatedStorage: 20,
      maxAllocatedStorage: 100,
      storageEncrypted: true,
      credentials: rds.Credentials.fromSecret(dbCredentials),
      databaseName: 'roster',
      backupRetention: cdk.Duration.days(7),
      removalPolicy: cdk.RemovalPolicy.SNAPSHOT,
      deletionProtection: true,
    });

    // ========================================
    // Token signing key
    // ========================================
    const signingKey = new secretsmanager.Secret(this, 'TokenSigningKey', {
      secretName: 'roster-api/token/signing-key',
      description: 'HMAC key used to sign access tokens',
      generateSecretString: {
        secretStringTemplate: JSON.stringify({}),
        generateStringKey: 'signing_key',
        excludePunctuation: true,
        includeSpace: false,
        passwordLength: 64,
      },
    });

    // ========================================
    // Lambda Functions
    // ========================================
    const lambdaSecurityGroup = new ec2.SecurityGroup(this, 'LambdaSecurityGroup', {
      vpc,
      description: 'Security group for Lambda functions',
      allowAllOutbound: true,
    });

    // Allow Lambda to connect to RDS
    dbSecurityGroup.addIngressRule(
      lambdaSecurityGroup,
      ec2.Port.tcp(5432),
      'Allow Lambda to connect to RDS'
    );

    const sharedEnvironment: Record<string, string> = {
      NODE_ENV: 'production',
      DB_HOST: database.dbInstanceEndpointAddress,
      DB_PORT: database.dbInstanceEndpointPort,
      DB_NAME: 'roster',
      DB_SECRET_ARN: dbCredentials.secretArn,
      DB_SSL: 'true',
      JWT_SECRET_ARN: signingKey.secretArn,
      AWS_NODEJS_CONNECTION_REUSE_ENABLED: '1',
    };

    const code = lambda.Code.fromAsset('dist');

    const apiFunction = new lambda.Function(this, 'RosterAPIFunction', {
      functionName: 'roster-api',
      runtime: lambda.Runtime.NODEJS_20_X,
      handler: 'src/handlers/api-handler.handler',
      code,
      vpc,
      vpcSubnets: {
        subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS,
      },
      securityGroups: [lambdaSecurityGroup],
      timeout: cdk.Duration.seconds(30),
      memorySize: 1024,
      environment: {
        ...sharedEnvironment,
        ACCESS_TOKEN_EXPIRE_MINUTES: '30',
        CORS_ALLOWED_ORIGINS: corsAllowedOrigins.join(','),
        METRICS_ENABLED: 'true',
        LOG_LEVEL: 'info',
      },
    });

    const migrationFunction = new lambda.Function(this, 'RosterMigrationFunction', {
      functionName: 'roster-api-migrations',
      runtime: lambda.Runtime.NODEJS_20_X,
      handler: 'src/handlers/migration-handler.handler',
      code,
      vpc,
      vpcSubnets: {
        subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS,
      },
      securityGroups: [lambdaSecurityGroup],
      timeout: cdk.Duration.minutes(5),
      memorySize: 512,
      environment: sharedEnvironment,
    });

    const docsFunction = new lambda.Function(this, 'RosterDocsFunction', {
      functionName: 'roster-api-docs',
      runtime: lambda.Runtime.NODEJS_20_X,
      handler: 'src/handlers/docs-handler.handler',
      code,
      timeout: cdk.Duration.seconds(10),
      memorySize: 256,
    });

    // Grant Lambda permissions
    dbCredentials.grantRead(apiFunction);
    dbCredentials.grantRead(migrationFunction);
    signingKey.grantRead(apiFunction);

    apiFunction.addToRolePolicy(new iam.PolicyStatement({
      actions: ['cloudwatch:PutMetricData'],
      resources: ['*'],
      conditions: {
        StringEquals: { 'cloudwatch:namespace': METRIC_NAMESPACE },
      },
    }));

    // VPC Endpoint for Secrets Manager
    vpc.addInterfaceEndpoint('SecretsManagerEndpoint', {
      service: ec2.InterfaceVpcEndpointAwsService.SECRETS_MANAGER,
      subnets: {
        subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS,
      },
      privateDnsEnabled: true,
    });

    // ========================================
    // API Gateway
    // ========================================
    const api = new apigateway.RestApi(this, 'RosterAPI', {
      restApiName: 'Roster API',
      description: 'Player roster management REST API',
      // CSV uploads arrive base64-encoded
      binaryMediaTypes: ['multipart/form-data'],
      deployOptions: {
        stageName: 'api',
        throttlingRateLimit: 100,
        throttlingBurstLimit: 200,
        loggingLevel: apigateway.MethodLoggingLevel.INFO,
        metricsEnabled: true,
      },
    });

    // Authentication happens in the Lambda; the proxy is open
    api.root.addProxy({
      defaultIntegration: new apigateway.LambdaIntegration(apiFunction, {
        proxy: true,
        allowTestInvoke: true,
      }),
      anyMethod: true,
    });

    const docsIntegration = new apigateway.LambdaIntegration(docsFunction, { proxy: true });
    const docsResource = api.root.addResource('api-docs');
    docsResource.addMethod('GET', docsIntegration);
    docsResource.addResource('openapi.json').addMethod('GET', docsIntegration);

    // ========================================
    // CloudWatch Alarms
    // ========================================

    // Lambda Error Rate Alarm
    new cloudwatch.Alarm(this, 'LambdaErrorAlarm', {
      alarmName: 'roster-api-lambda-errors',
      alarmDescription: 'Alert when Lambda error rate exceeds threshold',
      metric: apiFunction.metricErrors({
        statistic: 'Sum',
        period: cdk.Duration.minutes(5),
      }),
      threshold: 10,
      evaluationPeriods: 2,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
      treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
    });

    // Failed login spike
    new cloudwatch.Alarm(this, 'LoginFailureAlarm', {
      alarmName: 'roster-api-login-failures',
      alarmDescription: 'Alert when failed logins spike',
      metric: new cloudwatch.Metric({
        namespace: METRIC_NAMESPACE,
        metricName: 'LoginFailure',
        dimensionsMap: { operation_type: 'login', reason: 'password_mismatch' },
        statistic: 'Sum',
        period: cdk.Duration.minutes(5),
      }),
      threshold: 50,
      evaluationPeriods: 1,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
      treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
    });

    // API Gateway 5xx Error Alarm
    new cloudwatch.Alarm(this, 'API5xxErrorAlarm', {
      alarmName: 'roster-api-5xx-errors',
      alarmDescription: 'Alert when API Gateway 5xx error rate is high',
      metric: api.metricServerError({
        statistic: 'Sum',
        period: cdk.Duration.minutes(5),
      }),
      threshold: 10,
      evaluationPeriods: 2,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
      treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
    });

    // ========================================
    // Stack Outputs
    // ========================================
    new cdk.CfnOutput(this, 'APIEndpoint', {
      value: api.url,
      description: 'API Gateway endpoint URL',
      exportName: 'RosterAPIEndpoint',
    });

    new cdk.CfnOutput(this, 'DatabaseEndpoint', {
      value: database.dbInstanceEndpointAddress,
      description: 'RDS PostgreSQL endpoint',
      exportName: 'RosterDatabaseEndpoint',
    });

    new cdk.CfnOutput(this, 'MigrationFunctionName', {
      value: migrationFunction.functionName,
      description: 'Invoke to apply the database schema',
      exportName: 'RosterMigrationFunctionName',
    });
  }
}
