import {ProductionConfig} from './types';

// Load configuration from environment variables
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ProductionConfig {
  const region = env.AWS_DEFAULT_REGION || 'us-east-1';

  return {
    database: {
      host: env.DATABASE_HOST || 'localhost',
      port: parseInt(env.DATABASE_PORT || '5432', 10),
      user: env.DATABASE_USER || 'appuser',
      password: env.DATABASE_PASSWORD || 'apppassword',
      database: env.DATABASE_NAME || 'orderingdb',
    },
    redis: {
      host: env.REDIS_HOST || 'localhost',
      port: parseInt(env.REDIS_PORT || '6379', 10),
    },
    session: {
      ttlSeconds: parseInt(env.SESSION_TTL_SECONDS || String(24 * 60 * 60), 10),
    },
    email: {
      host: env.SMTP_HOST || 'localhost',
      port: parseInt(env.SMTP_PORT || '1025', 10),
      from: env.MAIL_FROM || '"Ordering Service" <noreply@example.com>',
    },
    aws: {
      region,
      accessKeyId: env.AWS_ACCESS_KEY_ID || 'test',
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY || 'test',
      monitoringEndpoint: env.AWS_ENDPOINT_MONITORING || 'http://localhost:4566',
      alertTopicArn: env.ALERT_TOPIC_ARN || `arn:aws:sns:${region}:000000000000:ordering-alerts`,
    },
    api: {
      port: parseInt(env.API_PORT || '3000', 10),
    },
  };
}
