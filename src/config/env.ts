import 'dotenv/config';

const env = {
  NODE_ENV: process.env.NODE_ENV ?? 'development',
  PORT: Number(process.env.PORT ?? 4000),
  MONGO_URI: process.env.MONGO_URI || 'mongodb://127.0.0.1:27017/?replicaSet=rs0',
  DB_NAME: process.env.DB_NAME || 'project_access_dev',
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',

  APP_URL: process.env.APP_URL || 'http://localhost:5173',
  MAIL_FROM: process.env.MAIL_FROM || 'Projects <no-reply@example.com>',
  RESEND_API_KEY: process.env.RESEND_API_KEY || '',

  JWT_ACCESS_SECRET: process.env.JWT_ACCESS_SECRET || '',

  // invitations live for 30 days unless the inviter picks a date
  INVITE_EXPIRES_DAYS: Number(process.env.INVITE_EXPIRES_DAYS) || 30,
  INVITE_TOKEN_IN_RESPONSE: process.env.INVITE_TOKEN_IN_RESPONSE === 'true',

  REDIS_URL: process.env.REDIS_URL || 'redis://127.0.0.1:6379',
  RATE_LIMIT_WINDOW_SEC: Number(process.env.RATE_LIMIT_WINDOW_SEC || 60),
  RATE_LIMIT_MAX: Number(process.env.RATE_LIMIT_MAX || 100),
  WS_ALLOW_ORIGINS: process.env.WS_ALLOW_ORIGINS || '',
};

export default env;
