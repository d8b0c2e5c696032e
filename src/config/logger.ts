import pino from 'pino';

// Logs go to stderr so `lmgate chat` can stream completions on stdout
export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
      destination: 2,
    },
  },
  // Redact secrets and message bodies
  redact: {
    paths: [
      'apiKey',
      'key',
      'token',
      'accessToken',
      'privateKey',
      'assertion',
      'headers.authorization',
      'headers.Authorization',
      'messages.*.content',
    ],
    censor: '[redacted]',
  },
});

export default logger;
