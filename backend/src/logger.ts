import { pino } from 'pino';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'budget-ledger' },
  redact: ['password', 'passwordHash', 'token', 'req.headers.authorization'],
});

export default logger;
