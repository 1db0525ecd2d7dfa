import pino from 'pino';

// stdout belongs to the CLI's JSON output, so logs always go to stderr.
export const logger = pino(
  {
    name: 'serena-launcher',
    level: process.env['LOG_LEVEL'] ?? 'info',
  },
  pino.destination(2)
);
