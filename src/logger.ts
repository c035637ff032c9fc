import { pino } from 'pino';

// Level is re-applied from validated config at startup (src/index.ts).
export const logger = pino({
  level: 'info',
  formatters: {
    level: (label) => ({ level: label })
  },
  timestamp: pino.stdTimeFunctions.isoTime
});

export type { Logger } from 'pino';
