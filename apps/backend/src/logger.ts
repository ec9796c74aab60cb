import pino, { type Logger } from 'pino';

const level = process.env.LOG_LEVEL ?? (process.env.VITEST ? 'silent' : 'info');

export const logger = pino({ level, base: { service: 'guess-duel' } });

export type { Logger };
