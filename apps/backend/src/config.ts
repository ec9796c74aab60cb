import { z } from 'zod';
import { seededRng, type Rng } from './game/rng';
import { INITIAL_DRAW_NUM, MAX_CARD_NUMBER_FLOOR } from './game/settings';
import { CARD_COLORS, type CardColor, type GameSettings } from './game/types';

const colorList = z
  .string()
  .transform((s) => s.split(',').map((c) => c.trim()).filter((c) => c.length > 0))
  .pipe(
    z
      .array(z.enum(['black', 'white']))
      .min(2)
      .refine((colors) => new Set(colors).size === colors.length, 'card colors must not repeat'),
  );

const envSchema = z.object({
  BACKEND_PORT: z.coerce.number().int().min(0).max(65535).default(54345),
  HOST: z.string().min(1).default('0.0.0.0'),
  MAX_CONNECTIONS: z.coerce.number().int().min(1).default(2),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGIN: z.string().min(1).default('*'),
  GAME_MAX_CARD_NUMBER: z.coerce.number().int().min(MAX_CARD_NUMBER_FLOOR).default(MAX_CARD_NUMBER_FLOOR),
  GAME_INITIAL_DRAW: z.coerce.number().int().min(1).default(INITIAL_DRAW_NUM),
  GAME_CARD_COLORS: colorList.default(CARD_COLORS.join(',')),
  GAME_SEED: z.string().min(1).optional(),
});

export type ServerConfig = {
  port: number;
  host: string;
  maxConnections: number;
  logLevel: string;
  corsOrigin: string;
  game: GameSettings;
  seed: string | null;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`invalid configuration: ${problems}`);
  }
  const e = parsed.data;
  const cardColors: CardColor[] = e.GAME_CARD_COLORS;
  return {
    port: e.BACKEND_PORT,
    host: e.HOST,
    maxConnections: e.MAX_CONNECTIONS,
    logLevel: e.LOG_LEVEL,
    corsOrigin: e.CORS_ORIGIN,
    game: { cardColors, maxCardNumber: e.GAME_MAX_CARD_NUMBER, initialDrawNum: e.GAME_INITIAL_DRAW },
    seed: e.GAME_SEED ?? null,
  };
}

/** Math.random unless a seed makes the matches reproducible. */
export function rngFor(config: Pick<ServerConfig, 'seed'>): Rng {
  return config.seed ? seededRng(config.seed) : Math.random;
}
