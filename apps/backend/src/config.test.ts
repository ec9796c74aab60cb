import { describe, it, expect } from 'vitest';
import { loadConfig, rngFor } from './config';

describe('loadConfig', () => {
  it('falls back to the default rules', () => {
    expect(loadConfig({})).toEqual({
      port: 54345,
      host: '0.0.0.0',
      maxConnections: 2,
      logLevel: 'info',
      corsOrigin: '*',
      game: { cardColors: ['black', 'white'], maxCardNumber: 11, initialDrawNum: 4 },
      seed: null,
    });
  });

  it('reads the game rules from the environment', () => {
    const config = loadConfig({ GAME_MAX_CARD_NUMBER: '15', GAME_INITIAL_DRAW: '3', GAME_CARD_COLORS: 'white, black', BACKEND_PORT: '0' });
    expect(config.port).toBe(0);
    expect(config.game).toEqual({ cardColors: ['white', 'black'], maxCardNumber: 15, initialDrawNum: 3 });
  });

  it('names every invalid variable', () => {
    expect(() => loadConfig({ BACKEND_PORT: 'abc', GAME_MAX_CARD_NUMBER: '5' })).toThrow(/BACKEND_PORT.*GAME_MAX_CARD_NUMBER/);
    expect(() => loadConfig({ GAME_CARD_COLORS: 'black' })).toThrow('GAME_CARD_COLORS');
    expect(() => loadConfig({ GAME_CARD_COLORS: 'black,red' })).toThrow('GAME_CARD_COLORS');
  });
});

describe('rngFor', () => {
  it('repeats the same sequence for the same seed', () => {
    const a = rngFor({ seed: 'test-seed' });
    const b = rngFor({ seed: 'test-seed' });
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
    expect(first.every((x) => x >= 0 && x < 1)).toBe(true);
  });

  it('uses Math.random without a seed', () => {
    expect(rngFor({ seed: null })).toBe(Math.random);
  });
});
