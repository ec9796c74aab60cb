import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config';
import { GameServer } from './gameServer';

describe('GameServer', () => {
  it('reports an idle status before any player connects', async () => {
    const server = new GameServer(loadConfig({ MAX_CONNECTIONS: '4' }));
    expect(server.status()).toEqual({
      waitingPlayers: 0,
      runningMatches: 0,
      finishedMatches: 0,
      connections: 0,
      capacity: 4,
    });
    await server.stop();
  });
});
