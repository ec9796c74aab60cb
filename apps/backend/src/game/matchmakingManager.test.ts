import { describe, it, expect } from 'vitest';
import { logger } from '../logger';
import { AsyncChannel } from '../server/channel';
import type { ServerInternalEvent } from '../server/internalEvents';
import { FakeLink } from '../testing/fakeLink';
import { GameInstance } from './gameInstance';
import { WaitingRoom, WaitingRoomSeats } from './matchmakingManager';
import { RESP_OK } from './events';
import { PlayerHandler } from './playerHandler';

function join(channel: AsyncChannel<ServerInternalEvent>, link: FakeLink, requestId = 1) {
  channel.push({ type: 'request_join', requestId, link });
}

describe('WaitingRoom', () => {
  it('seats two players and hands over to a match', async () => {
    const channel = new AsyncChannel<ServerInternalEvent>();
    const a = new FakeLink('a');
    const b = new FakeLink('b');
    join(channel, a);
    join(channel, b, 7);

    const match = await new WaitingRoom(channel).run();
    expect(match).toBeInstanceOf(GameInstance);
    expect(match?.players).toEqual([1, 2]);
    expect(a.playerId).toBe(1);
    expect(b.playerId).toBe(2);

    expect(a.sent).toEqual([
      {
        kind: 'response',
        id: 1,
        event: { type: 'request_join_accepted', payload: { joinedPlayer: { type: 'first', playerId: 1 }, roomSize: 2 } },
      },
      {
        kind: 'request',
        id: 1,
        event: { type: 'player_joined', payload: { joinedPlayer: { type: 'second', justJoined: 2, waitingPlayer: 1 }, roomSize: 2 } },
      },
    ]);
    expect(b.sent).toEqual([
      {
        kind: 'response',
        id: 7,
        event: { type: 'request_join_accepted', payload: { joinedPlayer: { type: 'second', justJoined: 2, waitingPlayer: 1 }, roomSize: 2 } },
      },
    ]);
  });

  it('frees the seat of a player who leaves before the match', async () => {
    const channel = new AsyncChannel<ServerInternalEvent>();
    const a = new FakeLink('a');
    join(channel, a);
    channel.push({ type: 'connection_lost', connectionId: 'a', playerId: 1 });
    join(channel, new FakeLink('b'));
    join(channel, new FakeLink('c'));

    const match = await new WaitingRoom(channel).run();
    expect(match?.players).toEqual([2, 3]);
  });

  it('refuses a second join from the same connection', async () => {
    const channel = new AsyncChannel<ServerInternalEvent>();
    const a = new FakeLink('a');
    join(channel, a, 1);
    join(channel, a, 2);
    join(channel, new FakeLink('b'));

    await new WaitingRoom(channel).run();
    expect(a.sent[1]).toEqual({ kind: 'response', id: 2, event: { type: 'error', payload: { message: 'already joined' } } });
  });

  it('answers game messages before the start with an error', async () => {
    const channel = new AsyncChannel<ServerInternalEvent>();
    const a = new FakeLink('a');
    join(channel, a);
    channel.push({
      type: 'in',
      playerId: 1,
      message: { kind: 'response', id: 5, event: { type: 'game_event_response', payload: RESP_OK } },
    });
    join(channel, new FakeLink('b'));

    await new WaitingRoom(channel).run();
    expect(a.sent[1]).toEqual({
      kind: 'response',
      id: 5,
      event: { type: 'error', payload: { message: 'the match has not started yet' } },
    });
  });

  it('closes seated links when the room closes', async () => {
    const channel = new AsyncChannel<ServerInternalEvent>();
    const a = new FakeLink('a');
    join(channel, a);
    channel.close();

    expect(await new WaitingRoom(channel).run()).toBeNull();
    expect(a.closed).toBe(true);
  });
});

describe('WaitingRoomSeats', () => {
  it('describes the first and the second join', () => {
    const seats = new WaitingRoomSeats();
    const first = seats.claim({ playerId: 4, handler: fakeHandler('x') });
    expect(first).toEqual({ joinedPlayer: { type: 'first', playerId: 4 }, roomSize: 2 });
    const second = seats.claim({ playerId: 6, handler: fakeHandler('y') });
    expect(second).toEqual({ joinedPlayer: { type: 'second', justJoined: 6, waitingPlayer: 4 }, roomSize: 2 });
    expect(seats.isFull()).toBe(true);
    expect(() => seats.claim({ playerId: 8, handler: fakeHandler('z') })).toThrow('waiting room is full');
  });

  it('releases by connection', () => {
    const seats = new WaitingRoomSeats();
    seats.claim({ playerId: 1, handler: fakeHandler('x') });
    expect(seats.release('nope')).toBeNull();
    expect(seats.release('x')?.playerId).toBe(1);
    expect(seats.count).toBe(0);
  });
});


function fakeHandler(connectionId: string) {
  return new PlayerHandler(0, new FakeLink(connectionId), logger);
}
