import { logger as rootLogger, type Logger } from '../logger';
import type { EventId } from '../protocol/envelope';
import { errorEvent, type JoinInfo } from '../protocol/messages';
import type { AsyncChannel } from '../server/channel';
import type { PlayerLink, ServerInternalEvent } from '../server/internalEvents';
import { Game } from './engine';
import { GameInstance } from './gameInstance';
import { PlayerIdAllocator } from './player';
import { PlayerHandler } from './playerHandler';
import type { Rng } from './rng';
import { defaultSettings } from './settings';
import type { GameSettings, PlayerId } from './types';

export const ROOM_SIZE = 2;

type Seat = { playerId: PlayerId; handler: PlayerHandler };

/** Claimed seats of a waiting room, in join order. */
export class WaitingRoomSeats {
  private seats: Seat[] = [];

  constructor(readonly roomSize: number = ROOM_SIZE) {}

  claim(seat: Seat): JoinInfo {
    if (this.isFull()) throw new Error('waiting room is full');
    const waiting = this.seats[0];
    this.seats.push(seat);
    const joinedPlayer: JoinInfo['joinedPlayer'] = waiting
      ? { type: 'second', justJoined: seat.playerId, waitingPlayer: waiting.playerId }
      : { type: 'first', playerId: seat.playerId };
    return { joinedPlayer, roomSize: this.roomSize };
  }

  release(connectionId: string): Seat | null {
    const seat = this.seats.find((s) => s.handler.connectionId === connectionId);
    if (!seat) return null;
    this.seats = this.seats.filter((s) => s !== seat);
    return seat;
  }

  has(connectionId: string) {
    return this.seats.some((s) => s.handler.connectionId === connectionId);
  }

  isFull() {
    return this.seats.length >= this.roomSize;
  }

  get count() {
    return this.seats.length;
  }

  all(): readonly Seat[] {
    return this.seats;
  }
}

export type WaitingRoomOptions = {
  settings?: GameSettings;
  rng?: Rng;
  ids?: PlayerIdAllocator;
  log?: Logger;
};

/**
 * The lobby in front of a match. Consumes its room channel until two players
 * are seated, then hands the same channel over to a GameInstance.
 */
export class WaitingRoom {
  readonly seats = new WaitingRoomSeats();
  private readonly ids: PlayerIdAllocator;
  private readonly log: Logger;

  constructor(
    private readonly channel: AsyncChannel<ServerInternalEvent>,
    private readonly options: WaitingRoomOptions = {},
  ) {
    this.ids = options.ids ?? new PlayerIdAllocator();
    this.log = (options.log ?? rootLogger).child({ module: 'waiting-room' });
  }

  /** Resolves with the match once the room fills, or null when the channel closes first. */
  async run(): Promise<GameInstance | null> {
    while (!this.seats.isFull()) {
      const event = await this.channel.recv();
      if (!event) {
        this.log.info({ seated: this.seats.count }, 'waiting room closed');
        for (const seat of this.seats.all()) seat.handler.close();
        return null;
      }
      this.handle(event);
    }
    return this.startMatch();
  }

  private handle(event: ServerInternalEvent) {
    switch (event.type) {
      case 'request_join':
        this.join(event.requestId, event.link);
        break;
      case 'in': {
        const seat = this.seats.all().find((s) => s.playerId === event.playerId);
        this.log.warn({ playerId: event.playerId, type: event.message.event.type }, 'message before the match started, ignored');
        seat?.handler.respond(event.message.id, errorEvent('the match has not started yet'));
        break;
      }
      case 'connection_lost': {
        const seat = this.seats.release(event.connectionId);
        if (seat) this.log.info({ playerId: seat.playerId }, 'player left the waiting room');
        break;
      }
    }
  }

  private join(requestId: EventId, link: PlayerLink) {
    if (this.seats.has(link.connectionId)) {
      link.respond(requestId, errorEvent('already joined'));
      return;
    }
    if (this.seats.isFull()) {
      link.respond(requestId, errorEvent('room is full'));
      return;
    }

    const playerId = this.ids.assign();
    link.assign(playerId);
    const handler = new PlayerHandler(playerId, link, this.log);
    const others = [...this.seats.all()];
    const info = this.seats.claim({ playerId, handler });

    handler.respond(requestId, { type: 'request_join_accepted', payload: info });
    for (const other of others) other.handler.notify({ type: 'player_joined', payload: info });
    this.log.info({ playerId, seated: this.seats.count }, 'player joined');
  }

  private startMatch(): GameInstance {
    const [first, second] = this.seats.all();
    if (!first || !second) throw new Error('cannot start a match without two players');
    const game = Game.forTwoPlayers([first.playerId, second.playerId], this.options.settings ?? defaultSettings(), {
      rng: this.options.rng,
    });
    this.log.info({ players: [first.playerId, second.playerId], order: game.turnOrder() }, 'match starting');
    return new GameInstance(this.channel, game, [first.handler, second.handler], { log: this.options.log });
  }
}
