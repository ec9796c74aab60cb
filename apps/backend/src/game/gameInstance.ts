import { logger as rootLogger, type Logger } from '../logger';
import { errorEvent } from '../protocol/messages';
import type { AsyncChannel } from '../server/channel';
import type { ServerInternalEvent } from '../server/internalEvents';
import type { Game } from './engine';
import { ResponseError, SequenceError } from './errors';
import type { GameEvent } from './events';
import type { PlayerHandler } from './playerHandler';
import type { PlayerId } from './types';

export type GameInstanceOptions = {
  log?: Logger;
};

export type GameInstanceResult = {
  finished: boolean;
  history: readonly GameEvent[];
};

/**
 * Owns one Game and drives it from the room channel: stage an event, push
 * each player's view of it, wait for every answer, process, repeat.
 */
export class GameInstance {
  private readonly handlers: Map<PlayerId, PlayerHandler>;
  private readonly log: Logger;
  private stopped = false;

  constructor(
    private readonly channel: AsyncChannel<ServerInternalEvent>,
    private readonly game: Game,
    handlers: PlayerHandler[],
    options: GameInstanceOptions = {},
  ) {
    this.handlers = new Map(handlers.map((h): [PlayerId, PlayerHandler] => [h.playerId, h]));
    this.log = (options.log ?? rootLogger).child({ module: 'game-instance', players: game.playerIds() });
  }

  get players(): PlayerId[] {
    return [...this.handlers.keys()];
  }

  isOver() {
    return this.game.isOver();
  }

  async run(): Promise<GameInstanceResult> {
    try {
      for (;;) {
        const views = this.stageNext();
        if (!views) break;
        for (const [playerId, event] of views) this.handler(playerId).sendGameEvent(event);
        if (!(await this.collectResponses())) break;
      }
    } finally {
      this.shutdown();
    }
    const finished = this.game.isOver();
    this.log.info({ finished, events: this.game.history().length }, 'match finished');
    return { finished, history: this.game.history() };
  }

  /** Closes the room channel; `run` returns once it sees that. */
  stop() {
    this.channel.close();
  }

  private stageNext(): Map<PlayerId, GameEvent> | null {
    try {
      return this.game.nextEvent();
    } catch (err) {
      if (err instanceof SequenceError && err.code === 'no_more_event') return null;
      throw err;
    }
  }

  /** Resolves true once the staged event is processed, false when the match has to stop. */
  private async collectResponses(): Promise<boolean> {
    for (;;) {
      const event = await this.channel.recv();
      if (!event) return false;

      switch (event.type) {
        case 'in': {
          const handler = this.handlers.get(event.playerId);
          if (!handler) {
            this.log.warn({ playerId: event.playerId }, 'message from a player outside the match');
            break;
          }
          const response = handler.accept(event.message);
          if (!response) break;
          if (this.game.storePlayerResponse(event.playerId, response) && this.tryProcess()) return true;
          break;
        }
        case 'connection_lost':
          if (!this.disconnect(event.connectionId)) return false;
          break;
        case 'request_join':
          event.link.respond(event.requestId, errorEvent('a match is already in progress'));
          break;
      }
    }
  }

  private tryProcess(): boolean {
    try {
      this.game.processEvent();
      return true;
    } catch (err) {
      if (!(err instanceof ResponseError)) throw err;
      this.reprompt(err);
      return false;
    }
  }

  // a rejected answer sends the player the same event again under a new id
  private reprompt(err: ResponseError) {
    this.log.warn({ playerId: err.player, reason: err.reason, expected: err.expected, received: err.received.type }, 'invalid response');
    const handler = this.handler(err.player);
    handler.notify(errorEvent(err.message));
    this.game.discardPlayerResponse(err.player);
    const staged = this.game.stagedEventFor(err.player);
    if (staged) handler.sendGameEvent(staged);
  }

  /** Returns false when nobody is left to play. */
  private disconnect(connectionId: string): boolean {
    const gone = [...this.handlers.values()].find((h) => h.connectionId === connectionId);
    if (!gone || !gone.isConnected) return true;

    gone.markDisconnected();
    this.log.info({ playerId: gone.playerId }, 'player disconnected');
    const remaining = [...this.handlers.values()].filter((h) => h.isConnected);
    for (const h of remaining) h.notify({ type: 'player_disconnected', payload: { playerId: gone.playerId } });
    return remaining.length > 0;
  }

  private handler(playerId: PlayerId): PlayerHandler {
    const handler = this.handlers.get(playerId);
    if (!handler) throw new Error(`no handler for player ${playerId}`);
    return handler;
  }

  private shutdown() {
    if (this.stopped) return;
    this.stopped = true;
    this.channel.close();
    for (const h of this.handlers.values()) h.close();
  }
}
