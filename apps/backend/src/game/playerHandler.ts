import type { Logger } from '../logger';
import type { EventId } from '../protocol/envelope';
import type { ClientMessage, ServerToClientEvent } from '../protocol/messages';
import type { PlayerLink } from '../server/internalEvents';
import type { GameEvent } from './events';
import type { PlayerId } from './types';

/**
 * A seated player as the match sees it. Remembers which game event the
 * player still owes an answer to and lets exactly one answer through.
 */
export class PlayerHandler {
  private expectedResponseId: EventId | null = null;
  private connected = true;
  private readonly log: Logger;

  constructor(
    readonly playerId: PlayerId,
    private readonly link: PlayerLink,
    log: Logger,
  ) {
    this.log = log.child({ playerId });
  }

  get connectionId() {
    return this.link.connectionId;
  }

  get isConnected() {
    return this.connected;
  }

  get awaitingResponse() {
    return this.expectedResponseId;
  }

  notify(event: ServerToClientEvent): EventId | null {
    if (!this.connected) return null;
    return this.link.send(event);
  }

  respond(requestId: EventId, event: ServerToClientEvent) {
    if (this.connected) this.link.respond(requestId, event);
  }

  /** Pushes a game event and waits for the answer to that id only. */
  sendGameEvent(event: GameEvent): EventId | null {
    const id = this.notify({ type: 'game_event', payload: event });
    this.expectedResponseId = id;
    return id;
  }

  /** Returns the answered game event, or null when the message is not the awaited answer. */
  accept(message: ClientMessage): GameEvent | null {
    if (message.kind !== 'response') {
      this.log.warn({ id: message.id, type: message.event.type }, 'unexpected request from player, ignored');
      return null;
    }
    if (this.expectedResponseId === null || message.id !== this.expectedResponseId) {
      this.log.warn({ id: message.id, expected: this.expectedResponseId }, 'stale or mismatched response id, ignored');
      return null;
    }
    if (message.event.type !== 'game_event_response') {
      this.log.warn({ id: message.id, type: message.event.type }, 'response is not a game event response, ignored');
      return null;
    }
    this.expectedResponseId = null;
    return message.event.payload;
  }

  markDisconnected() {
    this.connected = false;
    this.expectedResponseId = null;
  }

  close() {
    if (!this.connected) return;
    this.connected = false;
    this.link.close();
  }
}
