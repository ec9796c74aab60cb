import { z } from 'zod';
import type { PlayerId } from '../game/types';
import type { Logger } from '../logger';
import type { EventId } from '../protocol/envelope';
import { EventHandler } from '../protocol/eventHandler';
import { errorEvent, type ClientToServerEvent, type ServerMessage, type ServerToClientEvent } from '../protocol/messages';
import { parseClientMessage } from '../protocol/schemas';
import type { AsyncChannel } from './channel';
import type { PlayerLink, ServerInternalEvent } from './internalEvents';

/** The raw socket underneath a connection. */
export interface Transport {
  readonly id: string;
  send(message: ServerMessage): void;
  close(): void;
}

const idOnly = z.object({ id: z.number().int().nonnegative() });

/**
 * Relays one socket: inbound envelopes are validated and forwarded into the
 * room channel, outbound events are numbered and written to the socket.
 */
export class PlayerConnection implements PlayerLink {
  private readonly events: EventHandler<ClientToServerEvent, ServerToClientEvent>;
  private channel: AsyncChannel<ServerInternalEvent> | null = null;
  private playerId: PlayerId | null = null;
  private readonly log: Logger;

  constructor(
    private readonly transport: Transport,
    private readonly lobby: () => AsyncChannel<ServerInternalEvent>,
    log: Logger,
  ) {
    this.events = new EventHandler((message) => transport.send(message));
    this.log = log.child({ connectionId: transport.id });
  }

  get connectionId() {
    return this.transport.id;
  }

  get assignedPlayer() {
    return this.playerId;
  }

  send(event: ServerToClientEvent): EventId {
    return this.events.send(event);
  }

  respond(requestId: EventId, event: ServerToClientEvent) {
    this.events.respond({ id: requestId }, event);
  }

  assign(playerId: PlayerId) {
    this.playerId = playerId;
    this.log.debug({ playerId }, 'connection seated');
  }

  close() {
    this.transport.close();
  }

  onMessage(raw: unknown) {
    const parsed = parseClientMessage(raw);
    if (!parsed.ok) {
      this.log.warn({ error: parsed.error }, 'malformed message');
      const id = idOnly.safeParse(raw);
      this.respond(id.success ? id.data.id : 0, errorEvent(parsed.error));
      return;
    }

    const message = parsed.message;
    if (message.event.type === 'request_join') {
      this.requestJoin(message.id);
      return;
    }
    if (this.playerId === null || !this.channel) {
      this.respond(message.id, errorEvent('join the game first'));
      return;
    }
    if (!this.channel.push({ type: 'in', playerId: this.playerId, message })) {
      this.respond(message.id, errorEvent('the match is over'));
    }
  }

  onDisconnect(reason: string) {
    this.log.info({ playerId: this.playerId, reason }, 'connection lost');
    this.channel?.push({ type: 'connection_lost', connectionId: this.connectionId, playerId: this.playerId });
  }

  private requestJoin(requestId: EventId) {
    if (this.channel) {
      this.respond(requestId, errorEvent('already joined'));
      return;
    }
    const channel = this.lobby();
    if (!channel.push({ type: 'request_join', requestId, link: this })) {
      this.respond(requestId, errorEvent('the server is shutting down'));
      return;
    }
    this.channel = channel;
  }
}
