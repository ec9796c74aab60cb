import type { PlayerId } from '../game/types';
import type { EventId } from '../protocol/envelope';
import type { ClientMessage, ServerToClientEvent } from '../protocol/messages';

/**
 * The server side of one connection as the lobby and the match see it.
 * Outbound ids are scoped to the connection.
 */
export interface PlayerLink {
  readonly connectionId: string;
  send(event: ServerToClientEvent): EventId;
  respond(requestId: EventId, event: ServerToClientEvent): void;
  /** Binds the connection to its seat; later inbound messages carry `playerId`. */
  assign(playerId: PlayerId): void;
  close(): void;
}

export type ServerInternalEvent =
  | { type: 'in'; playerId: PlayerId; message: ClientMessage }
  | { type: 'request_join'; requestId: EventId; link: PlayerLink }
  | { type: 'connection_lost'; connectionId: string; playerId: PlayerId | null };
