import type { GameEvent } from '../game/events';
import type { PlayerId } from '../game/types';
import type { WithMetadata } from './envelope';

export type JoinedPlayer =
  | { type: 'first'; playerId: PlayerId }
  | { type: 'second'; justJoined: PlayerId; waitingPlayer: PlayerId };

export type JoinInfo = {
  joinedPlayer: JoinedPlayer;
  roomSize: number;
};

export type ClientToServerEvent =
  | { type: 'request_join' }
  | { type: 'game_event_response'; payload: GameEvent };

export type ServerToClientEvent =
  | { type: 'request_join_accepted'; payload: JoinInfo }
  | { type: 'player_joined'; payload: JoinInfo }
  | { type: 'player_disconnected'; payload: { playerId: PlayerId } }
  | { type: 'game_event'; payload: GameEvent }
  | { type: 'server_shutdown' }
  | { type: 'error'; payload: { message: string } };

export type ClientMessage = WithMetadata<ClientToServerEvent>;
export type ServerMessage = WithMetadata<ServerToClientEvent>;

/** socket.io event maps; every envelope travels as a single `message` event. */
export interface ServerBoundEvents {
  message: (message: unknown) => void;
}

export interface ClientBoundEvents {
  message: (message: ServerMessage) => void;
}

export function errorEvent(message: string): ServerToClientEvent {
  return { type: 'error', payload: { message } };
}

/** The player id a join info hands to the player who just joined. */
export function joinedPlayerId(info: JoinInfo): PlayerId {
  return info.joinedPlayer.type === 'first' ? info.joinedPlayer.playerId : info.joinedPlayer.justJoined;
}
