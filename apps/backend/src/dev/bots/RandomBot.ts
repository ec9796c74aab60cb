import { io, type Socket } from 'socket.io-client';
import { formatCardView } from '../../game/card';
import type { Rng } from '../../game/rng';
import type { PlayerId } from '../../game/types';
import { logger, type Logger } from '../../logger';
import type { EventId, WithMetadata } from '../../protocol/envelope';
import { EventHandler } from '../../protocol/eventHandler';
import {
  joinedPlayerId,
  type ClientBoundEvents,
  type ClientToServerEvent,
  type ServerBoundEvents,
  type ServerMessage,
  type ServerToClientEvent,
} from '../../protocol/messages';
import { BoardMirror } from './boardMirror';
import { decideResponse } from './decide';

export type RandomBotOptions = {
  attackAgainProbability?: number;
  delayMs?: number;
  rng?: Rng;
  log?: Logger;
};

/** Joins a room and answers every game event with a random legal move. */
export class RandomBot {
  socket: Socket<ClientBoundEvents, ServerBoundEvents> | null = null;
  playerId: PlayerId | null = null;
  readonly board = new BoardMirror();
  private readonly events: EventHandler<ServerToClientEvent, ClientToServerEvent>;
  private joinRequestId: EventId | null = null;
  private readonly log: Logger;
  private readonly rng: Rng;

  constructor(
    readonly name: string,
    private readonly options: RandomBotOptions = {},
  ) {
    this.rng = options.rng ?? Math.random;
    this.log = (options.log ?? logger).child({ bot: name });
    this.events = new EventHandler((message) => {
      this.socket?.emit('message', message);
    });
  }

  /** Resolves when the server closes the connection. */
  connect(url = 'http://localhost:54345'): Promise<void> {
    const socket: Socket<ClientBoundEvents, ServerBoundEvents> = io(url, { transports: ['websocket'], reconnection: false });
    this.socket = socket;
    socket.on('connect', () => this.join());
    socket.on('message', (message) => this.receive(message));
    return new Promise((resolve) => {
      socket.on('connect_error', (err) => {
        this.log.warn({ err: err.message }, 'could not connect');
        resolve();
      });
      socket.on('disconnect', (reason) => {
        this.log.info({ reason, playerId: this.playerId, gameOver: this.board.isOver() }, 'disconnected');
        resolve();
      });
    });
  }

  join() {
    this.joinRequestId = this.events.send({ type: 'request_join' });
  }

  receive(message: ServerMessage) {
    this.events.receive(message);
    this.checkJoin();
    for (let next = this.events.takeRequestWhere(() => true); next; next = this.events.takeRequestWhere(() => true)) {
      this.handleRequest(next);
    }
  }

  private checkJoin() {
    if (this.joinRequestId === null) return;
    const answer = this.events.takeResponse(this.joinRequestId);
    if (!answer) return;
    this.joinRequestId = null;
    if (answer.event.type === 'request_join_accepted') {
      this.playerId = joinedPlayerId(answer.event.payload);
      this.log.info({ playerId: this.playerId, joined: answer.event.payload.joinedPlayer.type }, 'joined');
    } else {
      this.log.warn({ answer: answer.event }, 'join refused');
    }
  }

  private handleRequest(request: WithMetadata<ServerToClientEvent>) {
    const event = request.event;
    switch (event.type) {
      case 'game_event': {
        this.board.apply(event.payload);
        if (this.playerId === null) return;
        if (event.payload.type === 'game_ended') {
          const fields = this.board.playerIds().map((id) => ({ id, field: this.board.field(id).map(formatCardView).join(' ') }));
          this.log.info({ fields }, 'game over');
        }
        const payload = decideResponse(event.payload, {
          self: this.playerId,
          board: this.board,
          attackAgainProbability: this.options.attackAgainProbability ?? 0.5,
          rng: this.rng,
        });
        const answer = () => this.events.respond(request, { type: 'game_event_response', payload });
        const delay = this.options.delayMs ?? 0;
        if (delay > 0) setTimeout(answer, delay);
        else answer();
        break;
      }
      case 'player_joined':
      case 'player_disconnected':
      case 'request_join_accepted':
        this.log.info({ event: event.type }, 'room update');
        break;
      case 'server_shutdown':
        this.log.info('server is shutting down');
        break;
      case 'error':
        this.log.warn({ message: event.payload.message }, 'server error');
        break;
    }
  }

  disconnect() {
    this.socket?.disconnect();
  }
}
