import type { GameEvent, GameEventType } from './events';
import type { PlayerId } from './types';

export class GameError<C extends string = string> extends Error {
  constructor(public readonly code: C, message?: string) {
    super(typeof message === 'string' ? `${code} (${message})` : code);
    this.name = 'GameError[' + code + ']';
  }
}

export type ConstructionErrorCode = 'duplicated_player_id' | 'invalid_settings';

/** The game could not be created from the given players and settings. */
export class ConstructionError extends GameError<ConstructionErrorCode> {}

export type SequenceErrorCode =
  | 'event_processing'
  | 'no_more_event'
  | 'not_ready'
  | 'unknown_player'
  | 'no_staged_event';

/** The driver called the engine out of order. */
export class SequenceError extends GameError<SequenceErrorCode> {}

export type ResponseErrorReason =
  | 'unexpected_kind'
  | 'target_out_of_range'
  | 'target_already_revealed'
  | 'guess_out_of_range';

/**
 * A player answered the staged event with something the engine can't accept.
 * The engine state is untouched when this is thrown.
 */
export class ResponseError extends GameError<ResponseErrorReason> {
  constructor(
    public readonly player: PlayerId,
    public readonly expected: GameEventType,
    public readonly received: GameEvent,
    reason: ResponseErrorReason,
  ) {
    super(reason, `player ${player} expected to answer with ${expected}, got ${received.type}`);
  }

  get reason(): ResponseErrorReason {
    return this.code;
  }
}

/** A broken internal invariant; never part of a correctly driven game. */
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolation';
  }
}
