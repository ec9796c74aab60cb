import { redactView } from './card';
import type { Card, CardNumber, CardView, PlayerId, TalonView } from './types';

export type CardMovement =
  | { type: 'talon_to_field'; insertAt: number }
  | { type: 'talon_to_attacker' }
  | { type: 'attacker_to_field'; insertAt: number };

// there is no talon location; nothing is ever revealed there
export type CardLocation = { type: 'field'; idx: number } | { type: 'attacker' };

export type BoardChange =
  | { type: 'card_moved'; player: PlayerId; movement: CardMovement; card: CardView }
  | { type: 'card_revealed'; player: PlayerId; location: CardLocation; card: Card };

export type BoardChanged = { type: 'board_changed'; payload: BoardChange };
export type GameStarted = { type: 'game_started'; payload: { talon: TalonView } };
export type TurnOrderDetermined = { type: 'turn_order_determined'; payload: { order: PlayerId[] } };
export type CardDistributed = { type: 'card_distributed'; payload: { playerId: PlayerId } };
export type TurnStarted = { type: 'turn_started'; payload: { playerId: PlayerId } };
export type TurnPlayerDrewCard = { type: 'turn_player_drew_card' };
export type NoCardsLeft = { type: 'no_cards_left' };
export type AttackTargetSelectionRequired = { type: 'attack_target_selection_required'; payload: { targetPlayer: PlayerId } };
export type AttackTargetSelected = { type: 'attack_target_selected'; payload: { targetIdx: number } };
export type NumberGuessRequired = { type: 'number_guess_required' };
export type NumberGuessed = { type: 'number_guessed'; payload: { number: CardNumber } };
export type AttackSucceeded = { type: 'attack_succeeded' };
export type AttackFailed = { type: 'attack_failed' };
export type AttackedPlayerLost = { type: 'attacked_player_lost' };
export type GameEnded = { type: 'game_ended' };
export type AttackOrStayDecisionRequired = { type: 'attack_or_stay_decision_required' };
export type AttackOrStayDecided = { type: 'attack_or_stay_decided'; payload: { attack: boolean } };
export type TurnEnded = { type: 'turn_ended' };
export type RespOk = { type: 'resp_ok' };

export type GameEvent =
  | BoardChanged
  | GameStarted
  | TurnOrderDetermined
  | CardDistributed
  | TurnStarted
  | TurnPlayerDrewCard
  | NoCardsLeft
  | AttackTargetSelectionRequired
  | AttackTargetSelected
  | NumberGuessRequired
  | NumberGuessed
  | AttackSucceeded
  | AttackFailed
  | AttackedPlayerLost
  | GameEnded
  | AttackOrStayDecisionRequired
  | AttackOrStayDecided
  | TurnEnded
  | RespOk;

export type GameEventType = GameEvent['type'];

export type Decision = AttackTargetSelected | NumberGuessed | AttackOrStayDecided;
export type DecisionRequest = AttackTargetSelectionRequired | NumberGuessRequired | AttackOrStayDecisionRequired;

export type ResponseKind = 'acknowledgement' | 'decision';

export const RESP_OK: RespOk = { type: 'resp_ok' };

/** The event is itself a player's decision. */
export function isDecision(event: GameEvent): event is Decision {
  return event.type === 'attack_target_selected' || event.type === 'number_guessed' || event.type === 'attack_or_stay_decided';
}

/** The turn player has to answer this event with a decision. */
export function isDecisionRequired(event: GameEvent): event is DecisionRequest {
  return (
    event.type === 'attack_target_selection_required' ||
    event.type === 'number_guess_required' ||
    event.type === 'attack_or_stay_decision_required'
  );
}

export function expectedResponseKind(event: GameEvent): ResponseKind {
  return isDecisionRequired(event) ? 'decision' : 'acknowledgement';
}

export function decisionFor(request: DecisionRequest['type']): Decision['type'] {
  switch (request) {
    case 'attack_target_selection_required':
      return 'attack_target_selected';
    case 'number_guess_required':
      return 'number_guessed';
    case 'attack_or_stay_decision_required':
      return 'attack_or_stay_decided';
  }
}

function viewBoardChange(change: BoardChange, viewer: PlayerId): BoardChange {
  if (change.type === 'card_moved' && change.player !== viewer) {
    return { ...change, card: redactView(change.card) };
  }
  return change;
}

/** The event as the given viewer is allowed to see it. */
export function viewEvent(event: GameEvent, viewer: PlayerId): GameEvent {
  if (event.type === 'board_changed') {
    return { type: 'board_changed', payload: viewBoardChange(event.payload, viewer) };
  }
  return event;
}

/**
 * Two FIFOs; the sub queue carries board changes that have to reach the
 * players before the next main event.
 */
export class EventQueue<T> {
  private readonly main: T[] = [];
  private readonly sub: T[] = [];

  constructor(initial: Iterable<T> = []) {
    this.main.push(...initial);
  }

  popNext(): T | undefined {
    if (this.sub.length > 0) return this.sub.shift();
    return this.main.shift();
  }

  pushMain(event: T) {
    this.main.push(event);
  }

  pushSub(event: T) {
    this.sub.push(event);
  }

  get size() {
    return this.main.length + this.sub.length;
  }

  isEmpty() {
    return this.size === 0;
  }
}
