import { cloneCard, fullView, revealCard } from './card';
import { ConstructionError, InvariantViolation, ResponseError, SequenceError } from './errors';
import {
  EventQueue,
  decisionFor,
  isDecisionRequired,
  viewEvent,
  type BoardChange,
  type Decision,
  type DecisionRequest,
  type GameEvent,
} from './events';
import { Player, TurnOrder } from './player';
import { shuffleInPlace, type Rng } from './rng';
import { buildCards, defaultSettings } from './settings';
import { Talon } from './talon';
import type { BoardView, Card, CardNumber, GameSettings, PlayerId, PlayerView } from './types';

export type GameOptions = {
  rng?: Rng;
};

type AttackContext = {
  targetPlayer: PlayerId | null;
  targetCardIdx: number | null;
  guess: CardNumber | null;
};

function emptyAttack(): AttackContext {
  return { targetPlayer: null, targetCardIdx: null, guess: null };
}

function boardChanged(change: BoardChange): GameEvent {
  return { type: 'board_changed', payload: change };
}

/**
 * The authoritative state machine of a match.
 *
 * The engine is stepped from outside: `nextEvent` stages one event and hands
 * out a per-player view of it, every player answers through
 * `storePlayerResponse`, and `processEvent` verifies the answers, applies the
 * staged event and schedules what follows. Nothing is drawn from the queue
 * while an event is staged.
 */
export class Game {
  private attack: AttackContext = emptyAttack();
  private staged: GameEvent | null = null;
  private readonly queue: EventQueue<GameEvent>;
  private readonly responses: Map<PlayerId, GameEvent | null>;
  private readonly processed: GameEvent[] = [];

  private constructor(
    private readonly settings: GameSettings,
    private readonly talon: Talon,
    private readonly players: Map<PlayerId, Player>,
    private readonly turn: TurnOrder,
  ) {
    this.queue = new EventQueue<GameEvent>([{ type: 'game_started', payload: { talon: talon.view() } }]);
    this.responses = new Map([...players.keys()].map((id): [PlayerId, GameEvent | null] => [id, null]));
  }

  /**
   * Creates a game for two players. The talon and the turn order are
   * shuffled with `options.rng` (Math.random by default).
   */
  static forTwoPlayers(playerIds: [PlayerId, PlayerId], settings: GameSettings = defaultSettings(), options: GameOptions = {}): Game {
    const [a, b] = playerIds;
    if (a === b) {
      throw new ConstructionError('duplicated_player_id', `player id ${a}`);
    }
    const rng = options.rng ?? Math.random;

    const talon = new Talon(buildCards(settings));
    talon.shuffle(rng);

    const order: PlayerId[] = [a, b];
    shuffleInPlace(order, rng);

    const players = new Map([a, b].sort((x, y) => x - y).map((id): [PlayerId, Player] => [id, new Player()]));
    return new Game({ ...settings, cardColors: [...settings.cardColors] }, talon, players, new TurnOrder(order));
  }

  // ---- stepping ----

  /** Stages the next event and returns it as each player may see it. */
  nextEvent(): Map<PlayerId, GameEvent> {
    if (this.staged) throw new SequenceError('event_processing');
    const event = this.queue.popNext();
    if (!event) throw new SequenceError('no_more_event');

    this.staged = event;
    const views = new Map<PlayerId, GameEvent>();
    for (const id of this.responses.keys()) views.set(id, viewEvent(event, id));
    return views;
  }

  /** Records a player's answer; returns true once every player has answered. */
  storePlayerResponse(player: PlayerId, response: GameEvent): boolean {
    if (!this.responses.has(player)) throw new SequenceError('unknown_player', `player ${player}`);
    if (!this.staged) throw new SequenceError('no_staged_event');
    this.responses.set(player, response);
    return this.hasAllPlayersResponded();
  }

  /**
   * Verifies the stored answers and applies the staged event.
   * On a ResponseError nothing changes: the event stays staged and the
   * answers stay stored until the caller discards or replaces them.
   */
  processEvent() {
    const event = this.staged;
    const responses = this.collectResponses();
    if (!event || !responses) throw new SequenceError('not_ready');

    const decision = this.verifyResponses(event, responses);
    this.apply(event, decision);
    this.finishEvent(event);
  }

  discardPlayerResponse(player: PlayerId) {
    if (!this.responses.has(player)) throw new SequenceError('unknown_player', `player ${player}`);
    this.responses.set(player, null);
  }

  // ---- inspection ----

  stagedEvent(): GameEvent | null {
    return this.staged;
  }

  stagedEventFor(player: PlayerId): GameEvent | null {
    if (!this.responses.has(player)) throw new SequenceError('unknown_player', `player ${player}`);
    return this.staged ? viewEvent(this.staged, player) : null;
  }

  pendingPlayers(): PlayerId[] {
    return [...this.responses].filter(([, r]) => r === null).map(([id]) => id);
  }

  playerIds(): PlayerId[] {
    return [...this.players.keys()];
  }

  turnOrder(): PlayerId[] {
    return this.turn.order();
  }

  currentTurnPlayer(): PlayerId {
    return this.turn.current();
  }

  history(): readonly GameEvent[] {
    return this.processed;
  }

  isOver() {
    return this.processed[this.processed.length - 1]?.type === 'game_ended';
  }

  getSettings(): GameSettings {
    return { ...this.settings, cardColors: [...this.settings.cardColors] };
  }

  /** Board as seen by `viewer`: their own cards in full, everybody else's redacted. */
  viewBoard(viewer: PlayerId): BoardView {
    const myself = this.players.get(viewer);
    if (!myself) throw new SequenceError('unknown_player', `player ${viewer}`);

    const otherPlayers: Record<PlayerId, PlayerView> = {};
    for (const [id, player] of this.players) {
      if (id !== viewer) otherPlayers[id] = player.publicView();
    }
    return {
      myself: myself.snapshot(),
      otherPlayers,
      talonRemaining: this.talon.length,
      talonTop: this.talon.viewTop(),
    };
  }

  // ---- internals ----

  private hasAllPlayersResponded() {
    return [...this.responses.values()].every((r) => r !== null);
  }

  private collectResponses(): Map<PlayerId, GameEvent> | null {
    const collected = new Map<PlayerId, GameEvent>();
    for (const [id, response] of this.responses) {
      if (!response) return null;
      collected.set(id, response);
    }
    return collected;
  }

  private playerOf(id: PlayerId): Player {
    const player = this.players.get(id);
    if (!player) throw new InvariantViolation(`unknown player ${id}`);
    return player;
  }

  private opponentOf(id: PlayerId): PlayerId {
    const other = [...this.players.keys()].find((p) => p !== id);
    if (other === undefined) throw new InvariantViolation(`player ${id} has no opponent`);
    return other;
  }

  /** Returns the turn player's decision when the staged event asked for one. */
  private verifyResponses(event: GameEvent, responses: Map<PlayerId, GameEvent>): Decision | null {
    const turnPlayer = this.turn.current();
    let decision: Decision | null = null;
    for (const [player, response] of responses) {
      if (isDecisionRequired(event) && player === turnPlayer) {
        decision = this.verifyDecision(event, player, response);
      } else if (response.type !== 'resp_ok') {
        throw new ResponseError(player, 'resp_ok', response, 'unexpected_kind');
      }
    }
    return decision;
  }

  private verifyDecision(request: DecisionRequest, player: PlayerId, response: GameEvent): Decision {
    const expected = decisionFor(request.type);
    switch (request.type) {
      case 'attack_target_selection_required': {
        if (response.type !== 'attack_target_selected') throw new ResponseError(player, expected, response, 'unexpected_kind');
        const field = this.playerOf(request.payload.targetPlayer).field;
        const idx = response.payload.targetIdx;
        if (!Number.isInteger(idx) || idx < 0 || idx >= field.length) {
          throw new ResponseError(player, expected, response, 'target_out_of_range');
        }
        if (field[idx].pubInfo.revealed) throw new ResponseError(player, expected, response, 'target_already_revealed');
        return response;
      }
      case 'number_guess_required': {
        if (response.type !== 'number_guessed') throw new ResponseError(player, expected, response, 'unexpected_kind');
        const n = response.payload.number;
        if (!Number.isInteger(n) || n < 0 || n > this.settings.maxCardNumber) {
          throw new ResponseError(player, expected, response, 'guess_out_of_range');
        }
        return response;
      }
      case 'attack_or_stay_decision_required': {
        if (response.type !== 'attack_or_stay_decided') throw new ResponseError(player, expected, response, 'unexpected_kind');
        return response;
      }
    }
  }

  private targetCard(): { player: PlayerId; idx: number; card: Card } {
    const { targetPlayer, targetCardIdx } = this.attack;
    if (targetPlayer === null || targetCardIdx === null) throw new InvariantViolation('no attack target selected');
    const card = this.playerOf(targetPlayer).field[targetCardIdx];
    if (!card) throw new InvariantViolation(`no card at index ${targetCardIdx}`);
    return { player: targetPlayer, idx: targetCardIdx, card };
  }

  private drawForDeal(): Card {
    const card = this.talon.draw();
    if (!card) throw new InvariantViolation('talon ran out while dealing');
    return card;
  }

  private foldAttacker(player: PlayerId) {
    const owner = this.playerOf(player);
    const card = owner.takeAttacker();
    const insertAt = owner.insertCardToField(card);
    this.queue.pushSub(boardChanged({ type: 'card_moved', player, movement: { type: 'attacker_to_field', insertAt }, card: fullView(card) }));
  }

  private apply(event: GameEvent, decision: Decision | null) {
    const q = this.queue;
    switch (event.type) {
      case 'game_started': {
        const order = this.turn.order();
        q.pushMain({ type: 'turn_order_determined', payload: { order } });
        for (let i = 0; i < this.settings.initialDrawNum; i++) {
          for (const playerId of order) q.pushMain({ type: 'card_distributed', payload: { playerId } });
        }
        q.pushMain({ type: 'turn_started', payload: { playerId: this.turn.current() } });
        break;
      }
      case 'card_distributed': {
        const { playerId } = event.payload;
        const card = this.drawForDeal();
        const insertAt = this.playerOf(playerId).insertCardToField(card);
        q.pushSub(boardChanged({ type: 'card_moved', player: playerId, movement: { type: 'talon_to_field', insertAt }, card: fullView(card) }));
        break;
      }
      case 'turn_started':
        q.pushMain({ type: 'turn_player_drew_card' });
        break;
      case 'turn_player_drew_card': {
        const card = this.talon.draw();
        if (!card) {
          q.pushMain({ type: 'no_cards_left' });
          break;
        }
        const turnPlayer = this.turn.current();
        this.playerOf(turnPlayer).insertAttacker(card);
        q.pushSub(boardChanged({ type: 'card_moved', player: turnPlayer, movement: { type: 'talon_to_attacker' }, card: fullView(card) }));
        q.pushMain({ type: 'attack_target_selection_required', payload: { targetPlayer: this.opponentOf(turnPlayer) } });
        break;
      }
      case 'no_cards_left':
        q.pushMain({ type: 'game_ended' });
        break;
      case 'attack_target_selection_required': {
        if (!decision || decision.type !== 'attack_target_selected') throw new InvariantViolation('target selection was not verified');
        this.attack = { targetPlayer: event.payload.targetPlayer, targetCardIdx: decision.payload.targetIdx, guess: null };
        q.pushMain(decision);
        break;
      }
      case 'attack_target_selected':
        q.pushMain({ type: 'number_guess_required' });
        break;
      case 'number_guess_required': {
        if (!decision || decision.type !== 'number_guessed') throw new InvariantViolation('guess was not verified');
        this.attack.guess = decision.payload.number;
        q.pushMain(decision);
        break;
      }
      case 'number_guessed': {
        const { card } = this.targetCard();
        q.pushMain(card.privInfo.number === this.attack.guess ? { type: 'attack_succeeded' } : { type: 'attack_failed' });
        break;
      }
      case 'attack_succeeded': {
        const { player, idx, card } = this.targetCard();
        revealCard(card);
        q.pushSub(boardChanged({ type: 'card_revealed', player, location: { type: 'field', idx }, card: cloneCard(card) }));
        this.attack = { targetPlayer: player, targetCardIdx: null, guess: null };
        if (this.playerOf(player).isFieldFullyRevealed()) {
          q.pushMain({ type: 'attacked_player_lost' });
        } else {
          q.pushMain({ type: 'attack_or_stay_decision_required' });
        }
        break;
      }
      case 'attack_failed': {
        const turnPlayer = this.turn.current();
        const attacker = this.playerOf(turnPlayer).attacker;
        if (!attacker) throw new InvariantViolation('attack failed without an attacker');
        revealCard(attacker);
        q.pushSub(boardChanged({ type: 'card_revealed', player: turnPlayer, location: { type: 'attacker' }, card: cloneCard(attacker) }));
        this.foldAttacker(turnPlayer);
        q.pushMain({ type: 'turn_ended' });
        break;
      }
      case 'attacked_player_lost':
        // two players: the other one is the winner
        q.pushMain({ type: 'game_ended' });
        break;
      case 'attack_or_stay_decision_required': {
        if (!decision || decision.type !== 'attack_or_stay_decided') throw new InvariantViolation('attack or stay was not verified');
        q.pushMain(decision);
        break;
      }
      case 'attack_or_stay_decided': {
        const turnPlayer = this.turn.current();
        if (event.payload.attack) {
          const targetPlayer = this.attack.targetPlayer ?? this.opponentOf(turnPlayer);
          q.pushMain({ type: 'attack_target_selection_required', payload: { targetPlayer } });
        } else {
          this.foldAttacker(turnPlayer);
          q.pushMain({ type: 'turn_ended' });
        }
        break;
      }
      case 'turn_ended':
        this.turn.advance();
        this.attack = emptyAttack();
        q.pushMain({ type: 'turn_started', payload: { playerId: this.turn.current() } });
        break;
      case 'board_changed':
      case 'turn_order_determined':
      case 'game_ended':
      case 'resp_ok':
        break;
    }
  }

  private finishEvent(event: GameEvent) {
    this.processed.push(event);
    this.staged = null;
    for (const id of this.responses.keys()) this.responses.set(id, null);
  }
}
