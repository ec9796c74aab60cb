import type { BoardChange, GameEvent } from '../../game/events';
import type { CardColor, CardNumber, CardView, PlayerId, PlayerView } from '../../game/types';

export type AttackTarget = { player: PlayerId; idx: number | null };

/** Client-side replica of the table, rebuilt from the game events a player receives. */
export class BoardMirror {
  private readonly players = new Map<PlayerId, PlayerView>();
  private order: PlayerId[] = [];
  private turnPlayer: PlayerId | null = null;
  private target: AttackTarget | null = null;
  private talon = 0;
  private maxNumber: CardNumber = 0;
  private over = false;

  apply(event: GameEvent) {
    switch (event.type) {
      case 'game_started': {
        const { talon } = event.payload;
        this.talon = talon.cardsRemaining;
        const colors = new Set(talon.colors).size;
        this.maxNumber = colors > 0 ? talon.colors.length / colors - 1 : 0;
        break;
      }
      case 'turn_order_determined':
        this.order = [...event.payload.order];
        for (const id of this.order) this.playerView(id);
        break;
      case 'turn_started':
        this.turnPlayer = event.payload.playerId;
        this.target = null;
        break;
      case 'attack_target_selection_required':
        this.target = { player: event.payload.targetPlayer, idx: null };
        break;
      case 'attack_target_selected':
        if (this.target) this.target.idx = event.payload.targetIdx;
        break;
      case 'board_changed':
        this.applyChange(event.payload);
        break;
      case 'game_ended':
        this.over = true;
        break;
      default:
        break;
    }
  }

  private applyChange(change: BoardChange) {
    const view = this.playerView(change.player);
    if (change.type === 'card_revealed') {
      const card: CardView = { pubInfo: { ...change.card.pubInfo }, privInfo: { ...change.card.privInfo } };
      if (change.location.type === 'attacker') view.attacker = card;
      else view.field[change.location.idx] = card;
      return;
    }
    const movement = change.movement;
    switch (movement.type) {
      case 'talon_to_field':
        view.field.splice(movement.insertAt, 0, change.card);
        this.talon -= 1;
        break;
      case 'talon_to_attacker':
        view.attacker = change.card;
        this.talon -= 1;
        break;
      case 'attacker_to_field':
        view.field.splice(movement.insertAt, 0, change.card);
        view.attacker = null;
        break;
    }
  }

  private playerView(id: PlayerId): PlayerView {
    let view = this.players.get(id);
    if (!view) {
      view = { field: [], attacker: null };
      this.players.set(id, view);
    }
    return view;
  }

  field(id: PlayerId): readonly CardView[] {
    return this.players.get(id)?.field ?? [];
  }

  attacker(id: PlayerId): CardView | null {
    return this.players.get(id)?.attacker ?? null;
  }

  playerIds(): PlayerId[] {
    return [...this.order];
  }

  currentTurnPlayer() {
    return this.turnPlayer;
  }

  attackTarget(): AttackTarget | null {
    return this.target ? { ...this.target } : null;
  }

  talonRemaining() {
    return this.talon;
  }

  maxCardNumber() {
    return this.maxNumber;
  }

  isOver() {
    return this.over;
  }

  /** Numbers of `color` that some visible card already shows. */
  knownNumbers(color: CardColor): Set<CardNumber> {
    const known = new Set<CardNumber>();
    for (const view of this.players.values()) {
      for (const card of [...view.field, view.attacker]) {
        if (card && card.privInfo && card.pubInfo.color === color) known.add(card.privInfo.number);
      }
    }
    return known;
  }
}
