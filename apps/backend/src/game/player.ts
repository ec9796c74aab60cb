import { cloneCard, compareCards, publicView } from './card';
import { InvariantViolation } from './errors';
import type { Card, PlayerId, PlayerState, PlayerView } from './types';

export class Player {
  // sorted by (number, color), no duplicates
  readonly field: Card[] = [];
  attacker: Card | null = null;

  /** Inserts keeping the field sorted; returns the index the card landed on. */
  insertCardToField(card: Card): number {
    let lo = 0;
    let hi = this.field.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const cmp = compareCards(this.field[mid], card);
      if (cmp === 0) throw new InvariantViolation(`duplicated card detected: ${card.pubInfo.color}-${card.privInfo.number}`);
      if (cmp < 0) lo = mid + 1;
      else hi = mid;
    }
    this.field.splice(lo, 0, card);
    return lo;
  }

  insertAttacker(card: Card) {
    if (this.attacker) {
      throw new InvariantViolation(`attacker already exists: ${this.attacker.pubInfo.color}-${this.attacker.privInfo.number}`);
    }
    this.attacker = card;
  }

  takeAttacker(): Card {
    const card = this.attacker;
    if (!card) throw new InvariantViolation('no attacker to take');
    this.attacker = null;
    return card;
  }

  isFieldFullyRevealed() {
    return this.field.every((c) => c.pubInfo.revealed);
  }

  snapshot(): PlayerState {
    return {
      field: this.field.map(cloneCard),
      attacker: this.attacker ? cloneCard(this.attacker) : null,
    };
  }

  publicView(): PlayerView {
    return {
      field: this.field.map(publicView),
      attacker: this.attacker ? publicView(this.attacker) : null,
    };
  }
}

/** Rotating turn order; the front is the current turn player. */
export class TurnOrder {
  private ids: PlayerId[];

  constructor(ids: Iterable<PlayerId>) {
    this.ids = [...ids];
  }

  current(): PlayerId {
    const id = this.ids[0];
    if (id === undefined) throw new InvariantViolation('turn order is empty');
    return id;
  }

  advance() {
    const id = this.ids.shift();
    if (id === undefined) throw new InvariantViolation('turn order is empty');
    this.ids.push(id);
  }

  order(): PlayerId[] {
    return [...this.ids];
  }
}

export class PlayerIdAllocator {
  private last: PlayerId = 0;

  assign(): PlayerId {
    this.last += 1;
    return this.last;
  }
}
