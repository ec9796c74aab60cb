import { publicView } from './card';
import { shuffleInPlace, type Rng } from './rng';
import type { Card, CardView, TalonView } from './types';

/** The shared face-down draw pile. The top card is the last element. */
export class Talon {
  private cards: Card[];

  constructor(cards: Card[]) {
    this.cards = [...cards];
  }

  get length() {
    return this.cards.length;
  }

  shuffle(rng: Rng) {
    shuffleInPlace(this.cards, rng);
  }

  draw(): Card | null {
    return this.cards.pop() ?? null;
  }

  viewTop(): CardView | null {
    const top = this.cards[this.cards.length - 1];
    return top ? publicView(top) : null;
  }

  view(): TalonView {
    const top = this.cards[this.cards.length - 1];
    return {
      topCard: top ? { ...top.pubInfo } : null,
      cardsRemaining: this.cards.length,
      colors: this.cards.map((c) => c.pubInfo.color),
    };
  }
}
