import { CARD_COLORS, type Card, type CardColor, type CardNumber, type CardView, type PlayerId } from './types';

export function createCard(number: CardNumber, color: CardColor): Card {
  return { pubInfo: { color, revealed: false }, privInfo: { number } };
}

/** Cross product of `0..=maxNumber` and `colors`, numbers outermost. */
export function createCards(maxNumber: CardNumber, colors: readonly CardColor[]): Card[] {
  const cards: Card[] = [];
  for (let n = 0; n <= maxNumber; n++) {
    for (const c of colors) cards.push(createCard(n, c));
  }
  return cards;
}

export function compareCards(a: Card, b: Card): number {
  if (a.privInfo.number !== b.privInfo.number) return a.privInfo.number - b.privInfo.number;
  return CARD_COLORS.indexOf(a.pubInfo.color) - CARD_COLORS.indexOf(b.pubInfo.color);
}

export function cloneCard(card: Card): Card {
  return { pubInfo: { ...card.pubInfo }, privInfo: { ...card.privInfo } };
}

export function revealCard(card: Card) {
  card.pubInfo.revealed = true;
}

export function fullView(card: Card): CardView {
  return { pubInfo: { ...card.pubInfo }, privInfo: { ...card.privInfo } };
}

/** What anybody at the table can see. */
export function publicView(card: Card): CardView {
  if (card.pubInfo.revealed) return fullView(card);
  return { pubInfo: { ...card.pubInfo }, privInfo: null };
}

export function viewCard(card: Card, owner: PlayerId, viewer: PlayerId): CardView {
  return owner === viewer ? fullView(card) : publicView(card);
}

/** Strips the number from an already built view unless the card is face up. */
export function redactView(view: CardView): CardView {
  if (view.pubInfo.revealed) return view;
  return { pubInfo: { ...view.pubInfo }, privInfo: null };
}

// e.g. "black-7", "white-?"
export function formatCardView(view: CardView): string {
  return `${view.pubInfo.color}-${view.privInfo ? view.privInfo.number : '?'}`;
}

/**
 * Parses `<color>-<number|?>[-U|-D]`. The optional suffix says whether the
 * card lies face up (U, the default for known numbers) or face down (D).
 */
export function parseCardView(text: string): CardView {
  const [rawColor, rawNumber, rawSide] = text.split('-').map((s) => s.trim().toLowerCase());
  const color = CARD_COLORS.find((c) => c === rawColor);
  if (!color) throw new Error(`unknown card color: ${rawColor}`);
  if (rawNumber === undefined || rawNumber === '') throw new Error(`card number is missing: ${text}`);
  if (rawNumber === '?') return { pubInfo: { color, revealed: false }, privInfo: null };

  const number = Number(rawNumber);
  if (!Number.isInteger(number) || number < 0) throw new Error(`invalid card number: ${rawNumber}`);
  const revealed = rawSide !== 'd';
  return { pubInfo: { color, revealed }, privInfo: { number } };
}
