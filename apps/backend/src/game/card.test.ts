import { describe, it, expect } from 'vitest';
import { compareCards, createCard, createCards, formatCardView, parseCardView, publicView, redactView, revealCard, viewCard } from './card';

describe('cards', () => {
  it('creates every number in every color', () => {
    const cards = createCards(11, ['black', 'white']);
    expect(cards).toHaveLength(24);
    expect(cards[0]).toEqual({ pubInfo: { color: 'black', revealed: false }, privInfo: { number: 0 } });
    expect(cards[23]).toEqual({ pubInfo: { color: 'white', revealed: false }, privInfo: { number: 11 } });
  });

  it('orders by number, then black before white', () => {
    expect(compareCards(createCard(3, 'white'), createCard(4, 'black'))).toBeLessThan(0);
    expect(compareCards(createCard(4, 'black'), createCard(4, 'white'))).toBeLessThan(0);
    expect(compareCards(createCard(4, 'white'), createCard(4, 'white'))).toBe(0);
  });

  it('hides an unrevealed number from everyone but the owner', () => {
    for (const card of createCards(11, ['black', 'white'])) {
      expect(viewCard(card, 1, 1).privInfo).toEqual({ number: card.privInfo.number });
      expect(viewCard(card, 1, 2).privInfo).toBeNull();
      revealCard(card);
      expect(viewCard(card, 1, 2).privInfo).toEqual({ number: card.privInfo.number });
    }
  });

  it('does not share state between a card and its views', () => {
    const card = createCard(5, 'black');
    const view = publicView(card);
    revealCard(card);
    expect(view.pubInfo.revealed).toBe(false);
  });

  it('redacts an owner view for other viewers', () => {
    const view = viewCard(createCard(9, 'white'), 1, 1);
    expect(redactView(view)).toEqual({ pubInfo: { color: 'white', revealed: false }, privInfo: null });
  });
});

describe('card notation', () => {
  it('formats known and hidden numbers', () => {
    expect(formatCardView({ pubInfo: { color: 'black', revealed: true }, privInfo: { number: 7 } })).toBe('black-7');
    expect(formatCardView({ pubInfo: { color: 'white', revealed: false }, privInfo: null })).toBe('white-?');
  });

  it('parses the face side suffix', () => {
    expect(parseCardView('black-7')).toEqual({ pubInfo: { color: 'black', revealed: true }, privInfo: { number: 7 } });
    expect(parseCardView('White-3-D')).toEqual({ pubInfo: { color: 'white', revealed: false }, privInfo: { number: 3 } });
    expect(parseCardView('white-?')).toEqual({ pubInfo: { color: 'white', revealed: false }, privInfo: null });
  });

  it('rejects bad colors and numbers', () => {
    expect(() => parseCardView('red-1')).toThrow('unknown card color: red');
    expect(() => parseCardView('black-x')).toThrow('invalid card number: x');
    expect(() => parseCardView('black')).toThrow('card number is missing');
  });
});
