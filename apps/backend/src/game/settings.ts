import { createCards } from './card';
import { ConstructionError } from './errors';
import type { Card, GameSettings } from './types';

export const MAX_CARD_NUMBER_FLOOR = 11;
export const MIN_COLOR_VARIANTS = 2;
export const INITIAL_DRAW_NUM = 4;

export function defaultSettings(): GameSettings {
  return {
    cardColors: ['black', 'white'],
    maxCardNumber: MAX_CARD_NUMBER_FLOOR,
    initialDrawNum: INITIAL_DRAW_NUM,
  };
}

/**
 * Builds the full deck for the given settings.
 * Throws a ConstructionError when the settings can't produce a playable game.
 */
export function buildCards(settings: GameSettings): Card[] {
  const { cardColors, maxCardNumber, initialDrawNum } = settings;
  if (cardColors.length < MIN_COLOR_VARIANTS) {
    throw new ConstructionError('invalid_settings', `there must be at least ${MIN_COLOR_VARIANTS} card colors`);
  }
  if (new Set(cardColors).size !== cardColors.length) {
    throw new ConstructionError('invalid_settings', 'card colors must not repeat');
  }
  if (!Number.isInteger(maxCardNumber) || maxCardNumber < MAX_CARD_NUMBER_FLOOR) {
    throw new ConstructionError('invalid_settings', `max card number must be at least ${MAX_CARD_NUMBER_FLOOR}`);
  }
  if (!Number.isInteger(initialDrawNum) || initialDrawNum < 1) {
    throw new ConstructionError('invalid_settings', 'initial draw must be a positive integer');
  }

  const cards = createCards(maxCardNumber, cardColors);
  if (cards.length <= initialDrawNum * 2) {
    throw new ConstructionError('invalid_settings', 'not enough cards to start the game');
  }
  return cards;
}
