export type CardColor = 'black' | 'white';

// lower index sorts first when two cards share a number
export const CARD_COLORS: readonly CardColor[] = ['black', 'white'];

export type CardNumber = number;

export type PlayerId = number;

export type CardPubInfo = {
  color: CardColor;
  revealed: boolean;
};

export type CardPrivInfo = {
  readonly number: CardNumber;
};

export type Card = {
  pubInfo: CardPubInfo;
  privInfo: CardPrivInfo;
};

// what a viewer is allowed to know about a card; privInfo is null when hidden
export type CardView = {
  pubInfo: CardPubInfo;
  privInfo: CardPrivInfo | null;
};

export type TalonView = {
  topCard: CardPubInfo | null;
  cardsRemaining: number;
  colors: CardColor[]; // bottom first, top last
};

export type PlayerState = {
  field: Card[];
  attacker: Card | null;
};

export type PlayerView = {
  field: CardView[];
  attacker: CardView | null;
};

export type BoardView = {
  myself: PlayerState;
  otherPlayers: Record<PlayerId, PlayerView>;
  talonRemaining: number;
  talonTop: CardView | null;
};

export type GameSettings = {
  cardColors: CardColor[];
  maxCardNumber: CardNumber;
  initialDrawNum: number; // cards dealt to each player before the first turn
};
