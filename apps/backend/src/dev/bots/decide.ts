import { RESP_OK, isDecisionRequired, type GameEvent } from '../../game/events';
import type { Rng } from '../../game/rng';
import type { PlayerId } from '../../game/types';
import type { BoardMirror } from './boardMirror';

export type DecisionContext = {
  self: PlayerId;
  board: BoardMirror;
  attackAgainProbability: number;
  rng: Rng;
};

function pick<T>(items: readonly T[], rng: Rng): T | undefined {
  return items[Math.floor(rng() * items.length)];
}

/**
 * The answer a bot gives to a game event it was sent. Everything but the
 * turn player's decisions is acknowledged.
 */
export function decideResponse(event: GameEvent, ctx: DecisionContext): GameEvent {
  const { board, rng } = ctx;
  if (!isDecisionRequired(event) || board.currentTurnPlayer() !== ctx.self) return RESP_OK;

  switch (event.type) {
    case 'attack_target_selection_required': {
      const hidden = board
        .field(event.payload.targetPlayer)
        .flatMap((card, idx) => (card.pubInfo.revealed ? [] : [idx]));
      return { type: 'attack_target_selected', payload: { targetIdx: pick(hidden, rng) ?? 0 } };
    }
    case 'number_guess_required': {
      const target = board.attackTarget();
      const card = target && target.idx !== null ? board.field(target.player)[target.idx] : undefined;
      const known = card ? board.knownNumbers(card.pubInfo.color) : new Set<number>();
      const candidates: number[] = [];
      for (let n = 0; n <= board.maxCardNumber(); n++) if (!known.has(n)) candidates.push(n);
      return { type: 'number_guessed', payload: { number: pick(candidates, rng) ?? 0 } };
    }
    case 'attack_or_stay_decision_required': {
      const target = board.attackTarget();
      const hiddenLeft = target ? board.field(target.player).some((c) => !c.pubInfo.revealed) : false;
      return { type: 'attack_or_stay_decided', payload: { attack: hiddenLeft && rng() < ctx.attackAgainProbability } };
    }
  }
}
