import { describe, it, expect } from 'vitest';
import { createCard } from './card';
import { InvariantViolation } from './errors';
import { Player, PlayerIdAllocator, TurnOrder } from './player';

describe('Player', () => {
  it('keeps the field sorted and reports insert positions', () => {
    const player = new Player();
    expect(player.insertCardToField(createCard(5, 'white'))).toBe(0);
    expect(player.insertCardToField(createCard(2, 'black'))).toBe(0);
    expect(player.insertCardToField(createCard(5, 'black'))).toBe(1);
    expect(player.field.map((c) => `${c.pubInfo.color}-${c.privInfo.number}`)).toEqual(['black-2', 'black-5', 'white-5']);
  });

  it('treats a duplicate card as a broken invariant', () => {
    const player = new Player();
    player.insertCardToField(createCard(4, 'black'));
    expect(() => player.insertCardToField(createCard(4, 'black'))).toThrow(InvariantViolation);
    expect(player.field).toHaveLength(1);
  });

  it('holds at most one attacker', () => {
    const player = new Player();
    expect(() => player.takeAttacker()).toThrow(InvariantViolation);
    player.insertAttacker(createCard(1, 'white'));
    expect(() => player.insertAttacker(createCard(2, 'white'))).toThrow(InvariantViolation);
    expect(player.takeAttacker().privInfo.number).toBe(1);
    expect(player.attacker).toBeNull();
  });

  it('knows when the whole field is face up', () => {
    const player = new Player();
    expect(player.isFieldFullyRevealed()).toBe(true);
    player.insertCardToField(createCard(0, 'black'));
    expect(player.isFieldFullyRevealed()).toBe(false);
    player.field[0].pubInfo.revealed = true;
    expect(player.isFieldFullyRevealed()).toBe(true);
  });

  it('hides unrevealed cards in its public view', () => {
    const player = new Player();
    player.insertCardToField(createCard(3, 'black'));
    player.insertAttacker(createCard(8, 'white'));
    expect(player.publicView()).toEqual({
      field: [{ pubInfo: { color: 'black', revealed: false }, privInfo: null }],
      attacker: { pubInfo: { color: 'white', revealed: false }, privInfo: null },
    });
  });
});

describe('TurnOrder', () => {
  it('comes back to the same order after one advance per player', () => {
    const order = new TurnOrder([4, 9, 2]);
    const before = order.order();
    order.advance();
    expect(order.current()).toBe(9);
    order.advance();
    order.advance();
    expect(order.order()).toEqual(before);
  });

  it('fails on an empty order', () => {
    expect(() => new TurnOrder([]).current()).toThrow(InvariantViolation);
  });
});

describe('PlayerIdAllocator', () => {
  it('hands out increasing ids from 1', () => {
    const ids = new PlayerIdAllocator();
    expect([ids.assign(), ids.assign(), ids.assign()]).toEqual([1, 2, 3]);
  });
});
