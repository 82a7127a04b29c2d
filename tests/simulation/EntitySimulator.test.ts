import { describe, it, expect } from 'vitest';
import { simulate, type SimAction, type SimEntity } from '../../src/simulation/EntitySimulator';
import { DeadlineExceededError } from '../../src/core/Errors';
import { Deadline } from '../../src/core/Deadline';
import type { PlayerState } from '../../src/core/Types';
import { loadDefaultEntityRules, type EntityRules } from '../../src/config/EntityRules';
import { entity, FakeClock, ME, ENEMY } from '../helpers/fixtures';

function players(myResource = 0): PlayerState[] {
  return [
    { id: ME, score: 0, resource: myResource },
    { id: ENEMY, score: 0, resource: 0 },
  ];
}

function actions(...pairs: [number, SimAction][]): Map<number, SimAction> {
  return new Map(pairs);
}

function find(list: readonly SimEntity[], id: number): SimEntity | undefined {
  return list.find(e => e.id === id);
}

const defaults = loadDefaultEntityRules();

/** Rules where melee hits and builders harvest for far more than any health pool. */
const heavy: EntityRules = {
  ...defaults,
  meleeUnit: { ...defaults.meleeUnit, attack: { range: 1, damage: 1000, harvests: false } },
  builderUnit: { ...defaults.builderUnit, attack: { range: 1, damage: 1000, harvests: true } },
};

describe('simulate', () => {
  describe('movement', () => {
    it('advances one cell per tick toward the target', () => {
      const result = simulate(
        [entity(1, 'builderUnit', ME, 0, 0)],
        actions([1, { kind: 'move', target: { x: 3, y: 0 } }]),
        2,
        { players: players() },
      );
      expect(result.tick).toBe(2);
      expect(find(result.entities, 1)?.position).toEqual({ x: 2, y: 0 });
    });

    it('follows the given route', () => {
      const route = [{ x: 0, y: 0 }, { x: 0, y: 1 }, { x: 1, y: 1 }];
      const result = simulate(
        [entity(1, 'builderUnit', ME, 0, 0)],
        actions([1, { kind: 'move', target: { x: 1, y: 1 }, route }]),
        1,
        { players: players() },
      );
      expect(find(result.entities, 1)?.position).toEqual({ x: 0, y: 1 });
    });

    it('gives a contested cell to the lower id', () => {
      const result = simulate(
        [entity(1, 'builderUnit', ME, 0, 0), entity(2, 'builderUnit', ME, 2, 0)],
        actions(
          [1, { kind: 'move', target: { x: 1, y: 0 } }],
          [2, { kind: 'move', target: { x: 1, y: 0 } }],
        ),
        1,
        { players: players() },
      );
      expect(find(result.entities, 1)?.position).toEqual({ x: 1, y: 0 });
      expect(find(result.entities, 2)?.position).toEqual({ x: 2, y: 0 });
    });

    it('lets a unit step into a cell vacated the same tick', () => {
      const result = simulate(
        [entity(1, 'builderUnit', ME, 0, 0), entity(2, 'builderUnit', ME, 1, 0)],
        actions(
          [1, { kind: 'move', target: { x: 1, y: 0 } }],
          [2, { kind: 'move', target: { x: 2, y: 0 } }],
        ),
        1,
        { players: players() },
      );
      expect(find(result.entities, 1)?.position).toEqual({ x: 1, y: 0 });
      expect(find(result.entities, 2)?.position).toEqual({ x: 2, y: 0 });
    });

    it('does not walk off the map', () => {
      const result = simulate(
        [entity(1, 'builderUnit', ME, 0, 0)],
        actions([1, { kind: 'move', target: { x: -3, y: 0 } }]),
        1,
        { players: players() },
      );
      expect(find(result.entities, 1)?.position).toEqual({ x: 0, y: 0 });
    });
  });

  describe('combat', () => {
    it('resolves strikes simultaneously and credits the destroyer', () => {
      const result = simulate(
        [entity(1, 'meleeUnit', ME, 0, 0), entity(2, 'rangedUnit', ENEMY, 1, 0)],
        actions([1, { kind: 'attack', targetId: 2 }]),
        2,
        { players: players() },
      );
      // the ranged unit auto-attacks back on both ticks, including the tick it dies
      expect(find(result.entities, 1)?.health).toBe(40);
      expect(find(result.entities, 2)).toBeUndefined();
      expect(result.destroyed).toEqual([2]);
      expect(result.players).toEqual([
        { id: ME, resource: 0, score: 30, damageDone: 10, damageReceived: 10, produced: 0 },
        { id: ENEMY, resource: 0, score: 0, damageDone: 10, damageReceived: 10, produced: 0 },
      ]);
    });

    it('counts only the health a target had when damage overshoots', () => {
      const result = simulate(
        [entity(1, 'meleeUnit', ME, 0, 0), entity(2, 'builderUnit', ENEMY, 1, 0)],
        actions([1, { kind: 'attack', targetId: 2 }], [2, { kind: 'none' }]),
        1,
        { players: players(), rules: heavy },
      );
      expect(result.destroyed).toEqual([2]);
      expect(result.players).toEqual([
        { id: ME, resource: 0, score: 10, damageDone: 10, damageReceived: 0, produced: 0 },
        { id: ENEMY, resource: 0, score: 0, damageDone: 0, damageReceived: 10, produced: 0 },
      ]);
    });

    it('skips an attack on a target that is already gone', () => {
      const result = simulate(
        [entity(1, 'meleeUnit', ME, 0, 0)],
        actions([1, { kind: 'attack', targetId: 42 }]),
        1,
        { players: players() },
      );
      expect(result.skipped).toEqual([1]);
    });

    it('leaves inactive buildings idle', () => {
      const result = simulate(
        [entity(1, 'meleeUnit', ME, 0, 0), entity(2, 'turret', ENEMY, 2, 0, { active: false })],
        new Map(),
        1,
        { players: players() },
      );
      // the melee unit steps toward the turret; the turret does not fire
      expect(find(result.entities, 1)?.health).toBe(50);
      expect(find(result.entities, 1)?.position).toEqual({ x: 1, y: 0 });
    });
  });

  describe('economy', () => {
    it('turns gathered health into resource', () => {
      const result = simulate(
        [entity(1, 'builderUnit', ME, 0, 0), entity(5, 'resource', null, 1, 0)],
        actions([1, { kind: 'gather', targetId: 5 }]),
        3,
        { players: players() },
      );
      expect(result.players[0].resource).toBe(3);
      expect(find(result.entities, 5)?.health).toBe(27);
    });

    it('stops once the resource is exhausted', () => {
      const result = simulate(
        [entity(1, 'builderUnit', ME, 0, 0), entity(5, 'resource', null, 1, 0, { health: 2 })],
        actions([1, { kind: 'gather', targetId: 5 }]),
        3,
        { players: players() },
      );
      expect(result.players[0].resource).toBe(2);
      expect(result.destroyed).toEqual([5]);
      expect(result.skipped).toEqual([1]);
    });

    it('gathers no more than the resource holds', () => {
      const result = simulate(
        [entity(1, 'builderUnit', ME, 0, 0), entity(5, 'resource', null, 1, 0, { health: 7 })],
        actions([1, { kind: 'gather', targetId: 5 }]),
        1,
        { players: players(), rules: heavy },
      );
      expect(result.players[0].resource).toBe(7);
      expect(result.destroyed).toEqual([5]);
    });

    it('produces a unit once and pays for it', () => {
      const result = simulate(
        [entity(1, 'builderBase', ME, 0, 0)],
        actions([1, { kind: 'produce', entityKind: 'builderUnit', target: { x: 5, y: 0 } }]),
        2,
        { players: players(25) },
      );
      // second tick finds the cell taken
      expect(result.players[0].resource).toBe(15);
      expect(result.players[0].produced).toBe(1);
      expect(find(result.entities, -1)).toEqual({
        id: -1, kind: 'builderUnit', owner: ME, position: { x: 5, y: 0 }, health: 10, active: true,
      });
    });

    it('does not produce without resource', () => {
      const result = simulate(
        [entity(1, 'builderBase', ME, 0, 0)],
        actions([1, { kind: 'produce', entityKind: 'builderUnit', target: { x: 5, y: 0 } }]),
        1,
        { players: players(5) },
      );
      expect(result.entities).toHaveLength(1);
      expect(result.players[0]).toEqual({ id: ME, resource: 5, score: 0, damageDone: 0, damageReceived: 0, produced: 0 });
    });

    it('never spends into debt across bases', () => {
      const result = simulate(
        [entity(1, 'builderBase', ME, 0, 0), entity(2, 'builderBase', ME, 10, 0)],
        actions(
          [1, { kind: 'produce', entityKind: 'builderUnit', target: { x: 5, y: 0 } }],
          [2, { kind: 'produce', entityKind: 'builderUnit', target: { x: 15, y: 0 } }],
        ),
        1,
        { players: players(15) },
      );
      // the first base pays 10, the second cannot afford another
      expect(result.players[0]).toMatchObject({ resource: 5, produced: 1 });
      expect(result.entities.map(e => e.id)).toEqual([-1, 1, 2]);
    });

    it('places a new building at minimal health, inactive', () => {
      const result = simulate(
        [entity(1, 'builderUnit', ME, 0, 0)],
        actions([1, { kind: 'build', entityKind: 'house', target: { x: 1, y: 0 } }]),
        1,
        { players: players(50) },
      );
      expect(result.players[0].resource).toBe(0);
      expect(find(result.entities, -1)).toEqual({
        id: -1, kind: 'house', owner: ME, position: { x: 1, y: 0 }, health: 1, active: false,
      });
    });

    it('repairs to full health and activates the building', () => {
      const result = simulate(
        [entity(1, 'builderUnit', ME, 0, 0), entity(3, 'house', ME, 1, 0, { health: 48, active: false })],
        actions([1, { kind: 'repair', targetId: 3 }]),
        2,
        { players: players() },
      );
      expect(find(result.entities, 3)).toMatchObject({ health: 50, active: true });
    });
  });

  describe('bookkeeping', () => {
    it('reports actions for absent entities as skipped', () => {
      const result = simulate([], actions([99, { kind: 'none' }]), 1, { players: players() });
      expect(result.skipped).toEqual([99]);
    });

    it('does not modify the input entities', () => {
      const input = [entity(1, 'builderUnit', ME, 0, 0)];
      simulate(input, actions([1, { kind: 'move', target: { x: 3, y: 0 } }]), 2, { players: players() });
      expect(input[0].position).toEqual({ x: 0, y: 0 });
    });

    it('throws once the deadline expires', () => {
      const clock = new FakeClock();
      expect(() => simulate(
        [entity(1, 'builderUnit', ME, 0, 0)],
        new Map(),
        3,
        { players: players(), deadline: Deadline.after(0, clock.now) },
      )).toThrow(DeadlineExceededError);
    });

    it('produces an identical state from identical input', () => {
      const scene = [
        entity(1, 'meleeUnit', ME, 0, 0),
        entity(2, 'builderUnit', ME, 3, 3),
        entity(3, 'builderBase', ME, 6, 0),
        entity(5, 'resource', null, 4, 3),
        entity(20, 'rangedUnit', ENEMY, 4, 0),
        entity(21, 'meleeUnit', ENEMY, 2, 1),
      ];
      const plan = actions(
        [1, { kind: 'attack', targetId: 21 }],
        [2, { kind: 'gather', targetId: 5 }],
        [3, { kind: 'produce', entityKind: 'builderUnit', target: { x: 11, y: 0 } }],
      );
      const first = simulate(scene, plan, 5, { players: players(40) });
      const second = simulate(scene, plan, 5, { players: players(40) });
      expect(second).toEqual(first);
    });

    it('simulates zero ticks for a zero horizon', () => {
      const result = simulate([entity(1, 'builderUnit', ME, 0, 0)], new Map(), 0, { players: players() });
      expect(result.tick).toBe(0);
      expect(result.entities[0].position).toEqual({ x: 0, y: 0 });
    });
  });
});
