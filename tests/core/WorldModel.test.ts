import { describe, it, expect, beforeEach } from 'vitest';
import { WorldModel } from '../../src/core/WorldModel';
import { OutOfOrderSnapshotError, StaleReferenceError } from '../../src/core/Errors';
import { loadDefaultEntityRules } from '../../src/config/EntityRules';
import { entity, snapshot, ME, ENEMY } from '../helpers/fixtures';

const rules = loadDefaultEntityRules();

function baseScene(tick = 0) {
  return snapshot({
    tick,
    entities: [
      entity(1, 'builderBase', ME, 0, 0),
      entity(2, 'builderUnit', ME, 5, 0),
      entity(3, 'house', ME, 0, 6, { active: false }),
      entity(10, 'meleeUnit', ENEMY, 20, 20),
      entity(11, 'turret', ENEMY, 25, 25, { active: false }),
      entity(30, 'resource', null, 10, 10),
    ],
    players: [
      { id: ME, score: 0, resource: 120 },
      { id: ENEMY, score: 40, resource: 0 },
    ],
  });
}

describe('WorldModel', () => {
  let world: WorldModel;

  beforeEach(() => {
    world = new WorldModel(rules);
    world.ingest(baseScene());
  });

  describe('queries', () => {
    it('splits entities by owner', () => {
      expect(world.mine().map(e => e.id)).toEqual([1, 2, 3]);
      expect(world.opponents().map(e => e.id)).toEqual([10, 11]);
      expect(world.resources().map(e => e.id)).toEqual([30]);
      expect(world.byOwner(null).map(e => e.id)).toEqual([30]);
    });

    it('requires present ids', () => {
      expect(world.require(2).kind).toBe('builderUnit');
      expect(() => world.require(99)).toThrow(StaleReferenceError);
    });

    it('filters by kind', () => {
      expect(world.byKind('house').map(e => e.id)).toEqual([3]);
      expect(world.myOfKind('builderUnit').map(e => e.id)).toEqual([2]);
    });

    it('lists own entities below max health', () => {
      const hurt = new WorldModel(rules);
      hurt.ingest(snapshot({
        entities: [
          entity(1, 'builderBase', ME, 0, 0),
          entity(2, 'builderUnit', ME, 5, 0, { health: 4 }),
          entity(3, 'house', ME, 0, 6, { health: 20 }),
          entity(10, 'meleeUnit', ENEMY, 20, 20, { health: 1 }),
        ],
      }));
      expect(hurt.myDamaged().map(e => e.id)).toEqual([2, 3]);
    });

    it('excludes inactive buildings from armed opponents', () => {
      expect(world.armedOpponents().map(e => e.id)).toEqual([10]);
    });

    it('finds entities by Manhattan radius, sorted by id', () => {
      expect(world.inRadius({ x: 5, y: 0 }, 5).map(e => e.id)).toEqual([1, 2]);
    });

    it('reports players and economy', () => {
      expect(world.myId).toBe(ME);
      expect(world.myResource()).toBe(120);
      expect(world.player(ENEMY)?.score).toBe(40);
      expect(world.populationUse()).toBe(1);
      // the unfinished house provides nothing
      expect(world.populationProvide()).toBe(5);
    });
  });

  describe('perimeter', () => {
    it('starts at the centroid of own bases', () => {
      expect(world.startPosition).toEqual({ x: 0, y: 0 });
    });

    it('extends to the farthest protected asset plus its sight', () => {
      // builder at distance 5 with sight 10
      expect(world.protectedRadius()).toBe(15);
      expect(world.isInsideProtectedPerimeter({ x: 10, y: 5 })).toBe(true);
      expect(world.isInsideProtectedPerimeter({ x: 10, y: 6 })).toBe(false);
    });

    it('detects cells within enemy reach', () => {
      expect(world.isAttackedByOpponents({ x: 20, y: 17 })).toBe(true);
      expect(world.isAttackedByOpponents({ x: 20, y: 16 })).toBe(false);
      expect(world.distanceToNearestOpponent({ x: 0, y: 0 })).toBe(40);
    });

    it('has no nearest opponent when none is armed', () => {
      const empty = new WorldModel(rules);
      empty.ingest(snapshot({ entities: [entity(1, 'builderUnit', ME, 1, 1)] }));
      expect(empty.distanceToNearestOpponent({ x: 0, y: 0 })).toBeNull();
      expect(empty.startPosition).toEqual({ x: 1, y: 1 });
    });
  });

  describe('placement', () => {
    it('finds the first free border cell clockwise', () => {
      // top row is off the map and (5,0) holds the builder
      expect(world.findFreeCellNear({ x: 0, y: 0 }, 5)).toEqual({ x: 5, y: 1 });
    });

    it('finds a build site with a free margin', () => {
      const open = new WorldModel(rules);
      open.ingest(snapshot({ mapSize: 10, entities: [] }));
      expect(open.findBuildSite('house', { x: 4, y: 4 })).toEqual({ x: 3, y: 3 });
    });

    it('keeps the margin clear of units', () => {
      const crowded = new WorldModel(rules);
      crowded.ingest(snapshot({ mapSize: 10, entities: [entity(5, 'builderUnit', ME, 4, 4)] }));
      expect(crowded.findBuildSite('house', { x: 4, y: 4 })).toEqual({ x: 6, y: 2 });
    });

    it('computes footprints from the mirrored position and size', () => {
      const base = world.require(1);
      expect(world.footprintOf(base)).toEqual({ min: { x: 0, y: 0 }, max: { x: 5, y: 5 } });
      // a stale copy of the entity still resolves to where the world has it
      expect(world.footprintOf({ ...base, position: { x: 9, y: 9 } })).toEqual({ min: { x: 0, y: 0 }, max: { x: 5, y: 5 } });
    });

    it('falls back to rules for entities outside the snapshot', () => {
      const ghost = entity(99, 'house', ME, 3, 3);
      expect(world.footprintOf(ghost)).toEqual({ min: { x: 3, y: 3 }, max: { x: 6, y: 6 } });
    });
  });

  describe('ingest', () => {
    it('reports appeared, vanished and owner changes', () => {
      const next = snapshot({
        tick: 1,
        entities: [
          entity(1, 'builderBase', ME, 0, 0),
          entity(3, 'house', ENEMY, 0, 6),
          entity(4, 'builderUnit', ME, 6, 0),
          entity(10, 'meleeUnit', ENEMY, 20, 20),
          entity(11, 'turret', ENEMY, 25, 25),
          entity(30, 'resource', null, 10, 10),
        ],
      });
      const delta = world.ingest(next);
      expect(delta.duplicate).toBe(false);
      expect(delta.appeared).toEqual([4]);
      expect(delta.vanished.map(e => e.id)).toEqual([2]);
      expect(delta.ownerChanged).toEqual([{ id: 3, from: ME, to: ENEMY }]);
      expect(world.hasEntity(2)).toBe(false);
      expect(world.mine().map(e => e.id)).toEqual([1, 4]);
      expect(world.armedOpponents().map(e => e.id)).toEqual([10, 11]);
    });

    it('ignores a repeated tick', () => {
      const delta = world.ingest(baseScene(0));
      expect(delta.duplicate).toBe(true);
      expect(world.tick).toBe(0);
    });

    it('rejects an older tick', () => {
      world.ingest(baseScene(5));
      expect(() => world.ingest(baseScene(4))).toThrow(OutOfOrderSnapshotError);
      expect(world.tick).toBe(5);
    });

    it('keeps a bounded history', () => {
      const short = new WorldModel(rules, { historySize: 2 });
      for (const tick of [1, 2, 3]) short.ingest(baseScene(tick));
      expect(short.history().map(s => s.tick)).toEqual([2, 3]);
    });

    it('reports no snapshot before the first ingest', () => {
      const fresh = new WorldModel(rules);
      expect(fresh.hasSnapshot).toBe(false);
      expect(fresh.tick).toBe(-1);
      expect(fresh.snapshot()).toBeNull();
    });
  });
});
