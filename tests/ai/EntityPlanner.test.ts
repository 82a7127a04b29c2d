import { describe, it, expect } from 'vitest';
import { EntityPlanner, mergeDecisions, type EntityDecision } from '../../src/ai/EntityPlanner';
import type { Candidate } from '../../src/ai/CandidateEvaluator';
import type { Task } from '../../src/ai/TaskAssignment';
import { PlannerStats } from '../../src/ai/PlannerStats';
import { PathPlanner } from '../../src/simulation/PathPlanner';
import { WorldModel } from '../../src/core/WorldModel';
import { EventBus, type EventMap } from '../../src/core/EventBus';
import { Deadline } from '../../src/core/Deadline';
import { loadDefaultEntityRules } from '../../src/config/EntityRules';
import { resolvePlannerConfig, type PlannerConfigOverrides } from '../../src/config/PlannerConfig';
import type { Entity, EntityAction, Vec2 } from '../../src/core/Types';
import { entity, snapshot, FakeClock, ME, ENEMY } from '../helpers/fixtures';

const rules = loadDefaultEntityRules();

function setup(entities: Entity[], overrides: PlannerConfigOverrides = {}) {
  const world = new WorldModel(rules);
  world.ingest(snapshot({ tick: 3, entities }));
  const config = resolvePlannerConfig(overrides);
  const stats = new PlannerStats();
  const bus = new EventBus();
  const paths = new PathPlanner(world, { occupancyPenalty: config.occupancyPenalty, maxNodes: config.pathMaxNodes });
  const planner = new EntityPlanner({ config, paths, stats, bus });
  return { world, stats, bus, planner };
}

function mustGet(world: WorldModel, id: number): Entity {
  const e = world.entity(id);
  if (!e) throw new Error(`entity ${id} missing`);
  return e;
}

function task(kind: Task['kind'], target: Task['target']): Task {
  return {
    id: 1, kind, key: `${kind}:test`, target, basePriority: 10, priority: 10, requiredSize: 1,
    status: 'assigned', groupId: 0, assignees: [], unassignedTicks: 0, createdTick: 0,
  };
}

const kinds = (candidates: readonly Candidate[]): string[] => candidates.map(c => c.action.kind);

describe('EntityPlanner.generate', () => {
  it('puts the gather on the task resource first for a gatherer', () => {
    const { world, planner } = setup([
      entity(2, 'builderUnit', ME, 7, 0),
      entity(50, 'resource', null, 8, 0),
      entity(51, 'resource', null, 7, 1, { health: 5 }),
    ]);
    const candidates = planner.generate(
      mustGet(world, 2), 'gather', task('harvest', { position: { x: 7, y: 0 }, entityId: 50 }), world, Deadline.unbounded(),
    );
    expect(candidates.map(c => c.action)).toEqual([
      { kind: 'gather', targetId: 50, target: { x: 8, y: 0 } },
      { kind: 'gather', targetId: 51, target: { x: 7, y: 1 } },
      { kind: 'hold' },
    ]);
  });

  it('moves a gatherer toward its spot', () => {
    const { world, planner, stats } = setup([entity(2, 'builderUnit', ME, 0, 5)]);
    const candidates = planner.generate(
      mustGet(world, 2), 'gather', task('harvest', { position: { x: 3, y: 5 }, entityId: 50 }), world, Deadline.unbounded(),
    );
    expect(candidates[0]).toEqual({
      action: { kind: 'move', target: { x: 3, y: 5 }, route: [{ x: 0, y: 5 }, { x: 3, y: 5 }] },
      sim: { kind: 'move', target: { x: 3, y: 5 }, route: [{ x: 0, y: 5 }, { x: 1, y: 5 }, { x: 2, y: 5 }, { x: 3, y: 5 }] },
      nextCell: { x: 1, y: 5 },
      objective: { x: 3, y: 5 },
    });
    expect(stats.tick().pathCalls).toBe(1);
  });

  it('builds when next to a free site', () => {
    const { world, planner } = setup([entity(2, 'builderUnit', ME, 2, 2)]);
    const candidates = planner.generate(
      mustGet(world, 2), 'build', task('build', { position: { x: 3, y: 2 }, entityKind: 'house' }), world, Deadline.unbounded(),
    );
    expect(candidates[0].action).toEqual({ kind: 'build', entityKind: 'house', target: { x: 3, y: 2 } });
    expect(kinds(candidates)).toEqual(['build', 'hold']);
  });

  it('repairs an adjacent building', () => {
    const { world, planner } = setup([
      entity(2, 'builderUnit', ME, 2, 2),
      entity(3, 'house', ME, 3, 2, { health: 20 }),
    ]);
    const candidates = planner.generate(
      mustGet(world, 2), 'repair', task('repair', { position: { x: 3, y: 2 }, entityId: 3 }), world, Deadline.unbounded(),
    );
    expect(candidates[0].action).toEqual({ kind: 'repair', targetId: 3, target: { x: 3, y: 2 } });
  });

  it('attacks the task target first, then the weakest', () => {
    const { world, planner } = setup([
      entity(2, 'rangedUnit', ME, 10, 10),
      entity(60, 'meleeUnit', ENEMY, 12, 10),
      entity(61, 'rangedUnit', ENEMY, 10, 13, { health: 4 }),
      entity(62, 'meleeUnit', ENEMY, 10, 12, { health: 30 }),
    ]);
    const candidates = planner.generate(
      mustGet(world, 2), 'defend', task('defend', { position: { x: 12, y: 10 }, entityId: 60 }), world, Deadline.unbounded(),
    );
    expect(candidates.slice(0, 3).map(c => c.action)).toEqual([
      { kind: 'attack', targetId: 60, target: { x: 12, y: 10 } },
      { kind: 'attack', targetId: 61, target: { x: 10, y: 13 } },
      { kind: 'attack', targetId: 62, target: { x: 10, y: 12 } },
    ]);
  });

  it('caps the candidate list', () => {
    const { world, planner } = setup([
      entity(2, 'rangedUnit', ME, 10, 10),
      entity(60, 'meleeUnit', ENEMY, 12, 10),
      entity(61, 'rangedUnit', ENEMY, 10, 13),
      entity(62, 'meleeUnit', ENEMY, 10, 12),
    ], { maxCandidatesPerEntity: 2 });
    expect(planner.generate(mustGet(world, 2), 'idle', undefined, world, Deadline.unbounded())).toHaveLength(2);
  });

  it('offers a retreat away from a nearby enemy', () => {
    const { world, planner } = setup([
      entity(2, 'builderUnit', ME, 10, 10),
      entity(60, 'meleeUnit', ENEMY, 12, 10),
    ]);
    const candidates = planner.generate(mustGet(world, 2), 'idle', undefined, world, Deadline.unbounded());
    expect(candidates.map(c => c.action)).toEqual([
      { kind: 'move', target: { x: 10, y: 11 }, route: [{ x: 10, y: 10 }, { x: 10, y: 11 }] },
      { kind: 'hold' },
    ]);
  });

  it('offers production to a base with a production task', () => {
    const { world, planner } = setup([entity(1, 'builderBase', ME, 0, 0)]);
    const candidates = planner.generate(
      mustGet(world, 1), 'produce',
      task('produce', { position: { x: 5, y: 0 }, entityId: 1, entityKind: 'builderUnit' }),
      world, Deadline.unbounded(),
    );
    expect(candidates.map(c => c.action)).toEqual([
      { kind: 'produce', entityKind: 'builderUnit', target: { x: 5, y: 0 } },
      { kind: 'noop' },
    ]);
  });

  describe('path fallback', () => {
    it('falls back to a straight route when the search has no time', () => {
      const { world, planner, stats, bus } = setup([entity(2, 'builderUnit', ME, 0, 5)], { pathBudgetMs: 0 });
      const hits: EventMap['deadline:hit'][] = [];
      bus.on('deadline:hit', e => hits.push(e));
      const clock = new FakeClock();
      const candidates = planner.generate(
        mustGet(world, 2), 'gather', task('harvest', { position: { x: 2, y: 6 }, entityId: 50 }), world,
        Deadline.after(40, clock.now),
      );
      expect(candidates[0].sim).toEqual({
        kind: 'move',
        target: { x: 2, y: 6 },
        route: [{ x: 0, y: 5 }, { x: 1, y: 5 }, { x: 2, y: 5 }, { x: 2, y: 6 }],
      });
      expect(stats.tick()).toMatchObject({ pathCalls: 1, fallbacks: 1, deadlineHits: 1 });
      expect(hits).toEqual([{ tick: 3, phase: 'path', overrunMs: 0 }]);
    });
  });

  it('skips a task whose target has vanished', () => {
    const { world, planner } = setup([entity(2, 'builderUnit', ME, 10, 10)]);
    const candidates = planner.generate(
      mustGet(world, 2), 'repair', task('repair', { position: { x: 3, y: 2 }, entityId: 99 }), world, Deadline.unbounded(),
    );
    expect(kinds(candidates)).toEqual(['hold']);
  });
});

describe('mergeDecisions', () => {
  const hold: Candidate = { action: { kind: 'hold' }, sim: { kind: 'none' }, nextCell: null, objective: null };

  function moveTo(cell: Vec2): Candidate {
    const action: EntityAction = { kind: 'move', target: cell, route: [cell] };
    return { action, sim: { kind: 'move', target: cell }, nextCell: cell, objective: cell };
  }

  it('takes the best score, ties to the earlier candidate', () => {
    const decision: EntityDecision = {
      entityId: 1,
      candidates: [hold, moveTo({ x: 1, y: 0 }), moveTo({ x: 0, y: 1 })],
      evaluations: [
        { index: 0, score: 1, raw: 1, hash: 0 },
        { index: 1, score: 5, raw: 5, hash: 1 },
        { index: 2, score: 5, raw: 5, hash: 2 },
      ],
    };
    expect(mergeDecisions([decision])[0].action).toEqual(moveTo({ x: 1, y: 0 }).action);
  });

  it('gives a contested cell to the lower id', () => {
    const cell = { x: 3, y: 3 };
    const records = mergeDecisions([
      { entityId: 8, candidates: [moveTo(cell), hold], evaluations: [{ index: 0, score: 9, raw: 9, hash: 0 }, { index: 1, score: 0, raw: 0, hash: 1 }] },
      { entityId: 4, candidates: [moveTo(cell), hold], evaluations: [{ index: 0, score: 1, raw: 1, hash: 0 }, { index: 1, score: 0, raw: 0, hash: 1 }] },
    ]);
    expect(records).toEqual([
      { entityId: 4, action: moveTo(cell).action },
      { entityId: 8, action: { kind: 'hold' } },
    ]);
  });

  it('falls back to generation order for unevaluated candidates', () => {
    const records = mergeDecisions([
      { entityId: 1, candidates: [moveTo({ x: 1, y: 1 }), hold], evaluations: [{ index: 1, score: -2, raw: -2, hash: 0 }] },
      { entityId: 2, candidates: [hold], evaluations: [] },
    ]);
    expect(records.map(r => r.action.kind)).toEqual(['hold', 'hold']);
  });

  it('emits noop for an entity with no candidates', () => {
    expect(mergeDecisions([{ entityId: 5, candidates: [], evaluations: [] }])).toEqual([
      { entityId: 5, action: { kind: 'noop' } },
    ]);
  });
});
