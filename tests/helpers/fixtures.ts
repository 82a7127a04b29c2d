import type { Entity, EntityKind, PlayerState, WorldSnapshot } from '../../src/core/Types';
import type { Clock } from '../../src/core/Deadline';

export const ME = 1;
export const ENEMY = 2;

export function entity(
  id: number,
  kind: EntityKind,
  owner: number | null,
  x: number,
  y: number,
  overrides: Partial<Omit<Entity, 'id' | 'kind' | 'owner' | 'position'>> = {},
): Entity {
  return {
    id,
    kind,
    owner,
    position: { x, y },
    health: overrides.health ?? defaultHealth(kind),
    active: overrides.active ?? true,
  };
}

function defaultHealth(kind: EntityKind): number {
  switch (kind) {
    case 'wall': return 50;
    case 'house': return 50;
    case 'builderBase':
    case 'meleeBase':
    case 'rangedBase': return 300;
    case 'builderUnit': return 10;
    case 'meleeUnit': return 50;
    case 'rangedUnit': return 10;
    case 'resource': return 30;
    case 'turret': return 100;
  }
}

export interface SnapshotInit {
  tick?: number;
  myId?: number;
  mapSize?: number;
  entities: Entity[];
  players?: PlayerState[];
  terrain?: number[];
}

export function snapshot(init: SnapshotInit): WorldSnapshot {
  return {
    tick: init.tick ?? 0,
    myId: init.myId ?? ME,
    mapSize: init.mapSize ?? 32,
    entities: init.entities,
    players: init.players ?? [
      { id: ME, score: 0, resource: 0 },
      { id: ENEMY, score: 0, resource: 0 },
    ],
    terrain: init.terrain ? { cost: init.terrain } : undefined,
  };
}

/** Manually advanced clock for deadline tests. */
export class FakeClock {
  time = 0;

  readonly now: Clock = () => this.time;

  advance(ms: number): void {
    this.time += ms;
  }
}
