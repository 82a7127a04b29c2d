import type { WorldModel } from '../core/WorldModel';
import type { PlannerConfig } from '../config/PlannerConfig';
import type { Group, GroupClass } from './Grouping';
import type { Task, TaskObservation } from './TaskAssignment';
import { ROLE_FOR_TASK } from './TaskAssignment';
import { Indicator, pressure, type MovingAverageTracker } from '../utils/MovingAverage';
import { manhattan } from '../utils/MathUtils';

export const ROLES = ['defend', 'repair', 'build', 'gather', 'produce', 'attack', 'scout', 'idle'] as const;

export type Role = typeof ROLES[number];

/** Fixed tie-break order; earlier wins. */
export const ROLE_PRIORITY: Readonly<Record<Role, number>> = {
  defend: 0,
  repair: 1,
  build: 2,
  gather: 3,
  produce: 4,
  attack: 5,
  scout: 6,
  idle: 7,
};

const ELIGIBLE_ROLES: Readonly<Record<GroupClass, readonly Role[]>> = {
  gatherer: ['gather', 'build', 'repair'],
  combat: ['defend', 'attack', 'scout'],
  structure: ['produce', 'defend'],
};

/** Cells of travel that cost one point of value. */
const DISTANCE_SCALE = 10;
const THREAT_WEIGHT = 0.1;
/** Smoothed threat at which the hysteresis margin grows by half. */
const THREAT_HALF = 10;

export interface RoleAssignment {
  groupId: number;
  role: Role;
  value: number;
}

export interface RoleAssignmentResult {
  byGroup: Map<number, RoleAssignment>;
  byEntity: Map<number, Role>;
}

export interface RoleContext {
  /** Opportunities seen this tick. */
  observations: readonly TaskObservation[];
  tracker: MovingAverageTracker;
  /** Role each entity held last tick. */
  previousRoles: ReadonlyMap<number, Role>;
  config: Pick<PlannerConfig, 'roleHysteresis'>;
}

interface Slot {
  priority: number;
  positions: { x: number; y: number }[];
  /** Entity a job is pinned to (a base's own production). */
  pinned: Set<number>;
  capacity: number;
}

/** Majority of members' previous roles; ties go to the higher-priority role. */
export function previousRoleOf(group: Group, previousRoles: ReadonlyMap<number, Role>): Role | null {
  const counts = new Map<Role, number>();
  for (const id of group.members) {
    const role = previousRoles.get(id);
    if (role) counts.set(role, (counts.get(role) ?? 0) + 1);
  }
  let best: Role | null = null;
  let bestCount = 0;
  for (const [role, count] of counts) {
    if (count > bestCount || (count === bestCount && best !== null && ROLE_PRIORITY[role] < ROLE_PRIORITY[best])) {
      best = role;
      bestCount = count;
    }
  }
  return best;
}

function collectSlots(observations: readonly TaskObservation[], openTasks: readonly Task[]): Map<Role, Slot> {
  const slots = new Map<Role, Slot>();
  const seen = new Set<string>();
  const add = (kind: Task['kind'], key: string, priority: number, position: { x: number; y: number }, entityId?: number): void => {
    if (seen.has(key)) return;
    seen.add(key);
    const role = ROLE_FOR_TASK[kind];
    let slot = slots.get(role);
    if (!slot) {
      slot = { priority: 0, positions: [], pinned: new Set(), capacity: 0 };
      slots.set(role, slot);
    }
    slot.priority = Math.max(slot.priority, priority);
    slot.positions.push(position);
    slot.capacity++;
    if (kind === 'produce' && entityId !== undefined) slot.pinned.add(entityId);
  };
  for (const t of openTasks) {
    if (t.status === 'open' || t.status === 'assigned') add(t.kind, t.key, t.priority, t.target.position, t.target.entityId);
  }
  for (const o of observations) add(o.kind, o.key, o.basePriority, o.target.position, o.target.entityId);
  return slots;
}

/**
 * Bonus for keeping the previous role. Grows with smoothed threat, up to
 * twice the configured base, so groups under pressure switch less readily.
 */
export function hysteresisMargin(base: number, tracker: MovingAverageTracker): number {
  return base * (1 + pressure(tracker, Indicator.Threat, THREAT_HALF));
}

function indicatorBonus(role: Role, tracker: MovingAverageTracker): number {
  switch (role) {
    case 'defend': return tracker.get(Indicator.Threat) * THREAT_WEIGHT;
    case 'gather': return 1 / (1 + Math.max(0, tracker.get(Indicator.Income)));
    default: return 0;
  }
}

/**
 * Greedy role assignment over (group, role) pairs by estimated value. Each
 * role has as many slots as there are open jobs of its kind, so a second
 * group only gets a role while work for it remains.
 */
export function assignRoles(
  groups: ReadonlyMap<number, Group>,
  world: WorldModel,
  openTasks: readonly Task[],
  context: RoleContext,
): RoleAssignmentResult {
  const slots = collectSlots(context.observations, openTasks);
  const pairs: RoleAssignment[] = [];
  const margin = hysteresisMargin(context.config.roleHysteresis, context.tracker);

  for (const group of groups.values()) {
    const previous = previousRoleOf(group, context.previousRoles);
    for (const role of ELIGIBLE_ROLES[group.class]) {
      const slot = slots.get(role);
      if (!slot) continue;
      if (group.class === 'structure' && !eligibleStructure(group, role, slot, world)) continue;
      let nearest = Infinity;
      for (const p of slot.positions) nearest = Math.min(nearest, manhattan(p, group.centroid));
      let value = slot.priority + indicatorBonus(role, context.tracker) - nearest / DISTANCE_SCALE;
      if (previous === role) value += margin;
      pairs.push({ groupId: group.id, role, value });
    }
  }

  pairs.sort((a, b) =>
    b.value - a.value
    || ROLE_PRIORITY[a.role] - ROLE_PRIORITY[b.role]
    || a.groupId - b.groupId);

  const byGroup = new Map<number, RoleAssignment>();
  for (const pair of pairs) {
    if (byGroup.has(pair.groupId)) continue;
    const slot = slots.get(pair.role);
    const group = groups.get(pair.groupId);
    if (!slot || !group) continue;
    // Structures act in place and never take a slot a unit group could fill
    if (group.class !== 'structure') {
      if (slot.capacity <= 0) continue;
      slot.capacity--;
    }
    byGroup.set(pair.groupId, pair);
  }

  const byEntity = new Map<number, Role>();
  for (const group of groups.values()) {
    let assignment = byGroup.get(group.id);
    if (!assignment) {
      assignment = { groupId: group.id, role: 'idle', value: 0 };
      byGroup.set(group.id, assignment);
    }
    for (const id of group.members) byEntity.set(id, assignment.role);
  }
  return { byGroup, byEntity };
}

function eligibleStructure(group: Group, role: Role, slot: Slot, world: WorldModel): boolean {
  if (role === 'produce') return group.members.some(id => slot.pinned.has(id));
  if (role === 'defend') {
    return group.members.some(id => {
      const e = world.entity(id);
      return e !== undefined && e.kind === 'turret';
    });
  }
  return false;
}
