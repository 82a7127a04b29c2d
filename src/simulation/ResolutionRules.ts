import type { EntityKind, Vec2 } from '../core/Types';
import type { SimAction, SimEntity, SimulationWorld } from './EntitySimulator';
import { rectDistance, footprint } from '../utils/Geometry';
import { equals, manhattan, saturatingSub, stepToward } from '../utils/MathUtils';

/** Health a freshly placed building starts with; repair brings it up. */
export const NEW_BUILDING_HEALTH = 1;

/** A tick-local, concrete version of an action with targets already checked for presence. */
export type Intent =
  | { kind: 'none' }
  | { kind: 'step'; to: Vec2 }
  | { kind: 'attack'; targetId: number }
  | { kind: 'gather'; targetId: number }
  | { kind: 'repair'; targetId: number }
  | { kind: 'spawn'; entityKind: EntityKind; position: Vec2; active: boolean };

export interface IntentEntry {
  entity: SimEntity;
  intent: Intent;
}

/**
 * Approximation of the host's tick rules. Swap in a different implementation
 * to model other rule sets; the simulator only sequences the phases.
 */
export interface ResolutionRules {
  /** Action of an entity that was given none. */
  defaultAction(entity: SimEntity, world: SimulationWorld): SimAction;
  /** Turn an action into this tick's concrete intent. Runs before any phase, so choices see the tick-start state. */
  resolveIntent(entity: SimEntity, action: SimAction, world: SimulationWorld): Intent;
  resolveMovement(world: SimulationWorld, intents: readonly IntentEntry[]): void;
  resolveCombat(world: SimulationWorld, intents: readonly IntentEntry[]): void;
  resolveEconomy(world: SimulationWorld, intents: readonly IntentEntry[]): void;
}

function nextRouteCell(position: Vec2, target: Vec2, route: readonly Vec2[] | undefined): Vec2 | null {
  if (equals(position, target)) return null;
  if (route) {
    const at = route.findIndex(p => equals(p, position));
    if (at >= 0 && at + 1 < route.length) return route[at + 1];
  }
  const step = stepToward(position, target);
  return { x: position.x + step.x, y: position.y + step.y };
}

/** Nearest living enemy within sight; ties go to the lower id. */
function nearestEnemy(entity: SimEntity, world: SimulationWorld): { target: SimEntity; distance: number } | null {
  const def = world.rules[entity.kind];
  const bounds = world.footprintOf(entity);
  let best: { target: SimEntity; distance: number } | null = null;
  for (const other of world.entities) {
    if (other.id === entity.id || other.health <= 0) continue;
    if (other.owner === null || other.owner === entity.owner) continue;
    const distance = rectDistance(bounds, world.footprintOf(other));
    if (distance > def.sightRange) continue;
    if (!best || distance < best.distance) best = { target: other, distance };
  }
  return best;
}

function inReach(world: SimulationWorld, actor: SimEntity, target: SimEntity, range: number): boolean {
  return rectDistance(world.footprintOf(actor), world.footprintOf(target)) <= range;
}

export const DefaultResolutionRules: ResolutionRules = {
  defaultAction(entity, world) {
    const attack = world.rules[entity.kind].attack;
    return attack && !attack.harvests ? { kind: 'autoAttack' } : { kind: 'none' };
  },

  resolveIntent(entity, action, world) {
    const def = world.rules[entity.kind];
    switch (action.kind) {
      case 'none':
        return { kind: 'none' };
      case 'move': {
        if (!def.canMove) return { kind: 'none' };
        const to = nextRouteCell(entity.position, action.target, action.route);
        return to && manhattan(to, entity.position) === 1 ? { kind: 'step', to } : { kind: 'none' };
      }
      case 'attack':
        return { kind: 'attack', targetId: action.targetId };
      case 'autoAttack': {
        if (!def.attack) return { kind: 'none' };
        const found = nearestEnemy(entity, world);
        if (!found) return { kind: 'none' };
        if (found.distance <= def.attack.range) return { kind: 'attack', targetId: found.target.id };
        if (!def.canMove) return { kind: 'none' };
        const step = stepToward(entity.position, found.target.position);
        return { kind: 'step', to: { x: entity.position.x + step.x, y: entity.position.y + step.y } };
      }
      case 'gather':
        return { kind: 'gather', targetId: action.targetId };
      case 'repair':
        return { kind: 'repair', targetId: action.targetId };
      case 'produce':
        return { kind: 'spawn', entityKind: action.entityKind, position: action.target, active: true };
      case 'build':
        return { kind: 'spawn', entityKind: action.entityKind, position: action.target, active: false };
    }
  },

  resolveMovement(world, intents) {
    // Passes repeat while anyone moved, so a unit can follow into a cell vacated earlier this tick
    let pending = intents.filter(
      (entry): entry is { entity: SimEntity; intent: Extract<Intent, { kind: 'step' }> } => entry.intent.kind === 'step',
    );
    while (pending.length > 0) {
      const claimed = new Set<string>();
      const winners: typeof pending = [];
      const waiting: typeof pending = [];
      for (const entry of pending) {
        const key = `${entry.intent.to.x},${entry.intent.to.y}`;
        if (claimed.has(key) || !world.isCellFree(entry.intent.to)) {
          waiting.push(entry);
          continue;
        }
        // Intents arrive in id order, so the first claimant is the lowest id
        claimed.add(key);
        winners.push(entry);
      }
      if (winners.length === 0) break;
      for (const { entity, intent } of winners) world.moveEntity(entity, intent.to);
      pending = waiting;
    }
  },

  resolveCombat(world, intents) {
    // Eligibility is decided against tick-start health, before anyone takes damage
    const strikes: { attacker: SimEntity; target: SimEntity; damage: number }[] = [];
    for (const { entity, intent } of intents) {
      if (intent.kind !== 'attack') continue;
      const attack = world.rules[entity.kind].attack;
      const target = world.entity(intent.targetId);
      if (!attack || !target || target.health <= 0) continue;
      if (target.owner === null || target.owner === entity.owner) continue;
      if (!inReach(world, entity, target, attack.range)) continue;
      strikes.push({ attacker: entity, target, damage: attack.damage });
    }

    for (const { attacker, target, damage } of strikes) {
      if (target.health <= 0) continue;
      const remaining = saturatingSub(target.health, damage);
      const dealt = target.health - remaining;
      target.health = remaining;
      const victim = world.player(target.owner);
      const striker = world.player(attacker.owner);
      if (victim) victim.damageReceived += dealt;
      if (striker) {
        striker.damageDone += dealt;
        if (target.health === 0) striker.score += world.rules[target.kind].destroyScore;
      }
    }
  },

  resolveEconomy(world, intents) {
    for (const { entity, intent } of intents) {
      if (intent.kind !== 'gather') continue;
      const attack = world.rules[entity.kind].attack;
      const target = world.entity(intent.targetId);
      if (!attack || !attack.harvests || !target || target.kind !== 'resource' || target.health <= 0) continue;
      if (!inReach(world, entity, target, attack.range)) continue;
      const remaining = saturatingSub(target.health, attack.damage);
      const taken = target.health - remaining;
      target.health = remaining;
      const player = world.player(entity.owner);
      if (player) player.resource += taken * world.rules.resource.resourcePerHealth;
    }

    for (const { entity, intent } of intents) {
      if (intent.kind !== 'repair') continue;
      const repair = world.rules[entity.kind].repair;
      const target = world.entity(intent.targetId);
      if (!repair || !target || target.owner !== entity.owner || target.health <= 0) continue;
      if (!inReach(world, entity, target, 1)) continue;
      const max = world.rules[target.kind].maxHealth;
      target.health = Math.min(max, target.health + repair.power);
      if (target.health === max) target.active = true;
    }

    for (const { entity, intent } of intents) {
      if (intent.kind !== 'spawn') continue;
      const build = world.rules[entity.kind].build;
      const player = world.player(entity.owner);
      const def = world.rules[intent.entityKind];
      if (!build || !player || !build.options.includes(intent.entityKind)) continue;
      if (player.resource < def.cost) continue;
      if (!world.isSquareFree(intent.position, def.size)) continue;
      if (rectDistance(world.footprintOf(entity), footprint(intent.position, def.size)) > 1) continue;
      player.resource -= def.cost;
      player.produced++;
      world.spawn(intent.entityKind, entity.owner, intent.position, intent.active, intent.active ? def.maxHealth : NEW_BUILDING_HEALTH);
    }
  },
};
