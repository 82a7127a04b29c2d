import type { Entity, EntityKind, Vec2 } from '../core/Types';
import type { WorldModel } from '../core/WorldModel';
import type { PlannerConfig } from '../config/PlannerConfig';
import { isCombatUnitKind, isProtectedKind, isUnitKind } from '../config/EntityRules';
import { borderCells, distanceToRect } from '../utils/Geometry';
import { manhattan } from '../utils/MathUtils';

export interface Threat {
  /** Armed opponent inside the detection range of an own asset. */
  enemyId: number;
  position: Vec2;
  /** Nearest own protected asset it threatens. */
  assetId: number;
  power: number;
}

export interface HarvestSpot {
  position: Vec2;
  resourceId: number;
}

export interface DamagedBuilding {
  entityId: number;
  position: Vec2;
  kind: EntityKind;
  missing: number;
}

export interface BuildNeed {
  entityKind: EntityKind;
  position: Vec2;
}

export interface ProduceOption {
  baseId: number;
  entityKind: EntityKind;
  position: Vec2;
}

export interface AttackTarget {
  entityId: number;
  position: Vec2;
  kind: EntityKind;
}

/** Everything the agent could act on this tick, derived from the world alone. */
export interface OpportunitySurvey {
  threats: Threat[];
  harvestSpots: HarvestSpot[];
  damaged: DamagedBuilding[];
  buildNeeds: BuildNeed[];
  produceOptions: ProduceOption[];
  attackTargets: AttackTarget[];
  scoutTargets: Vec2[];
  builders: number;
  combatUnits: number;
}

function surveyThreats(world: WorldModel, config: PlannerConfig): Threat[] {
  const assets = world.mine().filter(e => isProtectedKind(e.kind));
  const threats: Threat[] = [];
  for (const enemy of world.armedOpponents()) {
    let nearest: { asset: Entity; distance: number } | null = null;
    for (const asset of assets) {
      const distance = distanceToRect(world.footprintOf(asset), enemy.position);
      if (distance > config.detectionRange) continue;
      if (!nearest || distance < nearest.distance) nearest = { asset, distance };
    }
    if (!nearest) continue;
    threats.push({
      enemyId: enemy.id,
      position: enemy.position,
      assetId: nearest.asset.id,
      power: world.def(enemy.kind).attack?.damage ?? 0,
    });
  }
  return threats;
}

/** Free cells next to resources, inside the perimeter and out of enemy reach; nearest to home first. */
function surveyHarvestSpots(world: WorldModel, limit: number): HarvestSpot[] {
  const seen = new Set<string>();
  const spots: HarvestSpot[] = [];
  for (const resource of world.resources()) {
    for (const cell of borderCells(resource.position, 1)) {
      const key = `${cell.x},${cell.y}`;
      if (seen.has(key)) continue;
      seen.add(key);
      // An own builder already there is the harvester itself, not a blocker
      const occupant = world.entity(world.map.occupantAt(cell));
      const freeForBuilder = world.map.isFree(cell)
        || (occupant?.kind === 'builderUnit' && occupant.owner === world.myId);
      if (!world.map.contains(cell) || !freeForBuilder) continue;
      if (!world.isInsideProtectedPerimeter(cell) || world.isAttackedByOpponents(cell)) continue;
      spots.push({ position: cell, resourceId: resource.id });
    }
  }
  const start = world.startPosition;
  spots.sort((a, b) =>
    manhattan(a.position, start) - manhattan(b.position, start)
    || a.position.y - b.position.y
    || a.position.x - b.position.x);
  return spots.slice(0, limit);
}

function surveyDamaged(world: WorldModel): DamagedBuilding[] {
  const damaged: DamagedBuilding[] = [];
  for (const e of world.myDamaged()) {
    if (isUnitKind(e.kind)) continue;
    const missing = world.def(e.kind).maxHealth - e.health;
    if (missing > 0) damaged.push({ entityId: e.id, position: e.position, kind: e.kind, missing });
  }
  return damaged;
}

function surveyBuildNeeds(world: WorldModel): BuildNeed[] {
  const house = world.def('house');
  const underConstruction = world.myOfKind('house').some(h => !h.active);
  if (underConstruction) return [];
  if (world.populationUse() + 1 <= world.populationProvide()) return [];
  if (world.myResource() < house.cost) return [];
  const site = world.findBuildSite('house', world.startPosition);
  return site ? [{ entityKind: 'house', position: site }] : [];
}

function surveyProduceOptions(world: WorldModel, config: PlannerConfig, builders: number): ProduceOption[] {
  const options: ProduceOption[] = [];
  let resource = world.myResource();
  let population = world.populationUse();
  const capacity = world.populationProvide();
  for (const base of world.mine()) {
    const def = world.def(base.kind);
    if (!base.active || !def.build) continue;
    const entityKind = def.build.options[0];
    if (!entityKind || !isUnitKind(entityKind)) continue;
    if (entityKind === 'builderUnit' && builders >= config.targetGatherers) continue;
    const unit = world.def(entityKind);
    if (unit.cost > resource || population + unit.populationUse > capacity) continue;
    const position = world.findFreeCellNear(base.position, def.size);
    if (!position) continue;
    resource -= unit.cost;
    population += unit.populationUse;
    options.push({ baseId: base.id, entityKind, position });
  }
  return options;
}

function surveyAttackTargets(world: WorldModel, config: PlannerConfig, combatUnits: number): AttackTarget[] {
  if (combatUnits < config.attackGroupSize) return [];
  const start = world.startPosition;
  const targets = world.opponents()
    .filter(e => !isUnitKind(e.kind))
    .sort((a, b) => manhattan(a.position, start) - manhattan(b.position, start) || a.id - b.id);
  return targets.slice(0, 1).map(e => ({ entityId: e.id, position: e.position, kind: e.kind }));
}

/** The farthest map corner from home, while no enemy building is known. */
function surveyScoutTargets(world: WorldModel, combatUnits: number): Vec2[] {
  if (combatUnits === 0) return [];
  if (world.opponents().some(e => !isUnitKind(e.kind))) return [];
  const last = world.mapSize - 1;
  if (last < 0) return [];
  const corners: Vec2[] = [
    { x: 0, y: 0 },
    { x: last, y: 0 },
    { x: 0, y: last },
    { x: last, y: last },
  ];
  const start = world.startPosition;
  let best = corners[0];
  for (const corner of corners) {
    if (manhattan(corner, start) > manhattan(best, start)) best = corner;
  }
  return [best];
}

export function surveyOpportunities(world: WorldModel, config: PlannerConfig): OpportunitySurvey {
  const mine = world.mine();
  const builders = mine.filter(e => e.kind === 'builderUnit').length;
  const combatUnits = mine.filter(e => isCombatUnitKind(e.kind)).length;
  return {
    threats: surveyThreats(world, config),
    harvestSpots: surveyHarvestSpots(world, builders),
    damaged: surveyDamaged(world),
    buildNeeds: surveyBuildNeeds(world),
    produceOptions: surveyProduceOptions(world, config, builders),
    attackTargets: surveyAttackTargets(world, config, combatUnits),
    scoutTargets: surveyScoutTargets(world, combatUnits),
    builders,
    combatUnits,
  };
}
