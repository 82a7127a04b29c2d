// Static per-kind attributes (host coefficients). Loaded from data/entity-rules.json.

import rulesData from '../../data/entity-rules.json';
import { ENTITY_KINDS, type EntityKind } from '../core/Types';
import { RulesFormatError } from '../core/Errors';

export interface AttackDef {
  range: number;
  damage: number;
  /** Attacks on resources turn their health into player resource. */
  harvests: boolean;
}

export interface BuildDef {
  options: EntityKind[];
}

export interface RepairDef {
  power: number;
}

export interface EntityTypeDef {
  kind: EntityKind;
  size: number;
  maxHealth: number;
  cost: number;
  populationUse: number;
  populationProvide: number;
  canMove: boolean;
  sightRange: number;
  destroyScore: number;
  resourcePerHealth: number;
  attack: AttackDef | null;
  build: BuildDef | null;
  repair: RepairDef | null;
}

export type EntityRules = Readonly<Record<EntityKind, EntityTypeDef>>;

const BASE_KINDS: readonly EntityKind[] = ['builderBase', 'meleeBase', 'rangedBase'];
const UNIT_KINDS: readonly EntityKind[] = ['builderUnit', 'meleeUnit', 'rangedUnit'];

export function isBaseKind(kind: EntityKind): boolean {
  return BASE_KINDS.includes(kind);
}

export function isUnitKind(kind: EntityKind): boolean {
  return UNIT_KINDS.includes(kind);
}

export function isCombatUnitKind(kind: EntityKind): boolean {
  return kind === 'meleeUnit' || kind === 'rangedUnit';
}

/** Kinds whose loss the agent defends against and whose area counts as "home". */
export function isProtectedKind(kind: EntityKind): boolean {
  return kind === 'turret' || kind === 'house' || kind === 'builderUnit' || isBaseKind(kind);
}

export function isEntityKind(value: string): value is EntityKind {
  return ENTITY_KINDS.some(kind => kind === value);
}

// ── Parsing ──────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readInt(obj: Record<string, unknown>, key: string, path: string): number {
  const v = obj[key];
  if (typeof v !== 'number' || !Number.isInteger(v) || v < 0) {
    throw new RulesFormatError(`${path}.${key}`, `expected a non-negative integer, got ${JSON.stringify(v)}`);
  }
  return v;
}

function readBool(obj: Record<string, unknown>, key: string, path: string): boolean {
  const v = obj[key];
  if (typeof v !== 'boolean') {
    throw new RulesFormatError(`${path}.${key}`, `expected a boolean, got ${JSON.stringify(v)}`);
  }
  return v;
}

function readAttack(value: unknown, path: string): AttackDef | null {
  if (value === null || value === undefined) return null;
  if (!isRecord(value)) throw new RulesFormatError(path, 'expected an object or null');
  return {
    range: readInt(value, 'range', path),
    damage: readInt(value, 'damage', path),
    harvests: readBool(value, 'harvests', path),
  };
}

function readBuild(value: unknown, path: string): BuildDef | null {
  if (value === null || value === undefined) return null;
  if (!isRecord(value) || !Array.isArray(value.options)) {
    throw new RulesFormatError(path, 'expected { options: EntityKind[] } or null');
  }
  const options: EntityKind[] = [];
  for (const option of value.options) {
    if (typeof option !== 'string' || !isEntityKind(option)) {
      throw new RulesFormatError(`${path}.options`, `unknown entity kind ${JSON.stringify(option)}`);
    }
    options.push(option);
  }
  return { options };
}

function readRepair(value: unknown, path: string): RepairDef | null {
  if (value === null || value === undefined) return null;
  if (!isRecord(value)) throw new RulesFormatError(path, 'expected an object or null');
  return { power: readInt(value, 'power', path) };
}

/** Validate a raw rules table. Every entity kind must be present. */
export function parseEntityRules(raw: unknown): EntityRules {
  if (!isRecord(raw)) throw new RulesFormatError('$', 'expected an object keyed by entity kind');
  const out: Partial<Record<EntityKind, EntityTypeDef>> = {};
  for (const kind of ENTITY_KINDS) {
    const path = `$.${kind}`;
    const def = raw[kind];
    if (!isRecord(def)) throw new RulesFormatError(path, 'missing entity kind');
    const size = readInt(def, 'size', path);
    if (size < 1) throw new RulesFormatError(`${path}.size`, 'size must be at least 1');
    out[kind] = {
      kind,
      size,
      maxHealth: readInt(def, 'maxHealth', path),
      cost: readInt(def, 'cost', path),
      populationUse: readInt(def, 'populationUse', path),
      populationProvide: readInt(def, 'populationProvide', path),
      canMove: readBool(def, 'canMove', path),
      sightRange: readInt(def, 'sightRange', path),
      destroyScore: readInt(def, 'destroyScore', path),
      resourcePerHealth: readInt(def, 'resourcePerHealth', path),
      attack: readAttack(def.attack, `${path}.attack`),
      build: readBuild(def.build, `${path}.build`),
      repair: readRepair(def.repair, `${path}.repair`),
    };
  }
  return completeRules(out);
}

function completeRules(partial: Partial<Record<EntityKind, EntityTypeDef>>): EntityRules {
  const get = (kind: EntityKind): EntityTypeDef => {
    const def = partial[kind];
    if (!def) throw new RulesFormatError(`$.${kind}`, 'missing entity kind');
    return def;
  };
  return Object.freeze({
    wall: get('wall'),
    house: get('house'),
    builderBase: get('builderBase'),
    builderUnit: get('builderUnit'),
    meleeBase: get('meleeBase'),
    meleeUnit: get('meleeUnit'),
    rangedBase: get('rangedBase'),
    rangedUnit: get('rangedUnit'),
    resource: get('resource'),
    turret: get('turret'),
  });
}

let defaultRules: EntityRules | null = null;

/** The rules table bundled with the package. Parsed once. */
export function loadDefaultEntityRules(): EntityRules {
  if (!defaultRules) defaultRules = parseEntityRules(rulesData);
  return defaultRules;
}
