import {
  createWorld,
  addEntity,
  removeEntity,
  addComponent,
  removeComponent,
  hasComponent,
  defineComponent,
  Types,
  defineQuery,
} from 'bitecs';
import { ENTITY_KINDS, type EntityKind } from './Types';

// bitECS world type
export type World = ReturnType<typeof createWorld>;

// --- Component Definitions ---
// Mirrors of the current snapshot. Host ids are mapped to eids by WorldModel.

export const Position = defineComponent({
  x: Types.i32,
  y: Types.i32,
});

export const Health = defineComponent({
  current: Types.i32,
  max: Types.i32,
});

export const Owner = defineComponent({
  playerId: Types.i32, // NEUTRAL_OWNER for resources
});

export const Kind = defineComponent({
  id: Types.ui8, // Index into ENTITY_KINDS
});

export const Footprint = defineComponent({
  size: Types.ui8,
});

// Tags
export const Armed = defineComponent();
export const Inactive = defineComponent();

export const NEUTRAL_OWNER = -1;

// --- Queries ---

export const entityQuery = defineQuery([Position, Health, Owner, Kind]);
export const armedQuery = defineQuery([Position, Owner, Armed]);

// --- Helpers ---

export function kindToId(kind: EntityKind): number {
  return ENTITY_KINDS.indexOf(kind);
}

export function createEntityWorld(): World {
  return createWorld();
}

export {
  addEntity,
  removeEntity,
  addComponent,
  removeComponent,
  hasComponent,
};
