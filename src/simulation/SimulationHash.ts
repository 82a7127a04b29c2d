/**
 * 32-bit FNV-1a digest of a simulated state. Two runs from identical input
 * must produce the same digest; the planner also uses it to drop candidates
 * whose outcomes are indistinguishable.
 */

import { ENTITY_KINDS } from '../core/Types';
import type { SimulatedState } from './EntitySimulator';

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

export function hashSimulatedState(state: SimulatedState): number {
  let h = FNV_OFFSET;
  h = fnvMix(h, state.tick);

  for (const p of state.players) {
    h = fnvMix(h, p.id);
    h = fnvMix(h, p.resource);
    h = fnvMix(h, p.score);
    h = fnvMix(h, p.damageDone);
    h = fnvMix(h, p.damageReceived);
    h = fnvMix(h, p.produced);
  }

  for (const e of state.entities) {
    h = fnvMix(h, e.id);
    h = fnvMix(h, ENTITY_KINDS.indexOf(e.kind));
    h = fnvMix(h, e.owner ?? -1);
    h = fnvMix(h, e.position.x);
    h = fnvMix(h, e.position.y);
    h = fnvMix(h, e.health);
    h = fnvMix(h, e.active ? 1 : 0);
  }

  for (const id of state.destroyed) h = fnvMix(h, id);

  return h >>> 0;
}

/** FNV-1a mix step for a 32-bit integer */
function fnvMix(h: number, val: number): number {
  h ^= val & 0xff;
  h = Math.imul(h, FNV_PRIME);
  h ^= (val >>> 8) & 0xff;
  h = Math.imul(h, FNV_PRIME);
  h ^= (val >>> 16) & 0xff;
  h = Math.imul(h, FNV_PRIME);
  h ^= (val >>> 24) & 0xff;
  h = Math.imul(h, FNV_PRIME);
  return h;
}
