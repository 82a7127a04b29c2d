import type { Entity, EntityKind, Vec2 } from '../core/Types';
import type { PlannerConfig } from '../config/PlannerConfig';
import { isCombatUnitKind } from '../config/EntityRules';
import { centroid, chebyshev, manhattan } from '../utils/MathUtils';

export type GroupClass = 'combat' | 'gatherer' | 'structure';

export interface Group {
  id: number;
  /** Ascending entity ids. */
  members: number[];
  centroid: Vec2;
  class: GroupClass;
  dominantKind: EntityKind;
  /** Id of the closest same-class group of the previous tick, if any. Continuity only. */
  previousId: number | null;
}

export type GroupingConfig = Pick<PlannerConfig, 'groupingDistance' | 'gathererGroupingDistance'>;

export function classify(kind: EntityKind): GroupClass {
  if (isCombatUnitKind(kind)) return 'combat';
  if (kind === 'builderUnit') return 'gatherer';
  return 'structure';
}

function linkDistance(cls: GroupClass, config: GroupingConfig): number {
  switch (cls) {
    case 'combat': return config.groupingDistance;
    case 'gatherer': return config.gathererGroupingDistance;
    case 'structure': return -1;
  }
}

class UnionFind {
  private readonly parent: number[];

  constructor(n: number) {
    this.parent = Array.from({ length: n }, (_, i) => i);
  }

  find(i: number): number {
    let root = i;
    while (this.parent[root] !== root) root = this.parent[root];
    while (this.parent[i] !== root) {
      const next = this.parent[i];
      this.parent[i] = root;
      i = next;
    }
    return root;
  }

  /** The smaller index becomes the root, keeping roots stable under input order. */
  union(a: number, b: number): void {
    const ra = this.find(a);
    const rb = this.find(b);
    if (ra === rb) return;
    if (ra < rb) this.parent[rb] = ra;
    else this.parent[ra] = rb;
  }
}

function dominantKind(members: readonly Entity[]): EntityKind {
  const counts = new Map<EntityKind, number>();
  for (const m of members) counts.set(m.kind, (counts.get(m.kind) ?? 0) + 1);
  let best = members[0].kind;
  let bestCount = 0;
  // Members are id-sorted, so ties go to the kind seen first
  for (const m of members) {
    const count = counts.get(m.kind) ?? 0;
    if (count > bestCount) {
      best = m.kind;
      bestCount = count;
    }
  }
  return best;
}

function matchPrevious(cls: GroupClass, center: Vec2, previous: Iterable<Group>): number | null {
  let best: Group | null = null;
  let bestDistance = Infinity;
  for (const g of previous) {
    if (g.class !== cls) continue;
    const d = manhattan(g.centroid, center);
    if (d < bestDistance || (d === bestDistance && best !== null && g.id < best.id)) {
      best = g;
      bestDistance = d;
    }
  }
  return best ? best.id : null;
}

/**
 * Partition entities into groups by single-linkage clustering within each
 * class. The result depends only on the set of entities, not their order.
 */
export function partition(
  entities: readonly Entity[],
  config: GroupingConfig,
  previousGroups?: ReadonlyMap<number, Group>,
): Map<number, Group> {
  const sorted = [...entities].sort((a, b) => a.id - b.id);
  const classes = sorted.map(e => classify(e.kind));
  const uf = new UnionFind(sorted.length);

  for (let i = 0; i < sorted.length; i++) {
    const threshold = linkDistance(classes[i], config);
    if (threshold < 0) continue;
    for (let j = i + 1; j < sorted.length; j++) {
      if (classes[j] !== classes[i]) continue;
      if (chebyshev(sorted[i].position, sorted[j].position) <= threshold) uf.union(i, j);
    }
  }

  // Roots are the smallest index of each cluster, so walking in order yields
  // clusters sorted by their smallest member id
  const clusters = new Map<number, Entity[]>();
  for (let i = 0; i < sorted.length; i++) {
    const root = uf.find(i);
    const members = clusters.get(root);
    if (members) members.push(sorted[i]);
    else clusters.set(root, [sorted[i]]);
  }

  const previous = previousGroups ? [...previousGroups.values()] : [];
  const groups = new Map<number, Group>();
  let nextId = 0;
  for (const [root, members] of clusters) {
    const cls = classes[root];
    const center = centroid(members.map(m => m.position));
    const id = nextId++;
    groups.set(id, {
      id,
      members: members.map(m => m.id),
      centroid: center,
      class: cls,
      dominantKind: dominantKind(members),
      previousId: matchPrevious(cls, center, previous),
    });
  }
  return groups;
}

/** Entity id → group id. */
export function membership(groups: ReadonlyMap<number, Group>): Map<number, number> {
  const out = new Map<number, number>();
  for (const g of groups.values()) {
    for (const id of g.members) out.set(id, g.id);
  }
  return out;
}
