import type { Role } from '../ai/RoleAssignment';
import type { TaskKind, TaskStatus } from '../ai/TaskAssignment';
import type { PlannerStatsSnapshot } from '../ai/PlannerStats';

type EventCallback<T> = (data: T) => void;

interface EventMap {
  'tick:committed': { tick: number; actionCount: number; stats: PlannerStatsSnapshot };
  'task:opened': { taskId: number; kind: TaskKind; key: string };
  'task:closed': { taskId: number; kind: TaskKind; status: Exclude<TaskStatus, 'open' | 'assigned'> };
  'role:changed': { entityId: number; from: Role | null; to: Role };
  'deadline:hit': { tick: number; phase: 'path' | 'evaluation' | 'simulation'; overrunMs: number };
}

type EventName = keyof EventMap;

type ListenerMap = { [K in EventName]?: Set<EventCallback<EventMap[K]>> };

/** Typed pub/sub. One bus per planner instance; listeners run synchronously in registration order. */
export class EventBus {
  private listeners: ListenerMap = {};

  on<K extends EventName>(event: K, callback: EventCallback<EventMap[K]>): void {
    const listeners: { [P in K]?: Set<EventCallback<EventMap[P]>> } = this.listeners;
    let set = listeners[event];
    if (!set) {
      set = new Set<EventCallback<EventMap[K]>>();
      listeners[event] = set;
    }
    set.add(callback);
  }

  off<K extends EventName>(event: K, callback: EventCallback<EventMap[K]>): void {
    this.listeners[event]?.delete(callback);
  }

  emit<K extends EventName>(event: K, data: EventMap[K]): void {
    this.listeners[event]?.forEach(cb => cb(data));
  }

  listenerCount(event: EventName): number {
    return this.listeners[event]?.size ?? 0;
  }

  clear(): void {
    this.listeners = {};
  }
}

export type { EventMap, EventName, EventCallback };
