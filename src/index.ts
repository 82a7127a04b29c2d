// Public surface of the decision core.

export * from './core/Types';
export * from './core/Errors';
export { Deadline, systemClock, type Clock } from './core/Deadline';
export { EventBus, type EventMap, type EventName } from './core/EventBus';
export { WorldModel, type WorldDelta, type OwnerChange } from './core/WorldModel';

export {
  parseEntityRules,
  loadDefaultEntityRules,
  type EntityRules,
  type EntityTypeDef,
} from './config/EntityRules';
export {
  DEFAULT_PLANNER_CONFIG,
  resolvePlannerConfig,
  type PlannerConfig,
  type PlannerConfigOverrides,
  type ScoreWeights,
} from './config/PlannerConfig';

export { GameMap } from './simulation/GameMap';
export { PathPlanner, simplifyRoute, type Route, type PathProfile } from './simulation/PathPlanner';
export {
  simulate,
  type SimAction,
  type SimEntity,
  type SimPlayer,
  type SimulatedState,
} from './simulation/EntitySimulator';
export { DefaultResolutionRules, type ResolutionRules, type Intent } from './simulation/ResolutionRules';
export { hashSimulatedState } from './simulation/SimulationHash';

export { AIPlayer, type AIPlayerOptions, type TickResult } from './ai/AIPlayer';
export { partition, type Group, type GroupClass } from './ai/Grouping';
export { assignRoles, ROLES, type Role } from './ai/RoleAssignment';
export { reconcile, observeTasks, type Task, type TaskKind, type TaskStatus } from './ai/TaskAssignment';
export { surveyOpportunities, type OpportunitySurvey } from './ai/Opportunities';
export { GroupPlanner, type GroupPlan, type Manoeuvre } from './ai/GroupPlanner';
export type { PlannerStatsSnapshot } from './ai/PlannerStats';

export { MovingAverageTracker, Indicator, createDefaultTracker } from './utils/MovingAverage';
export { createLogger, setLogLevel, type LogLevel } from './utils/Logger';
