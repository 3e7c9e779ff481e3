export { CycleController, TRADING_HALT_LABEL } from './cycleController';
export type { CycleControllerOptions } from './cycleController';
export { CommandQueue } from './commands';
export type { EngineCommand, EngineCommandType } from './commands';
export type { EngineEvent, EngineEventSink, EngineEventType, EngineSnapshot } from './events';
export { GridBuilder, PendingOrderIndex, planLadder } from './gridBuilder';
export { pollFills } from './fillTracker';
export { detectPattern, DEFAULT_PATTERN_POLICY } from './patternDetector';
export { sizeLayer, validateScalingTable } from './positionSizer';
export { buildEngineSettings, buildGuardConfig } from './settings';
export * from './errors';
export * from './reports';
export type * from './types';
