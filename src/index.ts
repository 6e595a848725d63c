export * from './shared/engine';
export { PositionSchema, MoveSchema, parsePosition, parseMove } from './shared/validation/schemas';
export type { PositionInput, MoveInput } from './shared/validation/schemas';
export { GameSession } from './runtime/game/GameSession';
export type { GameSessionOptions, SessionSnapshot } from './runtime/game/GameSession';
export { runSimulation, DEMO_POSITION, DEMO_MOVES } from './runtime/simulateGame';
export type { SimulationResult, SimulationStep } from './runtime/simulateGame';
