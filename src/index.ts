export { GameController } from "./game/GameController";
export {
  GameBridge,
  type DirectionRejection,
  type GameBridgeEventName,
  type GameBridgeEvents,
  type GamePhase,
  type GameState,
} from "./game/bridge";
export {
  DEFAULT_FRUIT_PALETTE,
  DEFAULT_GRID_COLS,
  DEFAULT_GRID_ROWS,
  FRUIT_COLORS,
  FRUIT_SPAWN_INTERVAL_SECONDS,
  MOVE_INTERVAL_SECONDS,
  gameOptionsSchema,
  resolveGameOptions,
  type FruitColor,
  type GameControllerOptions,
  type GameOptions,
  type GameOptionsInput,
} from "./game/config";
export {
  Cell,
  Grid,
  type GridCellView,
  type ReadonlyGrid,
} from "./game/entities/Grid";
export { Snake } from "./game/entities/Snake";
export {
  FruitSpawner,
  type FruitPlacement,
  type FruitSpawnerOptions,
} from "./game/entities/FruitSpawner";
export {
  GameConfigError,
  GridBoundsError,
  SnakeContractError,
  describeFault,
  isTerminalFault,
  type DirectionFault,
  type DirectionOutcome,
  type Fault,
  type GrowthOutcome,
  type StepOutcome,
  type TerminalFault,
} from "./game/errors";
export {
  CARDINAL_DIRECTIONS,
  directionVector,
  gridEquals,
  isOppositeDirection,
  oppositeDirection,
  stepInDirection,
  type Direction,
  type GridPos,
} from "./game/utils/grid";
export { createSeededRng, type Rng } from "./game/utils/rng";
export { IntervalTicker } from "./game/utils/ticker";
