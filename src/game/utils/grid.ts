/** A cell coordinate: `col` is the horizontal (x) index, `row` the vertical (y) index. */
export type GridPos = Readonly<{
  col: number;
  row: number;
}>;

export type GridBounds = Readonly<{
  cols: number;
  rows: number;
}>;

export type Direction = "up" | "right" | "down" | "left";

export const CARDINAL_DIRECTIONS = [
  "up",
  "right",
  "down",
  "left",
] as const satisfies ReadonlyArray<Direction>;

const DIRECTION_VECTORS: Readonly<Record<Direction, GridPos>> = Object.freeze({
  up: Object.freeze({ col: 0, row: -1 }),
  right: Object.freeze({ col: 1, row: 0 }),
  down: Object.freeze({ col: 0, row: 1 }),
  left: Object.freeze({ col: -1, row: 0 }),
});

const OPPOSITE_DIRECTIONS: Readonly<Record<Direction, Direction>> =
  Object.freeze({
    up: "down",
    right: "left",
    down: "up",
    left: "right",
  });

export const directionVector = (direction: Direction): GridPos =>
  DIRECTION_VECTORS[direction];

export const oppositeDirection = (direction: Direction): Direction =>
  OPPOSITE_DIRECTIONS[direction];

export const isOppositeDirection = (
  currentDirection: Direction,
  nextDirection: Direction,
): boolean => oppositeDirection(currentDirection) === nextDirection;

export const gridEquals = (first: GridPos, second: GridPos): boolean =>
  first.col === second.col && first.row === second.row;

export const gridPosKey = (position: GridPos): string =>
  `${position.col}:${position.row}`;

export const translateGridPos = (
  position: GridPos,
  vector: GridPos,
  distance = 1,
): GridPos => ({
  col: position.col + vector.col * distance,
  row: position.row + vector.row * distance,
});

/** The neighbouring cell one unit away in `direction`. */
export const stepInDirection = (
  position: GridPos,
  direction: Direction,
  distance = 1,
): GridPos => translateGridPos(position, directionVector(direction), distance);

export const isInBounds = (position: GridPos, bounds: GridBounds): boolean =>
  Number.isInteger(position.col) &&
  Number.isInteger(position.row) &&
  position.col >= 0 &&
  position.row >= 0 &&
  position.col < bounds.cols &&
  position.row < bounds.rows;
