import { NoSolutionError } from "@breach-path/shared";
import { Grid, type Position } from "./grid";
import { distancesFrom, type FrontierStats } from "./frontier";
import { findBestBreach } from "./breach";

export type SolveOptions = {
  /** Also accept a floor-only route that breaks no wall. Off by default. */
  allowDirect?: boolean;
};

export type Solution = {
  steps: number;
  breach: Position | null; // null when the route breaks no wall
  start: Position;
  end: Position;
  wallCount: number;
  frontier: { start: FrontierStats; end: FrontierStats };
};

const NO_FRONTIER: FrontierStats = { expanded: 0, peakFrontier: 0, levels: 0 };

/**
 * Shortest corner-to-corner route through exactly one converted wall tile,
 * counted in steps with the start tile as step 1.
 * Throws InvalidMazeError for malformed input and NoSolutionError when no wall joins the corners.
 */
export function solveDetailed(maze: readonly (readonly number[])[], options: SolveOptions = {}): Solution {
  const grid = Grid.fromRows(maze);
  const start = { row: 0, col: 0 };
  const end = { row: grid.height - 1, col: grid.width - 1 };

  // start and end coincide
  if (grid.size === 1) {
    return {
      steps: 1,
      breach: grid.isWall(start) ? start : null,
      start, end,
      wallCount: grid.wallCount,
      frontier: { start: NO_FRONTIER, end: NO_FRONTIER }
    };
  }

  const startMap = distancesFrom(grid, start);
  const endMap = distancesFrom(grid, end);
  const frontier = { start: startMap.stats, end: endMap.stats };

  const best = findBestBreach(grid, startMap, endMap);
  const floorEnds = grid.isFloor(start) && grid.isFloor(end);
  const direct = options.allowDirect && floorEnds ? startMap.get(end) : undefined;

  if (direct !== undefined && (!best || direct <= best.steps)) {
    return { steps: direct, breach: null, start, end, wallCount: grid.wallCount, frontier };
  }
  if (!best) throw new NoSolutionError(grid.height, grid.width, grid.wallCount);
  return { steps: best.steps, breach: best.wall, start, end, wallCount: grid.wallCount, frontier };
}

export function solve(maze: readonly (readonly number[])[], options: SolveOptions = {}): number {
  return solveDetailed(maze, options).steps;
}
