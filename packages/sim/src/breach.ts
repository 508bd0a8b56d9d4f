import type { Grid, Position } from "./grid";
import type { DistanceMap } from "./frontier";

export type BreachCandidate = { wall: Position; steps: number };

/**
 * Best route that crosses `wall`: the closest floor neighbor seen from each end,
 * plus one step for the wall itself. `null` when either side has no reached neighbor.
 */
export function bestBreachDistance(grid: Grid, startMap: DistanceMap, endMap: DistanceMap, wall: Position): number | null {
  let minStart: number | undefined;
  let minEnd: number | undefined;
  for (const n of grid.neighbors(wall)) {
    if (!grid.isFloor(n)) continue;
    const s = startMap.get(n);
    if (s !== undefined && (minStart === undefined || s < minStart)) minStart = s;
    const e = endMap.get(n);
    if (e !== undefined && (minEnd === undefined || e < minEnd)) minEnd = e;
  }
  if (minStart === undefined || minEnd === undefined) return null;
  return minStart + minEnd + 1;
}

/** Minimum over every wall tile; ties go to the first wall in row-major order. */
export function findBestBreach(grid: Grid, startMap: DistanceMap, endMap: DistanceMap): BreachCandidate | null {
  let best: BreachCandidate | null = null;
  for (const wall of grid.walls()) {
    const steps = bestBreachDistance(grid, startMap, endMap, wall);
    if (steps === null) continue;
    if (!best || steps < best.steps) best = { wall, steps };
  }
  return best;
}
