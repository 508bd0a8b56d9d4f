import type { Grid, Position } from "./grid";

export type FrontierStats = {
  expanded: number;     // tiles popped from the frontier
  peakFrontier: number; // widest ring
  levels: number;       // rings, origin included
};

/**
 * Step counts from one origin. The origin is step 1; unreached tiles have no entry.
 * Backed by one dense slot per tile (0 = unreached).
 */
export class DistanceMap {
  constructor(
    private readonly grid: Grid,
    readonly origin: Position,
    private readonly steps: Int32Array,
    readonly stats: FrontierStats
  ) {}

  get(p: Position): number | undefined {
    if (!this.grid.inBounds(p)) return undefined;
    const s = this.steps[this.grid.indexOf(p)];
    return s ? s : undefined;
  }

  has(p: Position): boolean {
    return this.get(p) !== undefined;
  }

  get size(): number {
    return this.stats.expanded;
  }

  *entries(): Generator<[Position, number]> {
    for (let i = 0; i < this.steps.length; i++) {
      const s = this.steps[i]!;
      if (s) yield [this.grid.positionOf(i), s];
    }
  }
}

/** Level-order BFS over floor tiles. The origin itself may be a wall. */
export function distancesFrom(grid: Grid, origin: Position): DistanceMap {
  if (!grid.inBounds(origin)) {
    throw new RangeError(`origin (${origin.row},${origin.col}) is outside the ${grid.height}x${grid.width} maze`);
  }
  const steps = new Int32Array(grid.size);
  const stats: FrontierStats = { expanded: 0, peakFrontier: 1, levels: 0 };

  let step = 1;
  let frontier: Position[] = [origin];
  steps[grid.indexOf(origin)] = step;

  while (frontier.length) {
    stats.levels++;
    stats.peakFrontier = Math.max(stats.peakFrontier, frontier.length);
    step++;
    const next: Position[] = [];
    for (const p of frontier) {
      stats.expanded++;
      for (const n of grid.neighbors(p)) {
        if (!grid.isFloor(n)) continue;
        const i = grid.indexOf(n);
        if (steps[i]) continue; // first visit is final
        steps[i] = step;
        next.push(n);
      }
    }
    frontier = next;
  }
  return new DistanceMap(grid, origin, steps, stats);
}
