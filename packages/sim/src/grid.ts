import { InvalidMazeError } from "@breach-path/shared";

export type Position = { row: number; col: number };

export const FLOOR = 0;
export const WALL = 1;

// up, left, right, down
const MOVES = [[-1, 0], [0, -1], [0, 1], [1, 0]] as const;

/** Immutable view of a binary maze; tiles stored row-major. */
export class Grid {
  private constructor(
    readonly height: number,
    readonly width: number,
    private readonly tiles: Uint8Array,
    readonly wallCount: number
  ) {}

  static fromRows(rows: readonly (readonly number[])[]): Grid {
    if (rows.length === 0) throw new InvalidMazeError("maze has no rows");
    const width = rows[0]!.length;
    if (width === 0) throw new InvalidMazeError("maze has no columns");

    const height = rows.length;
    const tiles = new Uint8Array(height * width);
    let walls = 0;
    for (let r = 0; r < height; r++) {
      const row = rows[r]!;
      if (row.length !== width) {
        throw new InvalidMazeError(`row ${r} has ${row.length} tiles, expected ${width}`);
      }
      for (let c = 0; c < width; c++) {
        const t = row[c];
        if (t !== FLOOR && t !== WALL) {
          throw new InvalidMazeError(`tile (${r},${c}) must be 0 or 1, got ${String(t)}`);
        }
        tiles[r * width + c] = t;
        walls += t;
      }
    }
    return new Grid(height, width, tiles, walls);
  }

  get size(): number {
    return this.tiles.length;
  }

  inBounds(p: Position): boolean {
    return p.row >= 0 && p.row < this.height && p.col >= 0 && p.col < this.width;
  }

  isFloor(p: Position): boolean {
    return this.inBounds(p) && this.tiles[this.indexOf(p)] === FLOOR;
  }

  isWall(p: Position): boolean {
    return this.inBounds(p) && this.tiles[this.indexOf(p)] === WALL;
  }

  indexOf(p: Position): number {
    return p.row * this.width + p.col;
  }

  positionOf(index: number): Position {
    return { row: Math.floor(index / this.width), col: index % this.width };
  }

  /** In-bounds 4-neighbors, whatever their tile. */
  neighbors(p: Position): Position[] {
    const out: Position[] = [];
    for (const [dr, dc] of MOVES) {
      const n = { row: p.row + dr, col: p.col + dc };
      if (this.inBounds(n)) out.push(n);
    }
    return out;
  }

  /** Wall tiles in row-major order. */
  *walls(): Generator<Position> {
    for (let i = 0; i < this.tiles.length; i++) {
      if (this.tiles[i] === WALL) yield this.positionOf(i);
    }
  }
}
