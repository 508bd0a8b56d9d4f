import { InvalidParamError, prng, randomInt, seedFromHex, type MazeRows, type TileValue } from "@breach-path/shared";

/**
 * Binary maze (0 floor, 1 wall); recursive backtracker + loop-carving.
 * Cells sit on even coordinates so both corners are floor; dimensions must be odd.
 */
export function generateMaze(seedHex: string, h = 31, w = 31, loopiness = 0.08): MazeRows {
  if (h % 2 === 0 || w % 2 === 0) throw new InvalidParamError(`maze dimensions must be odd, got ${h}x${w}`);
  const rnd = prng(seedFromHex(seedHex));
  const rows: MazeRows = Array.from({ length: h }, () => Array.from({ length: w }, (): TileValue => 1));
  const open = (r: number, c: number) => { rows[r]![c] = 0; };
  const isCell = (r: number, c: number) => r >= 0 && c >= 0 && r < h && c < w;

  const visited = new Set<number>();
  const stack: [number, number][] = [[0, 0]];
  visited.add(0);
  open(0, 0);

  const dirs = [[-2, 0], [2, 0], [0, 2], [0, -2]] as const;

  while (stack.length) {
    const [cr, cc] = stack[stack.length - 1]!;
    const next = dirs
      .map(([dr, dc]) => [cr + dr, cc + dc] as const)
      .filter(([nr, nc]) => isCell(nr, nc) && !visited.has(nr * w + nc));
    if (next.length === 0) { stack.pop(); continue; }
    const [nr, nc] = next[randomInt(rnd, next.length)]!;
    // knock down the wall between current and next
    open((cr + nr) / 2, (cc + nc) / 2);
    open(nr, nc);
    visited.add(nr * w + nc);
    stack.push([nr, nc]);
  }

  // loop carving: open walls that separate two cells
  const carveCount = Math.floor(h * w * loopiness);
  for (let i = 0; i < carveCount; i++) {
    const r = randomInt(rnd, h), c = randomInt(rnd, w);
    if (rows[r]![c] === 0) continue;
    const horizontal = r % 2 === 0 && c % 2 === 1;
    const vertical = r % 2 === 1 && c % 2 === 0;
    if (horizontal || vertical) open(r, c);
  }
  return rows;
}

/** Each tile is a wall with probability `density`; the two corners are always floor. */
export function generateRandom(seedHex: string, h: number, w: number, density: number): MazeRows {
  const rnd = prng(seedFromHex(seedHex));
  const rows: MazeRows = Array.from({ length: h }, () =>
    Array.from({ length: w }, (): TileValue => (rnd() < density ? 1 : 0))
  );
  rows[0]![0] = 0;
  rows[h - 1]![w - 1] = 0;
  return rows;
}
