import { seeds } from "../../consts";
import {
  UniverseConfigSchema,
  type UniverseConfig,
  type UniverseOptions,
} from "./config";
import { InvalidConfigError, InvalidDimensionsError } from "./errors";
import {
  ALIVE,
  ALIVE_GLYPH,
  DEAD,
  DEAD_GLYPH,
  DEFAULT_HEIGHT,
  DEFAULT_WIDTH,
} from "./life.shared";

function parseConfig(options: UniverseOptions): UniverseConfig {
  const result = UniverseConfigSchema.safeParse(options);
  if (result.success) return result.data;

  const badSize = result.error.issues.some(
    (issue) => issue.path[0] === "width" || issue.path[0] === "height",
  );
  if (badSize) {
    throw new InvalidDimensionsError(
      options.width ?? DEFAULT_WIDTH,
      options.height ?? DEFAULT_HEIGHT,
    );
  }
  throw new InvalidConfigError(result.error.issues);
}

/**
 * A toroidal Game of Life grid (B3/S23).
 *
 * The host owns one instance and drives it by alternating {@link render} and
 * {@link tick}. Nothing here is asynchronous.
 */
export class Universe {
  readonly width: number;
  readonly height: number;

  private readonly config: UniverseConfig;
  private grid: Uint8Array;
  private currentGeneration = 0;

  /**
   * @throws {InvalidDimensionsError} when width or height is not an integer in [1, MAX_SIDE]
   * @throws {InvalidConfigError} for any other rejected option
   */
  constructor(options: UniverseOptions = {}) {
    this.config = parseConfig(options);
    this.width = this.config.width;
    this.height = this.config.height;
    this.grid = new Uint8Array(this.width * this.height);
    seeds[this.config.seed](this.grid, this.config);
  }

  get generation(): number {
    return this.currentGeneration;
  }

  private getIndex(row: number, column: number): number {
    return row * this.width + column;
  }

  private checkBounds(row: number, column: number) {
    if (
      !Number.isInteger(row) ||
      !Number.isInteger(column) ||
      row < 0 ||
      row >= this.height ||
      column < 0 ||
      column >= this.width
    ) {
      throw new RangeError(
        `Cell (${row}, ${column}) is outside a ${this.width}x${this.height} universe`,
      );
    }
  }

  /** Row-major copy of the grid. */
  cells(): boolean[] {
    return Array.from(this.grid, (cell) => cell === ALIVE);
  }

  cell(row: number, column: number): boolean {
    this.checkBounds(row, column);
    return this.grid[this.getIndex(row, column)] === ALIVE;
  }

  setCell(row: number, column: number, alive: boolean) {
    this.checkBounds(row, column);
    this.grid[this.getIndex(row, column)] = alive ? ALIVE : DEAD;
  }

  population(): number {
    let count = 0;
    for (const cell of this.grid) count += cell;
    return count;
  }

  liveNeighborCount(row: number, column: number): number {
    const self = this.getIndex(row, column);
    const seen: number[] = [];
    let count = 0;
    for (let dy = -1; dy <= 1; dy++) {
      for (let dx = -1; dx <= 1; dx++) {
        if (dx === 0 && dy === 0) continue;
        // Edges wrap
        const ny = (row + dy + this.height) % this.height;
        const nx = (column + dx + this.width) % this.width;
        const idx = this.getIndex(ny, nx);
        // Below 3 wide or tall, offsets wrap onto one cell or back onto this one
        if (idx === self || seen.includes(idx)) continue;
        seen.push(idx);
        count += this.grid[idx];
      }
    }
    return count;
  }

  /**
   * Advances one generation. Every count reads the previous grid; the new
   * grid is swapped in only once all cells are computed.
   */
  tick() {
    const next = new Uint8Array(this.grid.length);

    for (let row = 0; row < this.height; row++) {
      for (let col = 0; col < this.width; col++) {
        const idx = this.getIndex(row, col);
        const neighbors = this.liveNeighborCount(row, col);

        if (this.grid[idx] === ALIVE) {
          next[idx] = neighbors === 2 || neighbors === 3 ? ALIVE : DEAD;
        } else {
          next[idx] = neighbors === 3 ? ALIVE : DEAD;
        }
      }
    }

    this.grid = next;
    this.currentGeneration++;
  }

  render(): string {
    const lines: string[] = [];
    for (let row = 0; row < this.height; row++) {
      let line = "";
      for (let col = 0; col < this.width; col++) {
        line +=
          this.grid[this.getIndex(row, col)] === ALIVE
            ? ALIVE_GLYPH
            : DEAD_GLYPH;
      }
      lines.push(line);
    }
    return lines.join("\n");
  }

  /** Reseeds from the construction options and rewinds to generation 0. */
  reset() {
    this.grid = new Uint8Array(this.width * this.height);
    seeds[this.config.seed](this.grid, this.config);
    this.currentGeneration = 0;
  }

  clone(): Universe {
    const copy = new Universe(this.config);
    copy.grid = this.grid.slice();
    copy.currentGeneration = this.currentGeneration;
    return copy;
  }
}
