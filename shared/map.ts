// ============================================
// Grid Map
// Static station layout and world <-> grid transforms
// ============================================

/**
 * Wall texture families. 0 is open floor; any other value is solid.
 */
export enum WallType {
  Empty = 0,
  TechPanel = 1,
  HullPlating = 2,
  ControlSystem = 3,
  EnergyConduit = 4,
}

/**
 * World-space rectangle covered by the grid (X/Z floor plane).
 */
export interface MapBounds {
  worldMinX: number;
  worldMinZ: number;
  worldMaxX: number;
  worldMaxZ: number;
}

/**
 * The subset of a map that pathfinding and occupancy checks consume.
 */
export interface GridMapView {
  readonly width: number;
  readonly height: number;
  isWall(x: number, y: number): boolean;
  worldToGrid(worldX: number, worldZ: number): [number, number];
  gridToWorld(gridX: number, gridZ: number): [number, number];
}

/**
 * Raised by GridMap.fromRows() for layouts it cannot parse.
 */
export class MapFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MapFormatError';
  }
}

// Default station deck: outer hull plus four L-shaped consoles
const DEFAULT_LAYOUT = [
  '1111221111',
  '1000000002',
  '1033004402',
  '1030000402',
  '2000000001',
  '2000000001',
  '1040000302',
  '1044003302',
  '1000000002',
  '1112222111',
];

/**
 * GridMap - row-major tile grid mapped onto a world rectangle.
 * tiles[y][x]; out-of-bounds cells count as walls.
 */
export class GridMap implements GridMapView {
  readonly width: number;
  readonly height: number;
  readonly bounds: MapBounds;
  private readonly tiles: number[][];

  constructor(tiles: number[][], bounds?: MapBounds) {
    this.height = tiles.length;
    this.width = tiles.length > 0 ? tiles[0].length : 0;
    this.tiles = tiles.map((row) => row.slice());
    this.bounds = bounds ?? {
      worldMinX: 0,
      worldMinZ: 0,
      worldMaxX: this.width,
      worldMaxZ: this.height,
    };
  }

  /**
   * Build a map from digit strings, one string per row.
   *
   * Example: GridMap.fromRows(['111', '101', '111'])
   */
  static fromRows(rows: readonly string[], bounds?: MapBounds): GridMap {
    if (rows.length === 0) {
      throw new MapFormatError('Map layout has no rows');
    }

    const width = rows[0].length;
    const tiles = rows.map((row, y) => {
      if (row.length !== width) {
        throw new MapFormatError(`Row ${y} has ${row.length} cells, expected ${width}`);
      }
      return Array.from(row, (ch, x) => {
        if (ch < '0' || ch > '9') {
          throw new MapFormatError(`Invalid tile '${ch}' at (${x}, ${y})`);
        }
        return Number(ch);
      });
    });

    return new GridMap(tiles, bounds);
  }

  /**
   * The built-in 10x10 station deck.
   */
  static createDefault(): GridMap {
    return GridMap.fromRows(DEFAULT_LAYOUT);
  }

  /**
   * Convert world coordinates to the containing grid cell.
   */
  worldToGrid(worldX: number, worldZ: number): [number, number] {
    const { worldMinX, worldMinZ, worldMaxX, worldMaxZ } = this.bounds;
    const gridX = Math.floor(((worldX - worldMinX) / (worldMaxX - worldMinX)) * this.width);
    const gridZ = Math.floor(((worldZ - worldMinZ) / (worldMaxZ - worldMinZ)) * this.height);
    return [gridX, gridZ];
  }

  /**
   * Convert a grid cell to the world coordinates of its centre.
   */
  gridToWorld(gridX: number, gridZ: number): [number, number] {
    const { worldMinX, worldMinZ, worldMaxX, worldMaxZ } = this.bounds;
    const worldX = worldMinX + ((gridX + 0.5) * (worldMaxX - worldMinX)) / this.width;
    const worldZ = worldMinZ + ((gridZ + 0.5) * (worldMaxZ - worldMinZ)) / this.height;
    return [worldX, worldZ];
  }

  isWall(x: number, y: number): boolean {
    if (!this.inBounds(x, y)) return true;
    return this.tiles[y][x] !== WallType.Empty;
  }

  isWallWorld(worldX: number, worldZ: number): boolean {
    const [gridX, gridZ] = this.worldToGrid(worldX, worldZ);
    return this.isWall(gridX, gridZ);
  }

  /**
   * Wall family at a cell. Out of bounds reads as TechPanel hull;
   * unknown tile values fall back to TechPanel as well.
   */
  wallType(x: number, y: number): WallType {
    if (!this.inBounds(x, y)) return WallType.TechPanel;
    switch (this.tiles[y][x]) {
      case 0:
        return WallType.Empty;
      case 2:
        return WallType.HullPlating;
      case 3:
        return WallType.ControlSystem;
      case 4:
        return WallType.EnergyConduit;
      default:
        return WallType.TechPanel;
    }
  }

  /**
   * Every wall cell, row by row.
   */
  wallCells(): Array<[number, number]> {
    const cells: Array<[number, number]> = [];
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        if (this.isWall(x, y)) cells.push([x, y]);
      }
    }
    return cells;
  }

  inBounds(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < this.width && y < this.height;
  }
}
