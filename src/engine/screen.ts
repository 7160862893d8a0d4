/**
 * Screen compositor
 * A grid of tile references rendered into one RGBA image, with optional
 * separator lines spliced in at cell boundaries.
 */

import type { Color } from "../lib/color/color.js";
import type { RgbaImage } from "../lib/image/raster.js";
import { PreconditionError } from "./errors.js";
import { TILE_SIZE, TileSet, type TileId } from "./tile.js";

/**
 * 1 duplicates the pixel line before each boundary; 2 also duplicates the
 * line after it
 */
export type SeparatorWidth = 1 | 2;

export interface ComposeOptions {
    separatorWidth?: SeparatorWidth;
}

const BYTES_PER_PIXEL = 4;

function assertInterior(positions: readonly number[], extent: number, axis: string): void {
    for (const position of positions) {
        if (!Number.isInteger(position) || position <= 0 || position >= extent) {
            throw new PreconditionError(
                `${axis} separator at ${position} must be an integer strictly between 0 and ${extent}`
            );
        }
    }
}

/**
 * Widens every row by duplicating the pixel column(s) at each boundary.
 * @param boundaries - pixel offsets, processed right to left so earlier
 * splices do not move later ones
 */
export function spliceColumns(rows: readonly Buffer[], boundaries: readonly number[], width: SeparatorWidth): Buffer[] {
    const descending = [...boundaries].sort((a, b) => b - a);
    return rows.map((row) => {
        let line = row;
        for (const boundary of descending) {
            const cut = boundary * BYTES_PER_PIXEL;
            const parts = [line.subarray(0, cut), line.subarray(cut - BYTES_PER_PIXEL, cut)];
            if (width === 2) {
                parts.push(line.subarray(cut, cut + BYTES_PER_PIXEL));
            }
            parts.push(line.subarray(cut));
            line = Buffer.concat(parts);
        }
        return line;
    });
}

/**
 * Lengthens the image by duplicating the pixel row(s) at each boundary
 */
export function spliceRows(rows: readonly Buffer[], boundaries: readonly number[], width: SeparatorWidth): Buffer[] {
    const result = [...rows];
    const descending = [...boundaries].sort((a, b) => b - a);
    for (const boundary of descending) {
        const inserted = [result[boundary - 1]];
        if (width === 2) {
            inserted.push(result[boundary]);
        }
        result.splice(boundary, 0, ...inserted);
    }
    return result;
}

export class Screen {
    readonly width: number;
    readonly height: number;
    private readonly tiles: TileSet;
    private readonly cells: Int32Array;
    private readonly halos: (Color | null)[];
    private readonly faded: Uint8Array;

    /**
     * @param fill - tile every cell starts out with
     */
    constructor(width: number, height: number, tiles: TileSet, fill: TileId) {
        if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
            throw new PreconditionError(`Screen size ${width}x${height} must be positive integers`);
        }
        tiles.get(fill);
        this.width = width;
        this.height = height;
        this.tiles = tiles;
        this.cells = new Int32Array(width * height).fill(fill);
        this.halos = new Array<Color | null>(width * height).fill(null);
        this.faded = new Uint8Array(width * height);
    }

    private index(row: number, col: number): number {
        if (!Number.isInteger(row) || !Number.isInteger(col) || row < 0 || row >= this.height || col < 0 || col >= this.width) {
            throw new RangeError(`Cell (${row}, ${col}) is outside the ${this.width}x${this.height} screen`);
        }
        return row * this.width + col;
    }

    plot(row: number, col: number, tile: TileId): void {
        this.tiles.get(tile);
        this.cells[this.index(row, col)] = tile;
    }

    tileAt(row: number, col: number): TileId {
        return this.cells[this.index(row, col)];
    }

    haloAt(row: number, col: number, color: Color | null): void {
        this.halos[this.index(row, col)] = color;
    }

    haloOf(row: number, col: number): Color | null {
        return this.halos[this.index(row, col)];
    }

    fadeAt(row: number, col: number, fade: boolean = true): void {
        this.faded[this.index(row, col)] = fade ? 1 : 0;
    }

    isFaded(row: number, col: number): boolean {
        return this.faded[this.index(row, col)] === 1;
    }

    /**
     * Renders all cells, then splices column separators followed by row
     * separators. Positions are in cells and must be strictly interior.
     */
    compose(
        columnSeparators: readonly number[] = [],
        rowSeparators: readonly number[] = [],
        options: ComposeOptions = {}
    ): RgbaImage {
        const { separatorWidth = 1 } = options;
        assertInterior(columnSeparators, this.width, "Column");
        assertInterior(rowSeparators, this.height, "Row");

        const rowBytes = this.width * TILE_SIZE * BYTES_PER_PIXEL;
        const tileBytes = TILE_SIZE * BYTES_PER_PIXEL;
        let rows: Buffer[] = [];
        for (let row = 0; row < this.height; row++) {
            const band: Buffer[] = [];
            for (let line = 0; line < TILE_SIZE; line++) {
                band.push(Buffer.alloc(rowBytes));
            }
            for (let col = 0; col < this.width; col++) {
                const i = row * this.width + col;
                const drawn = this.tiles.get(this.cells[i]).render({
                    fade: this.faded[i] === 1,
                    halo: this.halos[i],
                });
                drawn.forEach((pixels, line) => pixels.copy(band[line], col * tileBytes));
            }
            rows.push(...band);
        }

        rows = spliceColumns(rows, columnSeparators.map((p) => p * TILE_SIZE), separatorWidth);
        rows = spliceRows(rows, rowSeparators.map((p) => p * TILE_SIZE), separatorWidth);

        return {
            width: this.width * TILE_SIZE + separatorWidth * columnSeparators.length,
            height: this.height * TILE_SIZE + separatorWidth * rowSeparators.length,
            data: Buffer.concat(rows),
        };
    }
}
