/**
 * Tile rasterizer
 * A tile is an immutable 9x9 textured square standing in for one magnified pixel.
 */

import type { Color } from "../lib/color/color.js";
import { PreconditionError } from "./errors.js";

export const TILE_SIZE = 9;

/**
 * Pattern rows: "X" marks a foreground cell, "." leaves the background
 */
export type TilePattern = readonly string[];

export interface TileSpec {
    background: Color;
    foreground?: Color;
    pattern?: TilePattern;
    highlight?: Color;
    shadow?: Color;
}

export interface TileRenderOptions {
    fade?: boolean;
    halo?: Color | null;
}

/**
 * Splits the compact "row/row/row" notation used by the palette table
 */
export function parsePattern(source: string): string[] {
    return source.length === 0 ? [] : source.split("/");
}

function validatePattern(pattern: TilePattern): void {
    if (pattern.length > TILE_SIZE) {
        throw new PreconditionError(`Tile pattern has ${pattern.length} rows, at most ${TILE_SIZE} allowed`);
    }
    const width = pattern.length > 0 ? pattern[0].length : 0;
    for (const row of pattern) {
        if (row.length !== width) {
            throw new PreconditionError("Tile pattern rows must all have the same length");
        }
        if (row.length > TILE_SIZE) {
            throw new PreconditionError(`Tile pattern row "${row}" is wider than ${TILE_SIZE}`);
        }
        if (!/^[X.]*$/.test(row)) {
            throw new PreconditionError(`Tile pattern row "${row}" may only contain "X" and "."`);
        }
    }
}

export class Tile {
    private readonly cells: readonly (readonly Color[])[];

    constructor(spec: TileSpec) {
        const { background, foreground, pattern = [], highlight, shadow } = spec;
        validatePattern(pattern);

        const cells: Color[][] = [];
        for (let row = 0; row < TILE_SIZE; row++) {
            cells.push(new Array<Color>(TILE_SIZE).fill(background));
        }

        // Highlight owns the top row and right column, minus the top-left corner
        if (highlight) {
            for (let i = 1; i < TILE_SIZE; i++) {
                cells[0][i] = highlight;
                cells[i][TILE_SIZE - 1] = highlight;
            }
        }

        // Shadow owns the left column and bottom row, minus the bottom-right corner
        if (shadow) {
            for (let i = 0; i < TILE_SIZE - 1; i++) {
                cells[i][0] = shadow;
                cells[TILE_SIZE - 1][i] = shadow;
            }
        }

        if (foreground && pattern.length > 0) {
            const top = (TILE_SIZE - pattern.length) >> 1;
            pattern.forEach((line, i) => {
                const left = (TILE_SIZE - line.length) >> 1;
                for (let j = 0; j < line.length; j++) {
                    if (line[j] === "X") {
                        cells[top + i][left + j] = foreground;
                    }
                }
            });
        }

        this.cells = cells;
    }

    colorAt(row: number, col: number): Color {
        const line = this.cells[row];
        if (!line || col < 0 || col >= TILE_SIZE) {
            throw new RangeError(`Tile cell (${row}, ${col}) is outside ${TILE_SIZE}x${TILE_SIZE}`);
        }
        return line[col];
    }

    /**
     * Renders 9 rows of RGBA bytes. Fade applies to every cell; the halo then
     * overwrites the whole perimeter.
     */
    render(options: TileRenderOptions = {}): Buffer[] {
        const { fade = false, halo = null } = options;
        const last = TILE_SIZE - 1;
        const rows: Buffer[] = [];
        for (let row = 0; row < TILE_SIZE; row++) {
            const line = Buffer.alloc(TILE_SIZE * 4);
            for (let col = 0; col < TILE_SIZE; col++) {
                let color = this.cells[row][col];
                if (halo && (row === 0 || row === last || col === 0 || col === last)) {
                    color = halo;
                } else if (fade) {
                    color = color.faded();
                }
                color.writeTo(line, col * 4);
            }
            rows.push(line);
        }
        return rows;
    }
}

export type TileId = number;

/**
 * Arena owning every tile; screens and palettes hold TileIds into it
 */
export class TileSet {
    private readonly tiles: Tile[] = [];

    add(tile: Tile): TileId {
        this.tiles.push(tile);
        return this.tiles.length - 1;
    }

    get(id: TileId): Tile {
        const tile = this.tiles[id];
        if (!tile) {
            throw new RangeError(`Unknown tile id ${id}`);
        }
        return tile;
    }

    get size(): number {
        return this.tiles.length;
    }
}
