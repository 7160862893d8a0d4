/**
 * Glyph tiles for coordinate labels
 */

import { BLACK, WHITE } from "../lib/color/color.js";
import { PreconditionError } from "./errors.js";
import { Tile, TileSet, type TileId, type TilePattern } from "./tile.js";

export type GlyphOrientation = "horizontal" | "vertical";

/**
 * Character -> square bitmap rows, as stored in font.json
 */
export type GlyphSource = Readonly<Record<string, TilePattern>>;

/**
 * Rotates a square pattern 90 degrees clockwise
 */
export function rotateRight(pattern: TilePattern): string[] {
    const size = pattern.length;
    if (pattern.some((row) => row.length !== size)) {
        throw new PreconditionError("Only square patterns can be rotated");
    }
    const rotated: string[] = [];
    for (let i = 0; i < size; i++) {
        let line = "";
        for (let j = 0; j < size; j++) {
            line += pattern[size - j - 1][i];
        }
        rotated.push(line);
    }
    return rotated;
}

export class GlyphFont {
    readonly orientation: GlyphOrientation;
    private readonly glyphs: ReadonlyMap<string, TileId>;
    private readonly fallback: TileId;

    private constructor(orientation: GlyphOrientation, glyphs: ReadonlyMap<string, TileId>, fallback: TileId) {
        this.orientation = orientation;
        this.glyphs = glyphs;
        this.fallback = fallback;
    }

    /**
     * Builds white-on-black glyph tiles into the shared tile set.
     * Characters without a glyph render as the fallback tile.
     */
    static build(source: GlyphSource, orientation: GlyphOrientation, tiles: TileSet, fallback: TileId): GlyphFont {
        const glyphs = new Map<string, TileId>();
        for (const [ch, pattern] of Object.entries(source)) {
            const oriented = orientation === "vertical" ? rotateRight(pattern) : pattern;
            glyphs.set(ch, tiles.add(new Tile({ background: BLACK, foreground: WHITE, pattern: oriented })));
        }
        return new GlyphFont(orientation, glyphs, fallback);
    }

    has(ch: string): boolean {
        return this.glyphs.has(ch);
    }

    glyph(ch: string): TileId {
        return this.glyphs.get(ch) ?? this.fallback;
    }

    get characters(): string[] {
        return [...this.glyphs.keys()];
    }
}
