/**
 * Fixed place palette: exact lookup and nearest-color resolution
 */

import { BLACK, Color, TRANSPARENT, WHITE, type ColorDistance } from "../lib/color/color.js";
import type { DistanceMetric } from "./distance.js";
import { PaletteMissError } from "./errors.js";
import { parsePattern, Tile, TileSet, type TileId } from "./tile.js";

/**
 * Palette table row, as stored in palette.json
 */
export interface PaletteDefinition {
    hex: string;
    name: string;
    restricted: boolean;
    pattern: string;
}

export interface PaletteEntry {
    readonly color: Color;
    readonly tileId: TileId;
    readonly name: string;
    /** Premium color, not part of the free set */
    readonly restricted: boolean;
}

export const TRANSPARENT_NAME = "Transparent";

/**
 * Gray tile with a dotted frame, used for alpha-0 pixels
 */
export function makeTransparentTile(): Tile {
    return new Tile({
        background: new Color(128, 128, 128),
        foreground: WHITE,
        pattern: ["X.X.X", ".....", "X...X", ".....", "X.X.X"],
        highlight: BLACK,
        shadow: WHITE,
    });
}

/**
 * Palette tile: the color itself, patterned in its highlight and framed
 * with a bright top/right edge and a dim left/bottom edge
 */
export function makeColorTile(color: Color, pattern: string, texture: ColorDistance): Tile {
    return new Tile({
        background: color,
        foreground: color.highlight(texture),
        pattern: parsePattern(pattern),
        highlight: color.bright(),
        shadow: color.dim(),
    });
}

export class Palette {
    readonly metric: DistanceMetric;
    readonly transparent: PaletteEntry;
    private readonly ordered: readonly PaletteEntry[];
    private readonly byKey: ReadonlyMap<number, PaletteEntry>;

    constructor(entries: readonly PaletteEntry[], transparent: PaletteEntry, metric: DistanceMetric) {
        if (entries.length === 0) {
            throw new Error("Palette needs at least one color");
        }
        const byKey = new Map<number, PaletteEntry>();
        for (const entry of entries) {
            if (entry.color.a !== 255) {
                throw new Error(`Palette color ${entry.color.toHex()} must be opaque`);
            }
            if (byKey.has(entry.color.key)) {
                throw new Error(`Palette color ${entry.color.toHex()} is listed twice`);
            }
            byKey.set(entry.color.key, entry);
        }
        this.ordered = entries;
        this.byKey = byKey;
        this.transparent = transparent;
        this.metric = metric;
    }

    /**
     * Builds every palette tile into the shared tile set.
     * @param texture - metric deciding each tile's pattern color
     * @param metric - metric used for nearest-color resolution
     */
    static build(
        definitions: readonly PaletteDefinition[],
        tiles: TileSet,
        texture: ColorDistance,
        metric: DistanceMetric
    ): Palette {
        const entries = definitions.map((definition): PaletteEntry => {
            const color = Color.fromHex(definition.hex);
            return {
                color,
                tileId: tiles.add(makeColorTile(color, definition.pattern, texture)),
                name: definition.name,
                restricted: definition.restricted,
            };
        });
        const transparent: PaletteEntry = {
            color: TRANSPARENT,
            tileId: tiles.add(makeTransparentTile()),
            name: TRANSPARENT_NAME,
            restricted: false,
        };
        return new Palette(entries, transparent, metric);
    }

    get entries(): readonly PaletteEntry[] {
        return this.ordered;
    }

    has(color: Color): boolean {
        return this.byKey.has(color.key);
    }

    find(color: Color): PaletteEntry | undefined {
        if (color.a === 0) {
            return this.transparent;
        }
        return this.byKey.get(color.key);
    }

    /**
     * @throws PaletteMissError when the color is not a member
     */
    exact(color: Color): PaletteEntry {
        const entry = this.find(color);
        if (!entry) {
            throw new PaletteMissError(color);
        }
        return entry;
    }

    /**
     * Closest palette color. Members map to themselves, alpha 0 maps to
     * TRANSPARENT, ties go to the entry declared first.
     */
    nearest(color: Color): Color {
        if (color.a === 0) {
            return TRANSPARENT;
        }
        if (this.byKey.has(color.key)) {
            return color;
        }
        let best = this.ordered[0];
        let bestDistance = this.metric.distance(best.color, color);
        for (let i = 1; i < this.ordered.length; i++) {
            const candidate = this.ordered[i];
            const distance = this.metric.distance(candidate.color, color);
            if (distance < bestDistance) {
                best = candidate;
                bestDistance = distance;
            }
        }
        return best.color;
    }

    nearestEntry(color: Color): PaletteEntry {
        return this.exact(this.nearest(color));
    }

    /**
     * nearestEntry with a memo scoped to the returned function, for
     * resolving every pixel of one image
     */
    resolver(): (color: Color) => PaletteEntry {
        const memo = new Map<number, PaletteEntry>();
        return (color: Color) => {
            let entry = memo.get(color.key);
            if (!entry) {
                entry = this.nearestEntry(color);
                memo.set(color.key, entry);
            }
            return entry;
        };
    }
}
