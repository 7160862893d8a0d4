/**
 * Render kit: the palette, fonts and tile arena every pipeline run shares.
 * Built once by an explicit initialisation step and passed to the engine.
 */

import { readFileSync } from "fs";
import { join } from "path";
import { z } from "zod";
import { BLACK } from "../lib/color/color.js";
import { createMetric, PerceptualMetric, type DistanceMetric, type MetricName } from "./distance.js";
import { GlyphFont, type GlyphSource } from "./font.js";
import { Palette, type PaletteDefinition } from "./palette.js";
import { Tile, TileSet, type TileId } from "./tile.js";

export interface KitSources {
    palette: PaletteDefinition[];
    font: GlyphSource;
}

export interface RenderKit {
    tiles: TileSet;
    /** Plain black tile: screen background and unknown glyphs */
    blank: TileId;
    palette: Palette;
    horizontalFont: GlyphFont;
    verticalFont: GlyphFont;
    metric: DistanceMetric;
}

const hexSchema = z.string().regex(/^#?[0-9a-fA-F]{6}$/, "Expected a 6-digit hex color");
const patternRow = z.string().regex(/^[X.]*$/, "Pattern rows may only contain 'X' and '.'");

const paletteSchema = z
    .array(
        z.object({
            hex: hexSchema,
            name: z.string().min(1),
            restricted: z.boolean(),
            pattern: z.string().regex(/^[X./]*$/, "Pattern may only contain 'X', '.' and '/'"),
        })
    )
    .min(1);

const glyphSchema = z.array(patternRow.length(7)).length(7);
const fontSchema = z.record(z.string().length(1), glyphSchema);

export const overridesSchema = z.array(
    z.object({
        from: hexSchema,
        to: hexSchema,
    })
);

export type OverrideDefinition = z.infer<typeof overridesSchema>[number];

function readJson(path: string): unknown {
    return JSON.parse(readFileSync(path, "utf-8"));
}

/**
 * Reads palette.json and font.json from the data directory
 * @throws Error if a file is missing or fails validation
 */
export function loadKitSources(dataDir: string): KitSources {
    const palette = paletteSchema.parse(readJson(join(dataDir, "palette.json")));
    const font = fontSchema.parse(readJson(join(dataDir, "font.json")));
    return { palette, font };
}

export function loadOverrideDefinitions(dataDir: string): OverrideDefinition[] {
    return overridesSchema.parse(readJson(join(dataDir, "overrides.json")));
}

/**
 * Builds every shared tile. Tile textures always use the perceptual metric;
 * `metric` only decides nearest-color resolution.
 */
export function createRenderKit(sources: KitSources, metric: DistanceMetric | MetricName = "perceptual"): RenderKit {
    const matcher = typeof metric === "string" ? createMetric(metric) : metric;
    const texture = matcher instanceof PerceptualMetric ? matcher : new PerceptualMetric();

    const tiles = new TileSet();
    const blank = tiles.add(new Tile({ background: BLACK }));
    const palette = Palette.build(sources.palette, tiles, texture, matcher);
    const horizontalFont = GlyphFont.build(sources.font, "horizontal", tiles, blank);
    const verticalFont = GlyphFont.build(sources.font, "vertical", tiles, blank);

    return { tiles, blank, palette, horizontalFont, verticalFont, metric: matcher };
}
