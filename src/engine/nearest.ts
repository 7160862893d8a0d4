/**
 * Snaps every pixel of an image to the palette
 */

import { Color, TRANSPARENT } from "../lib/color/color.js";
import { colorAt, createImage, setColorAt, type RgbaImage } from "../lib/image/raster.js";
import { PreconditionError } from "./errors.js";
import type { OverrideDefinition } from "./kit.js";
import type { Palette } from "./palette.js";

/**
 * Source color key -> palette color, consulted before nearest matching
 */
export type ColorOverrides = ReadonlyMap<number, Color>;

export interface NearestResult {
    image: RgbaImage;
    /** Pixels replaced through the override table */
    overridden: number;
    /** Opaque pixels whose color changed */
    adjusted: number;
}

/**
 * Validates an override table against the palette. Targets must be palette
 * colors and sources must not be, so mapping stays idempotent.
 */
export function buildOverrides(definitions: readonly OverrideDefinition[], palette: Palette): ColorOverrides {
    const overrides = new Map<number, Color>();
    for (const { from, to } of definitions) {
        const source = Color.fromHex(from);
        const target = Color.fromHex(to);
        if (!palette.has(target)) {
            throw new PreconditionError(`Override target ${target.toHex()} is not a palette color`);
        }
        if (palette.has(source)) {
            throw new PreconditionError(`Override source ${source.toHex()} is already a palette color`);
        }
        overrides.set(source.key, target);
    }
    return overrides;
}

export function mapToPalette(image: RgbaImage, palette: Palette, overrides: ColorOverrides = new Map()): NearestResult {
    const output = createImage(image.width, image.height);
    const resolve = palette.resolver();
    let overridden = 0;
    let adjusted = 0;

    for (let y = 0; y < image.height; y++) {
        for (let x = 0; x < image.width; x++) {
            const color = colorAt(image, x, y);
            if (color.a === 0) {
                setColorAt(output, x, y, TRANSPARENT);
                continue;
            }
            let mapped = overrides.get(color.key);
            if (mapped) {
                overridden++;
            } else {
                mapped = resolve(color).color;
            }
            if (!mapped.equals(color)) {
                adjusted++;
            }
            setColorAt(output, x, y, mapped);
        }
    }

    return { image: output, overridden, adjusted };
}
