/**
 * Palette usage report
 */

import { colorAt, type RgbaImage } from "../lib/image/raster.js";
import type { Palette, PaletteEntry } from "./palette.js";

export interface CatalogEntry {
    label: string;
    name: string;
    hex: string;
    restricted: boolean;
    count: number;
}

/**
 * Restricted entries carry a "$ " prefix
 */
export function catalogLabel(entry: PaletteEntry): string {
    return entry.restricted ? `$ ${entry.name}` : entry.name;
}

/**
 * Counts pixels per palette entry after nearest-color resolution.
 * Sorted by count descending, then label.
 */
export function catalogPalette(image: RgbaImage, palette: Palette): CatalogEntry[] {
    const resolve = palette.resolver();
    const counts = new Map<PaletteEntry, number>();
    for (let y = 0; y < image.height; y++) {
        for (let x = 0; x < image.width; x++) {
            const entry = resolve(colorAt(image, x, y));
            counts.set(entry, (counts.get(entry) ?? 0) + 1);
        }
    }

    return [...counts.entries()]
        .map(([entry, count]) => ({
            label: catalogLabel(entry),
            name: entry.name,
            hex: entry.color.toHex(),
            restricted: entry.restricted,
            count,
        }))
        .sort((a, b) => b.count - a.count || (a.label < b.label ? -1 : a.label > b.label ? 1 : 0));
}

export function formatCatalogReport(entries: readonly CatalogEntry[]): string {
    return entries.map((entry) => `${String(entry.count).padStart(7)}  ${entry.label}`).join("\n");
}
