/**
 * Lazily built render kits shared by the tools, one per metric
 */

import { loadConfig } from "../config.js";
import type { MetricName } from "../engine/distance.js";
import { PerceptualMetric } from "../engine/distance.js";
import {
    createRenderKit,
    loadKitSources,
    loadOverrideDefinitions,
    type KitSources,
    type OverrideDefinition,
    type RenderKit,
} from "../engine/kit.js";

let sources: KitSources | null = null;
const kits = new Map<MetricName, RenderKit>();

/**
 * Raised when palette.json or font.json cannot be loaded or built into a kit
 */
export class DatasetError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "DatasetError";
    }
}

function loadSources(): KitSources {
    if (sources !== null) {
        return sources;
    }
    const { dataDir } = loadConfig();
    try {
        sources = loadKitSources(dataDir);
    } catch (error) {
        throw new DatasetError(
            `Palette data not found or invalid in ${dataDir}: ${error instanceof Error ? error.message : String(error)}`
        );
    }
    return sources;
}

/**
 * @param metric - defaults to PLACE_GRID_METRIC
 */
export function getRenderKit(metric?: MetricName): RenderKit {
    const name = metric ?? loadConfig().metric;
    let kit = kits.get(name);
    if (!kit) {
        const loaded = loadSources();
        try {
            kit = createRenderKit(loaded, name);
        } catch (error) {
            throw new DatasetError(
                `Palette data in ${loadConfig().dataDir} is unusable: ${error instanceof Error ? error.message : String(error)}`
            );
        }
        kits.set(name, kit);
    }
    return kit;
}

export function getDefaultOverrides(): OverrideDefinition[] {
    const { dataDir } = loadConfig();
    try {
        return loadOverrideDefinitions(dataDir);
    } catch (error) {
        throw new DatasetError(
            `Override table not found or invalid in ${dataDir}: ${error instanceof Error ? error.message : String(error)}`
        );
    }
}

/**
 * Exported for the health endpoint
 */
export function isPaletteLoaded(): boolean {
    return sources !== null;
}

/**
 * Cached perceptual distance pairs across all kits
 */
export function getPerceptualCacheSize(): number {
    let size = 0;
    for (const kit of kits.values()) {
        if (kit.metric instanceof PerceptualMetric) {
            size += kit.metric.cacheSize;
        }
    }
    return size;
}

/**
 * Drops cached kits (exported for test use)
 */
export function resetRenderKits(): void {
    sources = null;
    kits.clear();
}
