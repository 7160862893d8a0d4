/**
 * Environment configuration
 */

import { resolve } from "path";
import { z } from "zod";
import { METRIC_NAMES, type MetricName } from "./engine/distance.js";

export interface Config {
    metric: MetricName;
    dataDir: string;
    version?: string;
}

const envSchema = z.object({
    PLACE_GRID_METRIC: z.enum(["perceptual", "euclidean"]).optional(),
    PLACE_GRID_DATA_DIR: z.string().min(1).optional(),
    VERSION: z.string().min(1).optional(),
});

/**
 * Reads PLACE_GRID_METRIC, PLACE_GRID_DATA_DIR and VERSION
 * @throws Error naming the offending variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new Error(
            `Invalid environment variable ${issue?.path.join(".") ?? ""}: ${issue?.message ?? "unknown"} (metrics: ${METRIC_NAMES.join(", ")})`
        );
    }
    return {
        metric: parsed.data.PLACE_GRID_METRIC ?? "perceptual",
        // Data files live beside the sources, resolved from the project root
        dataDir: resolve(process.cwd(), parsed.data.PLACE_GRID_DATA_DIR ?? "src/data"),
        version: parsed.data.VERSION,
    };
}
