/**
 * Health check tool - Returns server status and metrics
 */

import type { ToolDefinition } from "./index.js";
import { readFileSync } from "fs";
import { resolve } from "path";
import { loadConfig } from "../config.js";
import { getPerceptualCacheSize, isPaletteLoaded } from "./context.js";

export interface HealthOutput {
    ok: true;
    version: string;
    uptimeSec: number;
    toolCount: number;
    metric: string;
    datasets: {
        palette: boolean;
    };
    cache: {
        perceptualPairs: number;
    };
}

const startTime = Date.now();

/**
 * VERSION from the environment, else package.json
 */
function getVersion(): string {
    const { version } = loadConfig();
    if (version) {
        return version;
    }

    try {
        const packagePath = resolve(process.cwd(), "package.json");
        const packageJson: unknown = JSON.parse(readFileSync(packagePath, "utf-8"));
        if (typeof packageJson === "object" && packageJson !== null && "version" in packageJson) {
            return String(packageJson.version);
        }
        return "unknown";
    } catch {
        return "unknown";
    }
}

/**
 * @param toolCount - number of registered tools, supplied by the registry
 */
export function healthHandler(toolCount: number): HealthOutput {
    return {
        ok: true,
        version: getVersion(),
        uptimeSec: Math.floor((Date.now() - startTime) / 1000),
        toolCount,
        metric: loadConfig().metric,
        datasets: {
            palette: isPaletteLoaded(),
        },
        cache: {
            perceptualPairs: getPerceptualCacheSize(),
        },
    };
}

/**
 * Health tool definition for MCP
 */
export const healthTool = {
    name: "health",
    description: "Returns server health: version, uptime, tool count, default metric, palette availability and perceptual distance cache size",
    inputSchema: {
        type: "object",
        properties: {},
    },
} satisfies ToolDefinition;
