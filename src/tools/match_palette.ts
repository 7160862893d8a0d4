/**
 * match_palette: nearest palette entry for a single color
 */

import type { ToolDefinition } from "./index.js";
import type { MetricName } from "../engine/distance.js";
import { Color } from "../lib/color/color.js";
import { getRenderKit } from "./context.js";
import { describeFailure } from "./errors.js";

export interface MatchPaletteInput {
    hex: string;
    metric?: MetricName;
}

export interface PaletteMatch {
    name: string;
    hex: string;
    restricted: boolean;
    distance: number;
}

export interface MatchPaletteOutput {
    ok: boolean;
    best?: PaletteMatch;
    exact?: boolean;
    method?: MetricName;
    error?: string;
}

/**
 * Matches "#RRGGBB" (opaque) or "#RRGGBBAA" to the palette
 */
export function matchPaletteHandler(input: MatchPaletteInput): MatchPaletteOutput {
    let color: Color;
    try {
        color = Color.fromHex(input.hex);
    } catch {
        return {
            ok: false,
            error: "Invalid hex color format. Expected #RRGGBB or #RRGGBBAA",
        };
    }

    try {
        const { palette, metric } = getRenderKit(input.metric);
        const entry = palette.nearestEntry(color);
        const distance = color.a === 0 ? 0 : color.distanceTo(entry.color, metric);
        return {
            ok: true,
            best: {
                name: entry.name,
                hex: entry.color.toHex(),
                restricted: entry.restricted,
                distance: Math.round(distance * 100) / 100, // Round to 2 decimal places
            },
            exact: palette.has(color) || color.a === 0,
            method: metric.name,
        };
    } catch (error) {
        return {
            ok: false,
            error: describeFailure(error),
        };
    }
}

/**
 * Match palette tool definition for MCP
 */
export const matchPaletteTool = {
    name: "match_palette",
    description: "Finds the palette color nearest to a hex color, with its display name, restricted flag and distance",
    inputSchema: {
        type: "object",
        properties: {
            hex: {
                type: "string",
                description: "Hex color code (e.g., #ED1C24, or #RRGGBBAA with alpha)",
                pattern: "^#?[0-9a-fA-F]{6}([0-9a-fA-F]{2})?$",
            },
            metric: {
                type: "string",
                description: "Color distance used for nearest matching",
                enum: ["perceptual", "euclidean"],
            },
        },
        required: ["hex"],
    },
} satisfies ToolDefinition;
