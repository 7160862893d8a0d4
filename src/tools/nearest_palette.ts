/**
 * nearest_palette: snaps an image to the palette
 */

import type { ToolDefinition } from "./index.js";
import type { MetricName } from "../engine/distance.js";
import type { OverrideDefinition } from "../engine/kit.js";
import { buildOverrides, mapToPalette } from "../engine/nearest.js";
import { decodeImage, encodeImage } from "../lib/image/raster.js";
import { getDefaultOverrides, getRenderKit } from "./context.js";
import { describeFailure } from "./errors.js";

export interface NearestPaletteInput {
    input_path: string;
    output_path: string;
    /** Replaces the default override table when given */
    overrides?: OverrideDefinition[];
    metric?: MetricName;
}

export interface NearestPaletteOutput {
    ok: boolean;
    outputPath?: string;
    width?: number;
    height?: number;
    overridden?: number;
    adjusted?: number;
    error?: string;
}

export async function nearestPaletteHandler(input: NearestPaletteInput): Promise<NearestPaletteOutput> {
    try {
        const kit = getRenderKit(input.metric);
        const overrides = buildOverrides(input.overrides ?? getDefaultOverrides(), kit.palette);
        const source = await decodeImage(input.input_path);
        const { image, overridden, adjusted } = mapToPalette(source, kit.palette, overrides);
        await encodeImage(input.output_path, image);
        return {
            ok: true,
            outputPath: input.output_path,
            width: image.width,
            height: image.height,
            overridden,
            adjusted,
        };
    } catch (error) {
        return {
            ok: false,
            error: describeFailure(error),
        };
    }
}

/**
 * Nearest palette tool definition for MCP
 */
export const nearestPaletteTool = {
    name: "nearest_palette",
    description:
        "Writes a copy of a PNG with every pixel replaced by its nearest palette color. Fully transparent pixels stay transparent; an override table is consulted before matching.",
    inputSchema: {
        type: "object",
        properties: {
            input_path: { type: "string", description: "Path of the PNG to convert" },
            output_path: { type: "string", description: "Path the snapped PNG is written to" },
            overrides: {
                type: "array",
                description: "Manual substitutions checked before nearest matching (default: bundled table)",
                items: {
                    type: "object",
                    properties: {
                        from: { type: "string", description: "Source hex color", pattern: "^#?[0-9a-fA-F]{6}$" },
                        to: { type: "string", description: "Palette hex color", pattern: "^#?[0-9a-fA-F]{6}$" },
                    },
                    required: ["from", "to"],
                },
            },
            metric: {
                type: "string",
                description: "Color distance used for nearest matching",
                enum: ["perceptual", "euclidean"],
            },
        },
        required: ["input_path", "output_path"],
    },
} satisfies ToolDefinition;
