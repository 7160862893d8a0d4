/**
 * palette_catalog: how many pixels of each palette color an image needs
 */

import type { ToolDefinition } from "./index.js";
import { catalogPalette, formatCatalogReport, type CatalogEntry } from "../engine/catalog.js";
import type { MetricName } from "../engine/distance.js";
import { decodeImage } from "../lib/image/raster.js";
import { getRenderKit } from "./context.js";
import { describeFailure } from "./errors.js";

export interface PaletteCatalogInput {
    input_path: string;
    metric?: MetricName;
}

export interface PaletteCatalogOutput {
    ok: boolean;
    total?: number;
    entries?: CatalogEntry[];
    report?: string;
    error?: string;
}

export async function paletteCatalogHandler(input: PaletteCatalogInput): Promise<PaletteCatalogOutput> {
    try {
        const kit = getRenderKit(input.metric);
        const image = await decodeImage(input.input_path);
        const entries = catalogPalette(image, kit.palette);
        return {
            ok: true,
            total: image.width * image.height,
            entries,
            report: formatCatalogReport(entries),
        };
    } catch (error) {
        return {
            ok: false,
            error: describeFailure(error),
        };
    }
}

/**
 * Palette catalog tool definition for MCP
 */
export const paletteCatalogTool = {
    name: "palette_catalog",
    description:
        "Counts how many pixels of an image map to each palette color, most used first. Restricted (premium) colors are labelled with a '$ ' prefix.",
    inputSchema: {
        type: "object",
        properties: {
            input_path: { type: "string", description: "Path of the PNG to analyse" },
            metric: {
                type: "string",
                description: "Color distance used for nearest matching",
                enum: ["perceptual", "euclidean"],
            },
        },
        required: ["input_path"],
    },
} satisfies ToolDefinition;
