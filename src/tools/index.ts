/**
 * Tools aggregator - tool definitions, argument schemas and handlers
 */

import { z } from "zod";
import { pingTool, pingHandler } from "./ping.js";
import { healthTool, healthHandler } from "./health.js";
import { makeGridTool, makeGridHandler } from "./make_grid.js";
import { nearestPaletteTool, nearestPaletteHandler } from "./nearest_palette.js";
import { paletteCatalogTool, paletteCatalogHandler } from "./palette_catalog.js";
import { matchPaletteTool, matchPaletteHandler } from "./match_palette.js";

/**
 * Tool definition type
 */
export interface ToolDefinition {
    name: string;
    description: string;
    inputSchema: {
        type: "object";
        properties?: Record<string, unknown>;
        required?: string[];
    };
}

export type ToolCall = () => Promise<unknown> | unknown;

export type PreparedCall =
    | { success: true; call: ToolCall }
    | { success: false; issue: string };

export interface RegisteredTool {
    definition: ToolDefinition;
    /** Validates raw arguments and binds them to the handler */
    prepare(args: unknown): PreparedCall;
}

function defineTool<S extends z.ZodTypeAny>(
    definition: ToolDefinition,
    schema: S,
    handler: (input: z.output<S>) => unknown
): RegisteredTool {
    return {
        definition,
        prepare(args: unknown): PreparedCall {
            const parseResult = schema.safeParse(args ?? {});
            if (!parseResult.success) {
                const issue = parseResult.error.issues[0];
                return {
                    success: false,
                    issue: issue
                        ? `${issue.path.length > 0 ? `${issue.path.join(".")}: ` : ""}${issue.message}`
                        : `Invalid parameters for ${definition.name}`,
                };
            }
            const input = parseResult.data;
            return { success: true, call: () => handler(input) };
        },
    };
}

const hex = z.string().regex(/^#?[0-9a-fA-F]{6}$/, "Invalid hex color format");
const metric = z.enum(["perceptual", "euclidean"]).optional();
const wholeNumber = z.number().int();

const makeGridSchema = z.object({
    input_path: z.string().min(1),
    output_path: z.string().min(1),
    diffbase_path: z.string().min(1).optional(),
    x_start: wholeNumber.min(0).optional(),
    x_len: wholeNumber.positive().optional(),
    y_start: wholeNumber.min(0).optional(),
    y_len: wholeNumber.positive().optional(),
    x_woff: wholeNumber.optional(),
    y_woff: wholeNumber.optional(),
    xstride: wholeNumber.positive().optional(),
    ystride: wholeNumber.positive().optional(),
    xstride_off: wholeNumber.optional(),
    ystride_off: wholeNumber.optional(),
    stride_offset_sign: z.enum(["subtract", "add"]).optional(),
    separator_width: z.union([z.literal(1), z.literal(2)]).optional(),
    fade_unchanged: z.boolean().optional(),
    metric,
});

const nearestPaletteSchema = z.object({
    input_path: z.string().min(1),
    output_path: z.string().min(1),
    overrides: z.array(z.object({ from: hex, to: hex })).optional(),
    metric,
});

const paletteCatalogSchema = z.object({
    input_path: z.string().min(1),
    metric,
});

const matchPaletteSchema = z.object({
    hex: z.string().regex(/^#?[0-9a-fA-F]{6}([0-9a-fA-F]{2})?$/, "Invalid hex color format"),
    metric,
});

const registry: RegisteredTool[] = [
    defineTool(pingTool, z.object({ message: z.string().optional() }), pingHandler),
    defineTool(healthTool, z.object({}), () => healthHandler(registry.length)),
    defineTool(makeGridTool, makeGridSchema, makeGridHandler),
    defineTool(nearestPaletteTool, nearestPaletteSchema, nearestPaletteHandler),
    defineTool(paletteCatalogTool, paletteCatalogSchema, paletteCatalogHandler),
    defineTool(matchPaletteTool, matchPaletteSchema, matchPaletteHandler),
];

/**
 * All tool definitions
 */
export const tools: ToolDefinition[] = registry.map((tool) => tool.definition);

export function findTool(name: string): RegisteredTool | undefined {
    return registry.find((tool) => tool.definition.name === name);
}
