/**
 * make_grid: renders an image as an annotated placement grid
 */

import type { ToolDefinition } from "./index.js";
import type { MetricName } from "../engine/distance.js";
import { renderGrid, type StrideOffsetSign } from "../engine/grid.js";
import type { SeparatorWidth } from "../engine/screen.js";
import { decodeImage, encodeImage } from "../lib/image/raster.js";
import { getRenderKit } from "./context.js";
import { describeFailure } from "./errors.js";

export interface MakeGridInput {
    input_path: string;
    output_path: string;
    diffbase_path?: string;
    x_start?: number;
    x_len?: number;
    y_start?: number;
    y_len?: number;
    x_woff?: number;
    y_woff?: number;
    xstride?: number;
    ystride?: number;
    xstride_off?: number;
    ystride_off?: number;
    stride_offset_sign?: StrideOffsetSign;
    separator_width?: SeparatorWidth;
    fade_unchanged?: boolean;
    metric?: MetricName;
}

export interface MakeGridOutput {
    ok: boolean;
    outputPath?: string;
    width?: number;
    height?: number;
    region?: {
        xStart: number;
        xLen: number;
        yStart: number;
        yLen: number;
    };
    columnSeparators?: number[];
    rowSeparators?: number[];
    changedCells?: number;
    error?: string;
}

/**
 * Decodes the input (and diff base), builds the grid and writes the PNG.
 * The output file is only created once rendering has succeeded.
 */
export async function makeGridHandler(input: MakeGridInput): Promise<MakeGridOutput> {
    try {
        const kit = getRenderKit(input.metric);
        const source = await decodeImage(input.input_path);
        const diffBase = input.diffbase_path ? await decodeImage(input.diffbase_path) : undefined;

        const { image, plan } = renderGrid(
            kit,
            source,
            {
                xStart: input.x_start,
                xLen: input.x_len,
                yStart: input.y_start,
                yLen: input.y_len,
                xWorldOffset: input.x_woff,
                yWorldOffset: input.y_woff,
                xStride: input.xstride,
                yStride: input.ystride,
                xStrideOffset: input.xstride_off,
                yStrideOffset: input.ystride_off,
                strideOffsetSign: input.stride_offset_sign,
                separatorWidth: input.separator_width,
                fadeUnchanged: input.fade_unchanged,
            },
            diffBase
        );

        await encodeImage(input.output_path, image);

        return {
            ok: true,
            outputPath: input.output_path,
            width: image.width,
            height: image.height,
            region: plan.region,
            columnSeparators: plan.columnSeparators,
            rowSeparators: plan.rowSeparators,
            changedCells: plan.changedCells,
        };
    } catch (error) {
        return {
            ok: false,
            error: describeFailure(error),
        };
    }
}

/**
 * Make grid tool definition for MCP
 */
export const makeGridTool = {
    name: "make_grid",
    description:
        "Renders a PNG as a placement grid: every pixel becomes a 9x9 tile textured by its palette color, with coordinate labels, grid-division separators and optional red halos on pixels that differ from a diff base image.",
    inputSchema: {
        type: "object",
        properties: {
            input_path: { type: "string", description: "Path of the PNG to convert" },
            output_path: { type: "string", description: "Path the grid PNG is written to" },
            diffbase_path: {
                type: "string",
                description: "Optional PNG of the same size; pixels whose palette color differs are haloed",
            },
            x_start: { type: "number", description: "Left edge of the sub-rectangle (default: 0)", default: 0 },
            x_len: { type: "number", description: "Width of the sub-rectangle (default: rest of image)" },
            y_start: { type: "number", description: "Top edge of the sub-rectangle (default: 0)", default: 0 },
            y_len: { type: "number", description: "Height of the sub-rectangle (default: rest of image)" },
            x_woff: { type: "number", description: "World x coordinate of image column 0 (default: 0)", default: 0 },
            y_woff: { type: "number", description: "World y coordinate of image row 0 (default: 0)", default: 0 },
            xstride: { type: "number", description: "Columns per grid division (default: 8)", default: 8 },
            ystride: { type: "number", description: "Rows per grid division (default: 8)", default: 8 },
            xstride_off: { type: "number", description: "Phase of the column divisions (default: 0)", default: 0 },
            ystride_off: { type: "number", description: "Phase of the row divisions (default: 0)", default: 0 },
            stride_offset_sign: {
                type: "string",
                description: "Whether stride offsets are subtracted from or added to coordinates (default: subtract)",
                enum: ["subtract", "add"],
            },
            separator_width: {
                type: "number",
                description: "Pixels added per separator, 1 or 2 (default: 1)",
                enum: [1, 2],
            },
            fade_unchanged: {
                type: "boolean",
                description: "With a diff base, draw unchanged pixels faded (default: false)",
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
