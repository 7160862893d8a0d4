/**
 * Grid builder
 * Turns a source image into an annotated Screen: one palette tile per pixel,
 * coordinate labels in a 4-cell margin, separators at the margins and at
 * every stride boundary, and halos on cells that differ from a diff base.
 */

import { Color } from "../lib/color/color.js";
import { colorAt, type RgbaImage } from "../lib/image/raster.js";
import { PreconditionError } from "./errors.js";
import type { GlyphFont } from "./font.js";
import type { RenderKit } from "./kit.js";
import { Screen, type SeparatorWidth } from "./screen.js";

export const GRID_MARGIN = 4;
export const LABEL_INTERVAL = 5;
export const DIFF_HALO = new Color(255, 0, 0);

export type StrideOffsetSign = "subtract" | "add";

export interface GridOptions {
    xStart?: number;
    /** Defaults to the rest of the image */
    xLen?: number;
    yStart?: number;
    yLen?: number;
    /** World coordinate of image pixel (0, 0), used for labels */
    xWorldOffset?: number;
    yWorldOffset?: number;
    xStride?: number;
    yStride?: number;
    xStrideOffset?: number;
    yStrideOffset?: number;
    strideOffsetSign?: StrideOffsetSign;
    separatorWidth?: SeparatorWidth;
    /** With a diff base, draw unchanged cells faded */
    fadeUnchanged?: boolean;
}

export interface GridRegion {
    xStart: number;
    xLen: number;
    yStart: number;
    yLen: number;
}

export interface GridPlan {
    screen: Screen;
    region: GridRegion;
    /** Screen cell boundaries, ascending */
    columnSeparators: number[];
    rowSeparators: number[];
    changedCells: number;
}

export interface GridRender {
    image: RgbaImage;
    plan: GridPlan;
}

function mod(value: number, divisor: number): number {
    return ((value % divisor) + divisor) % divisor;
}

function requireInteger(name: string, value: number, min?: number): void {
    if (!Number.isInteger(value)) {
        throw new PreconditionError(`${name} must be an integer, got ${value}`);
    }
    if (min !== undefined && value < min) {
        throw new PreconditionError(`${name} must be at least ${min}, got ${value}`);
    }
}

/**
 * Applies defaults and checks the sub-rectangle lies inside the image
 */
export function resolveRegion(image: RgbaImage, options: GridOptions): GridRegion {
    const { xStart = 0, yStart = 0 } = options;
    requireInteger("x_start", xStart, 0);
    requireInteger("y_start", yStart, 0);
    const xLen = options.xLen ?? image.width - xStart;
    const yLen = options.yLen ?? image.height - yStart;
    requireInteger("x_len", xLen, 1);
    requireInteger("y_len", yLen, 1);
    if (xStart + xLen > image.width) {
        throw new PreconditionError(`x_start + x_len (${xStart + xLen}) exceeds image width ${image.width}`);
    }
    if (yStart + yLen > image.height) {
        throw new PreconditionError(`y_start + y_len (${yStart + yLen}) exceeds image height ${image.height}`);
    }
    return { xStart, xLen, yStart, yLen };
}

/**
 * Text stamped in the margin for a world coordinate
 */
export function formatLabel(value: number, align: "left" | "right"): string {
    const text = String(value);
    if (text.length > GRID_MARGIN) {
        throw new PreconditionError(`Coordinate ${value} does not fit in a ${GRID_MARGIN}-cell label`);
    }
    return align === "right" ? text.padStart(GRID_MARGIN) : text.padEnd(GRID_MARGIN);
}

/**
 * Separator positions in screen cells for one axis: both content edges,
 * plus every interior stride boundary. Boundaries on the first or last
 * content cell are skipped; they sit next to the edge separators.
 */
export function separatorPositions(
    start: number,
    length: number,
    stride: number,
    strideOffset: number,
    sign: StrideOffsetSign = "subtract"
): number[] {
    requireInteger("stride", stride, 1);
    requireInteger("stride offset", strideOffset);
    const shift = sign === "subtract" ? -strideOffset : strideOffset;
    const positions = [GRID_MARGIN, GRID_MARGIN + length];
    for (let i = 1; i < length - 1; i++) {
        if (mod(i + start + shift, stride) === 0) {
            positions.push(i + GRID_MARGIN);
        }
    }
    return positions.sort((a, b) => a - b);
}

function stampRow(screen: Screen, font: GlyphFont, row: number, col: number, text: string): void {
    [...text].forEach((ch, i) => screen.plot(row, col + i, font.glyph(ch)));
}

function stampColumn(screen: Screen, font: GlyphFont, row: number, col: number, text: string): void {
    [...text].forEach((ch, i) => screen.plot(row + i, col, font.glyph(ch)));
}

function shouldLabel(world: number, index: number, length: number): boolean {
    return mod(world, LABEL_INTERVAL) === 0 || index === 0 || index === length - 1;
}

/**
 * Builds the annotated screen without rendering it
 */
export function planGrid(kit: RenderKit, source: RgbaImage, options: GridOptions = {}, diffBase?: RgbaImage): GridPlan {
    const {
        xWorldOffset = 0,
        yWorldOffset = 0,
        xStride = 8,
        yStride = 8,
        xStrideOffset = 0,
        yStrideOffset = 0,
        strideOffsetSign = "subtract",
        fadeUnchanged = false,
    } = options;

    const region = resolveRegion(source, options);
    const { xStart, xLen, yStart, yLen } = region;
    if (diffBase && (diffBase.width !== source.width || diffBase.height !== source.height)) {
        throw new PreconditionError(
            `Diff base is ${diffBase.width}x${diffBase.height} but the input is ${source.width}x${source.height}`
        );
    }
    requireInteger("x_woff", xWorldOffset);
    requireInteger("y_woff", yWorldOffset);

    // Fail on labels and separators before any per-pixel work
    const columnSeparators = separatorPositions(xStart, xLen, xStride, xStrideOffset, strideOffsetSign);
    const rowSeparators = separatorPositions(yStart, yLen, yStride, yStrideOffset, strideOffsetSign);
    const rowLabels: [number, string, string][] = [];
    for (let i = 0; i < yLen; i++) {
        const world = yWorldOffset + yStart + i;
        if (shouldLabel(world, i, yLen)) {
            rowLabels.push([i, formatLabel(world, "right"), formatLabel(world, "left")]);
        }
    }
    const columnLabels: [number, string, string][] = [];
    for (let i = 0; i < xLen; i++) {
        const world = xWorldOffset + xStart + i;
        if (shouldLabel(world, i, xLen)) {
            columnLabels.push([i, formatLabel(world, "right"), formatLabel(world, "left")]);
        }
    }

    const { palette } = kit;
    const resolve = palette.resolver();
    const screen = new Screen(xLen + 2 * GRID_MARGIN, yLen + 2 * GRID_MARGIN, kit.tiles, kit.blank);
    let changedCells = 0;

    for (let row = 0; row < yLen; row++) {
        for (let col = 0; col < xLen; col++) {
            const entry = resolve(colorAt(source, xStart + col, yStart + row));
            screen.plot(row + GRID_MARGIN, col + GRID_MARGIN, entry.tileId);
            if (!diffBase) {
                continue;
            }
            const base = resolve(colorAt(diffBase, xStart + col, yStart + row));
            if (base !== entry) {
                screen.haloAt(row + GRID_MARGIN, col + GRID_MARGIN, DIFF_HALO);
                changedCells++;
            } else if (fadeUnchanged) {
                screen.fadeAt(row + GRID_MARGIN, col + GRID_MARGIN);
            }
        }
    }

    for (const [i, near, far] of rowLabels) {
        stampRow(screen, kit.horizontalFont, i + GRID_MARGIN, 0, near);
        stampRow(screen, kit.horizontalFont, i + GRID_MARGIN, xLen + GRID_MARGIN, far);
    }
    for (const [i, near, far] of columnLabels) {
        stampColumn(screen, kit.verticalFont, 0, i + GRID_MARGIN, near);
        stampColumn(screen, kit.verticalFont, yLen + GRID_MARGIN, i + GRID_MARGIN, far);
    }

    return { screen, region, columnSeparators, rowSeparators, changedCells };
}

/**
 * Builds and composes the grid image
 */
export function renderGrid(kit: RenderKit, source: RgbaImage, options: GridOptions = {}, diffBase?: RgbaImage): GridRender {
    const plan = planGrid(kit, source, options, diffBase);
    const image = plan.screen.compose(plan.columnSeparators, plan.rowSeparators, {
        separatorWidth: options.separatorWidth ?? 1,
    });
    return { image, plan };
}
