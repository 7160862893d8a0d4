/**
 * Unit tests for the grid builder
 */

import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { Color } from '../../lib/color/color.js';
import { createImage, setColorAt, type RgbaImage } from '../../lib/image/raster.js';
import { PreconditionError } from '../errors.js';
import {
    DIFF_HALO,
    formatLabel,
    planGrid,
    renderGrid,
    resolveRegion,
    separatorPositions,
} from '../grid.js';
import { createRenderKit, loadKitSources } from '../kit.js';

const DATA_DIR = fileURLToPath(new URL('../../data/', import.meta.url));
const kit = createRenderKit(loadKitSources(DATA_DIR));

const RED = Color.fromHex('#ED1C24');
const BLUE = Color.fromHex('#4093E4');

function filledImage(width: number, height: number, color: Color): RgbaImage {
    const image = createImage(width, height);
    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            setColorAt(image, x, y, color);
        }
    }
    return image;
}

describe('formatLabel', () => {
    it('should right-align for the near margin and left-align for the far one', () => {
        expect(formatLabel(5, 'right')).toBe('   5');
        expect(formatLabel(5, 'left')).toBe('5   ');
        expect(formatLabel(-120, 'right')).toBe('-120');
    });

    it('should reject coordinates wider than the margin', () => {
        expect(() => formatLabel(10000, 'right')).toThrow(PreconditionError);
        expect(() => formatLabel(-1000, 'left')).toThrow(PreconditionError);
    });
});

describe('separatorPositions', () => {
    it('should place edges and interior stride boundaries', () => {
        expect(separatorPositions(0, 10, 5, 0)).toEqual([4, 9, 14]);
    });

    it('should phase boundaries by the image-relative start', () => {
        expect(separatorPositions(3, 10, 5, 0)).toEqual([4, 6, 11, 14]);
    });

    it('should subtract the stride offset by default', () => {
        expect(separatorPositions(0, 10, 5, 1)).toEqual([4, 5, 10, 14]);
        expect(separatorPositions(0, 10, 5, 1, 'subtract')).toEqual([4, 5, 10, 14]);
    });

    it('should add the stride offset when asked', () => {
        expect(separatorPositions(0, 10, 5, 1, 'add')).toEqual([4, 8, 14]);
    });

    it('should skip boundaries on the first and last content cell', () => {
        // i = 0 and i = 9 both fall on a multiple of 3 but sit beside the edges
        expect(separatorPositions(0, 10, 3, 0)).toEqual([4, 7, 10, 14]);
    });

    it('should reject a zero stride', () => {
        expect(() => separatorPositions(0, 10, 0, 0)).toThrow(PreconditionError);
    });
});

describe('resolveRegion', () => {
    const image = createImage(10, 8);

    it('should default to the rest of the image', () => {
        expect(resolveRegion(image, { xStart: 2, yStart: 3 })).toEqual({ xStart: 2, xLen: 8, yStart: 3, yLen: 5 });
    });

    it('should reject a region running past the image', () => {
        expect(() => resolveRegion(image, { xStart: 5, xLen: 6 })).toThrow(PreconditionError);
        expect(() => resolveRegion(image, { yLen: 9 })).toThrow(PreconditionError);
    });

    it('should reject empty and fractional regions', () => {
        expect(() => resolveRegion(image, { xLen: 0 })).toThrow(PreconditionError);
        expect(() => resolveRegion(image, { xStart: 10 })).toThrow(PreconditionError);
        expect(() => resolveRegion(image, { yStart: 1.5 })).toThrow(PreconditionError);
    });
});

describe('planGrid', () => {
    const source = filledImage(10, 10, RED);
    const redTile = kit.palette.exact(RED).tileId;

    it('should surround the content with a 4-cell margin', () => {
        const plan = planGrid(kit, source, { xStride: 5, yStride: 5 });
        expect(plan.screen.width).toBe(18);
        expect(plan.screen.height).toBe(18);
        expect(plan.screen.tileAt(4, 4)).toBe(redTile);
        expect(plan.screen.tileAt(13, 13)).toBe(redTile);
        expect(plan.screen.tileAt(0, 0)).toBe(kit.blank);
        expect(plan.columnSeparators).toEqual([4, 9, 14]);
        expect(plan.rowSeparators).toEqual([4, 9, 14]);
        expect(plan.changedCells).toBe(0);
    });

    it('should label rows on multiples of 5 and on the first and last row', () => {
        const plan = planGrid(kit, source);
        const font = kit.horizontalFont;
        // near margin, right-aligned: "   0" ends at column 3
        expect(plan.screen.tileAt(4, 3)).toBe(font.glyph('0'));
        expect(plan.screen.tileAt(4, 2)).toBe(font.glyph(' '));
        // far margin, left-aligned: "0   " starts at column 14
        expect(plan.screen.tileAt(4, 14)).toBe(font.glyph('0'));
        expect(plan.screen.tileAt(9, 3)).toBe(font.glyph('5'));
        expect(plan.screen.tileAt(13, 3)).toBe(font.glyph('9'));
        // row 1 is not labelled
        expect(plan.screen.tileAt(5, 3)).toBe(kit.blank);
    });

    it('should label columns with rotated glyphs running downward', () => {
        const plan = planGrid(kit, source);
        const font = kit.verticalFont;
        expect(plan.screen.tileAt(3, 4)).toBe(font.glyph('0'));
        expect(plan.screen.tileAt(14, 4)).toBe(font.glyph('0'));
        expect(plan.screen.tileAt(3, 9)).toBe(font.glyph('5'));
        expect(plan.screen.tileAt(3, 5)).toBe(kit.blank);
        expect(font.glyph('0')).not.toBe(kit.horizontalFont.glyph('0'));
    });

    it('should label with world coordinates', () => {
        const plan = planGrid(kit, source, { xStart: 2, xLen: 4, yWorldOffset: 100 });
        // x world 2..5: first, last and 5 are labelled
        expect(plan.screen.tileAt(3, 4)).toBe(kit.verticalFont.glyph('2'));
        expect(plan.screen.tileAt(3, 7)).toBe(kit.verticalFont.glyph('5'));
        expect(plan.screen.tileAt(3, 5)).toBe(kit.blank);
        // y world 100: "100" right-aligned in the near margin
        expect(plan.screen.tileAt(4, 1)).toBe(kit.horizontalFont.glyph('1'));
        expect(plan.screen.tileAt(4, 3)).toBe(kit.horizontalFont.glyph('0'));
    });

    it('should halo exactly the pixels whose palette color differs', () => {
        const base = filledImage(10, 10, RED);
        setColorAt(base, 3, 2, BLUE);
        const plan = planGrid(kit, source, {}, base);
        expect(plan.changedCells).toBe(1);
        expect(plan.screen.haloOf(6, 7)?.equals(DIFF_HALO)).toBe(true);
        expect(plan.screen.haloOf(4, 4)).toBeNull();
        expect(plan.screen.isFaded(4, 4)).toBe(false);
    });

    it('should not halo pixels that resolve to the same palette color', () => {
        const base = filledImage(10, 10, new Color(236, 29, 37));
        const plan = planGrid(kit, source, {}, base);
        expect(plan.changedCells).toBe(0);
    });

    it('should fade unchanged pixels when asked', () => {
        const base = filledImage(10, 10, RED);
        setColorAt(base, 3, 2, BLUE);
        const plan = planGrid(kit, source, { fadeUnchanged: true }, base);
        expect(plan.screen.isFaded(4, 4)).toBe(true);
        expect(plan.screen.isFaded(6, 7)).toBe(false);
        expect(plan.screen.isFaded(0, 0)).toBe(false);
    });

    it('should reject a diff base of another size', () => {
        expect(() => planGrid(kit, source, {}, createImage(10, 9))).toThrow(PreconditionError);
    });

    it('should reject labels that do not fit', () => {
        expect(() => planGrid(kit, source, { xWorldOffset: 10000 })).toThrow(PreconditionError);
    });
});

describe('renderGrid', () => {
    const source = filledImage(10, 10, RED);

    it('should add one pixel per separator to the tiled size', () => {
        const { image } = renderGrid(kit, source, { xStride: 5, yStride: 5 });
        expect(image.width).toBe(165);
        expect(image.height).toBe(165);
        expect(image.data.length).toBe(165 * 165 * 4);
    });

    it('should add two pixels per separator at width 2', () => {
        const { image } = renderGrid(kit, source, { xStride: 5, yStride: 5, separatorWidth: 2 });
        expect(image.width).toBe(168);
        expect(image.height).toBe(168);
    });

    it('should render a 1x1 image with only edge separators', () => {
        const { image, plan } = renderGrid(kit, filledImage(1, 1, RED));
        expect(plan.columnSeparators).toEqual([4, 5]);
        expect(image.width).toBe(9 * 9 + 2);
    });
});
