/**
 * Unit tests for nearest_palette tool
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import sharp from 'sharp';
import { existsSync } from 'fs';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { colorAt, decodeImage } from '../../lib/image/raster.js';
import { nearestPaletteHandler } from '../nearest_palette.js';

async function writeRow(path: string, pixels: number[][]): Promise<void> {
    const data = Buffer.from(pixels.flat());
    await sharp(data, { raw: { width: pixels.length, height: 1, channels: 4 } }).png().toFile(path);
}

describe('nearest_palette tool', () => {
    let dir: string;
    let input: string;

    beforeAll(async () => {
        dir = await mkdtemp(join(tmpdir(), 'nearest-palette-'));
        input = join(dir, 'input.png');
        await writeRow(input, [
            [236, 29, 37, 255],
            [64, 136, 32, 255],
            [255, 255, 255, 255],
        ]);
    });

    afterAll(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should snap pixels and apply the default overrides', async () => {
        const output = join(dir, 'snapped.png');
        const result = await nearestPaletteHandler({ input_path: input, output_path: output });

        expect(result).toEqual({
            ok: true,
            outputPath: output,
            width: 3,
            height: 1,
            overridden: 1,
            adjusted: 2,
        });

        const image = await decodeImage(output);
        expect(colorAt(image, 0, 0).toHex()).toBe('#ED1C24');
        expect(colorAt(image, 1, 0).toHex()).toBe('#0C816E');
        expect(colorAt(image, 2, 0).toHex()).toBe('#FFFFFF');
    });

    it('should use caller overrides in place of the defaults', async () => {
        const output = join(dir, 'custom.png');
        const result = await nearestPaletteHandler({
            input_path: input,
            output_path: output,
            overrides: [{ from: '#EC1D25', to: '#FFFFFF' }],
        });

        expect(result.ok).toBe(true);
        expect(result.overridden).toBe(1);
        const image = await decodeImage(output);
        expect(colorAt(image, 0, 0).toHex()).toBe('#FFFFFF');
    });

    it('should reject an override onto a non-palette color', async () => {
        const output = join(dir, 'never.png');
        const result = await nearestPaletteHandler({
            input_path: input,
            output_path: output,
            overrides: [{ from: '#408820', to: '#010203' }],
        });

        expect(result.ok).toBe(false);
        expect(result.error).toBe('ERROR-PG-01: Override target #010203 is not a palette color');
        expect(existsSync(output)).toBe(false);
    });
});
