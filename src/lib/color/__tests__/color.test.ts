/**
 * Unit tests for the Color value type
 */

import { describe, it, expect } from 'vitest';
import { BLACK, Color, TRANSPARENT, WHITE } from '../color.js';
import { rgbToLab } from '../lab.js';
import { EuclideanRgbMetric, PerceptualMetric } from '../../../engine/distance.js';

describe('Color', () => {
    describe('construction', () => {
        it('should default alpha to 255', () => {
            const color = new Color(1, 2, 3);
            expect(color.a).toBe(255);
        });

        it('should reject channels outside 0-255', () => {
            expect(() => new Color(256, 0, 0)).toThrow(RangeError);
            expect(() => new Color(0, -1, 0)).toThrow(RangeError);
        });

        it('should reject fractional channels', () => {
            expect(() => new Color(1.5, 0, 0)).toThrow(RangeError);
        });
    });

    describe('hex conversion', () => {
        it('should parse #RRGGBB and format it back uppercase', () => {
            const color = Color.fromHex('#ed1c24');
            expect(color.r).toBe(237);
            expect(color.g).toBe(28);
            expect(color.b).toBe(36);
            expect(color.toHex()).toBe('#ED1C24');
        });

        it('should parse hex without hash prefix', () => {
            expect(Color.fromHex('ED1C24').equals(new Color(237, 28, 36))).toBe(true);
        });

        it('should keep alpha from 8-digit hex', () => {
            const color = Color.fromHex('#ED1C2480');
            expect(color.a).toBe(128);
            expect(color.toHex()).toBe('#ED1C2480');
        });

        it('should reject malformed hex', () => {
            expect(() => Color.fromHex('#12345')).toThrow('Invalid hex color format: #12345');
            expect(() => Color.fromHex('GGGGGG')).toThrow();
        });

        it('should render toString as a compact tag', () => {
            expect(new Color(237, 28, 36).toString()).toBe('<ced1c24>');
        });
    });

    describe('key', () => {
        it('should pack channels as RRGGBBAA', () => {
            expect(new Color(1, 2, 3, 4).key).toBe(0x01020304);
        });

        it('should stay unsigned for high red values', () => {
            expect(new Color(255, 255, 255, 255).key).toBe(4294967295);
        });

        it('should distinguish colors that differ only in alpha', () => {
            expect(new Color(0, 0, 0, 0).key).not.toBe(BLACK.key);
            expect(TRANSPARENT.equals(new Color(0, 0, 0, 0))).toBe(true);
        });
    });

    describe('bytes', () => {
        it('should read and write RGBA quadruples', () => {
            const buffer = new Uint8Array(8);
            new Color(10, 20, 30, 40).writeTo(buffer, 4);
            expect([...buffer]).toEqual([0, 0, 0, 0, 10, 20, 30, 40]);
            expect(Color.fromBytes(buffer, 4).equals(new Color(10, 20, 30, 40))).toBe(true);
        });
    });

    describe('derived colors', () => {
        it('should move bright() halfway to white', () => {
            expect(new Color(100, 50, 0).bright().toHex()).toBe(new Color(177, 152, 127).toHex());
        });

        it('should map white to light gray in bright()', () => {
            expect(WHITE.bright().equals(new Color(192, 192, 192))).toBe(true);
        });

        it('should halve channels in dim()', () => {
            expect(new Color(100, 51, 1).dim().equals(new Color(50, 25, 0))).toBe(true);
        });

        it('should map black to dark gray in dim()', () => {
            expect(BLACK.dim().equals(new Color(64, 64, 64))).toBe(true);
        });

        it('should wash out toward gray in faded() and keep alpha', () => {
            expect(new Color(100, 50, 0, 128).faded().equals(new Color(114, 89, 64, 128))).toBe(true);
        });

        it('should pick whichever of bright and dim is farther for highlight()', () => {
            const metric = new EuclideanRgbMetric();
            // white: bright is (192,192,192), dim is (127,127,127)
            expect(WHITE.highlight(metric).equals(new Color(127, 127, 127))).toBe(true);
            // black: bright is (127,127,127), dim is (64,64,64)
            expect(BLACK.highlight(metric).equals(new Color(127, 127, 127))).toBe(true);
        });

        it('should always return one of bright() or dim() from highlight()', () => {
            const metric = new EuclideanRgbMetric();
            for (const hex of ['#ED1C24', '#13E67B', '#4093E4', '#787878']) {
                const color = Color.fromHex(hex);
                const picked = color.highlight(metric);
                expect(picked.equals(color.bright()) || picked.equals(color.dim())).toBe(true);
            }
        });

        it('should never leave the unpicked candidate farther from the color', () => {
            for (const metric of [new EuclideanRgbMetric(), new PerceptualMetric()]) {
                for (let r = 0; r <= 255; r += 51) {
                    for (let g = 0; g <= 255; g += 51) {
                        for (let b = 0; b <= 255; b += 51) {
                            const color = new Color(r, g, b);
                            const chosen = color.highlight(metric);
                            const other = chosen.equals(color.bright()) ? color.dim() : color.bright();
                            expect(metric.distance(color, other)).toBeLessThanOrEqual(metric.distance(color, chosen));
                        }
                    }
                }
            }
        });
    });
});

describe('rgbToLab', () => {
    it('should map black to L=0', () => {
        const lab = rgbToLab({ r: 0, g: 0, b: 0 });
        expect(lab.l).toBeCloseTo(0, 5);
        expect(lab.a).toBeCloseTo(0, 5);
        expect(lab.b).toBeCloseTo(0, 5);
    });

    it('should map white to L=100 with neutral a/b under D65', () => {
        const lab = rgbToLab({ r: 255, g: 255, b: 255 });
        expect(lab.l).toBeCloseTo(100, 2);
        expect(lab.a).toBeCloseTo(0, 1);
        expect(lab.b).toBeCloseTo(0, 1);
    });
});
