/**
 * Immutable RGBA color value
 */

/**
 * Anything able to measure how far apart two colors are.
 * Implementations live in engine/distance.ts.
 */
export interface ColorDistance {
    distance(a: Color, b: Color): number;
}

function assertChannel(name: string, value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > 255) {
        throw new RangeError(`Color channel ${name} must be an integer 0-255, got ${value}`);
    }
}

export class Color {
    readonly r: number;
    readonly g: number;
    readonly b: number;
    readonly a: number;

    constructor(r: number, g: number, b: number, a: number = 255) {
        assertChannel("r", r);
        assertChannel("g", g);
        assertChannel("b", b);
        assertChannel("a", a);
        this.r = r;
        this.g = g;
        this.b = b;
        this.a = a;
    }

    /**
     * Parses "#RRGGBB", "RRGGBB" or "RRGGBBAA"
     */
    static fromHex(hex: string): Color {
        const cleaned = hex.replace(/^#/, "");
        if (!/^[0-9a-fA-F]{6}([0-9a-fA-F]{2})?$/.test(cleaned)) {
            throw new Error(`Invalid hex color format: ${hex}`);
        }
        const r = parseInt(cleaned.substring(0, 2), 16);
        const g = parseInt(cleaned.substring(2, 4), 16);
        const b = parseInt(cleaned.substring(4, 6), 16);
        const a = cleaned.length === 8 ? parseInt(cleaned.substring(6, 8), 16) : 255;
        return new Color(r, g, b, a);
    }

    /**
     * Reads one pixel from an RGBA byte buffer
     */
    static fromBytes(data: Uint8Array, offset: number): Color {
        return new Color(data[offset], data[offset + 1], data[offset + 2], data[offset + 3]);
    }

    /**
     * Packed 0xRRGGBBAA value, unique per byte pattern
     */
    get key(): number {
        return ((this.r << 24) | (this.g << 16) | (this.b << 8) | this.a) >>> 0;
    }

    equals(other: Color): boolean {
        return this.key === other.key;
    }

    toHex(): string {
        const channels = this.a === 255 ? [this.r, this.g, this.b] : [this.r, this.g, this.b, this.a];
        return `#${channels
            .map((val) => val.toString(16).padStart(2, "0"))
            .join("")
            .toUpperCase()}`;
    }

    toString(): string {
        return `<c${this.toHex().slice(1).toLowerCase()}>`;
    }

    writeTo(target: Uint8Array, offset: number): void {
        target[offset] = this.r;
        target[offset + 1] = this.g;
        target[offset + 2] = this.b;
        target[offset + 3] = this.a;
    }

    /**
     * Halfway to white. White itself maps to a light gray so a highlight
     * border stays visible on a white fill.
     */
    bright(): Color {
        if (this.r === 255 && this.g === 255 && this.b === 255) {
            return new Color(192, 192, 192);
        }
        return new Color((this.r + 255) >> 1, (this.g + 255) >> 1, (this.b + 255) >> 1);
    }

    /**
     * Half value. Black maps to a dark gray so a shadow border stays
     * visible on a black fill.
     */
    dim(): Color {
        if (this.r === 0 && this.g === 0 && this.b === 0) {
            return new Color(64, 64, 64);
        }
        return new Color(this.r >> 1, this.g >> 1, this.b >> 1);
    }

    faded(): Color {
        return new Color(64 + (this.r >> 1), 64 + (this.g >> 1), 64 + (this.b >> 1), this.a);
    }

    /**
     * Whichever of bright() and dim() is farther from this color
     */
    highlight(metric: ColorDistance): Color {
        const bright = this.bright();
        const dim = this.dim();
        if (metric.distance(this, bright) > metric.distance(this, dim)) {
            return bright;
        }
        return dim;
    }

    distanceTo(other: Color, metric: ColorDistance): number {
        return metric.distance(this, other);
    }
}

export const BLACK = new Color(0, 0, 0);
export const WHITE = new Color(255, 255, 255);
export const TRANSPARENT = new Color(0, 0, 0, 0);
