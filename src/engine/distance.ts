/**
 * Color distance metrics
 * Euclidean RGB (cheap) and CIEDE2000 over Lab (perceptual, memoised)
 */

import type { Color, ColorDistance } from "../lib/color/color.js";
import { rgbToLab, type Lab } from "../lib/color/lab.js";

export type MetricName = "perceptual" | "euclidean";

export const METRIC_NAMES: readonly MetricName[] = ["perceptual", "euclidean"];

export interface DistanceMetric extends ColorDistance {
    readonly name: MetricName;
}

/**
 * CIE LCH color space coordinates (polar representation of Lab)
 */
type LCH = {
    l: number; // Luminance
    c: number; // Chroma (saturation)
    h: number; // Hue angle (degrees)
};

/**
 * Converts CIE Lab to CIE LCH color space
 */
function labToLCH(lab: Lab): LCH {
    const c = Math.sqrt(lab.a * lab.a + lab.b * lab.b);
    let h = (Math.atan2(lab.b, lab.a) * 180.0) / Math.PI;
    if (h < 0) {
        h += 360.0;
    }
    return {
        l: lab.l,
        c: c,
        h: h,
    };
}

/**
 * Calculates the perceptual color difference using CIEDE2000 formula
 * Returns Delta E value where lower values indicate closer perceptual match
 *
 * Reference: "The CIEDE2000 Color-Difference Formula: Implementation Notes,
 * Supplementary Test Data, and Mathematical Observations" by Sharma et al.
 */
export function calculateDeltaE2000(lab1: Lab, lab2: Lab): number {
    const lch1 = labToLCH(lab1);
    const lch2 = labToLCH(lab2);

    const lBar = (lch1.l + lch2.l) / 2.0;
    const cBar = (lch1.c + lch2.c) / 2.0;

    // G factor for chroma weighting
    const g =
        0.5 *
        (1.0 -
            Math.sqrt(
                Math.pow(cBar, 7.0) /
                    (Math.pow(cBar, 7.0) + Math.pow(25.0, 7.0))
            ));

    const a1Prime = (1.0 + g) * lab1.a;
    const a2Prime = (1.0 + g) * lab2.a;

    const c1Prime = Math.sqrt(a1Prime * a1Prime + lab1.b * lab1.b);
    const c2Prime = Math.sqrt(a2Prime * a2Prime + lab2.b * lab2.b);

    const cBarPrime = (c1Prime + c2Prime) / 2.0;

    let h1Prime =
        Math.abs(a1Prime) < 1e-10 && Math.abs(lab1.b) < 1e-10
            ? 0.0
            : (Math.atan2(lab1.b, a1Prime) * 180.0) / Math.PI;
    if (h1Prime < 0) h1Prime += 360.0;

    let h2Prime =
        Math.abs(a2Prime) < 1e-10 && Math.abs(lab2.b) < 1e-10
            ? 0.0
            : (Math.atan2(lab2.b, a2Prime) * 180.0) / Math.PI;
    if (h2Prime < 0) h2Prime += 360.0;

    const deltaLPrime = lch2.l - lch1.l;
    const deltaCPrime = c2Prime - c1Prime;

    let deltaHPrime: number;
    if (c1Prime * c2Prime === 0) {
        deltaHPrime = 0;
    } else if (Math.abs(h2Prime - h1Prime) <= 180.0) {
        deltaHPrime = h2Prime - h1Prime;
    } else if (h2Prime - h1Prime > 180.0) {
        deltaHPrime = h2Prime - h1Prime - 360.0;
    } else {
        deltaHPrime = h2Prime - h1Prime + 360.0;
    }

    deltaHPrime = 2.0 * Math.sqrt(c1Prime * c2Prime) * Math.sin((deltaHPrime * Math.PI) / 360.0);

    let hBarPrime: number;
    if (c1Prime * c2Prime === 0) {
        hBarPrime = h1Prime + h2Prime;
    } else if (Math.abs(h2Prime - h1Prime) <= 180.0) {
        hBarPrime = (h1Prime + h2Prime) / 2.0;
    } else if (h1Prime + h2Prime < 360.0) {
        hBarPrime = (h1Prime + h2Prime + 360.0) / 2.0;
    } else {
        hBarPrime = (h1Prime + h2Prime - 360.0) / 2.0;
    }

    const t =
        1.0 -
        0.17 * Math.cos((hBarPrime - 30.0) * (Math.PI / 180.0)) +
        0.24 * Math.cos((2.0 * hBarPrime) * (Math.PI / 180.0)) +
        0.32 * Math.cos((3.0 * hBarPrime + 6.0) * (Math.PI / 180.0)) -
        0.20 * Math.cos((4.0 * hBarPrime - 63.0) * (Math.PI / 180.0));

    const deltaTheta = 30.0 * Math.exp(-Math.pow((hBarPrime - 275.0) / 25.0, 2.0));

    const rc =
        2.0 *
        Math.sqrt(
            Math.pow(cBarPrime, 7.0) /
                (Math.pow(cBarPrime, 7.0) + Math.pow(25.0, 7.0))
        );

    const rt = -Math.sin((2.0 * deltaTheta) * (Math.PI / 180.0)) * rc;

    const sl =
        1.0 +
        (0.015 * Math.pow(lBar - 50.0, 2.0)) /
            Math.sqrt(20.0 + Math.pow(lBar - 50.0, 2.0));
    const sc = 1.0 + 0.045 * cBarPrime;
    const sh = 1.0 + 0.015 * cBarPrime * t;

    // kL = kC = kH = 1 (reference viewing conditions)
    return Math.sqrt(
        Math.pow(deltaLPrime / sl, 2.0) +
            Math.pow(deltaCPrime / sc, 2.0) +
            Math.pow(deltaHPrime / sh, 2.0) +
            rt * (deltaCPrime / sc) * (deltaHPrime / sh)
    );
}

/**
 * Sum of squared channel differences, alpha ignored
 */
export class EuclideanRgbMetric implements DistanceMetric {
    readonly name = "euclidean" as const;

    distance(a: Color, b: Color): number {
        const dr = a.r - b.r;
        const dg = a.g - b.g;
        const db = a.b - b.b;
        return dr * dr + dg * dg + db * db;
    }
}

/**
 * Memo of pairwise distances keyed by the unordered color pair.
 * Never evicts: the palette is small, so the number of pairs queried
 * against it is bounded by the distinct input colors.
 */
export class PairCache {
    private readonly entries = new Map<string, number>();

    static keyFor(a: Color, b: Color): string {
        const ka = a.key;
        const kb = b.key;
        return ka <= kb ? `${ka}:${kb}` : `${kb}:${ka}`;
    }

    get(a: Color, b: Color): number | undefined {
        return this.entries.get(PairCache.keyFor(a, b));
    }

    set(a: Color, b: Color, value: number): void {
        this.entries.set(PairCache.keyFor(a, b), value);
    }

    get size(): number {
        return this.entries.size;
    }

    clear(): void {
        this.entries.clear();
    }
}

/**
 * CIEDE2000 over D65 Lab, memoised per unordered pair
 */
export class PerceptualMetric implements DistanceMetric {
    readonly name = "perceptual" as const;
    private readonly cache: PairCache;

    constructor(cache: PairCache = new PairCache()) {
        this.cache = cache;
    }

    distance(a: Color, b: Color): number {
        const cached = this.cache.get(a, b);
        if (cached !== undefined) {
            return cached;
        }
        const result = calculateDeltaE2000(rgbToLab(a), rgbToLab(b));
        this.cache.set(a, b, result);
        return result;
    }

    get cacheSize(): number {
        return this.cache.size;
    }
}

export function createMetric(name: MetricName): DistanceMetric {
    return name === "euclidean" ? new EuclideanRgbMetric() : new PerceptualMetric();
}
