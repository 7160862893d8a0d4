/**
 * Lab color space conversion utilities
 * Implements RGB -> XYZ -> Lab conversion for perceptual distance calculations
 */

/**
 * RGB color (0-255 range)
 */
export interface RGB {
    r: number;
    g: number;
    b: number;
}

/**
 * XYZ color space
 */
export interface XYZ {
    x: number;
    y: number;
    z: number;
}

/**
 * Lab color space
 */
export interface Lab {
    l: number;
    a: number;
    b: number;
}

/**
 * Converts sRGB to linear RGB (gamma correction)
 * @param value - sRGB component (0-255)
 * @returns Linear RGB component (0-1)
 */
function srgbToLinear(value: number): number {
    const normalized = value / 255.0;
    if (normalized <= 0.04045) {
        return normalized / 12.92;
    }
    return Math.pow((normalized + 0.055) / 1.055, 2.4);
}

/**
 * Converts RGB to XYZ using D65 illuminant
 */
export function rgbToXyz(rgb: RGB): XYZ {
    const r = srgbToLinear(rgb.r);
    const g = srgbToLinear(rgb.g);
    const b = srgbToLinear(rgb.b);

    // sRGB matrix (D65 white point)
    const x = r * 0.4124564 + g * 0.3575761 + b * 0.1804375;
    const y = r * 0.2126729 + g * 0.7151522 + b * 0.0721750;
    const z = r * 0.0193339 + g * 0.1191920 + b * 0.9503041;

    return { x, y, z };
}

/**
 * Converts XYZ to Lab
 */
export function xyzToLab(xyz: XYZ): Lab {
    // D65 white point
    const xn = 0.95047;
    const yn = 1.0;
    const zn = 1.08883;

    const fx = xyz.x / xn;
    const fy = xyz.y / yn;
    const fz = xyz.z / zn;

    const epsilon = 216.0 / 24389.0; // 6^3/29^3
    const kappa = 24389.0 / 27.0; // 29^3/3^3

    const fx_adj = fx > epsilon ? Math.pow(fx, 1.0 / 3.0) : (kappa * fx + 16.0) / 116.0;
    const fy_adj = fy > epsilon ? Math.pow(fy, 1.0 / 3.0) : (kappa * fy + 16.0) / 116.0;
    const fz_adj = fz > epsilon ? Math.pow(fz, 1.0 / 3.0) : (kappa * fz + 16.0) / 116.0;

    const l = 116.0 * fy_adj - 16.0;
    const a = 500.0 * (fx_adj - fy_adj);
    const b = 200.0 * (fy_adj - fz_adj);

    return { l, a, b };
}

/**
 * Converts RGB to Lab
 */
export function rgbToLab(rgb: RGB): Lab {
    return xyzToLab(rgbToXyz(rgb));
}
