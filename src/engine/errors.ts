/**
 * Engine error types
 */

import type { Color } from "../lib/color/color.js";

/**
 * Caller supplied arguments the pipeline cannot work with.
 * Raised before any output is produced.
 */
export class PreconditionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "PreconditionError";
    }
}

/**
 * Exact palette lookup of a color that is not a palette member
 */
export class PaletteMissError extends Error {
    readonly color: Color;

    constructor(color: Color) {
        super(`Color ${color.toHex()} is not in the palette`);
        this.name = "PaletteMissError";
        this.color = color;
    }
}
