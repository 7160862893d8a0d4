/**
 * Error codes reported by tool handlers
 */

import { PaletteMissError, PreconditionError } from "../engine/errors.js";
import { DatasetError } from "./context.js";

export const ERROR_PRECONDITION = "ERROR-PG-01";
export const ERROR_IMAGE = "ERROR-PG-02";
export const ERROR_DATASET = "ERROR-PG-03";
export const ERROR_PALETTE_MISS = "ERROR-PG-04";

/**
 * Maps a thrown error to a coded message. Anything that is not an engine
 * or dataset error is treated as an image read/write failure.
 */
export function describeFailure(error: unknown): string {
    if (error instanceof PreconditionError) {
        return `${ERROR_PRECONDITION}: ${error.message}`;
    }
    if (error instanceof DatasetError) {
        return `${ERROR_DATASET}: ${error.message}`;
    }
    if (error instanceof PaletteMissError) {
        return `${ERROR_PALETTE_MISS}: ${error.message}`;
    }
    if (error instanceof Error) {
        return `${ERROR_IMAGE}: ${error.message}`;
    }
    return `${ERROR_IMAGE}: ${String(error)}`;
}
