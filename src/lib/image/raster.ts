/**
 * Raw RGBA8 images and their PNG encode/decode
 */

import sharp from "sharp";
import { randomUUID } from "crypto";
import { rename, rm } from "fs/promises";
import { basename, dirname, join } from "path";
import { Color } from "../color/color.js";

/**
 * Row-major RGBA image, 4 bytes per pixel
 */
export interface RgbaImage {
    width: number;
    height: number;
    data: Buffer;
}

export function createImage(width: number, height: number): RgbaImage {
    return { width, height, data: Buffer.alloc(width * height * 4) };
}

export function colorAt(image: RgbaImage, x: number, y: number): Color {
    return Color.fromBytes(image.data, (y * image.width + x) * 4);
}

export function setColorAt(image: RgbaImage, x: number, y: number, color: Color): void {
    color.writeTo(image.data, (y * image.width + x) * 4);
}

/**
 * Decodes any image sharp understands into RGBA8.
 * Decoder errors propagate unchanged.
 */
export async function decodeImage(path: string): Promise<RgbaImage> {
    const { data, info } = await sharp(path)
        .ensureAlpha()
        .raw({ depth: "uchar" })
        .toBuffer({ resolveWithObject: true });

    if (info.channels !== 4 || data.length !== info.width * info.height * 4) {
        throw new Error(`Unexpected pixel layout in ${path}: ${info.channels} channels`);
    }

    return { width: info.width, height: info.height, data };
}

/**
 * Writes an RGBA8 PNG. The file is written beside the target and renamed
 * into place, so a failed write never leaves a partial output.
 */
export async function encodeImage(path: string, image: RgbaImage): Promise<void> {
    const temporary = join(dirname(path), `.${basename(path)}.${process.pid}.${randomUUID()}.tmp`);
    try {
        await sharp(image.data, {
            raw: {
                width: image.width,
                height: image.height,
                channels: 4,
            },
        })
            .png()
            .toFile(temporary);
        await rename(temporary, path);
    } catch (error) {
        await rm(temporary, { force: true });
        throw error;
    }
}
