import sharp from "sharp";
import { DecodeError, errorMessage, fail, ok, type Result } from "./errors.ts";
import type { Geometry, Orientation } from "./types.ts";

export type Size = { width: number; height: number };

export type Placement = Size & { left: number; top: number };

export type PreparedImage = {
    width: number;
    height: number;
    rotated: boolean;
    placement: Placement;
    mimeType: "image/png";
    data: Buffer;
};

export type ImagePreparer = (bytes: Buffer, target: Geometry) => Promise<Result<PreparedImage, DecodeError>>;

const BACKGROUND = { r: 0, g: 0, b: 0, alpha: 1 };

export const orientationOf = ({ width, height }: Size): Orientation => (width > height ? "landscape" : "portrait");

// Square images fit either way and are never turned.
export const needsRotation = (source: Size, target: Orientation): boolean =>
    target === "portrait" ? source.width > source.height : source.height > source.width;

/** Largest aspect-preserving size that fits inside `target`, centred. */
export function computePlacement(source: Size, target: Size): Placement {
    const scale = Math.min(target.width / source.width, target.height / source.height);
    const width = Math.max(1, Math.floor(source.width * scale));
    const height = Math.max(1, Math.floor(source.height * scale));
    return {
        width,
        height,
        left: Math.floor((target.width - width) / 2),
        top: Math.floor((target.height - height) / 2),
    };
}

// EXIF orientations 5-8 store the image transposed.
const uprightSize = (meta: sharp.Metadata): Size | null => {
    if (!meta.width || !meta.height) return null;
    const transposed = (meta.orientation ?? 1) >= 5;
    return transposed ? { width: meta.height, height: meta.width } : { width: meta.width, height: meta.height };
};

/** @throws DecodeError */
export async function inspectImage(bytes: Buffer): Promise<Geometry> {
    let meta: sharp.Metadata;
    try {
        meta = await sharp(bytes).metadata();
    } catch (err) {
        throw new DecodeError(`unreadable image: ${errorMessage(err)}`, { cause: err });
    }
    const size = uprightSize(meta);
    if (!size) {
        throw new DecodeError("image has no dimensions");
    }
    return { ...size, orientation: orientationOf(size) };
}

export const prepareImage: ImagePreparer = async (bytes, target) => {
    try {
        const meta = await sharp(bytes).metadata();
        const size = uprightSize(meta);
        if (!size) {
            return fail(new DecodeError("image has no dimensions"));
        }
        // sharp applies a single rotation per pipeline, so EXIF orientation is baked in first.
        const upright = (meta.orientation ?? 1) > 1 ? await sharp(bytes).rotate().toBuffer() : bytes;

        const rotated = needsRotation(size, target.orientation);
        const source = rotated ? { width: size.height, height: size.width } : size;
        const placement = computePlacement(source, target);

        let pipeline = sharp(upright);
        if (rotated) {
            pipeline = pipeline.rotate(90);
        }
        const data = await pipeline
            .resize(placement.width, placement.height, { fit: "fill" })
            .extend({
                top: placement.top,
                bottom: target.height - placement.height - placement.top,
                left: placement.left,
                right: target.width - placement.width - placement.left,
                background: BACKGROUND,
            })
            .png()
            .toBuffer();

        return ok({
            width: target.width,
            height: target.height,
            rotated,
            placement,
            mimeType: "image/png",
            data,
        });
    } catch (err) {
        return fail(new DecodeError(`cannot prepare image: ${errorMessage(err)}`, { cause: err }));
    }
};
