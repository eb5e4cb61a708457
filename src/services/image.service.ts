/**
 * Image Processing Service
 *
 * Draws emoji overlays over detected faces and re-encodes the result.
 * Uses Sharp for decoding, resizing, compositing and encoding.
 */

import sharp from 'sharp';
import type { EmotionCategory, FaceAnnotation } from '../types/emotion.js';
import type { EmojiAssetTable } from './emoji-assets.service.js';
import { selectEmotionEmoji, selectHatOverlay } from './emoji-selector.service.js';

export interface OverlayPlacement {
    emoji: EmotionCategory;
    left: number;
    top: number;
    width: number;
    height: number;
}

export interface CompositeOptions {
    /** Image subtype to encode to, e.g. "jpeg" or "png" */
    format: string;
    /** Also draw the hat emoji over faces wearing headwear */
    hatOverlay?: boolean;
}

type Encoder = (image: sharp.Sharp) => sharp.Sharp;

const FORMAT_ALIASES: Readonly<Record<string, string>> = {
    jpg: 'jpeg',
    tif: 'tiff',
    heic: 'heif',
};

// Encoders libvips can write to a buffer, keyed by format id and its aliases
const ENCODERS: ReadonlyMap<string, Encoder> = (() => {
    const encoders = new Map<string, Encoder>();
    for (const info of Object.values(sharp.format)) {
        if (!info.output.buffer) continue;
        for (const name of [info.id, ...(info.output.alias || [])]) {
            encoders.set(name, (image) => image.toFormat(info));
        }
    }
    // The heif container needs an explicit compression
    if (encoders.has('heif')) {
        encoders.set('heif', (image) => image.heif({ compression: 'hevc' }));
        encoders.set('avif', (image) => image.avif());
    }
    return encoders;
})();

function encoderFor(format: string): Encoder | undefined {
    return ENCODERS.get(FORMAT_ALIASES[format] ?? format);
}

export function isOutputFormat(format: string): boolean {
    return encoderFor(format) !== undefined;
}

/**
 * Compute where each overlay goes, in drawing order.
 *
 * Size comes from specific vertex pairs of the bounding polygon:
 * width = x[1] - x[0], height = y[2] - y[0], anchored at (x[0], y[1]).
 */
export function planOverlays(
    annotations: readonly FaceAnnotation[],
    options: Pick<CompositeOptions, 'hatOverlay'> = {}
): OverlayPlacement[] {
    const placements: OverlayPlacement[] = [];

    for (const annotation of annotations) {
        const [v0, v1, v2] = annotation.boundingPoly;
        if (!v0 || !v1 || !v2) continue;

        const box = {
            left: v0.x,
            top: v1.y,
            width: v1.x - v0.x,
            height: v2.y - v0.y,
        };

        placements.push({ emoji: selectEmotionEmoji(annotation), ...box });

        if (options.hatOverlay && selectHatOverlay(annotation)) {
            placements.push({ emoji: 'hat', ...box });
        }
    }

    return placements;
}

export class ImageService {
    /**
     * Draw an emoji over every annotated face and encode the result.
     * Later annotations are drawn over earlier ones. Overlays are clipped
     * to the canvas; empty boxes draw nothing.
     */
    async composite(
        source: Buffer,
        annotations: readonly FaceAnnotation[],
        emojis: EmojiAssetTable,
        options: CompositeOptions
    ): Promise<Buffer> {
        const encode = encoderFor(options.format);
        if (!encode) {
            throw new Error(`Unsupported output image type: ${options.format}`);
        }

        const { width, height } = await this.getMetadata(source);
        const layers: sharp.OverlayOptions[] = [];

        for (const placement of planOverlays(annotations, options)) {
            const layer = await this.renderOverlay(emojis[placement.emoji], placement, width, height);
            if (layer) layers.push(layer);
        }

        // Bake EXIF orientation into the pixels; the output carries no EXIF
        return encode(sharp(source).rotate().composite(layers)).toBuffer();
    }

    /**
     * Get image metadata without processing.
     * Dimensions are as displayed, after EXIF orientation.
     */
    async getMetadata(buffer: Buffer): Promise<{
        width: number;
        height: number;
        format: string;
    }> {
        const metadata = await sharp(buffer).metadata();
        // Orientations 5-8 turn the image a quarter
        const sideways = (metadata.orientation || 1) >= 5;
        return {
            width: (sideways ? metadata.height : metadata.width) || 0,
            height: (sideways ? metadata.width : metadata.height) || 0,
            format: metadata.format || 'unknown',
        };
    }

    private async renderOverlay(
        emoji: Buffer,
        placement: OverlayPlacement,
        canvasWidth: number,
        canvasHeight: number
    ): Promise<sharp.OverlayOptions | null> {
        if (placement.width <= 0 || placement.height <= 0) return null;

        // Visible part of the overlay on the canvas
        const left = Math.max(placement.left, 0);
        const top = Math.max(placement.top, 0);
        const right = Math.min(placement.left + placement.width, canvasWidth);
        const bottom = Math.min(placement.top + placement.height, canvasHeight);
        if (right <= left || bottom <= top) return null;

        const resized = await sharp(emoji)
            .resize(placement.width, placement.height, { fit: 'fill' })
            .png()
            .toBuffer();

        const fitsCanvas =
            left === placement.left &&
            top === placement.top &&
            right - left === placement.width &&
            bottom - top === placement.height;

        const input = fitsCanvas
            ? resized
            : await sharp(resized)
                .extract({
                    left: left - placement.left,
                    top: top - placement.top,
                    width: right - left,
                    height: bottom - top,
                })
                .png()
                .toBuffer();

        return { input, left, top };
    }
}

// Singleton instance
export const imageService = new ImageService();
