/**
 * Emoji Asset Table
 *
 * Loads the six overlay images once at startup and rasterizes them to PNG.
 * The resulting table is frozen and shared read-only by every request.
 */

import fs from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import sharp from 'sharp';
import type { EmotionCategory } from '../types/emotion.js';

export type EmojiAssetTable = Readonly<Record<EmotionCategory, Buffer>>;

export const EMOJI_ASSETS_DIR = fileURLToPath(new URL('../../assets/emojis/', import.meta.url));

// The vector assets are drawn on a 128px canvas; render them at 4x
const RASTER_SIZE = 512;
const RASTER_DENSITY = 72 * 4;

async function loadEmoji(directory: string, category: EmotionCategory): Promise<Buffer> {
    const file = path.join(directory, `${category}.svg`);

    let source: Buffer;
    try {
        source = await fs.readFile(file);
    } catch (error) {
        throw new Error(`Missing emoji asset "${category}" at ${file}`, { cause: error });
    }

    return sharp(source, { density: RASTER_DENSITY })
        .resize(RASTER_SIZE, RASTER_SIZE, { fit: 'fill' })
        .png()
        .toBuffer();
}

/**
 * Load every emoji asset from `directory`.
 * Rejects if any asset is missing or unreadable.
 */
export async function loadEmojiAssets(directory: string = EMOJI_ASSETS_DIR): Promise<EmojiAssetTable> {
    const load = (category: EmotionCategory) => loadEmoji(directory, category);
    const [joy, anger, surprise, sorrow, hat, none] = await Promise.all([
        load('joy'),
        load('anger'),
        load('surprise'),
        load('sorrow'),
        load('hat'),
        load('none'),
    ]);

    console.log(`[ASSETS] Loaded emoji assets from ${directory}`);

    return Object.freeze({ joy, anger, surprise, sorrow, hat, none });
}
