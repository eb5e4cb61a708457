/**
 * Face detection types shared by the detection providers, the emoji selector
 * and the compositor.
 */

export const EMOTION_CATEGORIES = ['joy', 'anger', 'surprise', 'sorrow', 'hat', 'none'] as const;

/** Which overlay image is drawn over a face. */
export type EmotionCategory = (typeof EMOTION_CATEGORIES)[number];

/** Ordinal confidence reported by the detector, most confident first. */
export type Likelihood =
    | 'VERY_LIKELY'
    | 'LIKELY'
    | 'POSSIBLE'
    | 'UNLIKELY'
    | 'VERY_UNLIKELY'
    | 'UNKNOWN';

export interface Vertex {
    x: number;
    y: number;
}

export interface FaceAnnotation {
    joyLikelihood: Likelihood;
    angerLikelihood: Likelihood;
    surpriseLikelihood: Likelihood;
    sorrowLikelihood: Likelihood;
    headwearLikelihood: Likelihood;

    /**
     * Four integer pixel vertices, clockwise from top-left:
     * top-left, top-right, bottom-right, bottom-left.
     */
    boundingPoly: Vertex[];
}

export interface PixelBox {
    left: number;
    top: number;
    width: number;
    height: number;
}

/**
 * Bounding polygon of a pixel box, rounded to integer vertices.
 */
export function polygonFromBox(box: PixelBox): Vertex[] {
    const left = Math.round(box.left);
    const top = Math.round(box.top);
    const right = Math.round(box.left + box.width);
    const bottom = Math.round(box.top + box.height);

    return [
        { x: left, y: top },
        { x: right, y: top },
        { x: right, y: bottom },
        { x: left, y: bottom },
    ];
}
