/**
 * Emoji Selector
 *
 * Picks the overlay for a detected face from its likelihood levels.
 *
 * Policy: the most confident level wins. Among emotions at the same level,
 * joy beats anger, which beats surprise, which beats sorrow.
 * UNLIKELY, VERY_UNLIKELY and UNKNOWN never select an emotion.
 */

import type { EmotionCategory, FaceAnnotation, Likelihood } from '../types/emotion.js';

// Levels that count as a detection, most confident first
const SELECTING_LIKELIHOODS: readonly Likelihood[] = ['VERY_LIKELY', 'LIKELY', 'POSSIBLE'];

// Priority order for equally confident emotions
const EMOTION_PRIORITY: ReadonlyArray<readonly [EmotionCategory, (annotation: FaceAnnotation) => Likelihood]> = [
    ['joy', (annotation) => annotation.joyLikelihood],
    ['anger', (annotation) => annotation.angerLikelihood],
    ['surprise', (annotation) => annotation.surpriseLikelihood],
    ['sorrow', (annotation) => annotation.sorrowLikelihood],
];

export function selectEmotionEmoji(annotation: FaceAnnotation): EmotionCategory {
    for (const likelihood of SELECTING_LIKELIHOODS) {
        for (const [emotion, likelihoodOf] of EMOTION_PRIORITY) {
            if (likelihoodOf(annotation) === likelihood) {
                return emotion;
            }
        }
    }
    return 'none';
}

/**
 * Whether the face is wearing headwear, independently of its emotion.
 */
export function selectHatOverlay(annotation: FaceAnnotation): boolean {
    return SELECTING_LIKELIHOODS.includes(annotation.headwearLikelihood);
}
