/**
 * Observation Encoder
 *
 * Turns an episode state into the fixed-size observation agents consume.
 * The encoding is a pure function of the episode history.
 */

import type { EpisodeState, Observation } from "../types";

/**
 * Padding id for empty token slots.
 */
export const PAD_TOKEN_ID = -1;

/**
 * Number of context features appended after the one-hot window.
 */
const CONTEXT_SIZE = 2;

export interface EncoderSpec {
  vocabularySize: number;
  observationLength: number;
  maxSteps: number;
}

/**
 * Feature dimension for linear models:
 * window one-hot + progress + context + bias.
 */
export function getFeatureDimension(spec: EncoderSpec): number {
  return spec.observationLength * spec.vocabularySize + 1 + CONTEXT_SIZE + 1;
}

/**
 * Last N action ids, most recent first, padded with PAD_TOKEN_ID.
 */
export function recentTokenIds(actions: readonly number[], length: number): number[] {
  const ids: number[] = new Array(length).fill(PAD_TOKEN_ID);
  for (let slot = 0; slot < length && slot < actions.length; slot++) {
    ids[slot] = actions[actions.length - 1 - slot];
  }
  return ids;
}

/**
 * Convert episode state to an observation.
 */
export function encodeObservation(state: Readonly<EpisodeState>, spec: EncoderSpec): Observation {
  const tokenIds = recentTokenIds(state.actions, spec.observationLength);
  const progress = state.stepCount / spec.maxSteps;
  const context = [state.tokens.length / spec.maxSteps, state.lastSimilarity];

  const features: number[] = new Array(getFeatureDimension(spec)).fill(0);

  // One-hot per window slot
  tokenIds.forEach((id, slot) => {
    if (id !== PAD_TOKEN_ID) {
      features[slot * spec.vocabularySize + id] = 1;
    }
  });

  let offset = spec.observationLength * spec.vocabularySize;
  features[offset++] = progress;
  for (const value of context) {
    features[offset++] = value;
  }

  // Bias term
  features[offset] = 1;

  return { tokenIds, progress, context, features };
}
