import {
  ActiveEmotion,
  AdaptationConfig,
  AdaptationResult,
  AdaptedBehaviorState,
  BehaviorVector,
  EmotionalState,
  PersonalityProfile
} from '../types';
import { clamp } from '../utils/text';
import { BEHAVIOR_DIMENSIONS, DIMENSION_RANGES, effectiveVector, isZeroVector, zeroVector } from './dimensions';

const POSITIVE_EMOTIONS: readonly ActiveEmotion[] = ['excited', 'engaged'];

export class BehaviorAdapter {
  private config: AdaptationConfig;

  constructor(config: AdaptationConfig) {
    this.config = config;
  }

  initialState(characterId: string, userId: string, now: Date = new Date()): AdaptedBehaviorState {
    return {
      characterId,
      userId,
      delta: zeroVector(),
      turnsSinceEmotion: 0,
      turn: 0,
      lastEmotion: { emotion: 'neutral', confidence: 0 },
      topicNovelty: false,
      rapport: 0.5,
      trust: 0.5,
      updatedAt: now
    };
  }

  // Pure transition: returns a new state, never mutates the one passed in
  step(
    profile: PersonalityProfile,
    previous: AdaptedBehaviorState,
    detected: EmotionalState,
    now: Date = new Date()
  ): AdaptationResult {
    const state: AdaptedBehaviorState = {
      ...previous,
      delta: { ...previous.delta },
      lastEmotion: { ...detected },
      turn: previous.turn + 1,
      updatedAt: now
    };

    if (detected.emotion === 'neutral') {
      state.delta = this.decay(state.delta);
      state.turnsSinceEmotion = previous.turnsSinceEmotion + 1;
    } else {
      state.delta = this.accumulate(profile.baseline, state.delta, detected.emotion);
      state.turnsSinceEmotion = 0;
      state.topicNovelty = detected.emotion === 'bored';
      this.updateRelationship(state, detected.emotion);
    }

    if (isZeroVector(state.delta)) {
      state.topicNovelty = false;
    }

    return {
      state,
      effective: effectiveVector(profile.baseline, state.delta),
      mode: isZeroVector(state.delta) ? 'baseline' : 'adapted'
    };
  }

  private accumulate(baseline: BehaviorVector, delta: BehaviorVector, emotion: ActiveEmotion): BehaviorVector {
    const transition = this.config.transitions[emotion];
    const next = { ...delta };

    for (const dimension of BEHAVIOR_DIMENSIONS) {
      const change = transition[dimension] ?? 0;
      const range = DIMENSION_RANGES[dimension];
      // Keep baseline + delta inside the declared range so drift can never run away
      next[dimension] = clamp(
        delta[dimension] + change,
        range.min - baseline[dimension],
        range.max - baseline[dimension]
      );
    }

    return next;
  }

  private decay(delta: BehaviorVector): BehaviorVector {
    const next = zeroVector();
    for (const dimension of BEHAVIOR_DIMENSIONS) {
      const decayed = delta[dimension] * this.config.decayFactor;
      next[dimension] = Math.abs(decayed) < this.config.snapEpsilon ? 0 : decayed;
    }
    return next;
  }

  private updateRelationship(state: AdaptedBehaviorState, emotion: ActiveEmotion): void {
    if (POSITIVE_EMOTIONS.includes(emotion)) {
      state.rapport = clamp(state.rapport + this.config.rapportGain, 0, 1);
      state.trust = clamp(state.trust + this.config.trustGain, 0, 1);
    } else if (emotion === 'frustrated') {
      state.trust = clamp(state.trust - this.config.trustLoss, 0, 1);
    }
  }
}
