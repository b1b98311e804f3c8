import lexiconData from '../data/emotion-lexicon.json';
import { ActiveEmotion, EmotionConfig, EmotionLabel, EmotionalState, SessionTurn } from '../types';
import { tokenize } from '../utils/text';

export interface LexiconEntry {
  term: string;
  weight: number;
}

export interface EmotionLexicon {
  categories: Record<ActiveEmotion, LexiconEntry[]>;
  negators: string[];
  intensifiers: string[];
}

// Highest priority first; failure states must never be masked by milder signals
export const EMOTION_PRIORITY: readonly EmotionLabel[] = [
  'frustrated',
  'overwhelmed',
  'confused',
  'bored',
  'excited',
  'engaged',
  'neutral'
];

const ACTIVE_EMOTIONS: readonly ActiveEmotion[] = [
  'frustrated',
  'overwhelmed',
  'confused',
  'bored',
  'excited',
  'engaged'
];

export const DEFAULT_LEXICON: EmotionLexicon = lexiconData;

const NEUTRAL: EmotionalState = { emotion: 'neutral', confidence: 0 };

// Stable seam: a statistical classifier can replace the lexical one without touching callers
export interface EmotionDetector {
  detect(text: string, recentHistory?: SessionTurn[]): EmotionalState;
}

interface CompiledEntry {
  tokens: string[];
  weight: number;
}

export type EmotionScores = Record<ActiveEmotion, number>;

export class LexicalEmotionDetector implements EmotionDetector {
  private config: EmotionConfig;
  private entries: Record<ActiveEmotion, CompiledEntry[]>;
  private negators: Set<string>;
  private intensifiers: Set<string>;

  constructor(config: EmotionConfig, lexicon: EmotionLexicon = DEFAULT_LEXICON) {
    this.config = config;
    this.negators = new Set(lexicon.negators);
    this.intensifiers = new Set(lexicon.intensifiers);
    this.entries = {
      frustrated: this.compile(lexicon.categories.frustrated),
      overwhelmed: this.compile(lexicon.categories.overwhelmed),
      confused: this.compile(lexicon.categories.confused),
      bored: this.compile(lexicon.categories.bored),
      excited: this.compile(lexicon.categories.excited),
      engaged: this.compile(lexicon.categories.engaged)
    };
  }

  detect(text: string, recentHistory: SessionTurn[] = []): EmotionalState {
    const scores = this.score(text);

    const history = recentHistory
      .filter(turn => turn.speaker === 'user')
      .slice(-this.config.historyWindow);

    // History only sharpens categories the current message already hints at
    for (const turn of history) {
      const past = this.score(turn.text);
      for (const emotion of ACTIVE_EMOTIONS) {
        if (scores[emotion] > 0) {
          scores[emotion] += past[emotion] * this.config.historyWeight;
        }
      }
    }

    let best: ActiveEmotion | null = null;
    for (const emotion of ACTIVE_EMOTIONS) {
      // ACTIVE_EMOTIONS is in priority order, so only a strictly higher score displaces
      if (scores[emotion] < this.config.minimumScore) continue;
      if (best === null || scores[emotion] > scores[best] + 1e-9) {
        best = emotion;
      }
    }

    if (best === null) return { ...NEUTRAL };

    const score = scores[best];
    return { emotion: best, confidence: score / (score + 1) };
  }

  score(text: string): EmotionScores {
    const tokens = tokenize(text);
    const scores: EmotionScores = {
      frustrated: 0,
      overwhelmed: 0,
      confused: 0,
      bored: 0,
      excited: 0,
      engaged: 0
    };

    for (const emotion of ACTIVE_EMOTIONS) {
      for (const entry of this.entries[emotion]) {
        const start = this.findUnnegated(tokens, entry.tokens);
        if (start === -1) continue;

        const intensified = start > 0 && this.intensifiers.has(tokens[start - 1]);
        scores[emotion] += entry.weight * (intensified ? this.config.intensifierMultiplier : 1);
      }
    }

    const questionMarks = (text.match(/\?/g) ?? []).length;
    if (questionMarks >= 2) {
      scores.confused += this.config.questionMarkWeight;
    }

    return scores;
  }

  private compile(entries: LexiconEntry[]): CompiledEntry[] {
    return entries
      .map(entry => ({ tokens: tokenize(entry.term), weight: entry.weight }))
      .filter(entry => entry.tokens.length > 0 && entry.weight > 0);
  }

  // Index of the first occurrence not preceded by a negator within the window, or -1
  private findUnnegated(tokens: string[], phrase: string[]): number {
    for (let start = 0; start + phrase.length <= tokens.length; start++) {
      if (!phrase.every((token, offset) => tokens[start + offset] === token)) continue;

      const windowStart = Math.max(0, start - this.config.negationWindow);
      const negated = tokens.slice(windowStart, start).some(token => this.negators.has(token));
      if (!negated) return start;
    }
    return -1;
  }
}
