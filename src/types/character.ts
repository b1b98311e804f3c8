export type BehaviorDimension =
  | 'patience'
  | 'formality'
  | 'enthusiasm'
  | 'humor'
  | 'expertiseConfidence'
  | 'verbosity';

export type PatienceLevel = 'low' | 'moderate' | 'high' | 'very-high';

export type BehaviorVector = Record<BehaviorDimension, number>;

export interface DimensionRange {
  min: number;
  max: number;
}

export type EmotionLabel =
  | 'neutral'
  | 'frustrated'
  | 'excited'
  | 'confused'
  | 'bored'
  | 'engaged'
  | 'overwhelmed';

export type ActiveEmotion = Exclude<EmotionLabel, 'neutral'>;

export interface EmotionalState {
  emotion: EmotionLabel;
  confidence: number; // 0-1
}

export interface PersonaIdentity {
  name: string;
  archetype: string;
  culturalBackground: string;
  age: number;
  occupation: string;
}

export interface PersonalityProfile extends PersonaIdentity {
  id: string;
  baseline: BehaviorVector;
  knowledgeDomains: string[];
  teachingSpecialties: string[];
  conversationStarters: string[];
  adaptationPrompts: Partial<Record<ActiveEmotion, string>>;
}

// What an admin hands in; patience may be given on the ordinal scale
export interface PersonalityProfileInput extends PersonaIdentity {
  id: string;
  baseline: Omit<BehaviorVector, 'patience'> & { patience: number | PatienceLevel };
  knowledgeDomains?: string[];
  teachingSpecialties?: string[];
  conversationStarters?: string[];
  adaptationPrompts?: Partial<Record<ActiveEmotion, string>>;
}

export interface RelationshipState {
  rapport: number; // 0-1
  trust: number; // 0-1
}

export interface AdaptedBehaviorState extends RelationshipState {
  characterId: string;
  userId: string;
  delta: BehaviorVector;
  turnsSinceEmotion: number;
  turn: number;
  lastEmotion: EmotionalState;
  topicNovelty: boolean;
  updatedAt: Date;
}

export type AdaptationMode = 'baseline' | 'adapted';

export interface AdaptationResult {
  state: AdaptedBehaviorState;
  effective: BehaviorVector;
  mode: AdaptationMode;
}
