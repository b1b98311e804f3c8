import {
  ActiveEmotion,
  AdaptationMode,
  AdaptedBehaviorState,
  BehaviorDimension,
  BehaviorVector,
  EmotionLabel,
  EmotionalState,
  PersonalityProfile
} from './character';

export * from './character';

export type MemoryCategory = 'preference' | 'fact' | 'goal' | 'emotional-event';

export interface Memory {
  id: string;
  characterId: string;
  userId: string;
  content: string;
  category: MemoryCategory;
  importance: number; // 0-1, fixed at write time
  emotion: EmotionalState;
  topics: string[];
  createdAt: Date;
  lastAccessedAt: Date;
  accessCount: number;
  turn: number;
}

export interface MemoryCandidate {
  content: string;
  category: MemoryCategory;
}

export interface ScoredMemory {
  memory: Memory;
  composite: number;
}

export type RecordResult =
  | { status: 'stored'; memory: Memory; evicted: Memory[] }
  | { status: 'merged'; memory: Memory }
  | { status: 'discarded'; reason: string };

export interface MemorySummary {
  totalMemories: number;
  byCategory: Record<MemoryCategory, number>;
  byTopic: Record<string, number>;
  byEmotion: Partial<Record<EmotionLabel, number>>;
  relationshipStrength: number; // 0-10
  personalityUnderstanding: number; // 0-10
  learningFocus: LearningFocus;
  averageImportance: number;
}

export interface LearningFocus {
  level: 'focused' | 'mixed' | 'general';
  topic?: string;
}

export type EngagementLevel = 'getting-started' | 'building' | 'active' | 'highly-engaged';

export interface ConversationInsights {
  suggestedTopics: string[];
  learningGaps: string[];
  engagementLevel: EngagementLevel;
  nextSteps: string[];
}

export type Speaker = 'user' | 'character';

export interface SessionTurn {
  speaker: Speaker;
  text: string;
  timestamp: Date;
}

export interface SystemLayer {
  kind: 'system';
  profile: PersonalityProfile;
  behavior: BehaviorVector;
  emotion: EmotionalState;
  rapport: number;
  trust: number;
  adaptationPrompt?: string;
  topicNovelty: boolean;
  text: string;
  tokens: number;
}

export interface SessionLayer {
  kind: 'session';
  turns: SessionTurn[];
  text: string;
  tokens: number;
}

export interface KnowledgeLayer {
  kind: 'knowledge';
  memories: ScoredMemory[];
  text: string;
  tokens: number;
}

export interface UserLayer {
  kind: 'user';
  message: string;
  text: string;
  tokens: number;
}

export interface ContextBundle {
  characterId: string;
  userId: string;
  layers: [SystemLayer, SessionLayer, KnowledgeLayer, UserLayer];
  tokenEstimate: number;
  tokenBudget: number;
  overBudget: boolean;
  droppedTurns: number;
  droppedMemories: number;
  usedMemoryIds: string[];
}

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export type ResponseStyle = 'brief' | 'moderate' | 'detailed' | 'comprehensive';

export interface GenerationConfig {
  model: string;
  maxTokens: number;
  temperature: number;
  responseStyle: ResponseStyle;
}

export interface GenerationRequest {
  messages: ChatMessage[];
  config: GenerationConfig;
}

// Generation collaborator: returns text or throws GenerationError
export interface GenerationService {
  generate(request: GenerationRequest, signal?: AbortSignal): Promise<string>;
}

// Storage collaborator. put* resolve to false (or reject) when the write did not land.
export interface PersonaStorage {
  putMemory(characterId: string, userId: string, memory: Memory): Promise<boolean>;
  getMemories(characterId: string, userId: string): Promise<Memory[]>;
  deleteMemory(characterId: string, userId: string, memoryId: string): Promise<boolean>;
  putProfile(profile: PersonalityProfile): Promise<boolean>;
  getProfile(characterId: string): Promise<PersonalityProfile | null>;
  putAdaptation(state: AdaptedBehaviorState): Promise<boolean>;
  getAdaptation(characterId: string, userId: string): Promise<AdaptedBehaviorState | null>;
}

export interface PendingTurn {
  characterId: string;
  userId: string;
  message: string;
  emotion: EmotionalState;
  turn: number;
  mode: AdaptationMode;
  bundle: ContextBundle;
  request: GenerationRequest;
}

interface TelemetryBase {
  characterId: string;
  userId: string;
  turn: number;
  timestamp: number;
}

export interface TurnCompletedEvent extends TelemetryBase {
  kind: 'turn.completed';
  emotion: EmotionalState;
  mode: AdaptationMode;
  tokenEstimate: number;
  overBudget: boolean;
  droppedTurns: number;
  droppedMemories: number;
  memoriesUsed: number;
}

export interface TurnCancelledEvent extends TelemetryBase {
  kind: 'turn.cancelled';
}

export interface GenerationFailedEvent extends TelemetryBase {
  kind: 'generation.failed';
  transient: boolean;
  message: string;
}

export interface MemoryRecordedEvent extends TelemetryBase {
  kind: 'memory.recorded';
  status: RecordResult['status'];
  category: MemoryCategory;
}

export type TelemetryEvent = TurnCompletedEvent | TurnCancelledEvent | GenerationFailedEvent | MemoryRecordedEvent;

export interface EmotionConfig {
  minimumScore: number;
  intensifierMultiplier: number;
  negationWindow: number;
  questionMarkWeight: number;
  historyWindow: number;
  historyWeight: number;
}

export interface AdaptationConfig {
  decayFactor: number;
  snapEpsilon: number;
  transitions: Record<ActiveEmotion, Partial<Record<BehaviorDimension, number>>>;
  rapportGain: number;
  trustGain: number;
  trustLoss: number;
}

export interface MemoryConfig {
  capacity: number;
  retrievalLimit: number;
  halfLifeHours: number;
  importanceWeight: number;
  recencyWeight: number;
  topicBias: number;
  mergeThreshold: number;
  noveltyPenalty: number;
  promotionBoost: number;
  emotionalBoost: number;
  maxContentLength: number;
}

export interface ContextConfig {
  sessionTurnLimit: number;
  tokenBudget: number;
}

export interface EngineConfig {
  emotion: EmotionConfig;
  adaptation: AdaptationConfig;
  memory: MemoryConfig;
  context: ContextConfig;
  model: string;
}
