import dotenv from 'dotenv';
import { EngineConfig } from '../types';

dotenv.config();

export type StorageBackend = 'memory' | 'weaviate';

export interface EnvConfig {
  OPENAI_API_KEY: string;
  OPENAI_MODEL: string;
  STORAGE_BACKEND: StorageBackend;
  WEAVIATE_URL?: string;
  WEAVIATE_API_KEY?: string;
  LOG_LEVEL: string;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  emotion: {
    minimumScore: 1.0,
    intensifierMultiplier: 1.5,
    negationWindow: 3,
    questionMarkWeight: 0.5,
    historyWindow: 2,
    historyWeight: 0.3
  },
  adaptation: {
    decayFactor: 0.7,
    snapEpsilon: 0.005,
    transitions: {
      frustrated: { patience: 0.3, formality: -0.1 },
      excited: { enthusiasm: 0.2, verbosity: 0.15 },
      confused: { patience: 0.2, verbosity: 0.25 },
      bored: { humor: 0.25, enthusiasm: 0.1 },
      overwhelmed: { patience: 0.35, verbosity: -0.25, enthusiasm: -0.1 },
      engaged: { enthusiasm: 0.05, expertiseConfidence: 0.05 }
    },
    rapportGain: 0.05,
    trustGain: 0.03,
    trustLoss: 0.02
  },
  memory: {
    capacity: 100,
    retrievalLimit: 5,
    halfLifeHours: 72,
    importanceWeight: 0.7,
    recencyWeight: 0.3,
    topicBias: 0.1,
    mergeThreshold: 0.8,
    noveltyPenalty: 0.5,
    promotionBoost: 0.05,
    emotionalBoost: 0.2,
    maxContentLength: 200
  },
  context: {
    sessionTurnLimit: 8,
    tokenBudget: 2000
  },
  model: 'gpt-4o-mini'
};

function isStorageBackend(value: string): value is StorageBackend {
  return value === 'memory' || value === 'weaviate';
}

export function loadEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const backend = (env.STORAGE_BACKEND || 'memory').toLowerCase();
  if (!isStorageBackend(backend)) {
    throw new Error(`Unsupported STORAGE_BACKEND "${backend}" (expected memory or weaviate)`);
  }
  if (backend === 'weaviate' && !env.WEAVIATE_URL) {
    throw new Error('Missing WEAVIATE_URL for the weaviate storage backend');
  }

  return {
    OPENAI_API_KEY: env.OPENAI_API_KEY || '',
    OPENAI_MODEL: env.OPENAI_MODEL || DEFAULT_ENGINE_CONFIG.model,
    STORAGE_BACKEND: backend,
    WEAVIATE_URL: env.WEAVIATE_URL,
    WEAVIATE_API_KEY: env.WEAVIATE_API_KEY,
    LOG_LEVEL: env.LOG_LEVEL || 'info'
  };
}

function readNumber(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  check: (value: number) => boolean,
  expectation: string
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || !check(value)) {
    throw new Error(`Invalid ${name}="${raw}": expected ${expectation}`);
  }
  return value;
}

const positiveInt = (value: number) => Number.isInteger(value) && value > 0;
const positive = (value: number) => value > 0;

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const defaults = DEFAULT_ENGINE_CONFIG;

  return {
    emotion: {
      ...defaults.emotion,
      minimumScore: readNumber(env, 'EMOTION_MIN_SCORE', defaults.emotion.minimumScore, positive, 'a positive number')
    },
    adaptation: {
      ...defaults.adaptation,
      transitions: { ...defaults.adaptation.transitions },
      decayFactor: readNumber(
        env,
        'ADAPTATION_DECAY',
        defaults.adaptation.decayFactor,
        value => value >= 0 && value < 1,
        'a number in [0, 1)'
      )
    },
    memory: {
      ...defaults.memory,
      capacity: readNumber(env, 'MEMORY_CAPACITY', defaults.memory.capacity, positiveInt, 'a positive integer'),
      retrievalLimit: readNumber(
        env,
        'MEMORY_RETRIEVAL_LIMIT',
        defaults.memory.retrievalLimit,
        positiveInt,
        'a positive integer'
      ),
      halfLifeHours: readNumber(
        env,
        'MEMORY_HALF_LIFE_HOURS',
        defaults.memory.halfLifeHours,
        positive,
        'a positive number'
      )
    },
    context: {
      sessionTurnLimit: readNumber(
        env,
        'SESSION_TURN_LIMIT',
        defaults.context.sessionTurnLimit,
        positiveInt,
        'a positive integer'
      ),
      tokenBudget: readNumber(env, 'CONTEXT_TOKEN_BUDGET', defaults.context.tokenBudget, positiveInt, 'a positive integer')
    },
    model: env.OPENAI_MODEL || defaults.model
  };
}
