import weaviate, { ApiKey, WeaviateClient } from 'weaviate-ts-client';
import { v5 as uuidv5 } from 'uuid';
import {
  AdaptedBehaviorState,
  BehaviorVector,
  EmotionLabel,
  EmotionalState,
  Memory,
  MemoryCategory,
  PersonaStorage,
  PersonalityProfile
} from '../types';
import { BEHAVIOR_DIMENSIONS, zeroVector } from '../engines/dimensions';
import { MemoryStoreUnavailableError, describeError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('weaviate');

const MEMORY_CLASS = 'PersonaMemory';
const PROFILE_CLASS = 'PersonaProfile';
const ADAPTATION_CLASS = 'PersonaAdaptation';

// Fixed namespace so profile and adaptation ids are derived deterministically from their keys
const ID_NAMESPACE = '5b8f2d1e-7c43-4f0a-9d6b-2e1c8a7f3b90';

const MEMORY_FIELDS =
  'characterId userId content category importance emotion emotionConfidence topics createdAt lastAccessedAt accessCount turn _additional { id }';

const CATEGORIES: readonly MemoryCategory[] = ['preference', 'fact', 'goal', 'emotional-event'];
const EMOTIONS: readonly EmotionLabel[] = [
  'neutral',
  'frustrated',
  'excited',
  'confused',
  'bored',
  'engaged',
  'overwhelmed'
];

type Row = Record<string, unknown>;

function isRecord(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function getRows(result: unknown, className: string): Row[] {
  if (!isRecord(result)) return [];
  const data = result.data;
  if (!isRecord(data)) return [];
  const get = data.Get;
  if (!isRecord(get)) return [];
  const rows = get[className];
  return Array.isArray(rows) ? rows.filter(isRecord) : [];
}

// Per-object errors reported inside an otherwise successful batch response
export function findBatchErrors(results: unknown): unknown[] {
  if (!Array.isArray(results)) return [];
  return results.flatMap(item => (isRecord(item) && isRecord(item.result) && item.result.errors ? [item.result.errors] : []));
}

function readString(row: Row, field: string): string {
  const value = row[field];
  return typeof value === 'string' ? value : '';
}

function readNumber(row: Row, field: string): number {
  const value = row[field];
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

function readDate(row: Row, field: string): Date {
  const value = row[field];
  const date = typeof value === 'string' || typeof value === 'number' ? new Date(value) : new Date(0);
  return Number.isNaN(date.getTime()) ? new Date(0) : date;
}

function readEmotionLabel(value: unknown): EmotionLabel {
  return EMOTIONS.find(emotion => emotion === value) ?? 'neutral';
}

function readVector(value: unknown): BehaviorVector {
  const vector = zeroVector();
  if (!isRecord(value)) return vector;
  for (const dimension of BEHAVIOR_DIMENSIONS) {
    const component = value[dimension];
    if (typeof component === 'number' && Number.isFinite(component)) vector[dimension] = component;
  }
  return vector;
}

function readStringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function rowToMemory(row: Row): Memory | null {
  const additional = row._additional;
  const id = isRecord(additional) ? additional.id : undefined;
  const category = CATEGORIES.find(candidate => candidate === row.category);
  if (typeof id !== 'string' || !category) return null;

  const emotion: EmotionalState = {
    emotion: readEmotionLabel(row.emotion),
    confidence: readNumber(row, 'emotionConfidence')
  };

  return {
    id,
    characterId: readString(row, 'characterId'),
    userId: readString(row, 'userId'),
    content: readString(row, 'content'),
    category,
    importance: readNumber(row, 'importance'),
    emotion,
    topics: readStringList(row.topics),
    createdAt: readDate(row, 'createdAt'),
    lastAccessedAt: readDate(row, 'lastAccessedAt'),
    accessCount: readNumber(row, 'accessCount'),
    turn: readNumber(row, 'turn')
  };
}

export function parseProfileJson(json: string): PersonalityProfile | null {
  const parsed: unknown = JSON.parse(json);
  if (!isRecord(parsed)) return null;

  const prompts = isRecord(parsed.adaptationPrompts) ? parsed.adaptationPrompts : {};
  const adaptationPrompts: PersonalityProfile['adaptationPrompts'] = {};
  for (const emotion of EMOTIONS) {
    const prompt = prompts[emotion];
    if (emotion !== 'neutral' && typeof prompt === 'string') adaptationPrompts[emotion] = prompt;
  }

  return {
    id: readString(parsed, 'id'),
    name: readString(parsed, 'name'),
    archetype: readString(parsed, 'archetype'),
    culturalBackground: readString(parsed, 'culturalBackground'),
    age: readNumber(parsed, 'age'),
    occupation: readString(parsed, 'occupation'),
    baseline: readVector(parsed.baseline),
    knowledgeDomains: readStringList(parsed.knowledgeDomains),
    teachingSpecialties: readStringList(parsed.teachingSpecialties),
    conversationStarters: readStringList(parsed.conversationStarters),
    adaptationPrompts
  };
}

export function parseAdaptationJson(json: string): AdaptedBehaviorState | null {
  const parsed: unknown = JSON.parse(json);
  if (!isRecord(parsed)) return null;

  const lastEmotion = isRecord(parsed.lastEmotion) ? parsed.lastEmotion : {};

  return {
    characterId: readString(parsed, 'characterId'),
    userId: readString(parsed, 'userId'),
    delta: readVector(parsed.delta),
    turnsSinceEmotion: readNumber(parsed, 'turnsSinceEmotion'),
    turn: readNumber(parsed, 'turn'),
    lastEmotion: {
      emotion: readEmotionLabel(lastEmotion.emotion),
      confidence: readNumber(lastEmotion, 'confidence')
    },
    topicNovelty: parsed.topicNovelty === true,
    rapport: readNumber(parsed, 'rapport'),
    trust: readNumber(parsed, 'trust'),
    updatedAt: readDate(parsed, 'updatedAt')
  };
}

function pairFilter(characterId: string, userId: string) {
  return {
    operator: 'And' as const,
    operands: [
      { path: ['characterId'], operator: 'Equal' as const, valueText: characterId },
      { path: ['userId'], operator: 'Equal' as const, valueText: userId }
    ]
  };
}

export class WeaviatePersonaStorage implements PersonaStorage {
  private client: WeaviateClient;

  constructor(url: string, apiKey?: string, client?: WeaviateClient) {
    this.client =
      client ??
      weaviate.client({
        scheme: url.startsWith('http://') ? 'http' : 'https',
        host: url.replace(/^https?:\/\//, ''),
        apiKey: apiKey ? new ApiKey(apiKey) : undefined
      });
  }

  async initializeSchema(): Promise<void> {
    try {
      const schema: unknown = await this.client.schema.getter().do();
      const classes = isRecord(schema) && Array.isArray(schema.classes) ? schema.classes.filter(isRecord) : [];
      const existing = new Set(classes.map(cls => readString(cls, 'class')));

      const definitions = [
        {
          class: MEMORY_CLASS,
          description: 'Scored long-term memories per character and user',
          vectorizer: 'none',
          properties: [
            { name: 'characterId', dataType: ['text'] },
            { name: 'userId', dataType: ['text'] },
            { name: 'content', dataType: ['text'] },
            { name: 'category', dataType: ['text'] },
            { name: 'importance', dataType: ['number'] },
            { name: 'emotion', dataType: ['text'] },
            { name: 'emotionConfidence', dataType: ['number'] },
            { name: 'topics', dataType: ['text[]'] },
            { name: 'createdAt', dataType: ['date'] },
            { name: 'lastAccessedAt', dataType: ['date'] },
            { name: 'accessCount', dataType: ['int'] },
            { name: 'turn', dataType: ['int'] }
          ]
        },
        {
          class: PROFILE_CLASS,
          description: 'Personality profiles, stored as validated JSON documents',
          vectorizer: 'none',
          properties: [
            { name: 'characterId', dataType: ['text'] },
            { name: 'profileJson', dataType: ['text'] }
          ]
        },
        {
          class: ADAPTATION_CLASS,
          description: 'Emotional adaptation overlay per character and user',
          vectorizer: 'none',
          properties: [
            { name: 'characterId', dataType: ['text'] },
            { name: 'userId', dataType: ['text'] },
            { name: 'stateJson', dataType: ['text'] }
          ]
        }
      ];

      for (const definition of definitions) {
        if (existing.has(definition.class)) continue;
        await this.client.schema.classCreator().withClass(definition).do();
        log.info(`${definition.class} class created successfully`);
      }
    } catch (error) {
      log.error('Error initializing Weaviate schema:', describeError(error));
      throw error;
    }
  }

  async putMemory(characterId: string, userId: string, memory: Memory): Promise<boolean> {
    return this.upsert(MEMORY_CLASS, memory.id, {
      characterId,
      userId,
      content: memory.content,
      category: memory.category,
      importance: memory.importance,
      emotion: memory.emotion.emotion,
      emotionConfidence: memory.emotion.confidence,
      topics: memory.topics,
      createdAt: memory.createdAt.toISOString(),
      lastAccessedAt: memory.lastAccessedAt.toISOString(),
      accessCount: memory.accessCount,
      turn: memory.turn
    });
  }

  async getMemories(characterId: string, userId: string): Promise<Memory[]> {
    try {
      const result: unknown = await this.client.graphql
        .get()
        .withClassName(MEMORY_CLASS)
        .withFields(MEMORY_FIELDS)
        .withWhere(pairFilter(characterId, userId))
        .withLimit(10_000)
        .do();

      return getRows(result, MEMORY_CLASS)
        .map(rowToMemory)
        .filter((memory): memory is Memory => memory !== null)
        .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
    } catch (error) {
      throw new MemoryStoreUnavailableError(`Could not read memories for ${characterId}/${userId}`, { cause: error });
    }
  }

  async deleteMemory(_characterId: string, _userId: string, memoryId: string): Promise<boolean> {
    try {
      await this.client.data.deleter().withClassName(MEMORY_CLASS).withId(memoryId).do();
      return true;
    } catch (error) {
      log.error(`Error deleting memory ${memoryId}:`, describeError(error));
      return false;
    }
  }

  async putProfile(profile: PersonalityProfile): Promise<boolean> {
    return this.upsert(PROFILE_CLASS, uuidv5(profile.id, ID_NAMESPACE), {
      characterId: profile.id,
      profileJson: JSON.stringify(profile)
    });
  }

  async getProfile(characterId: string): Promise<PersonalityProfile | null> {
    const row = await this.findOne(PROFILE_CLASS, 'characterId profileJson', {
      path: ['characterId'],
      operator: 'Equal' as const,
      valueText: characterId
    });
    return row ? parseProfileJson(readString(row, 'profileJson')) : null;
  }

  async putAdaptation(state: AdaptedBehaviorState): Promise<boolean> {
    return this.upsert(ADAPTATION_CLASS, uuidv5(`${state.characterId}/${state.userId}`, ID_NAMESPACE), {
      characterId: state.characterId,
      userId: state.userId,
      stateJson: JSON.stringify(state)
    });
  }

  async getAdaptation(characterId: string, userId: string): Promise<AdaptedBehaviorState | null> {
    const row = await this.findOne(ADAPTATION_CLASS, 'characterId userId stateJson', pairFilter(characterId, userId));
    return row ? parseAdaptationJson(readString(row, 'stateJson')) : null;
  }

  private async findOne(
    className: string,
    fields: string,
    where: Parameters<ReturnType<WeaviateClient['graphql']['get']>['withWhere']>[0]
  ): Promise<Row | null> {
    const result: unknown = await this.client.graphql
      .get()
      .withClassName(className)
      .withFields(fields)
      .withWhere(where)
      .withLimit(1)
      .do();

    return getRows(result, className)[0] ?? null;
  }

  // Batch writes upsert by id, which keeps repeated puts of the same object idempotent
  private async upsert(className: string, id: string, properties: Record<string, unknown>): Promise<boolean> {
    try {
      const results: unknown = await this.client.batch
        .objectsBatcher()
        .withObject({ class: className, id, properties })
        .do();

      const failures = findBatchErrors(results);
      if (failures.length > 0) {
        log.error(`Weaviate rejected ${className} ${id}:`, JSON.stringify(failures));
        return false;
      }
      return true;
    } catch (error) {
      log.error(`Error storing ${className} ${id}:`, describeError(error));
      return false;
    }
  }
}
