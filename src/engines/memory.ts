import { v4 as uuidv4 } from 'uuid';
import topicData from '../data/topics.json';
import {
  ConversationInsights,
  EmotionLabel,
  EmotionalState,
  EngagementLevel,
  LearningFocus,
  Memory,
  MemoryCandidate,
  MemoryCategory,
  MemoryConfig,
  MemorySummary,
  PersonaStorage,
  RecordResult,
  ScoredMemory
} from '../types';
import { describeError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { clamp, similarity, tokenize, truncate } from '../utils/text';

const log = createLogger('memory');

export type TopicTable = Record<string, string[]>;

export const DEFAULT_TOPICS: TopicTable = topicData;

const CATEGORY_WEIGHTS: Record<MemoryCategory, number> = {
  goal: 0.7,
  preference: 0.6,
  'emotional-event': 0.5,
  fact: 0.4
};

const SALIENT_KEYWORDS = ['goal', 'important', 'always', 'never', 'love', 'hate', 'struggling', 'dream', 'must'];
const HEDGES = ['i think', 'maybe', 'probably', 'sometimes', 'kind of'];
const KEYWORD_STEP = 0.05;
const KEYWORD_CAP = 0.15;
const HEDGE_STEP = 0.05;

const EXTRACTORS: Array<{ category: MemoryCategory; pattern: RegExp }> = [
  { category: 'preference', pattern: /\bI (?:really |usually |always )?(?:like|love|enjoy|prefer|don't like|hate|dislike) [^.!?\n]+/gi },
  { category: 'preference', pattern: /\bmy favou?rite [^.!?\n]+? is [^.!?\n]+/gi },
  { category: 'goal', pattern: /\bI(?: want to| hope to| need to| plan to| am trying to|'m trying to) [^.!?\n]+/gi },
  { category: 'goal', pattern: /\bmy goal is [^.!?\n]+/gi },
  { category: 'fact', pattern: /\bI(?: work as| work at| live in| study| am learning|'m learning| have) [^.!?\n]+/gi },
  { category: 'fact', pattern: /\bmy (?!favou?rite\b|goal\b)\w+ is [^.!?\n]+/gi }
];

const EMOTIONAL_EVENT_CONFIDENCE = 0.5;

const SALIENT_IMPORTANCE = 0.8;
const FOCUS_SHARE = 0.4;
const INSIGHT_WINDOW = 20;
const INSIGHT_LIMIT = 3;
const RECENT_STEP_WINDOW = 5;
const STRUGGLE_THRESHOLD = 2;
const STRUGGLE_EMOTIONS: ReadonlySet<EmotionLabel> = new Set<EmotionLabel>(['frustrated', 'confused', 'overwhelmed']);
const DEFAULT_NEXT_STEPS = ['Set a specific learning goal', 'Practise with real-world examples', 'Build on your interests'];

export interface MemoryEngineOptions {
  clock?: () => Date;
  topics?: TopicTable;
}

export interface ImportanceAssessment {
  importance: number;
  similarity: number;
  duplicate?: Memory;
}

function pairKey(characterId: string, userId: string): string {
  return `${characterId}/${userId}`;
}

function topicLabel(topic: string): string {
  return topic.replace(/_/g, ' ');
}

function countTopics(memories: Memory[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const memory of memories) {
    for (const topic of memory.topics) {
      counts[topic] = (counts[topic] ?? 0) + 1;
    }
  }
  return counts;
}

function rankTopics(counts: Record<string, number>): string[] {
  return Object.entries(counts)
    .sort(([a, countA], [b, countB]) => countB - countA || a.localeCompare(b))
    .map(([topic]) => topic);
}

function learningFocus(byTopic: Record<string, number>, total: number): LearningFocus {
  const [topic] = rankTopics(byTopic);
  if (!topic) return { level: 'general' };
  return { level: byTopic[topic] > total * FOCUS_SHARE ? 'focused' : 'mixed', topic };
}

function engagementLevel(count: number): EngagementLevel {
  if (count < 3) return 'getting-started';
  if (count < 10) return 'building';
  if (count < 20) return 'active';
  return 'highly-engaged';
}

function learningGaps(memories: Memory[]): string[] {
  const gaps: string[] = [];

  const struggles = memories.filter(
    memory => memory.category === 'emotional-event' && STRUGGLE_EMOTIONS.has(memory.emotion.emotion)
  );
  if (struggles.length > STRUGGLE_THRESHOLD) {
    gaps.push('Review fundamental concepts');
  }

  // A goal nobody has talked about since it was set
  const covered = new Set(memories.filter(memory => memory.category !== 'goal').flatMap(memory => memory.topics));
  const goalTopics = new Set(memories.filter(memory => memory.category === 'goal').flatMap(memory => memory.topics));
  for (const topic of [...goalTopics].sort()) {
    if (!covered.has(topic)) gaps.push(`More ${topicLabel(topic)} practice`);
  }

  return gaps.slice(0, INSIGHT_LIMIT);
}

function nextSteps(recent: Memory[], focus: string | undefined): string[] {
  const steps: string[] = [];
  if (recent.some(memory => memory.category === 'goal')) {
    steps.push('Continue working toward your stated goals');
  }
  if (focus && recent.some(memory => memory.topics.includes(focus))) {
    steps.push(`Practise ${topicLabel(focus)} with everyday scenarios`);
  }
  return steps.length > 0 ? steps : [...DEFAULT_NEXT_STEPS];
}

function countPhrases(text: string, phrases: string[]): number {
  const padded = ` ${tokenize(text).join(' ')} `;
  return phrases.filter(phrase => padded.includes(` ${phrase} `)).length;
}

export class MemoryEngine {
  private storage: PersonaStorage;
  private config: MemoryConfig;
  private clock: () => Date;
  private topics: TopicTable;

  constructor(storage: PersonaStorage, config: MemoryConfig, options: MemoryEngineOptions = {}) {
    this.storage = storage;
    this.config = config;
    this.clock = options.clock ?? (() => new Date());
    this.topics = options.topics ?? DEFAULT_TOPICS;
  }

  extractTopics(text: string): string[] {
    const tokens = new Set(tokenize(text));
    return Object.entries(this.topics)
      .filter(([, keywords]) => keywords.some(keyword => tokens.has(keyword)))
      .map(([topic]) => topic)
      .sort();
  }

  assessImportance(
    content: string,
    category: MemoryCategory,
    emotion: EmotionalState,
    existing: Memory[]
  ): ImportanceAssessment {
    let score = CATEGORY_WEIGHTS[category];

    if (emotion.emotion !== 'neutral') {
      score += this.config.emotionalBoost * emotion.confidence;
    }

    score += Math.min(KEYWORD_CAP, countPhrases(content, SALIENT_KEYWORDS) * KEYWORD_STEP);
    score -= countPhrases(content, HEDGES) * HEDGE_STEP;

    let closest: Memory | undefined;
    let closestSimilarity = 0;
    for (const memory of existing) {
      const overlap = similarity(content, memory.content);
      if (overlap > closestSimilarity) {
        closestSimilarity = overlap;
        closest = memory;
      }
    }

    const importance = clamp(score, 0, 1);
    if (closest && closestSimilarity >= this.config.mergeThreshold) {
      return { importance, similarity: closestSimilarity, duplicate: closest };
    }

    return {
      importance: clamp(importance * (1 - this.config.noveltyPenalty * closestSimilarity), 0, 1),
      similarity: closestSimilarity
    };
  }

  compositeScore(memory: Memory, now: Date, messageTopics: string[] = []): number {
    const anchor = Math.max(memory.createdAt.getTime(), memory.lastAccessedAt.getTime());
    const ageHours = Math.max(0, now.getTime() - anchor) / 3_600_000;
    const recency = Math.pow(0.5, ageHours / this.config.halfLifeHours);
    const topical = memory.topics.some(topic => messageTopics.includes(topic)) ? this.config.topicBias : 0;

    return this.config.importanceWeight * memory.importance + this.config.recencyWeight * recency + topical;
  }

  async recordMemory(
    characterId: string,
    userId: string,
    content: string,
    category: MemoryCategory,
    emotion: EmotionalState,
    turn: number = 0,
    protectedIds: ReadonlySet<string> = new Set()
  ): Promise<RecordResult> {
    const cleaned = truncate(content, this.config.maxContentLength);
    if (!cleaned) {
      return { status: 'discarded', reason: 'empty content' };
    }

    const now = this.clock();
    const existing = await this.loadForWrite(characterId, userId);
    const assessment = this.assessImportance(cleaned, category, emotion, existing);

    if (assessment.duplicate) {
      const duplicate = assessment.duplicate;
      const promoted: Memory = {
        ...duplicate,
        importance: clamp(Math.max(duplicate.importance, assessment.importance) + this.config.promotionBoost, 0, 1),
        lastAccessedAt: now
      };

      if (!(await this.write(characterId, userId, promoted))) {
        return { status: 'discarded', reason: 'durable write failed' };
      }
      log.debug(`🔁 Merged near-duplicate into ${promoted.id} (similarity ${assessment.similarity.toFixed(2)})`);
      return { status: 'merged', memory: promoted };
    }

    const memory: Memory = {
      id: uuidv4(),
      characterId,
      userId,
      content: cleaned,
      category,
      importance: assessment.importance,
      emotion: { ...emotion },
      topics: this.extractTopics(cleaned),
      createdAt: now,
      lastAccessedAt: now,
      accessCount: 0,
      turn
    };

    if (!(await this.write(characterId, userId, memory))) {
      return { status: 'discarded', reason: 'durable write failed' };
    }

    const evicted = await this.evict(characterId, userId, [...existing, memory], new Set([...protectedIds, memory.id]), now);
    log.debug(`🧠 Stored ${category} memory for ${pairKey(characterId, userId)} (importance ${memory.importance.toFixed(2)})`);
    return { status: 'stored', memory, evicted };
  }

  async retrieve(
    characterId: string,
    userId: string,
    message: string,
    limit: number = this.config.retrievalLimit,
    options: { touch?: boolean } = {}
  ): Promise<ScoredMemory[]> {
    let memories: Memory[];
    try {
      memories = await this.storage.getMemories(characterId, userId);
    } catch (error) {
      log.warn(`Memory store unavailable for ${pairKey(characterId, userId)}; continuing without knowledge:`, describeError(error));
      return [];
    }

    const now = this.clock();
    const topics = this.extractTopics(message);
    const ranked = this.rank(memories, now, topics).slice(0, Math.max(0, limit));

    if (options.touch ?? true) {
      await this.touch(characterId, userId, ranked.map(entry => entry.memory.id));
    }

    return ranked;
  }

  // Read-triggered recency refresh on the current records; ids evicted since retrieval are skipped
  async touch(characterId: string, userId: string, memoryIds: string[]): Promise<void> {
    if (memoryIds.length === 0) return;

    let current: Memory[];
    try {
      current = await this.storage.getMemories(characterId, userId);
    } catch (error) {
      log.warn(`Could not refresh recalled memories for ${pairKey(characterId, userId)}:`, describeError(error));
      return;
    }

    const byId = new Map(current.map(memory => [memory.id, memory]));
    const now = this.clock();
    for (const id of memoryIds) {
      const memory = byId.get(id);
      if (!memory) continue;
      await this.write(characterId, userId, {
        ...memory,
        lastAccessedAt: now,
        accessCount: memory.accessCount + 1
      });
    }
  }

  extractCandidates(userMessage: string, emotion: EmotionalState): MemoryCandidate[] {
    const text = userMessage.replace(/[‘’]/g, "'");
    const seen = new Set<string>();
    const candidates: MemoryCandidate[] = [];

    for (const { category, pattern } of EXTRACTORS) {
      for (const match of text.matchAll(pattern)) {
        const content = truncate(match[0].trim(), this.config.maxContentLength);
        const key = content.toLowerCase();
        if (!content || seen.has(key)) continue;
        seen.add(key);
        candidates.push({ content, category });
      }
    }

    if (emotion.emotion !== 'neutral' && emotion.confidence >= EMOTIONAL_EVENT_CONFIDENCE) {
      candidates.push({
        content: `Felt ${emotion.emotion}: ${truncate(userMessage, 80)}`,
        category: 'emotional-event'
      });
    }

    return candidates;
  }

  async summarize(characterId: string, userId: string): Promise<MemorySummary> {
    const memories = await this.storage.getMemories(characterId, userId);
    const summary: MemorySummary = {
      totalMemories: memories.length,
      byCategory: { preference: 0, fact: 0, goal: 0, 'emotional-event': 0 },
      byTopic: {},
      byEmotion: {},
      relationshipStrength: Math.min(10, Math.floor(memories.length / 5)),
      personalityUnderstanding: 0,
      learningFocus: { level: 'general' },
      averageImportance: 0
    };

    for (const memory of memories) {
      summary.byCategory[memory.category]++;
      for (const topic of memory.topics) {
        summary.byTopic[topic] = (summary.byTopic[topic] ?? 0) + 1;
      }
      summary.byEmotion[memory.emotion.emotion] = (summary.byEmotion[memory.emotion.emotion] ?? 0) + 1;
    }

    if (memories.length > 0) {
      summary.averageImportance = memories.reduce((sum, memory) => sum + memory.importance, 0) / memories.length;
    }

    const categories = new Set(memories.map(memory => memory.category));
    const salient = memories.filter(memory => memory.importance >= SALIENT_IMPORTANCE).length;
    summary.personalityUnderstanding = Math.min(10, categories.size * 2 + salient);
    summary.learningFocus = learningFocus(summary.byTopic, memories.length);

    return summary;
  }

  /** Conversation guidance drawn from the pair's most recent memories. */
  async insights(characterId: string, userId: string): Promise<ConversationInsights> {
    let memories: Memory[];
    try {
      memories = await this.storage.getMemories(characterId, userId);
    } catch (error) {
      log.warn(`Memory store unavailable for ${pairKey(characterId, userId)}; insights start from scratch:`, describeError(error));
      memories = [];
    }

    const recent = [...memories]
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || a.id.localeCompare(b.id))
      .slice(0, INSIGHT_WINDOW);
    const topicCounts = countTopics(recent);
    const ranked = rankTopics(topicCounts);

    return {
      suggestedTopics: this.suggestTopics(ranked),
      learningGaps: learningGaps(recent),
      engagementLevel: engagementLevel(recent.length),
      nextSteps: nextSteps(recent.slice(0, RECENT_STEP_WINDOW), ranked[0])
    };
  }

  private suggestTopics(ranked: string[]): string[] {
    if (ranked.length > 0) return ranked.slice(0, INSIGHT_LIMIT);
    return Object.keys(this.topics).slice(0, INSIGHT_LIMIT);
  }

  rank(memories: Memory[], now: Date, messageTopics: string[] = []): ScoredMemory[] {
    return memories
      .map(memory => ({ memory, composite: this.compositeScore(memory, now, messageTopics) }))
      .sort(
        (a, b) =>
          b.composite - a.composite ||
          b.memory.createdAt.getTime() - a.memory.createdAt.getTime() ||
          a.memory.id.localeCompare(b.memory.id)
      );
  }

  private async loadForWrite(characterId: string, userId: string): Promise<Memory[]> {
    try {
      return await this.storage.getMemories(characterId, userId);
    } catch (error) {
      log.warn(`Could not read existing memories for ${pairKey(characterId, userId)}; scoring without novelty:`, describeError(error));
      return [];
    }
  }

  private async write(characterId: string, userId: string, memory: Memory): Promise<boolean> {
    try {
      const ok = await this.storage.putMemory(characterId, userId, memory);
      if (!ok) {
        log.warn(`Memory write rejected for ${pairKey(characterId, userId)}; discarding ${memory.id}`);
      }
      return ok;
    } catch (error) {
      log.warn(`Memory write failed for ${pairKey(characterId, userId)}; discarding ${memory.id}:`, describeError(error));
      return false;
    }
  }

  private async evict(
    characterId: string,
    userId: string,
    memories: Memory[],
    protectedIds: ReadonlySet<string>,
    now: Date
  ): Promise<Memory[]> {
    const overflow = memories.length - this.config.capacity;
    if (overflow <= 0) return [];

    // Memories written by the current write job are never eligible
    const victims = memories
      .filter(memory => !protectedIds.has(memory.id))
      .map(memory => ({ memory, composite: this.compositeScore(memory, now) }))
      .sort(
        (a, b) =>
          a.composite - b.composite ||
          a.memory.createdAt.getTime() - b.memory.createdAt.getTime() ||
          a.memory.id.localeCompare(b.memory.id)
      )
      .slice(0, overflow)
      .map(entry => entry.memory);

    const evicted: Memory[] = [];
    for (const victim of victims) {
      try {
        if (await this.storage.deleteMemory(characterId, userId, victim.id)) {
          evicted.push(victim);
        } else {
          log.warn(`Eviction of ${victim.id} was rejected by storage`);
        }
      } catch (error) {
        log.warn(`Eviction of ${victim.id} failed:`, describeError(error));
      }
    }

    if (evicted.length > 0) {
      log.info(`🗑️  Evicted ${evicted.length} memories for ${pairKey(characterId, userId)}`);
    }
    return evicted;
  }
}
