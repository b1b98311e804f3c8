import { MemoryEngine } from '../engines/memory';
import { InMemoryPersonaStorage } from '../storage/persona-store';
import { EmotionalState, Memory, MemoryConfig } from '../types';
import { DEFAULT_ENGINE_CONFIG } from '../utils/env';

const NEUTRAL: EmotionalState = { emotion: 'neutral', confidence: 0 };
const START = new Date('2026-03-01T09:00:00Z');
const HOUR = 3_600_000;

// Storage whose memory writes can be switched to reject or throw
class FailingStorage extends InMemoryPersonaStorage {
  writeMode: 'ok' | 'reject' | 'throw' = 'ok';
  readsFail = false;

  async putMemory(characterId: string, userId: string, memory: Memory): Promise<boolean> {
    if (this.writeMode === 'reject') return false;
    if (this.writeMode === 'throw') throw new Error('disk full');
    return super.putMemory(characterId, userId, memory);
  }

  async getMemories(characterId: string, userId: string): Promise<Memory[]> {
    if (this.readsFail) throw new Error('connection refused');
    return super.getMemories(characterId, userId);
  }
}

describe('Memory Engine', () => {
  let storage: FailingStorage;
  let engine: MemoryEngine;
  let now: Date;

  function createEngine(config: Partial<MemoryConfig> = {}): MemoryEngine {
    return new MemoryEngine(storage, { ...DEFAULT_ENGINE_CONFIG.memory, ...config }, { clock: () => now });
  }

  beforeEach(() => {
    now = START;
    storage = new FailingStorage();
    engine = createEngine();
  });

  describe('Importance at write time', () => {
    test('A neutral goal with no prior memories scores its category weight', async () => {
      const result = await engine.recordMemory('tutor', 'user-1', 'I want to learn Spanish', 'goal', NEUTRAL, 1);

      expect(result.status).toBe('stored');
      if (result.status !== 'stored') return;
      expect(result.memory.importance).toBeCloseTo(0.7, 10);
      expect(result.memory.topics).toEqual(['language_learning']);
      expect(result.memory.createdAt).toEqual(START);
      expect(result.memory.accessCount).toBe(0);
      expect(result.evicted).toEqual([]);
    });

    test('Emotion and salient keywords raise importance, hedges lower it', () => {
      const excited: EmotionalState = { emotion: 'excited', confidence: 0.5 };

      expect(engine.assessImportance('I love Spanish music', 'preference', excited, []).importance).toBeCloseTo(0.75, 10);
      expect(engine.assessImportance('I think maybe I like jazz', 'preference', NEUTRAL, []).importance).toBeCloseTo(0.5, 10);
    });

    test('Keyword bonus is capped', () => {
      const assessment = engine.assessImportance('always love goal must hate never', 'fact', NEUTRAL, []);
      expect(assessment.importance).toBeCloseTo(0.55, 10);
    });

    test('Similar existing memories reduce novelty', async () => {
      await engine.recordMemory('tutor', 'user-1', 'I love Spanish music', 'preference', NEUTRAL);
      const existing = await storage.getMemories('tutor', 'user-1');

      const assessment = engine.assessImportance('I love French music', 'preference', NEUTRAL, existing);
      expect(assessment.similarity).toBeCloseTo(0.5, 10);
      expect(assessment.importance).toBeCloseTo(0.65 * 0.75, 10);
      expect(assessment.duplicate).toBeUndefined();
    });

    test('Near-duplicates merge into the existing memory and promote it', async () => {
      const first = await engine.recordMemory('tutor', 'user-1', 'I love learning Spanish grammar', 'preference', NEUTRAL);
      const second = await engine.recordMemory('tutor', 'user-1', 'I love learning Spanish grammar!', 'preference', NEUTRAL);

      expect(first.status).toBe('stored');
      expect(second.status).toBe('merged');
      if (first.status !== 'stored' || second.status !== 'merged') return;
      expect(second.memory.id).toBe(first.memory.id);
      expect(second.memory.importance).toBeCloseTo(0.7, 10);
      expect(await storage.getMemories('tutor', 'user-1')).toHaveLength(1);
    });

    test('Content is truncated to the configured length', async () => {
      engine = createEngine({ maxContentLength: 10 });
      const result = await engine.recordMemory('tutor', 'user-1', 'I have   a very long story', 'fact', NEUTRAL);

      expect(result.status).toBe('stored');
      if (result.status !== 'stored') return;
      expect(result.memory.content).toBe('I have a v...');
    });

    test('Empty content is discarded', async () => {
      expect(await engine.recordMemory('tutor', 'user-1', '   ', 'fact', NEUTRAL)).toEqual({
        status: 'discarded',
        reason: 'empty content'
      });
    });
  });

  describe('Retrieval', () => {
    test('Composite score blends importance, recency and topic overlap', async () => {
      const result = await engine.recordMemory('tutor', 'user-1', 'I want to learn Spanish', 'goal', NEUTRAL);
      if (result.status !== 'stored') throw new Error('expected a stored memory');

      const later = new Date(START.getTime() + 72 * HOUR);
      expect(engine.compositeScore(result.memory, later)).toBeCloseTo(0.7 * 0.7 + 0.3 * 0.5, 10);
      expect(engine.compositeScore(result.memory, later, ['language_learning'])).toBeCloseTo(0.74, 10);
    });

    test('Stored memories are recalled for a related message', async () => {
      await engine.recordMemory('tutor', 'user-1', 'I want to learn Spanish', 'goal', NEUTRAL);
      await engine.recordMemory('tutor', 'user-1', 'I live in Helsinki', 'fact', NEUTRAL);

      now = new Date(START.getTime() + HOUR);
      const recalled = await engine.retrieve('tutor', 'user-1', 'Any tips for Spanish pronunciation?');

      expect(recalled.map(entry => entry.memory.content)).toEqual(['I want to learn Spanish', 'I live in Helsinki']);
    });

    test('Ranking is stable for equal scores and respects the limit', async () => {
      await engine.recordMemory('tutor', 'user-1', 'I live in Helsinki', 'fact', NEUTRAL);
      now = new Date(START.getTime() + 1000);
      await engine.recordMemory('tutor', 'user-1', 'I have two cats', 'fact', NEUTRAL);

      const first = await engine.retrieve('tutor', 'user-1', 'hello', 5, { touch: false });
      const second = await engine.retrieve('tutor', 'user-1', 'hello', 5, { touch: false });
      expect(second).toEqual(first);
      expect(first[0].memory.content).toBe('I have two cats');

      expect(await engine.retrieve('tutor', 'user-1', 'hello', 1, { touch: false })).toHaveLength(1);
    });

    test('Retrieval refreshes access time unless asked not to', async () => {
      await engine.recordMemory('tutor', 'user-1', 'I want to learn Spanish', 'goal', NEUTRAL);
      now = new Date(START.getTime() + 5 * HOUR);

      await engine.retrieve('tutor', 'user-1', 'Spanish', 5, { touch: false });
      expect((await storage.getMemories('tutor', 'user-1'))[0].accessCount).toBe(0);

      await engine.retrieve('tutor', 'user-1', 'Spanish');
      const [touched] = await storage.getMemories('tutor', 'user-1');
      expect(touched.accessCount).toBe(1);
      expect(touched.lastAccessedAt).toEqual(now);
      expect(touched.importance).toBeCloseTo(0.7, 10);
    });

    test('Touching refreshes the current record and skips memories that are gone', async () => {
      const first = await engine.recordMemory('tutor', 'user-1', 'I want to learn Spanish', 'goal', NEUTRAL);
      const cats = await engine.recordMemory('tutor', 'user-1', 'I have two cats', 'fact', NEUTRAL);
      if (first.status !== 'stored' || cats.status !== 'stored') throw new Error('expected stored memories');

      // Promoted and evicted after the ids were recalled
      await engine.recordMemory('tutor', 'user-1', 'I want to learn Spanish!', 'goal', NEUTRAL);
      await storage.deleteMemory('tutor', 'user-1', cats.memory.id);

      now = new Date(START.getTime() + HOUR);
      await engine.touch('tutor', 'user-1', [first.memory.id, cats.memory.id]);

      const remaining = await storage.getMemories('tutor', 'user-1');
      expect(remaining).toHaveLength(1);
      expect(remaining[0].importance).toBeCloseTo(0.75, 10);
      expect(remaining[0].accessCount).toBe(1);
      expect(remaining[0].lastAccessedAt).toEqual(now);
    });

    test('An unavailable store degrades to no memories', async () => {
      await engine.recordMemory('tutor', 'user-1', 'I want to learn Spanish', 'goal', NEUTRAL);
      storage.readsFail = true;

      expect(await engine.retrieve('tutor', 'user-1', 'Spanish')).toEqual([]);
    });
  });

  describe('Eviction', () => {
    test('The lowest composite memory is evicted when over capacity', async () => {
      engine = createEngine({ capacity: 3 });

      const helsinki = await engine.recordMemory('tutor', 'user-1', 'I live in Helsinki', 'fact', NEUTRAL, 1);
      await engine.recordMemory('tutor', 'user-1', 'I want to run a marathon', 'goal', NEUTRAL, 2);
      await engine.recordMemory('tutor', 'user-1', 'I enjoy cooking pasta', 'preference', NEUTRAL, 3);
      const cats = await engine.recordMemory('tutor', 'user-1', 'I have two cats', 'fact', NEUTRAL, 4);

      if (helsinki.status !== 'stored' || cats.status !== 'stored') throw new Error('expected stored memories');
      expect(cats.evicted.map(memory => memory.id)).toEqual([helsinki.memory.id]);
      expect((await storage.getMemories('tutor', 'user-1')).map(memory => memory.content)).toEqual([
        'I want to run a marathon',
        'I enjoy cooking pasta',
        'I have two cats'
      ]);
    });

    test('The newest memory survives even when it scores lowest', async () => {
      engine = createEngine({ capacity: 1 });

      await engine.recordMemory('tutor', 'user-1', 'I want to run a marathon', 'goal', NEUTRAL, 1);
      const weak = await engine.recordMemory('tutor', 'user-1', 'I have two cats', 'fact', NEUTRAL, 2);

      expect(weak.status).toBe('stored');
      const remaining = await storage.getMemories('tutor', 'user-1');
      expect(remaining.map(memory => memory.content)).toEqual(['I have two cats']);
    });

    test('Memories from the same write job are protected, later writes are not', async () => {
      engine = createEngine({ capacity: 1 });

      const marathon = await engine.recordMemory('tutor', 'user-1', 'I want to run a marathon', 'goal', NEUTRAL, 1);
      if (marathon.status !== 'stored') throw new Error('expected a stored memory');
      const cats = await engine.recordMemory('tutor', 'user-1', 'I have two cats', 'fact', NEUTRAL, 1, new Set([marathon.memory.id]));
      if (cats.status !== 'stored') throw new Error('expected a stored memory');

      expect(cats.evicted).toEqual([]);
      expect(await storage.getMemories('tutor', 'user-1')).toHaveLength(2);

      const helsinki = await engine.recordMemory('tutor', 'user-1', 'I live in Helsinki', 'fact', NEUTRAL, 1);
      if (helsinki.status !== 'stored') throw new Error('expected a stored memory');
      expect(helsinki.evicted.map(memory => memory.id).sort()).toEqual([marathon.memory.id, cats.memory.id].sort());
      expect((await storage.getMemories('tutor', 'user-1')).map(memory => memory.content)).toEqual(['I live in Helsinki']);
    });

    test('Sharing a turn number does not exempt memories from eviction', async () => {
      engine = createEngine({ capacity: 2 });

      for (const content of ['I live in Helsinki', 'I have two cats', 'I study chemistry']) {
        await engine.recordMemory('tutor', 'user-1', content, 'fact', NEUTRAL, 1);
      }

      const remaining = await storage.getMemories('tutor', 'user-1');
      expect(remaining).toHaveLength(2);
      expect(remaining.map(memory => memory.content)).toContain('I study chemistry');
    });
  });

  describe('Write failures', () => {
    test('A rejected write discards the candidate', async () => {
      storage.writeMode = 'reject';
      expect(await engine.recordMemory('tutor', 'user-1', 'I want to learn Spanish', 'goal', NEUTRAL)).toEqual({
        status: 'discarded',
        reason: 'durable write failed'
      });
    });

    test('A throwing write is recovered locally', async () => {
      storage.writeMode = 'throw';
      const result = await engine.recordMemory('tutor', 'user-1', 'I want to learn Spanish', 'goal', NEUTRAL);

      expect(result.status).toBe('discarded');
      storage.writeMode = 'ok';
      expect(await storage.getMemories('tutor', 'user-1')).toEqual([]);
    });
  });

  describe('Extraction and summary', () => {
    test('Extracts goals, preferences and facts from a message', () => {
      expect(engine.extractCandidates('I want to learn Spanish. My favorite food is tacos.', NEUTRAL)).toEqual([
        { content: 'My favorite food is tacos', category: 'preference' },
        { content: 'I want to learn Spanish', category: 'goal' }
      ]);
    });

    test('A confident emotion becomes an emotional event', () => {
      const emotion: EmotionalState = { emotion: 'frustrated', confidence: 0.64 };

      expect(engine.extractCandidates("I'm so frustrated with this!", emotion)).toEqual([
        { content: "Felt frustrated: I'm so frustrated with this!", category: 'emotional-event' }
      ]);
      expect(engine.extractCandidates("I'm so frustrated with this!", { emotion: 'frustrated', confidence: 0.4 })).toEqual([]);
    });

    test('Topics come from the keyword table', () => {
      expect(engine.extractTopics('My boss wants the Python code by Friday')).toEqual(['school_work', 'technology']);
      expect(engine.extractTopics('Nice weather today')).toEqual([]);
    });

    test('Summarises memories by category, topic and emotion', async () => {
      const proud: EmotionalState = { emotion: 'excited', confidence: 0.6 };
      await engine.recordMemory('tutor', 'user-1', 'I want to learn Spanish', 'goal', NEUTRAL);
      await engine.recordMemory('tutor', 'user-1', 'I enjoy cooking pasta', 'preference', proud);

      const summary = await engine.summarize('tutor', 'user-1');
      expect(summary.totalMemories).toBe(2);
      expect(summary.byCategory).toEqual({ preference: 1, fact: 0, goal: 1, 'emotional-event': 0 });
      expect(summary.byTopic).toEqual({ language_learning: 1 });
      expect(summary.byEmotion).toEqual({ neutral: 1, excited: 1 });
      expect(summary.relationshipStrength).toBe(0);
      expect(summary.personalityUnderstanding).toBe(4);
      expect(summary.learningFocus).toEqual({ level: 'focused', topic: 'language_learning' });
      expect(summary.averageImportance).toBeCloseTo((0.7 + 0.72) / 2, 10);
    });

    test('An empty store has a general focus', async () => {
      const summary = await engine.summarize('tutor', 'user-1');

      expect(summary.personalityUnderstanding).toBe(0);
      expect(summary.learningFocus).toEqual({ level: 'general' });
    });
  });

  describe('Conversation insights', () => {
    test('A new user gets starter suggestions', async () => {
      expect(await engine.insights('tutor', 'user-1')).toEqual({
        suggestedTopics: ['language_learning', 'learning_methods', 'technology'],
        learningGaps: [],
        engagementLevel: 'getting-started',
        nextSteps: ['Set a specific learning goal', 'Practise with real-world examples', 'Build on your interests']
      });
    });

    test('Topics, gaps and next steps follow what the user has shared', async () => {
      await engine.recordMemory('tutor', 'user-1', 'I want to learn Spanish', 'goal', NEUTRAL);
      await engine.recordMemory('tutor', 'user-1', 'I enjoy Spanish songs', 'preference', NEUTRAL);
      await engine.recordMemory('tutor', 'user-1', 'I work at a software company', 'fact', NEUTRAL);
      await engine.recordMemory('tutor', 'user-1', 'I want to save money', 'goal', NEUTRAL);

      expect(await engine.insights('tutor', 'user-1')).toEqual({
        suggestedTopics: ['language_learning', 'finance', 'school_work'],
        learningGaps: ['More finance practice'],
        engagementLevel: 'building',
        nextSteps: ['Continue working toward your stated goals', 'Practise language learning with everyday scenarios']
      });
    });

    test('Repeated struggles call for a review', async () => {
      const frustrated: EmotionalState = { emotion: 'frustrated', confidence: 0.7 };
      for (const content of ['Felt frustrated: verbs', 'Felt frustrated: the subjunctive mood', 'Felt frustrated: listening drills']) {
        await engine.recordMemory('tutor', 'user-1', content, 'emotional-event', frustrated);
      }

      const insights = await engine.insights('tutor', 'user-1');
      expect(insights.learningGaps).toEqual(['Review fundamental concepts']);
      expect(insights.engagementLevel).toBe('building');
    });
  });
});
