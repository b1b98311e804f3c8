import { BehaviorAdapter } from '../engines/behavior';
import { findBatchErrors, parseAdaptationJson, parseProfileJson } from '../integrations/weaviate';
import { InMemoryPersonaStorage } from '../storage/persona-store';
import { normalizeProfile } from '../storage/profile-store';
import { Memory } from '../types';
import { DEFAULT_ENGINE_CONFIG } from '../utils/env';

const AT = new Date('2026-03-01T09:00:00Z');

function memory(id: string, userId: string): Memory {
  return {
    id,
    characterId: 'tutor',
    userId,
    content: `memory ${id}`,
    category: 'fact',
    importance: 0.4,
    emotion: { emotion: 'neutral', confidence: 0 },
    topics: [],
    createdAt: AT,
    lastAccessedAt: AT,
    accessCount: 0,
    turn: 1
  };
}

const profile = normalizeProfile({
  id: 'tutor',
  name: 'Ada',
  archetype: 'patient tutor',
  culturalBackground: 'British',
  age: 40,
  occupation: 'language teacher',
  baseline: { patience: 'high', formality: 0.5, enthusiasm: 0.5, humor: 0.5, expertiseConfidence: 0.5, verbosity: 0.5 },
  adaptationPrompts: { bored: 'Try a game.' }
});

describe('In-memory storage', () => {
  let storage: InMemoryPersonaStorage;

  beforeEach(() => {
    storage = new InMemoryPersonaStorage();
  });

  test('Returned memories are copies', async () => {
    await storage.putMemory('tutor', 'user-1', memory('a', 'user-1'));
    const [first] = await storage.getMemories('tutor', 'user-1');
    first.content = 'changed';

    expect((await storage.getMemories('tutor', 'user-1'))[0].content).toBe('memory a');
  });

  test('Deleting reports whether anything was removed', async () => {
    await storage.putMemory('tutor', 'user-1', memory('a', 'user-1'));

    expect(await storage.deleteMemory('tutor', 'user-1', 'a')).toBe(true);
    expect(await storage.deleteMemory('tutor', 'user-1', 'a')).toBe(false);
  });

  test('Clearing a user removes only their memories and adaptation state', async () => {
    const adapter = new BehaviorAdapter(DEFAULT_ENGINE_CONFIG.adaptation);
    await storage.putProfile(profile);
    await storage.putMemory('tutor', 'user-1', memory('a', 'user-1'));
    await storage.putMemory('tutor', 'user-2', memory('b', 'user-2'));
    await storage.putAdaptation(adapter.initialState('tutor', 'user-1', AT));
    await storage.putAdaptation(adapter.initialState('tutor', 'user-2', AT));

    await storage.clearUser('user-1');

    expect(await storage.getMemories('tutor', 'user-1')).toEqual([]);
    expect(await storage.getAdaptation('tutor', 'user-1')).toBeNull();
    expect(storage.getStats()).toEqual({ profileCount: 1, pairCount: 1, memoryCount: 1, adaptationCount: 1 });
  });
});

describe('Weaviate record parsing', () => {
  test('Profiles round-trip through their stored JSON', () => {
    expect(parseProfileJson(JSON.stringify(profile))).toEqual(profile);
  });

  test('Unknown prompt keys and malformed fields are dropped', () => {
    const parsed = parseProfileJson(
      JSON.stringify({ ...profile, adaptationPrompts: { bored: 'Try a game.', sleepy: 'Wake up.' }, knowledgeDomains: [1, 'grammar'] })
    );

    expect(parsed?.adaptationPrompts).toEqual({ bored: 'Try a game.' });
    expect(parsed?.knowledgeDomains).toEqual(['grammar']);
    expect(parseProfileJson('[]')).toBeNull();
  });

  test('Per-object batch errors are reported as failures', () => {
    const rejected = { error: [{ message: 'invalid property' }] };

    expect(findBatchErrors([{ result: {} }, { result: { errors: rejected } }])).toEqual([rejected]);
    expect(findBatchErrors([{ result: {} }])).toEqual([]);
    expect(findBatchErrors(null)).toEqual([]);
  });

  test('Adaptation state round-trips with its dates restored', () => {
    const adapter = new BehaviorAdapter(DEFAULT_ENGINE_CONFIG.adaptation);
    const { state } = adapter.step(profile, adapter.initialState('tutor', 'user-1', AT), { emotion: 'bored', confidence: 0.6 }, AT);

    const parsed = parseAdaptationJson(JSON.stringify(state));
    expect(parsed).toEqual(state);
    expect(parsed?.updatedAt).toBeInstanceOf(Date);
  });
});
