// In-process storage collaborator: used by tests, the demo and single-node deployments.
// Durable backends implement the same PersonaStorage contract (see integrations/weaviate).

import { AdaptedBehaviorState, Memory, PersonaStorage, PersonalityProfile } from '../types';

function pairKey(characterId: string, userId: string): string {
  return `${characterId}::${userId}`;
}

export class InMemoryPersonaStorage implements PersonaStorage {
  private memories: Map<string, Map<string, Memory>> = new Map();
  private profiles: Map<string, PersonalityProfile> = new Map();
  private adaptations: Map<string, AdaptedBehaviorState> = new Map();

  async putMemory(characterId: string, userId: string, memory: Memory): Promise<boolean> {
    const key = pairKey(characterId, userId);
    const bucket = this.memories.get(key) ?? new Map<string, Memory>();
    bucket.set(memory.id, structuredClone(memory));
    this.memories.set(key, bucket);
    return true;
  }

  // Insertion order, oldest first
  async getMemories(characterId: string, userId: string): Promise<Memory[]> {
    const bucket = this.memories.get(pairKey(characterId, userId));
    return bucket ? Array.from(bucket.values(), memory => structuredClone(memory)) : [];
  }

  async deleteMemory(characterId: string, userId: string, memoryId: string): Promise<boolean> {
    return this.memories.get(pairKey(characterId, userId))?.delete(memoryId) ?? false;
  }

  async putProfile(profile: PersonalityProfile): Promise<boolean> {
    this.profiles.set(profile.id, structuredClone(profile));
    return true;
  }

  async getProfile(characterId: string): Promise<PersonalityProfile | null> {
    const profile = this.profiles.get(characterId);
    return profile ? structuredClone(profile) : null;
  }

  async putAdaptation(state: AdaptedBehaviorState): Promise<boolean> {
    this.adaptations.set(pairKey(state.characterId, state.userId), structuredClone(state));
    return true;
  }

  async getAdaptation(characterId: string, userId: string): Promise<AdaptedBehaviorState | null> {
    const state = this.adaptations.get(pairKey(characterId, userId));
    return state ? structuredClone(state) : null;
  }

  async clearUser(userId: string): Promise<void> {
    for (const key of Array.from(this.memories.keys())) {
      if (key.endsWith(`::${userId}`)) this.memories.delete(key);
    }
    for (const key of Array.from(this.adaptations.keys())) {
      if (key.endsWith(`::${userId}`)) this.adaptations.delete(key);
    }
  }

  getStats(): { profileCount: number; pairCount: number; memoryCount: number; adaptationCount: number } {
    let memoryCount = 0;
    for (const bucket of this.memories.values()) memoryCount += bucket.size;

    return {
      profileCount: this.profiles.size,
      pairCount: this.memories.size,
      memoryCount,
      adaptationCount: this.adaptations.size
    };
  }
}
