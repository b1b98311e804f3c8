import { PATIENCE_SCALE, vectorIssues } from '../engines/dimensions';
import {
  ActiveEmotion,
  BehaviorVector,
  PatienceLevel,
  PersonaStorage,
  PersonalityProfile,
  PersonalityProfileInput
} from '../types';
import { PersonaEngineError, ProfileNotFoundError, ProfileValidationError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('profiles');

const ACTIVE_EMOTIONS: readonly ActiveEmotion[] = [
  'frustrated',
  'overwhelmed',
  'confused',
  'bored',
  'excited',
  'engaged'
];

function isPatienceLevel(value: unknown): value is PatienceLevel {
  return typeof value === 'string' && Object.hasOwn(PATIENCE_SCALE, value);
}

function freezeProfile(profile: PersonalityProfile): PersonalityProfile {
  Object.freeze(profile.baseline);
  Object.freeze(profile.knowledgeDomains);
  Object.freeze(profile.teachingSpecialties);
  Object.freeze(profile.conversationStarters);
  Object.freeze(profile.adaptationPrompts);
  return Object.freeze(profile);
}

export function normalizeProfile(input: PersonalityProfileInput): PersonalityProfile {
  const issues: string[] = [];

  if (!input.id.trim()) issues.push('id must not be empty');
  if (!input.name.trim()) issues.push('name must not be empty');
  if (!Number.isInteger(input.age) || input.age < 18) issues.push(`age=${input.age} must be an integer of at least 18`);

  const rawPatience = input.baseline.patience;
  const patience = isPatienceLevel(rawPatience) ? PATIENCE_SCALE[rawPatience] : rawPatience;
  if (typeof patience !== 'number') {
    issues.push(`baseline.patience="${rawPatience}" is not a known patience level`);
  }

  const baseline: BehaviorVector = {
    patience: typeof patience === 'number' ? patience : Number.NaN,
    formality: input.baseline.formality,
    enthusiasm: input.baseline.enthusiasm,
    humor: input.baseline.humor,
    expertiseConfidence: input.baseline.expertiseConfidence,
    verbosity: input.baseline.verbosity
  };
  if (typeof patience === 'number') {
    issues.push(...vectorIssues(baseline, 'baseline'));
  } else {
    issues.push(...vectorIssues(baseline, 'baseline').filter(issue => !issue.startsWith('baseline.patience')));
  }

  for (const key of Object.keys(input.adaptationPrompts ?? {})) {
    if (!ACTIVE_EMOTIONS.some(emotion => emotion === key)) {
      issues.push(`adaptationPrompts.${key} is not an adaptable emotion`);
    }
  }

  if (issues.length > 0) {
    throw new ProfileValidationError(input.id || '(unnamed)', issues);
  }

  return {
    id: input.id.trim(),
    name: input.name.trim(),
    archetype: input.archetype,
    culturalBackground: input.culturalBackground,
    age: input.age,
    occupation: input.occupation,
    baseline,
    knowledgeDomains: [...(input.knowledgeDomains ?? [])],
    teachingSpecialties: [...(input.teachingSpecialties ?? [])],
    conversationStarters: [...(input.conversationStarters ?? [])],
    adaptationPrompts: { ...(input.adaptationPrompts ?? {}) }
  };
}

// Any subset of fields; baseline dimensions can be edited one at a time
export type ProfilePatch = Partial<Omit<PersonalityProfileInput, 'id' | 'baseline'>> & {
  baseline?: Partial<PersonalityProfileInput['baseline']>;
};

// Explicit profile collaborator; the hosting service owns its lifecycle
export class PersonalityProfileStore {
  private storage: PersonaStorage;
  private cache: Map<string, PersonalityProfile> = new Map();

  constructor(storage: PersonaStorage) {
    this.storage = storage;
  }

  async createProfile(input: PersonalityProfileInput): Promise<PersonalityProfile> {
    const profile = normalizeProfile(input);

    if (this.cache.has(profile.id) || (await this.storage.getProfile(profile.id))) {
      throw new PersonaEngineError(`Personality profile ${profile.id} already exists; use updateProfile to edit it`);
    }

    await this.persist(profile);
    log.info(`🎭 Created profile ${profile.id} (${profile.name}, ${profile.archetype})`);
    return this.remember(profile);
  }

  // Administrative edit: the only way a profile changes after creation
  async updateProfile(
    characterId: string,
    patch: ProfilePatch
  ): Promise<PersonalityProfile> {
    const current = await this.getProfile(characterId);
    const profile = normalizeProfile({
      ...current,
      ...patch,
      id: characterId,
      baseline: { ...current.baseline, ...patch.baseline }
    });

    await this.persist(profile);
    log.info(`✏️  Updated profile ${profile.id}`);
    return this.remember(profile);
  }

  async getProfile(characterId: string): Promise<PersonalityProfile> {
    const cached = this.cache.get(characterId);
    if (cached) return cached;

    const stored = await this.storage.getProfile(characterId);
    if (!stored) throw new ProfileNotFoundError(characterId);

    // Re-validate whatever the backend hands back before it reaches the adapter
    return this.remember(normalizeProfile(stored));
  }

  async hasProfile(characterId: string): Promise<boolean> {
    return this.cache.has(characterId) || (await this.storage.getProfile(characterId)) !== null;
  }

  private async persist(profile: PersonalityProfile): Promise<void> {
    if (!(await this.storage.putProfile(profile))) {
      throw new PersonaEngineError(`Storage rejected profile ${profile.id}`);
    }
  }

  private remember(profile: PersonalityProfile): PersonalityProfile {
    const frozen = freezeProfile(profile);
    this.cache.set(profile.id, frozen);
    return frozen;
  }
}
