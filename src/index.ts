import { PersonaEngine } from './core/persona-engine';
import { DEMO_PROFILES, runPersonaDemo } from './demo/persona-demo';
import { deriveGenerationConfig } from './engines/context';
import { LexicalEmotionDetector } from './engines/emotion';
import { OpenAIService } from './integrations/openai';
import { WeaviatePersonaStorage } from './integrations/weaviate';
import { InMemoryPersonaStorage } from './storage/persona-store';
import { normalizeProfile } from './storage/profile-store';
import { PersonaStorage } from './types';
import { EnvConfig, loadEngineConfig, loadEnv } from './utils/env';
import { describeError } from './utils/errors';

export { PersonaEngine } from './core/persona-engine';
export type { PersonaEngineOptions, TurnOptions, TurnResult } from './core/persona-engine';
export { KeyedTurnQueue } from './core/turn-queue';
export { SessionHistory } from './core/session-history';
export { BehaviorAdapter } from './engines/behavior';
export { ContextAssembler, deriveGenerationConfig, responseStyleFor, serializeBundle } from './engines/context';
export { LexicalEmotionDetector } from './engines/emotion';
export type { EmotionDetector, EmotionLexicon } from './engines/emotion';
export { MemoryEngine } from './engines/memory';
export { OpenAIService, classifyOpenAIError } from './integrations/openai';
export { WeaviatePersonaStorage } from './integrations/weaviate';
export { InMemoryPersonaStorage } from './storage/persona-store';
export { PersonalityProfileStore, normalizeProfile } from './storage/profile-store';
export type { ProfilePatch } from './storage/profile-store';
export * from './types';
export * from './utils/errors';
export { DEFAULT_ENGINE_CONFIG, loadEngineConfig, loadEnv } from './utils/env';
export { InputGuard } from './utils/safety';

async function createStorage(env: EnvConfig): Promise<PersonaStorage> {
  if (env.STORAGE_BACKEND === 'weaviate' && env.WEAVIATE_URL) {
    const weaviate = new WeaviatePersonaStorage(env.WEAVIATE_URL, env.WEAVIATE_API_KEY);
    console.log('Initializing Weaviate schema...');
    await weaviate.initializeSchema();
    return weaviate;
  }
  return new InMemoryPersonaStorage();
}

async function runDemo(): Promise<void> {
  const env = loadEnv();
  if (!env.OPENAI_API_KEY) {
    throw new Error('OPENAI_API_KEY is required for the conversation demo (try `profiles` mode instead)');
  }

  const config = loadEngineConfig();
  const storage = await createStorage(env);
  const engine = new PersonaEngine({ storage, generator: new OpenAIService(env.OPENAI_API_KEY), config });

  for (const input of DEMO_PROFILES) {
    if (!(await engine.profiles.hasProfile(input.id))) {
      await engine.profiles.createProfile(input);
    }
  }

  console.log(`🌱 Persona demo (${env.STORAGE_BACKEND} storage, model ${config.model})`);
  await runPersonaDemo(engine);
}

// Offline look at the demo profiles and the detector; needs no API key
function runProfiles(): void {
  const config = loadEngineConfig();
  const detector = new LexicalEmotionDetector(config.emotion);

  console.log('📚 Demo profiles:');
  for (const input of DEMO_PROFILES) {
    const profile = normalizeProfile(input);
    const generation = deriveGenerationConfig(profile.baseline, config.model);
    console.log(
      `- ${profile.name} (${profile.archetype}): ${generation.responseStyle} replies, ${generation.maxTokens} tokens, temperature ${generation.temperature}`
    );
  }

  console.log('\n🔍 Emotion detection:');
  for (const sample of ["I'm so frustrated with this!", 'This is boring', "I don't understand???", 'Wow, I love it!']) {
    const state = detector.detect(sample);
    console.log(`- "${sample}" → ${state.emotion} (${state.confidence.toFixed(2)})`);
  }
}

if (require.main === module) {
  const mode = process.argv[2] || 'demo';

  if (mode === 'profiles') {
    runProfiles();
  } else {
    runDemo().catch(error => {
      console.error('❌ Demo failed:', describeError(error));
      process.exitCode = 1;
    });
  }
}
