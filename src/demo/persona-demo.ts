import { PersonaEngine } from '../core/persona-engine';
import { PersonalityProfileInput, TelemetryEvent } from '../types';
import { TurnCancelledError, TurnGenerationError, describeError } from '../utils/errors';

export const DEMO_PROFILES: PersonalityProfileInput[] = [
  {
    id: 'maria-teacher',
    name: 'María',
    archetype: 'encouraging language teacher',
    culturalBackground: 'Mexican',
    age: 34,
    occupation: 'Spanish teacher',
    baseline: {
      patience: 'high',
      formality: 0.4,
      enthusiasm: 0.7,
      humor: 0.5,
      expertiseConfidence: 0.8,
      verbosity: 0.5
    },
    knowledgeDomains: ['Spanish grammar', 'Mexican culture', 'conversation practice'],
    teachingSpecialties: ['pronunciation drills', 'everyday vocabulary'],
    conversationStarters: [
      '¡Hola! What would you like to practise today?',
      'Tell me about your week, in Spanish if you can.'
    ],
    adaptationPrompts: {
      frustrated: 'Slow down, acknowledge the difficulty and offer one small, concrete next step.',
      confused: 'Re-explain with a simpler example and check understanding before moving on.',
      bored: 'Switch to a game, a song lyric or a cultural story.',
      overwhelmed: 'Cut the lesson down to a single idea and reassure the learner.',
      excited: 'Match their energy and build on what they are excited about.'
    }
  },
  {
    id: 'ken-mentor',
    name: 'Ken',
    archetype: 'calm engineering mentor',
    culturalBackground: 'Japanese-Canadian',
    age: 46,
    occupation: 'staff software engineer',
    baseline: {
      patience: 'very-high',
      formality: 0.6,
      enthusiasm: 0.4,
      humor: 0.3,
      expertiseConfidence: 0.9,
      verbosity: 0.35
    },
    knowledgeDomains: ['TypeScript', 'distributed systems', 'code review'],
    teachingSpecialties: ['debugging strategy', 'system design'],
    conversationStarters: ['What are you building at the moment?']
  }
];

const DEMO_SCRIPT = [
  "Hi! I want to learn Spanish before my trip to Mexico.",
  "I'm so frustrated with this! The verb conjugations don't work in my head.",
  'Okay, can you show me the present tense of hablar?',
  'I love music, so maybe songs would help.',
  'Tell me more about how the past tense works',
  'Thanks, that makes sense now.'
];

export async function runPersonaDemo(engine: PersonaEngine, characterId: string = 'maria-teacher'): Promise<void> {
  const userId = 'demo-user';
  const profile = await engine.profiles.getProfile(characterId);

  engine.on('telemetry', (event: TelemetryEvent) => {
    if (event.kind === 'turn.completed' && event.overBudget) {
      console.log(`📊 Turn ${event.turn} ran over the context budget (${event.tokenEstimate} tokens)`);
    }
  });

  console.log(`🎭 Talking to ${profile.name} (${profile.archetype})`);
  const starter = await engine.conversationStarter(characterId);
  if (starter) console.log(`${profile.name}: ${starter}`);
  console.log('---');

  for (const message of DEMO_SCRIPT) {
    console.log(`👤 User: ${message}`);

    try {
      const result = await engine.processTurn(characterId, userId, message);
      const { behavior } = result;

      console.log(`🔍 Emotion: ${result.emotion.emotion} (${result.emotion.confidence.toFixed(2)}), mode: ${result.mode}`);
      console.log(
        `🎚️  Patience ${behavior.patience.toFixed(2)}, enthusiasm ${behavior.enthusiasm.toFixed(2)}, verbosity ${behavior.verbosity.toFixed(2)}, humor ${behavior.humor.toFixed(2)}`
      );
      console.log(
        `🧩 Context: ${result.bundle.tokenEstimate}/${result.bundle.tokenBudget} tokens, ${result.bundle.usedMemoryIds.length} memories, ${result.generation.responseStyle} reply`
      );
      console.log(`💬 ${profile.name}: ${result.reply}`);

      const writes = await result.memoryWrites;
      for (const write of writes) {
        if (write.status !== 'discarded') {
          console.log(`🧠 ${write.status}: [${write.memory.category}] ${write.memory.content}`);
        }
      }
    } catch (error) {
      if (error instanceof TurnGenerationError) {
        console.error(`❌ Generation failed (${error.retryable ? 'retryable' : 'permanent'}): ${error.message}`);
      } else if (error instanceof TurnCancelledError) {
        console.error(`🛑 ${error.message}`);
      } else {
        console.error('❌ Turn failed:', describeError(error));
      }
    }
    console.log('---');
  }

  await engine.flush(characterId, userId);
  const summary = await engine.summarizeMemories(characterId, userId);
  const state = await engine.getAdaptationState(characterId, userId);
  const insights = await engine.conversationInsights(characterId, userId);

  console.log('🎯 Session summary:');
  console.log(`Memories: ${summary.totalMemories} (average importance ${summary.averageImportance.toFixed(2)})`);
  console.log(
    `By category: ${Object.entries(summary.byCategory)
      .map(([category, count]) => `${category} ${count}`)
      .join(', ')}`
  );
  console.log(`Topics: ${Object.keys(summary.byTopic).join(', ') || 'None'}`);
  console.log(
    `Learning focus: ${summary.learningFocus.level}${summary.learningFocus.topic ? ` (${summary.learningFocus.topic})` : ''}, understanding ${summary.personalityUnderstanding}/10`
  );
  console.log(`Relationship: rapport ${(state.rapport * 100).toFixed(0)}%, trust ${(state.trust * 100).toFixed(0)}%`);

  console.log(`💡 Engagement: ${insights.engagementLevel}`);
  console.log(`Suggested topics: ${insights.suggestedTopics.join(', ')}`);
  if (insights.learningGaps.length > 0) console.log(`Gaps: ${insights.learningGaps.join('; ')}`);
  console.log(`Next steps: ${insights.nextSteps.join('; ')}`);
}
