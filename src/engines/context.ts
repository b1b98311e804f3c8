import {
  AdaptedBehaviorState,
  BehaviorVector,
  ChatMessage,
  ContextBundle,
  ContextConfig,
  GenerationConfig,
  KnowledgeLayer,
  PersonalityProfile,
  ResponseStyle,
  ScoredMemory,
  SessionLayer,
  SessionTurn,
  SystemLayer,
  UserLayer
} from '../types';
import { estimateTokens, truncate } from '../utils/text';
import { patienceLabel } from './dimensions';

export interface ContextInputs {
  profile: PersonalityProfile;
  behavior: BehaviorVector;
  state: AdaptedBehaviorState;
  session: SessionTurn[];
  memories: ScoredMemory[];
  message: string;
}

const TURN_PREVIEW_LENGTH = 200;

const STYLE_TOKENS: Record<ResponseStyle, number> = {
  brief: 100,
  moderate: 200,
  detailed: 300,
  comprehensive: 400
};

export function responseStyleFor(verbosity: number): ResponseStyle {
  if (verbosity < 0.3) return 'brief';
  if (verbosity < 0.55) return 'moderate';
  if (verbosity < 0.8) return 'detailed';
  return 'comprehensive';
}

export function deriveGenerationConfig(behavior: BehaviorVector, model: string): GenerationConfig {
  const responseStyle = responseStyleFor(behavior.verbosity);
  const temperature = Math.min(1, 0.7 + behavior.humor * 0.2 + (1 - behavior.formality) * 0.1);

  return {
    model,
    responseStyle,
    maxTokens: STYLE_TOKENS[responseStyle],
    temperature: Math.round(temperature * 100) / 100
  };
}

function describeLevel(value: number): string {
  return value.toFixed(2);
}

export class ContextAssembler {
  private config: ContextConfig;

  constructor(config: ContextConfig) {
    this.config = config;
  }

  assemble(characterId: string, userId: string, inputs: ContextInputs): ContextBundle {
    const system = this.buildSystemLayer(inputs);
    const user = this.buildUserLayer(inputs.message);

    let turns = inputs.session.slice(-this.config.sessionTurnLimit);
    let memories = [...inputs.memories].sort((a, b) => b.composite - a.composite);
    let session = this.buildSessionLayer(inputs.profile, turns);
    let knowledge = this.buildKnowledgeLayer(memories);

    const total = () => system.tokens + session.tokens + knowledge.tokens + user.tokens;
    let droppedTurns = 0;
    let droppedMemories = 0;

    // Historical context yields first: oldest turns, then the weakest memories
    while (total() > this.config.tokenBudget && turns.length > 0) {
      turns = turns.slice(1);
      droppedTurns++;
      session = this.buildSessionLayer(inputs.profile, turns);
    }

    while (total() > this.config.tokenBudget && memories.length > 0) {
      memories = memories.slice(0, -1);
      droppedMemories++;
      knowledge = this.buildKnowledgeLayer(memories);
    }

    return {
      characterId,
      userId,
      layers: [system, session, knowledge, user],
      tokenEstimate: total(),
      tokenBudget: this.config.tokenBudget,
      overBudget: total() > this.config.tokenBudget,
      droppedTurns,
      droppedMemories,
      usedMemoryIds: memories.map(entry => entry.memory.id)
    };
  }

  buildSystemLayer(inputs: ContextInputs): SystemLayer {
    const { profile, behavior, state } = inputs;
    const emotion = state.lastEmotion;
    const adaptationPrompt = emotion.emotion === 'neutral' ? undefined : profile.adaptationPrompts[emotion.emotion];

    const lines = [
      `You are ${profile.name}, a ${profile.archetype} (${profile.occupation}, age ${profile.age}, ${profile.culturalBackground} background).`,
      '',
      'PERSONALITY (0 = low, 1 = high):',
      `- Patience: ${patienceLabel(behavior.patience)} (${describeLevel(behavior.patience)})`,
      `- Formality: ${describeLevel(behavior.formality)}`,
      `- Enthusiasm: ${describeLevel(behavior.enthusiasm)}`,
      `- Humor: ${describeLevel(behavior.humor)}`,
      `- Expertise confidence: ${describeLevel(behavior.expertiseConfidence)}`,
      `- Verbosity: ${describeLevel(behavior.verbosity)} (${responseStyleFor(behavior.verbosity)} replies)`,
      '',
      `RELATIONSHIP: rapport ${describeLevel(state.rapport)}, trust ${describeLevel(state.trust)}`
    ];

    if (profile.knowledgeDomains.length > 0) {
      lines.push(`KNOWLEDGE DOMAINS: ${profile.knowledgeDomains.join(', ')}`);
    }
    if (profile.teachingSpecialties.length > 0) {
      lines.push(`TEACHING SPECIALTIES: ${profile.teachingSpecialties.join(', ')}`);
    }

    lines.push(`USER EMOTION: ${emotion.emotion} (confidence ${describeLevel(emotion.confidence)})`);
    if (adaptationPrompt) {
      lines.push(`ADAPTATION: ${adaptationPrompt}`);
    }
    if (state.topicNovelty) {
      lines.push('TOPIC: The user is losing interest. Bring in a fresh angle, example or topic.');
    }
    lines.push('', `Stay in character as ${profile.name} and keep your personality consistent across the conversation.`);

    const text = lines.join('\n');
    return {
      kind: 'system',
      profile,
      behavior: { ...behavior },
      emotion: { ...emotion },
      rapport: state.rapport,
      trust: state.trust,
      adaptationPrompt,
      topicNovelty: state.topicNovelty,
      text,
      tokens: estimateTokens(text)
    };
  }

  buildSessionLayer(profile: PersonalityProfile, turns: SessionTurn[]): SessionLayer {
    if (turns.length === 0) {
      return { kind: 'session', turns: [], text: '', tokens: 0 };
    }

    // The previews are what gets costed and what gets sent
    const previews = turns.map(turn => ({ ...turn, text: truncate(turn.text, TURN_PREVIEW_LENGTH) }));
    const text = [
      'RECENT CONVERSATION:',
      ...previews.map(turn => `${turn.speaker === 'user' ? 'User' : profile.name}: ${turn.text}`)
    ].join('\n');

    return { kind: 'session', turns: previews, text, tokens: estimateTokens(text) };
  }

  buildKnowledgeLayer(memories: ScoredMemory[]): KnowledgeLayer {
    if (memories.length === 0) {
      return { kind: 'knowledge', memories: [], text: '', tokens: 0 };
    }

    const text = [
      'WHAT YOU REMEMBER ABOUT THE USER:',
      ...memories.map(
        ({ memory }) => `- [${memory.category}] ${memory.content} (importance ${describeLevel(memory.importance)})`
      )
    ].join('\n');

    return { kind: 'knowledge', memories: [...memories], text, tokens: estimateTokens(text) };
  }

  buildUserLayer(message: string): UserLayer {
    return { kind: 'user', message, text: message, tokens: estimateTokens(message) };
  }
}

/**
 * Role-tagged messages for the generation collaborator; same bundle, same messages.
 *
 * Each message carries exactly the text of its layer, so the estimated size of
 * what is sent never exceeds `bundle.tokenEstimate`.
 */
export function serializeBundle(bundle: ContextBundle): ChatMessage[] {
  const [system, session, knowledge, user] = bundle.layers;
  const knowledgeMessages: ChatMessage[] = knowledge.text ? [{ role: 'system', content: knowledge.text }] : [];

  return [
    { role: 'system', content: system.text },
    ...knowledgeMessages,
    ...session.turns.map(
      (turn): ChatMessage => ({ role: turn.speaker === 'user' ? 'user' : 'assistant', content: turn.text })
    ),
    { role: 'user', content: user.text }
  ];
}
