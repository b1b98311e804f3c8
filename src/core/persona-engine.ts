import { EventEmitter } from 'events';
import { BehaviorAdapter } from '../engines/behavior';
import { ContextAssembler, deriveGenerationConfig, serializeBundle } from '../engines/context';
import { effectiveVector } from '../engines/dimensions';
import { EmotionDetector, LexicalEmotionDetector } from '../engines/emotion';
import { MemoryEngine } from '../engines/memory';
import { PersonalityProfileStore } from '../storage/profile-store';
import {
  AdaptationResult,
  AdaptedBehaviorState,
  BehaviorVector,
  ContextBundle,
  ConversationInsights,
  EmotionalState,
  EngineConfig,
  GenerationConfig,
  GenerationService,
  MemoryCategory,
  MemorySummary,
  PendingTurn,
  PersonaStorage,
  PersonalityProfile,
  RecordResult,
  SessionTurn,
  AdaptationMode,
  TelemetryEvent
} from '../types';
import { DEFAULT_ENGINE_CONFIG } from '../utils/env';
import { GenerationError, TurnCancelledError, TurnGenerationError, describeError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { InputGuard } from '../utils/safety';
import { KeyedTurnQueue } from './turn-queue';
import { SessionHistory } from './session-history';

const log = createLogger('persona-engine');

export interface PersonaEngineOptions {
  storage: PersonaStorage;
  generator: GenerationService;
  config?: EngineConfig;
  profiles?: PersonalityProfileStore;
  detector?: EmotionDetector;
  guard?: InputGuard;
  clock?: () => Date;
}

export interface TurnOptions {
  signal?: AbortSignal;
}

export interface TurnResult {
  characterId: string;
  userId: string;
  reply: string;
  emotion: EmotionalState;
  behavior: BehaviorVector;
  mode: AdaptationMode;
  turn: number;
  bundle: ContextBundle;
  generation: GenerationConfig;
  // Settles once this turn's memories are persisted; never rejects
  memoryWrites: Promise<RecordResult[]>;
}

/**
 * Runs conversational turns for (character, user) pairs.
 *
 * A turn is: sanitise, detect, adapt (committed immediately), wait for the
 * pair's earlier memory writes, retrieve, assemble, generate, then record the
 * session turns and hand memory writes to a second queue so the reply is not
 * held up by persistence.
 *
 * Emits `telemetry` with a {@link TelemetryEvent} for every completed,
 * cancelled or failed turn and for every memory write.
 */
export class PersonaEngine extends EventEmitter {
  readonly profiles: PersonalityProfileStore;
  private storage: PersonaStorage;
  private generator: GenerationService;
  private config: EngineConfig;
  private detector: EmotionDetector;
  private adapter: BehaviorAdapter;
  private memory: MemoryEngine;
  private assembler: ContextAssembler;
  private guard: InputGuard;
  private clock: () => Date;
  private session: SessionHistory;
  private turns = new KeyedTurnQueue('turn-queue');
  private writes = new KeyedTurnQueue('memory-writes');
  // Last committed state per pair, used when storage cannot be read
  private adaptationCache: Map<string, AdaptedBehaviorState> = new Map();

  constructor(options: PersonaEngineOptions) {
    super();
    this.storage = options.storage;
    this.generator = options.generator;
    this.config = options.config ?? DEFAULT_ENGINE_CONFIG;
    this.clock = options.clock ?? (() => new Date());
    this.profiles = options.profiles ?? new PersonalityProfileStore(options.storage);
    this.detector = options.detector ?? new LexicalEmotionDetector(this.config.emotion);
    this.guard = options.guard ?? new InputGuard();
    this.adapter = new BehaviorAdapter(this.config.adaptation);
    this.memory = new MemoryEngine(options.storage, this.config.memory, { clock: this.clock });
    this.assembler = new ContextAssembler(this.config.context);
    this.session = new SessionHistory(this.config.context.sessionTurnLimit);
  }

  detectEmotion(text: string, recentHistory: SessionTurn[] = []): EmotionalState {
    return this.detector.detect(text, recentHistory);
  }

  adapt(characterId: string, userId: string, emotion: EmotionalState): Promise<AdaptationResult> {
    return this.turns.enqueue(
      KeyedTurnQueue.key(characterId, userId),
      async () => this.commitAdaptation(await this.profiles.getProfile(characterId), characterId, userId, emotion),
      'adapt'
    );
  }

  recordMemory(
    characterId: string,
    userId: string,
    content: string,
    category: MemoryCategory,
    emotion: EmotionalState
  ): Promise<RecordResult> {
    return this.writes.enqueue(
      KeyedTurnQueue.key(characterId, userId),
      async () => {
        const state = await this.loadState(characterId, userId);
        return this.memory.recordMemory(characterId, userId, content, category, emotion, state.turn);
      },
      'record-memory'
    );
  }

  // Read-only: same stored state and clock, same bundle
  async buildContext(characterId: string, userId: string, message: string): Promise<ContextBundle> {
    const profile = await this.profiles.getProfile(characterId);
    const state = await this.loadState(characterId, userId);
    const text = this.guard.sanitize(message).text;

    return this.assemble(profile, state, effectiveVector(profile.baseline, state.delta), text);
  }

  processTurn(characterId: string, userId: string, message: string, options: TurnOptions = {}): Promise<TurnResult> {
    return this.turns.enqueue(
      KeyedTurnQueue.key(characterId, userId),
      () => this.runTurn(characterId, userId, message, options.signal),
      'turn'
    );
  }

  // Replays a failed generation with the exact request it was built with; adaptation is not applied again
  retryTurn(pending: PendingTurn, options: TurnOptions = {}): Promise<TurnResult> {
    return this.turns.enqueue(
      KeyedTurnQueue.key(pending.characterId, pending.userId),
      () => this.complete(pending, options.signal),
      'retry'
    );
  }

  async getAdaptationState(characterId: string, userId: string): Promise<AdaptedBehaviorState> {
    return this.loadState(characterId, userId);
  }

  async summarizeMemories(characterId: string, userId: string): Promise<MemorySummary> {
    await this.writes.drain(KeyedTurnQueue.key(characterId, userId));
    return this.memory.summarize(characterId, userId);
  }

  async conversationInsights(characterId: string, userId: string): Promise<ConversationInsights> {
    await this.writes.drain(KeyedTurnQueue.key(characterId, userId));
    return this.memory.insights(characterId, userId);
  }

  recentTurns(characterId: string, userId: string): SessionTurn[] {
    return this.session.recent(characterId, userId);
  }

  async conversationStarter(characterId: string): Promise<string | undefined> {
    const profile = await this.profiles.getProfile(characterId);
    const starters = profile.conversationStarters;
    if (starters.length === 0) return undefined;
    return starters[Math.floor(Math.random() * starters.length)];
  }

  endSession(characterId: string, userId: string): void {
    this.session.clear(characterId, userId);
  }

  async flush(characterId: string, userId: string): Promise<void> {
    const key = KeyedTurnQueue.key(characterId, userId);
    await this.turns.drain(key);
    await this.writes.drain(key);
  }

  async flushAll(): Promise<void> {
    await this.turns.drainAll();
    await this.writes.drainAll();
  }

  private async runTurn(
    characterId: string,
    userId: string,
    message: string,
    signal: AbortSignal | undefined
  ): Promise<TurnResult> {
    const key = KeyedTurnQueue.key(characterId, userId);
    const profile = await this.profiles.getProfile(characterId);
    const text = this.guard.sanitize(message).text;

    const history = this.session.recent(characterId, userId);
    const emotion = this.detector.detect(text, history);
    const adaptation = await this.commitAdaptation(profile, characterId, userId, emotion);
    log.info(
      `🎭 ${profile.name} ← ${userId}: ${emotion.emotion} (${emotion.confidence.toFixed(2)}), ${adaptation.mode} behaviour`
    );

    // Earlier turns' memories must be visible to this turn's retrieval
    await this.writes.drain(key);

    const bundle = await this.assemble(profile, adaptation.state, adaptation.effective, text);
    const pending: PendingTurn = {
      characterId,
      userId,
      message: text,
      emotion,
      turn: adaptation.state.turn,
      mode: adaptation.mode,
      bundle,
      request: {
        messages: serializeBundle(bundle),
        config: deriveGenerationConfig(adaptation.effective, this.config.model)
      }
    };

    return this.complete(pending, signal);
  }

  private async complete(pending: PendingTurn, signal: AbortSignal | undefined): Promise<TurnResult> {
    const { characterId, userId } = pending;
    if (signal?.aborted) throw this.cancel(pending);

    let reply: string;
    try {
      reply = await this.generator.generate(pending.request, signal);
    } catch (error) {
      if (signal?.aborted) throw this.cancel(pending);

      const failure =
        error instanceof GenerationError
          ? error
          : new GenerationError(`Generation failed: ${describeError(error)}`, false, { cause: error });
      log.error(`Generation failed for ${characterId}/${userId} (${failure.transient ? 'transient' : 'permanent'}):`, failure.message);
      this.emitTelemetry({
        kind: 'generation.failed',
        ...this.telemetryBase(pending),
        transient: failure.transient,
        message: failure.message
      });
      throw new TurnGenerationError(failure, pending);
    }

    if (signal?.aborted) throw this.cancel(pending);

    const now = this.clock();
    this.session.append(characterId, userId, 'user', pending.message, now);
    this.session.append(characterId, userId, 'character', reply, now);

    const { bundle } = pending;
    this.emitTelemetry({
      kind: 'turn.completed',
      ...this.telemetryBase(pending),
      emotion: pending.emotion,
      mode: pending.mode,
      tokenEstimate: bundle.tokenEstimate,
      overBudget: bundle.overBudget,
      droppedTurns: bundle.droppedTurns,
      droppedMemories: bundle.droppedMemories,
      memoriesUsed: bundle.usedMemoryIds.length
    });

    return {
      characterId,
      userId,
      reply,
      emotion: pending.emotion,
      behavior: pending.bundle.layers[0].behavior,
      mode: pending.mode,
      turn: pending.turn,
      bundle: pending.bundle,
      generation: pending.request.config,
      memoryWrites: this.dispatchWrites(pending)
    };
  }

  private cancel(pending: PendingTurn): TurnCancelledError {
    // The user still said it; only the exchange's memories are dropped
    this.session.append(pending.characterId, pending.userId, 'user', pending.message, this.clock());
    log.info(`🛑 Turn ${pending.turn} for ${pending.characterId}/${pending.userId} cancelled; memory write discarded`);
    this.emitTelemetry({ kind: 'turn.cancelled', ...this.telemetryBase(pending) });
    return new TurnCancelledError(pending.characterId, pending.userId);
  }

  private dispatchWrites(pending: PendingTurn): Promise<RecordResult[]> {
    const { characterId, userId } = pending;
    const candidates = this.memory.extractCandidates(pending.message, pending.emotion);
    const used = pending.bundle.layers[2].memories.map(entry => entry.memory.id);

    return this.writes
      .enqueue(
        KeyedTurnQueue.key(characterId, userId),
        async () => {
          await this.memory.touch(characterId, userId, used);

          const results: RecordResult[] = [];
          // Candidates from one exchange never evict each other
          const written = new Set<string>();
          for (const candidate of candidates) {
            const result = await this.memory.recordMemory(
              characterId,
              userId,
              candidate.content,
              candidate.category,
              pending.emotion,
              pending.turn,
              written
            );
            if (result.status !== 'discarded') written.add(result.memory.id);
            this.emitTelemetry({
              kind: 'memory.recorded',
              ...this.telemetryBase(pending),
              status: result.status,
              category: candidate.category
            });
            results.push(result);
          }
          return results;
        },
        'memory-write'
      )
      .catch((error: unknown) => {
        log.error(`Memory writes for ${characterId}/${userId} failed:`, describeError(error));
        return [];
      });
  }

  private telemetryBase(pending: PendingTurn): { characterId: string; userId: string; turn: number; timestamp: number } {
    return {
      characterId: pending.characterId,
      userId: pending.userId,
      turn: pending.turn,
      timestamp: this.clock().getTime()
    };
  }

  private emitTelemetry(event: TelemetryEvent): void {
    this.emit('telemetry', event);
  }

  private async assemble(
    profile: PersonalityProfile,
    state: AdaptedBehaviorState,
    behavior: BehaviorVector,
    message: string
  ): Promise<ContextBundle> {
    const { characterId, userId } = state;
    const memories = await this.memory.retrieve(characterId, userId, message, this.config.memory.retrievalLimit, {
      touch: false
    });

    return this.assembler.assemble(characterId, userId, {
      profile,
      behavior,
      state,
      session: this.session.recent(characterId, userId),
      memories,
      message
    });
  }

  private async commitAdaptation(
    profile: PersonalityProfile,
    characterId: string,
    userId: string,
    emotion: EmotionalState
  ): Promise<AdaptationResult> {
    const previous = await this.loadState(characterId, userId);
    const result = this.adapter.step(profile, previous, emotion, this.clock());

    this.adaptationCache.set(KeyedTurnQueue.key(characterId, userId), result.state);
    try {
      if (!(await this.storage.putAdaptation(result.state))) {
        log.warn(`Storage rejected adaptation state for ${characterId}/${userId}; keeping it in memory`);
      }
    } catch (error) {
      log.warn(`Could not persist adaptation state for ${characterId}/${userId}:`, describeError(error));
    }

    return result;
  }

  private async loadState(characterId: string, userId: string): Promise<AdaptedBehaviorState> {
    const cached = this.adaptationCache.get(KeyedTurnQueue.key(characterId, userId));

    try {
      const stored = await this.storage.getAdaptation(characterId, userId);
      if (stored && (!cached || stored.turn >= cached.turn)) return stored;
    } catch (error) {
      log.warn(`Could not load adaptation state for ${characterId}/${userId}:`, describeError(error));
    }

    return cached ?? this.adapter.initialState(characterId, userId, this.clock());
  }
}
