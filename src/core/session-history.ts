import { SessionTurn, Speaker } from '../types';

// Bounded recent-turn log per (character, user); oldest turns fall off first
export class SessionHistory {
  private turns: Map<string, SessionTurn[]> = new Map();
  private capacity: number;

  constructor(capacity: number) {
    this.capacity = capacity;
  }

  append(characterId: string, userId: string, speaker: Speaker, text: string, timestamp: Date = new Date()): void {
    const key = `${characterId}/${userId}`;
    const log = this.turns.get(key) ?? [];
    log.push({ speaker, text, timestamp });
    if (log.length > this.capacity) {
      log.splice(0, log.length - this.capacity);
    }
    this.turns.set(key, log);
  }

  recent(characterId: string, userId: string, limit: number = this.capacity): SessionTurn[] {
    const log = this.turns.get(`${characterId}/${userId}`) ?? [];
    return log.slice(-limit).map(turn => ({ ...turn }));
  }

  clear(characterId: string, userId: string): void {
    this.turns.delete(`${characterId}/${userId}`);
  }
}
