import type { ChatId } from '../types';

export interface ChatState {
  isActive: boolean;
}

/**
 * In-memory per-chat settings. Lives for the process lifetime and is
 * dropped on restart. Every mutation is synchronous, so handlers running
 * on the event loop never interleave inside one.
 */
export class ChatStateManager {
  private states: Map<ChatId, ChatState> = new Map();

  /**
   * Get or create the state for a chat
   */
  getState(chatId: ChatId): ChatState {
    let state = this.states.get(chatId);
    if (!state) {
      state = { isActive: false };
      this.states.set(chatId, state);
    }
    return state;
  }

  isActive(chatId: ChatId): boolean {
    return this.getState(chatId).isActive;
  }

  setActive(chatId: ChatId, active: boolean): void {
    this.getState(chatId).isActive = active;
  }

  toggleActive(chatId: ChatId): boolean {
    const state = this.getState(chatId);
    state.isActive = !state.isActive;
    return state.isActive;
  }

  activeChats(): ChatId[] {
    const active: ChatId[] = [];
    for (const [chatId, state] of this.states) {
      if (state.isActive) active.push(chatId);
    }
    return active;
  }

  clear(): void {
    this.states.clear();
  }
}
