import { createSessionStore, KeyValueStore } from '../sessionStore';
import { ConversationSession } from '../models/SessionModels';

/**
 * Thin wrapper around the key-value store that provides strongly-typed helpers
 * to load and persist a user's post session.  Keeps the conversation service
 * free of storage details; swap the store to change where sessions live.
 */
export class SessionManager {
  constructor(
    private readonly store: KeyValueStore<ConversationSession> = createSessionStore<ConversationSession>(),
  ) {}

  /** Retrieve the active session, `undefined` when the user has none. */
  async get(userId: number): Promise<ConversationSession | undefined> {
    return this.store.get(userId.toString());
  }

  /** Begin a blank session, replacing whatever was there. */
  async start(userId: number): Promise<ConversationSession> {
    const session: ConversationSession = { currentStepIndex: 0, fields: {}, editMode: false };
    await this.set(userId, session);
    return session;
  }

  /** Persist full session object (overwrites previous value). */
  async set(userId: number, session: ConversationSession): Promise<void> {
    await this.store.set(userId.toString(), session);
  }

  async discard(userId: number): Promise<void> {
    await this.store.delete(userId.toString());
  }
}
