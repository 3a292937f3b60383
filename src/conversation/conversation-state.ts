import type { ConversationStateSnapshot } from "../types/conversation";

/**
 * Cross-turn dialog state of one session.
 *
 * A fresh instance starts a new conversation. The request encoder clears the
 * flag once the first config message is built; the response state machine
 * replaces the continuation token whenever the service sends one.
 */
export class ConversationState {
  private token: Buffer | undefined;
  private newConversation = true;

  get continuationToken(): Buffer | undefined {
    return this.token;
  }

  get isNewConversation(): boolean {
    return this.newConversation;
  }

  updateContinuationToken(token: Buffer): void {
    this.token = Buffer.from(token);
  }

  clearNewConversation(): void {
    this.newConversation = false;
  }

  /**
   * Puts back the state captured before a failed attempt so a retry repeats the
   * same request. A token received during the failed attempt is dropped.
   */
  restore(snapshot: ConversationStateSnapshot): void {
    this.token = snapshot.continuationToken ? Buffer.from(snapshot.continuationToken) : undefined;
    this.newConversation = snapshot.isNewConversation;
  }

  snapshot(): ConversationStateSnapshot {
    return {
      continuationToken: this.token ? Buffer.from(this.token) : undefined,
      isNewConversation: this.newConversation,
    };
  }
}
