/** A chat message as delivered by the feed. */
export interface ChatMessage {
  username: string;
  content: string;
}

export interface ChatFeedHandlers {
  onMessage(message: ChatMessage): void;
  /** Called once if the feed ends on its own. Not called after `stop()`. */
  onClose(error: Error): void;
}

/** Source of live chat messages. */
export interface ChatFeed {
  start(handlers: ChatFeedHandlers): void;
  stop(): void;
}
