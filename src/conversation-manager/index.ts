/**
 * Conversation Manager exports.
 *
 * This module exports conversation manager implementations.
 */

export type { ConversationManager } from './conversation-manager.js'
export { NullConversationManager } from './null-conversation-manager.js'
export {
  SlidingWindowConversationManager,
  type SlidingWindowConversationManagerConfig,
} from './sliding-window-conversation-manager.js'
