// SessionModels.ts
// -----------------------------------------------------------------------------
// Runtime data the bot keeps between Telegram updates.  Instances are
// serialised to a key-value store (in-memory during local development, Redis
// when running behind the webhook) keyed by the user's Telegram id.
// -----------------------------------------------------------------------------
//   • ConversationSession – the post a user is currently filling in.
//   • ChatReply           – transport-neutral answer produced by the services.
// -----------------------------------------------------------------------------

import type { FieldMap, FieldName } from './ReviewFields';

/**
 * One per user while a post is being created.  Created by `/post`, removed on
 * cancel, after a publish attempt, or when the store's TTL runs out.
 */
export interface ConversationSession {
  /**
   * Index into `FIELD_ORDER` of the field being asked for.  Equal to the number
   * of fields once everything is collected (the confirmation step).
   */
  currentStepIndex: number;
  fields: FieldMap;
  /** True while the user is re-entering a single field */
  editMode: boolean;
  /** Defined only together with `editMode` */
  editingField?: FieldName;
}

export interface ReplyOption {
  label: string;
  /** Callback payload sent back by the chat client when the option is chosen */
  action: string;
}

export interface ChatReply {
  text: string;
  /** Rows of selectable options (rendered as an inline keyboard) */
  options?: ReplyOption[][];
}
