import {
  FIELD_ORDER,
  FIELD_PROMPTS,
  FieldMap,
  FieldName,
  fieldLabel,
  isFieldName,
} from '../models/ReviewFields';
import { ChatReply, ConversationSession, ReplyOption } from '../models/SessionModels';
import { PublishResult } from '../models/Credentials';
import { SessionManager } from './sessionManager';
import { validateField } from './fieldValidationService';

export interface PostRenderer {
  render(fields: FieldMap): string;
}

export interface PostPublisher {
  publish(title: string, htmlBody: string, labels?: string): Promise<PublishResult>;
}

const TOTAL_STEPS = FIELD_ORDER.length;
const STATUS_REVIEW_LIMIT = 50;
const SUMMARY_REVIEW_LIMIT = 100;

const NO_SESSION_HINT = 'Please use /post to start creating a new movie post.';

const CONFIRM_OPTIONS: ReplyOption[][] = [
  [{ label: '✏️ Edit', action: 'post_edit' }],
  [{ label: '❌ Cancel', action: 'post_cancel' }],
  [{ label: '✅ POST', action: 'post_confirm' }],
];

const SUMMARY_ICONS: Record<FieldName, string> = {
  title: '🎬',
  labels: '🏷️',
  poster: '🖼️',
  rating: '⭐',
  review: '📝',
  scenes: '🎞️',
  youtube: '📺',
  source_data: '📂',
};

function truncate(value: string, limit: number): string {
  return value.length > limit ? `${value.slice(0, limit)}...` : value;
}

function isConfirming(session: ConversationSession): boolean {
  return !session.editMode && session.currentStepIndex >= TOTAL_STEPS;
}

export function authorizationInstructions(authorizationUrl: string): string {
  return (
    '🔐 Authentication Required\n\n' +
    'To publish posts to Blogger, you need to authorize this application.\n\n' +
    'Steps to complete setup:\n' +
    `1. Open this URL: ${authorizationUrl}\n\n` +
    '2. Sign in with your Google account\n' +
    '3. Grant permission to access Blogger\n' +
    "4. You'll be redirected to a success page\n" +
    '5. Return here and use /complete_auth to finish setup\n\n' +
    'Note: This is a one-time setup process.'
  );
}

/**
 * Drives the per-user questionnaire:
 *
 *   IDLE ─/post→ COLLECTING(0) → … → COLLECTING(7) → CONFIRM ─POST→ IDLE
 *                                        CONFIRM ⇄ EDIT_FIELD(f)
 *
 * `/cancel` returns to IDLE from anywhere.  Every method answers with chat
 * replies; validation problems never surface as exceptions.
 */
export class ConversationService {
  constructor(
    private readonly sessions: SessionManager,
    private readonly renderer: PostRenderer,
    private readonly publisher: PostPublisher,
  ) {}

  async start(userId: number): Promise<ChatReply> {
    const session = await this.sessions.start(userId);
    return this.promptFor(session);
  }

  async handleText(userId: number, text: string): Promise<ChatReply[]> {
    const session = await this.sessions.get(userId);
    if (!session) {
      return [{ text: NO_SESSION_HINT }];
    }

    if (session.editMode && session.editingField) {
      const field = session.editingField;
      const result = validateField(field, text);
      if (!result.ok) return [{ text: result.message }];

      session.fields[field] = result.value;
      session.editMode = false;
      delete session.editingField;
      await this.sessions.set(userId, session);
      return [{ text: `✅ ${fieldLabel(field)} updated successfully!` }, this.nextReply(session)];
    }

    if (isConfirming(session)) {
      return [this.confirmation(session)];
    }

    const field = FIELD_ORDER[session.currentStepIndex];
    const result = validateField(field, text);
    if (!result.ok) return [{ text: result.message }];

    session.fields[field] = result.value;
    session.currentStepIndex += 1;
    await this.sessions.set(userId, session);
    return [this.nextReply(session)];
  }

  /** Offers the fields that can be edited right now. */
  async showEditOptions(userId: number): Promise<ChatReply> {
    const session = await this.sessions.get(userId);
    if (!session) {
      return { text: 'No active post to edit. Use /post to start creating a post.' };
    }

    const editable = FIELD_ORDER.filter((field) => session.fields[field] !== undefined);
    if (editable.length === 0) {
      return { text: 'Nothing to edit yet.\n\n' + this.promptFor(session).text };
    }

    return {
      text: 'Which field would you like to edit?',
      options: editable.map((field) => [{ label: fieldLabel(field), action: `edit_${field}` }]),
    };
  }

  async beginEdit(userId: number, field: string): Promise<ChatReply> {
    const session = await this.sessions.get(userId);
    if (!session) return { text: 'Session expired. Please use /post to start again.' };
    if (!isFieldName(field)) return { text: `❌ Unknown field: ${field}` };

    session.editMode = true;
    session.editingField = field;
    await this.sessions.set(userId, session);

    const current = session.fields[field] ?? 'Not set';
    return { text: `Current value: ${current}\n\n${FIELD_PROMPTS[field]}` };
  }

  /**
   * Publishes the collected post.  The session ends whatever the outcome;
   * outside the confirmation step the current prompt is repeated instead.
   */
  async confirm(userId: number, onPublishing?: () => Promise<void>): Promise<ChatReply> {
    const session = await this.sessions.get(userId);
    if (!session) return { text: 'Session expired. Please use /post to start again.' };
    if (!isConfirming(session)) return this.nextReply(session);

    if (onPublishing) await onPublishing();

    let result: PublishResult;
    try {
      const html = this.renderer.render(session.fields);
      result = await this.publisher.publish(session.fields.title ?? '', html, session.fields.labels);
    } finally {
      await this.sessions.discard(userId);
    }

    if (result.ok) {
      return { text: `✅ Post published successfully!\n\n🔗 URL: ${result.url}` };
    }
    if (result.authorizationUrl) {
      return { text: authorizationInstructions(result.authorizationUrl) };
    }
    return { text: `❌ Failed to publish post:\n${result.reason}` };
  }

  async cancel(userId: number): Promise<ChatReply> {
    const session = await this.sessions.get(userId);
    if (!session) {
      return { text: 'No active post creation to cancel.' };
    }
    await this.sessions.discard(userId);
    return { text: '❌ Post creation cancelled.' };
  }

  async status(userId: number): Promise<ChatReply> {
    const session = await this.sessions.get(userId);
    if (!session) {
      return { text: '📝 No active post creation in progress.\nUse /post to start creating a new movie post.' };
    }

    const lines = ['📊 Current Post Status:', ''];
    FIELD_ORDER.forEach((field, idx) => {
      const label = fieldLabel(field);
      const value = session.fields[field];
      if (value !== undefined) {
        const shown = field === 'review' ? truncate(value, STATUS_REVIEW_LIMIT) : value;
        lines.push(`✅ ${label}: ${shown}`);
      } else if (idx === session.currentStepIndex) {
        lines.push(`➡️ ${label}: Currently asking`);
      } else {
        lines.push(`⏳ ${label}: Pending`);
      }
    });
    lines.push('');
    lines.push(`Progress: ${session.currentStepIndex}/${TOTAL_STEPS} steps completed`);
    return { text: lines.join('\n') };
  }

  // ---------------- Reply builders ----------------

  private nextReply(session: ConversationSession): ChatReply {
    return session.currentStepIndex >= TOTAL_STEPS ? this.confirmation(session) : this.promptFor(session);
  }

  private promptFor(session: ConversationSession): ChatReply {
    const field = FIELD_ORDER[session.currentStepIndex];
    return { text: `📝 Step ${session.currentStepIndex + 1}/${TOTAL_STEPS}: ${FIELD_PROMPTS[field]}` };
  }

  private confirmation(session: ConversationSession): ChatReply {
    const lines = ['📋 Post Summary:', ''];
    for (const field of FIELD_ORDER) {
      const value = session.fields[field] ?? 'N/A';
      const shown = field === 'review' ? truncate(value, SUMMARY_REVIEW_LIMIT) : value;
      lines.push(`${SUMMARY_ICONS[field]} ${fieldLabel(field)}: ${shown}`);
    }
    lines.push('');
    lines.push('What would you like to do?');
    return { text: lines.join('\n'), options: CONFIRM_OPTIONS };
  }
}
