import { Telegraf, Context, Markup } from 'telegraf';
import { env } from './config';
import { ChatReply } from './models/SessionModels';
import { AuthCompletion } from './models/Credentials';
import { FIELD_ORDER, fieldLabel } from './models/ReviewFields';
import { BloggerRestApi } from './services/bloggerApi';
import { BloggerService, COMPLETE_AUTH_TIMEOUT_MS } from './services/bloggerService';
import { ConversationService, authorizationInstructions } from './services/conversationService';
import { FileCredentialStore } from './services/credentialStore';
import { GoogleOAuthClient, loadClientConfig } from './services/googleOAuthService';
import { OAuthCallbackServer } from './services/oauthCallbackServer';
import { SessionManager } from './services/sessionManager';
import { TemplateService } from './services/templateService';

export interface BotServices {
  conversation: Pick<
    ConversationService,
    'start' | 'handleText' | 'showEditOptions' | 'beginEdit' | 'confirm' | 'cancel' | 'status'
  >;
  blogger: Pick<BloggerService, 'ensureAuthenticated' | 'completeAuthorization' | 'getBlogInfo' | 'stop'>;
  templates: Pick<TemplateService, 'validateTemplate'>;
}

/** Wires the production services from the environment. */
export function createServices(): BotServices {
  const templates = new TemplateService(env.TEMPLATE_FILE);
  const blogger = new BloggerService({
    blogId: env.BLOG_ID,
    credentialStore: new FileCredentialStore(env.TOKEN_FILE),
    blogApi: new BloggerRestApi(),
    createOAuthClient: () => new GoogleOAuthClient(loadClientConfig(env.CLIENT_SECRET_FILE)),
    createListener: () => new OAuthCallbackServer(env.OAUTH_CALLBACK_PORT, env.OAUTH_CALLBACK_HOST),
  });
  const conversation = new ConversationService(new SessionManager(), templates, blogger);
  return { conversation, blogger, templates };
}

// ---------------- Static texts ----------------
const WELCOME_MESSAGE =
  '🎬 Welcome to the Blogger Movie Post Bot!\n\n' +
  'I can help you create and publish movie review posts to your Blogger blog.\n\n' +
  'Available commands:\n' +
  '/post - Start creating a new movie post\n' +
  '/cancel - Cancel current operation\n' +
  '/edit - Edit current post data\n' +
  '/help - Show this help message\n\n' +
  'Use /post to get started!';

const HELP_MESSAGE = [
  '🎬 Blogger Movie Post Bot Help',
  '',
  'Available Commands:',
  '/start - Welcome message and introduction',
  '/post - Start creating a new movie post',
  '/cancel - Cancel current posting process',
  '/edit - Edit any field in your current post',
  '/status - Check your current post status',
  '/template - View the HTML template structure',
  '/auth - Check Google Blogger authentication status',
  '/complete_auth - Complete Google authentication after authorization',
  '/help - Show this help message',
  '',
  'How to use:',
  '1. Use /post to start creating a post',
  '2. Follow the step-by-step prompts:',
  ...FIELD_ORDER.map((field) => `   • ${fieldLabel(field)}`),
  '3. Review and edit if needed',
  '4. Confirm to publish to your blog',
  '',
  'Tips:',
  '• You can use /cancel anytime to stop',
  '• Use /edit to modify any field during creation',
  '• All fields are validated before posting',
].join('\n');

const TEMPLATE_INFO =
  '🏗️ *HTML Template Structure:*\n\n' +
  'The bot uses the following placeholders in the HTML template:\n\n' +
  '• `(1#Poster)` → Poster image name\n' +
  '• `(2#Rating)` → Movie rating\n' +
  '• `(3#MovieReview)` → Your review text\n' +
  '• `(4#Scene1-4)` → Scene image numbers\n' +
  '• `(5#YoutubeEmbedLink)` → YouTube embed URL\n' +
  '• `(6#Year/Month/MovieCode)` → Source data\n\n' +
  'All placeholders are processed automatically when you create a post.';

const GENERIC_FAILURE = '❌ Something went wrong. Please try again.';

// ---------------- Reply helpers ----------------
type InlineKeyboard = ReturnType<typeof Markup.inlineKeyboard>['reply_markup'];

function extraFor(reply: ChatReply): { reply_markup?: InlineKeyboard } {
  if (!reply.options) return {};
  const rows = reply.options.map((row) => row.map((o) => Markup.button.callback(o.label, o.action)));
  return { reply_markup: Markup.inlineKeyboard(rows).reply_markup };
}

async function send(ctx: Context, reply: ChatReply): Promise<void> {
  await ctx.reply(reply.text, extraFor(reply));
}

async function edit(ctx: Context, reply: ChatReply): Promise<void> {
  await ctx.editMessageText(reply.text, extraFor(reply));
}

/**
 * Outer boundary of every update: unexpected exceptions are logged and the
 * user gets a generic failure message instead of silence.  Updates without a
 * sender (channel posts) are ignored.
 */
async function safely(ctx: Context, name: string, run: (userId: number) => Promise<void>): Promise<void> {
  const userId = ctx.from?.id;
  if (!userId) return;
  try {
    await run(userId);
  } catch (err) {
    console.error(`[bot] ${name} failed`, err);
    try {
      await ctx.reply(GENERIC_FAILURE);
    } catch (replyErr) {
      console.error('[bot] failed to report error to user', replyErr);
    }
  }
}

function completionText(result: AuthCompletion): string {
  if (result.status === 'success') {
    return (
      '✅ Authentication Successful!\n\n' +
      'Your bot is now connected to Google Blogger API.\n' +
      'You can now create and publish posts using /post command.'
    );
  }
  return result.status === 'no_code_received' ? `⌛ ${result.message}` : `❌ ${result.reason}`;
}

/** Waits for the OAuth callback and reports the outcome as a separate message. */
function completeAuthInBackground(ctx: Context, blogger: BotServices['blogger']): void {
  safely(ctx, 'complete_auth', async () => {
    const result = await blogger.completeAuthorization(COMPLETE_AUTH_TIMEOUT_MS);
    await ctx.reply(completionText(result));
  }).catch((err) => console.error('[bot] complete_auth failed', err));
}

export function createBot(token: string, services: BotServices): Telegraf<Context> {
  const { conversation, blogger, templates } = services;
  const bot = new Telegraf(token);

  bot.start(async (ctx) => safely(ctx, 'start', async () => {
    await ctx.reply(WELCOME_MESSAGE);
  }));

  bot.help(async (ctx) => safely(ctx, 'help', async () => {
    await ctx.reply(HELP_MESSAGE);
  }));

  bot.command('post', async (ctx) => safely(ctx, 'post', async (userId) => {
    await send(ctx, await conversation.start(userId));
  }));

  bot.command('cancel', async (ctx) => safely(ctx, 'cancel', async (userId) => {
    await send(ctx, await conversation.cancel(userId));
  }));

  bot.command('edit', async (ctx) => safely(ctx, 'edit', async (userId) => {
    await send(ctx, await conversation.showEditOptions(userId));
  }));

  bot.command('status', async (ctx) => safely(ctx, 'status', async (userId) => {
    await send(ctx, await conversation.status(userId));
  }));

  bot.command('template', async (ctx) => safely(ctx, 'template', async () => {
    const check = templates.validateTemplate();
    const checkLine = check.valid
      ? '✅ Template check: all placeholders present.'
      : `⚠️ Template check failed, missing: ${check.missing.join(', ')}`;
    await ctx.reply(TEMPLATE_INFO, { parse_mode: 'Markdown' });
    await ctx.reply(checkLine);
  }));

  bot.command('auth', async (ctx) => safely(ctx, 'auth', async () => {
    const state = await blogger.ensureAuthenticated();
    if (state.status === 'ready') {
      const blog = await blogger.getBlogInfo();
      const blogLine = blog ? `\n\nBlog: ${blog.name ?? blog.id}${blog.url ? ` (${blog.url})` : ''}` : '';
      await ctx.reply(
        '✅ Authentication Status: ACTIVE\n\n' +
          'Your bot is successfully connected to Google Blogger API.\n' +
          'You can create and publish posts without any issues.' +
          blogLine,
      );
    } else if (state.status === 'authorization_required') {
      await ctx.reply(authorizationInstructions(state.authorizationUrl));
    } else {
      await ctx.reply(`❌ Authentication failed: ${state.reason}`);
    }
  }));

  bot.command('complete_auth', async (ctx) => safely(ctx, 'complete_auth', async () => {
    await ctx.reply(`🔄 Waiting for Google authorization (up to ${COMPLETE_AUTH_TIMEOUT_MS / 1000} seconds)...`);
    // Not awaited: long polling handles a batch of updates only after every handler in it returns
    completeAuthInBackground(ctx, blogger);
  }));

  // ---------------- Inline keyboard ----------------
  bot.action('post_confirm', async (ctx) => safely(ctx, 'post_confirm', async (userId) => {
    await ctx.answerCbQuery();
    const reply = await conversation.confirm(userId, async () => {
      await ctx.editMessageText('📤 Publishing post to Blogger...');
    });
    await edit(ctx, reply);
  }));

  bot.action('post_cancel', async (ctx) => safely(ctx, 'post_cancel', async (userId) => {
    await ctx.answerCbQuery();
    await edit(ctx, await conversation.cancel(userId));
  }));

  bot.action('post_edit', async (ctx) => safely(ctx, 'post_edit', async (userId) => {
    await ctx.answerCbQuery();
    await edit(ctx, await conversation.showEditOptions(userId));
  }));

  bot.action(/^edit_(.+)$/, async (ctx) => safely(ctx, 'edit_field', async (userId) => {
    await ctx.answerCbQuery();
    await edit(ctx, await conversation.beginEdit(userId, ctx.match[1]));
  }));

  // ---------------- Free text (questionnaire answers) ----------------
  bot.on('text', async (ctx) => safely(ctx, 'text', async (userId) => {
    if (ctx.message.text.startsWith('/')) {
      await ctx.reply('Unknown command. Use /help to see what I can do.');
      return;
    }
    for (const reply of await conversation.handleText(userId, ctx.message.text)) {
      await send(ctx, reply);
    }
  }));

  bot.catch((err, ctx) => {
    console.error(`[bot] unhandled error for update ${ctx.update.update_id}`, err);
  });

  return bot;
}

let shared: { bot: Telegraf<Context>; services: BotServices } | undefined;

/** Process-wide bot instance, built on first use. */
export function getBot(): { bot: Telegraf<Context>; services: BotServices } {
  if (!shared) {
    const services = createServices();
    shared = { bot: createBot(env.BOT_TOKEN, services), services };
  }
  return shared;
}
