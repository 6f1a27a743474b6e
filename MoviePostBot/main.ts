import { getBot } from './bot';

// Long-polling entry point (local development / a plain VM)
const { bot, services } = getBot();

const templateCheck = services.templates.validateTemplate();
if (!templateCheck.valid) {
  console.warn('[main] post template is incomplete, missing:', templateCheck.missing);
}

bot.launch().catch((err) => {
  console.error('[main] bot stopped with an error', err);
  process.exitCode = 1;
});
console.log('[main] bot started');

// Enable graceful stop
function shutdown(signal: string): void {
  bot.stop(signal);
  services.blogger.stop().catch((err) => console.error('[main] failed to stop OAuth listener', err));
}

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));
