import { start } from './bootstrap/main.js';
import { errorMessage } from './core/errors.js';

async function main(): Promise<void> {
  const bot = await start();

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.log(`[bootstrap] Received ${signal}`);
    bot.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error(`[bootstrap] Shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error(`[bootstrap] Startup failed: ${errorMessage(error)}`);
  process.exit(1);
});
