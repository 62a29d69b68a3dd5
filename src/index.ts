/**
 * ddns-sync - Entry Point
 *
 * Keeps dynamic DNS hostnames pointed at this host's public IP address
 */
import { createApplication, logger } from './core/index.js';

async function main(): Promise<void> {
  try {
    const app = createApplication();
    await app.start();
  } catch (error) {
    logger.fatal({ error }, 'Failed to start ddns-sync');
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
