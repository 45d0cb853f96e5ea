import { checkRedisHealth } from '../src/lib/queue/connection';
import { getTempStorage } from '../src/lib/storage/tmp-storage';
import { shutdownDefaultOcr } from '../src/lib/extraction/pipeline';

async function main() {
  console.log('[Workers] Starting receipt workers...');

  if (!(await checkRedisHealth())) {
    console.error('[Workers] Redis is not reachable; set REDIS_URL');
    process.exit(1);
  }

  await getTempStorage().cleanupStale();

  const { receiptWorker } = await import('./receipt-worker');
  console.log('[Workers] Receipt worker:', receiptWorker.name);

  async function shutdown() {
    console.log('[Workers] Shutting down...');
    await receiptWorker.close();
    await shutdownDefaultOcr();
    process.exit(0);
  }

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[Workers] Shutdown failed:', err);
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((err) => {
  console.error('[Workers] Error:', err);
  process.exit(1);
});
