import { Worker, type Job } from 'bullmq';
import { getConfig } from '../src/lib/config';
import { getRedisConnection } from '../src/lib/queue/connection';
import { RECEIPT_QUEUE } from '../src/lib/queue/queues';
import { runReceiptJob, type ReceiptJobSummary } from '../src/lib/queue/receipt-job';
import { getTempStorage } from '../src/lib/storage/tmp-storage';
import { getConfidenceLevel } from '../src/lib/extraction/confidence';
import type { ReceiptJobData } from '../src/lib/utils/validation';

export const receiptWorker = new Worker<ReceiptJobData, ReceiptJobSummary>(
  RECEIPT_QUEUE,
  async (job: Job<ReceiptJobData, ReceiptJobSummary>) => {
    const summary = await runReceiptJob(job.data, {
      storage: getTempStorage(),
      onProgress: (percent) => job.updateProgress(percent),
    });

    const confidence = summary.result.overallConfidence;
    console.log(
      `[Receipt] Done ${summary.documentId.slice(0, 12)}...: ` +
      `${(confidence * 100).toFixed(1)}% (${getConfidenceLevel(confidence)})`
    );
    return summary;
  },
  {
    connection: getRedisConnection(),
    concurrency: getConfig().RECEIPT_WORKER_CONCURRENCY,
    removeOnComplete: { count: 200 },
    removeOnFail: { count: 100 },
  }
);

receiptWorker.on('completed', (job) => {
  console.log(`[Receipt] Job ${job.id} completed`);
});

receiptWorker.on('failed', (job, err) => {
  console.error(`[Receipt] Job ${job?.id} failed:`, err.message);
});
