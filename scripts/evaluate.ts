/**
 * Accuracy evaluation over labelled sample receipts.
 * Usage: npm run evaluate -- [samplesDir]
 *
 * Reads <samplesDir>/ground-truth.json and writes evaluation_report.txt.
 */

import { promises as fs } from 'fs';
import path from 'path';
import {
  evaluateSamples,
  formatEvaluationReport,
  loadGroundTruth,
} from '../src/lib/extraction/evaluation';
import { shutdownDefaultOcr } from '../src/lib/extraction/pipeline';

async function evaluate() {
  const samplesDir = path.resolve(process.argv[2] ?? 'samples');
  const groundTruth = await loadGroundTruth(path.join(samplesDir, 'ground-truth.json'));

  console.log('[Evaluation] Running receipt extraction evaluation...');
  const summary = await evaluateSamples(samplesDir, groundTruth);
  await shutdownDefaultOcr();

  const report = formatEvaluationReport(summary);
  console.log(report);

  await fs.writeFile('evaluation_report.txt', report);
  console.log('[Evaluation] Report saved to evaluation_report.txt');
}

evaluate().catch((err) => {
  console.error('[Evaluation] Error:', err);
  process.exit(1);
});
