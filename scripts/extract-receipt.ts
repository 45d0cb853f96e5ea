/**
 * Run one receipt image through the pipeline and print the result as JSON.
 * Usage: npm run extract -- <image> [--threshold 30] [--no-deskew] ...
 */

import { promises as fs } from 'fs';
import { parseArgs } from 'util';
import { processReceipt, shutdownDefaultOcr } from '../src/lib/extraction/pipeline';
import { confidenceThresholdSchema } from '../src/lib/utils/validation';

async function extract() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      threshold: { type: 'string' },
      'no-grayscale': { type: 'boolean', default: false },
      'no-upscale': { type: 'boolean', default: false },
      'no-denoise': { type: 'boolean', default: false },
      'no-deskew': { type: 'boolean', default: false },
      'no-binarize': { type: 'boolean', default: false },
    },
  });

  const imagePath = positionals[0];
  if (!imagePath) {
    console.error('Usage: extract-receipt <image> [--threshold N] [--no-<step>]');
    process.exit(1);
  }

  const confidenceThreshold =
    values.threshold === undefined ? undefined : confidenceThresholdSchema.parse(Number(values.threshold));

  const image = await fs.readFile(imagePath);
  const output = await processReceipt(image, {
    confidenceThreshold,
    preprocessing: {
      grayscale: !values['no-grayscale'],
      upscale: !values['no-upscale'],
      denoise: !values['no-denoise'],
      deskew: !values['no-deskew'],
      binarize: !values['no-binarize'],
    },
  });

  console.log(JSON.stringify(output, null, 2));
  await shutdownDefaultOcr();
}

extract().catch((err) => {
  console.error('[Extract] Error:', err);
  process.exit(1);
});
