/**
 * Accuracy evaluation against hand-labelled sample receipts.
 *
 * Ground truth lives in a JSON file keyed by sample filename; each sample is
 * run through the full pipeline and scored field by field.
 */

import { promises as fs } from 'fs';
import path from 'path';
import type { ExtractionResult } from './types';
import { getConfidenceLevel } from './confidence';
import { processReceipt, type ProcessReceiptOptions } from './pipeline';
import {
  groundTruthSchema,
  type GroundTruth,
  type GroundTruthEntry,
} from '@/lib/utils/validation';

export const FIELD_NAMES = ['vendor', 'date', 'subtotal', 'tax', 'total'] as const;
export type FieldName = (typeof FIELD_NAMES)[number];

const AMOUNT_FIELDS = ['subtotal', 'tax', 'total'] as const;

/** Partial-credit scores */
const VENDOR_PARTIAL_SCORE = 0.7;
const AMOUNT_NEAR_SCORE = 0.5;

export interface ExtractedValues {
  vendor: string | null;
  date: string | null;
  subtotal: number | null;
  tax: number | null;
  total: number | null;
}

export interface FieldAccuracy {
  fieldScores: Record<FieldName, number>;
  overallAccuracy: number;
}

export type ConfidenceGrade = 'High' | 'Medium' | 'Low';

export interface OcrQuality {
  wordCount: number;
  avgConfidence: number;
  meetsWordThreshold: boolean;
  confidenceGrade: ConfidenceGrade;
}

export type DocumentEvaluation =
  | {
      status: 'ok';
      filename: string;
      fieldAccuracy: FieldAccuracy;
      ocrQuality: OcrQuality;
      extracted: ExtractedValues;
      expected: GroundTruthEntry;
      overallConfidence: number;
    }
  | { status: 'error'; filename: string; error: string };

export interface EvaluationSummary {
  documentsProcessed: number;
  documentsSuccessful: number;
  avgFieldAccuracy: number;
  avgOcrConfidence: number;
  documents: DocumentEvaluation[];
}

export function toExtractedValues(result: ExtractionResult): ExtractedValues {
  return {
    vendor: result.vendor.value,
    date: result.date.value,
    subtotal: result.subtotal.value,
    tax: result.tax.value,
    total: result.total.value,
  };
}

function amountTolerance(expected: number): number {
  return Math.max(0.02, expected * 0.01);
}

function scoreVendor(extracted: string | null, expected: string | null): number {
  if (!extracted || !expected) return 0;
  const a = extracted.trim().toUpperCase();
  const b = expected.trim().toUpperCase();
  if (a === b) return 1;
  if (a.includes(b) || b.includes(a)) return VENDOR_PARTIAL_SCORE;
  return 0;
}

function scoreAmount(extracted: number | null, expected: number | null): number {
  if (extracted === null || expected === null) return 0;
  const diff = Math.abs(extracted - expected);
  const tolerance = amountTolerance(expected);
  if (diff <= tolerance) return 1;
  if (diff <= tolerance * 2) return AMOUNT_NEAR_SCORE;
  return 0;
}

/**
 * Vendor: exact (case-insensitive) or partial containment; date: exact;
 * amounts: within max($0.02, 1%), half credit within twice that.
 */
export function scoreFieldAccuracy(extracted: ExtractedValues, expected: GroundTruthEntry): FieldAccuracy {
  const fieldScores: Record<FieldName, number> = {
    vendor: scoreVendor(extracted.vendor, expected.vendor),
    date: extracted.date && expected.date && extracted.date === expected.date ? 1 : 0,
    subtotal: 0,
    tax: 0,
    total: 0,
  };

  for (const field of AMOUNT_FIELDS) {
    fieldScores[field] = scoreAmount(extracted[field], expected[field]);
  }

  const scores = FIELD_NAMES.map((field) => fieldScores[field]);
  return {
    fieldScores,
    overallAccuracy: scores.reduce((sum, s) => sum + s, 0) / scores.length,
  };
}

export function gradeOcrQuality(
  metrics: { wordCount: number; avgConfidence: number },
  expectedWordsMin = 20
): OcrQuality {
  const { wordCount, avgConfidence } = metrics;
  return {
    wordCount,
    avgConfidence,
    meetsWordThreshold: wordCount >= expectedWordsMin,
    confidenceGrade: avgConfidence >= 80 ? 'High' : avgConfidence >= 60 ? 'Medium' : 'Low',
  };
}

export async function loadGroundTruth(filePath: string): Promise<GroundTruth> {
  const raw = await fs.readFile(filePath, 'utf-8');
  return groundTruthSchema.parse(JSON.parse(raw));
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Run every labelled sample through the pipeline. Missing files are
 * skipped; processing errors are recorded per document.
 */
export async function evaluateSamples(
  samplesDir: string,
  groundTruth: GroundTruth,
  options: ProcessReceiptOptions = {}
): Promise<EvaluationSummary> {
  const documents: DocumentEvaluation[] = [];
  let totalAccuracy = 0;
  let totalOcrConfidence = 0;

  for (const [filename, expected] of Object.entries(groundTruth)) {
    let image: Buffer;
    try {
      image = await fs.readFile(path.join(samplesDir, filename));
    } catch (error) {
      if (isMissingFile(error)) {
        console.warn(`[Evaluation] Sample file not found: ${filename}`);
        continue;
      }
      throw error;
    }

    try {
      console.log(`[Evaluation] Evaluating ${filename}...`);
      const processed = await processReceipt(image, options);
      const extracted = toExtractedValues(processed.result);
      const fieldAccuracy = scoreFieldAccuracy(extracted, expected);

      documents.push({
        status: 'ok',
        filename,
        fieldAccuracy,
        ocrQuality: gradeOcrQuality(processed.metrics, expected.expectedWordsMin),
        extracted,
        expected,
        overallConfidence: processed.result.overallConfidence,
      });

      totalAccuracy += fieldAccuracy.overallAccuracy;
      totalOcrConfidence += processed.metrics.avgConfidence;
      console.log(`[Evaluation] ${filename}: ${formatPercent(fieldAccuracy.overallAccuracy)} accuracy`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Evaluation] Error processing ${filename}:`, message);
      documents.push({ status: 'error', filename, error: message });
    }
  }

  const successful = documents.filter((d) => d.status === 'ok').length;

  return {
    documentsProcessed: documents.length,
    documentsSuccessful: successful,
    avgFieldAccuracy: successful > 0 ? totalAccuracy / successful : 0,
    avgOcrConfidence: successful > 0 ? totalOcrConfidence / successful : 0,
    documents,
  };
}

function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

function formatValue(value: string | number | null): string {
  if (value === null || value === '' || value === 0) return 'None';
  return typeof value === 'number' ? `$${value.toFixed(2)}` : value;
}

function statusLabel(score: number): string {
  if (score >= 0.9) return 'OK  ';
  if (score >= 0.5) return 'WARN';
  return 'FAIL';
}

export function formatEvaluationReport(summary: EvaluationSummary): string {
  const rule = '='.repeat(60);
  const lines: string[] = [
    'RECEIPT EXTRACTION EVALUATION REPORT',
    rule,
    '',
    'OVERALL METRICS:',
    `   Documents Processed: ${summary.documentsProcessed}`,
    `   Successful Extractions: ${summary.documentsSuccessful}`,
    `   Average Field Accuracy: ${formatPercent(summary.avgFieldAccuracy)}`,
    `   Average OCR Confidence: ${summary.avgOcrConfidence.toFixed(1)}%`,
    '',
    'DOCUMENT RESULTS:',
    '',
  ];

  for (const doc of summary.documents) {
    if (doc.status === 'error') {
      lines.push(`FAIL ${doc.filename}: ${doc.error}`);
      continue;
    }

    lines.push(`${doc.filename}:`);
    lines.push(`   Overall Accuracy: ${formatPercent(doc.fieldAccuracy.overallAccuracy)}`);
    lines.push(
      `   Extraction Confidence: ${formatPercent(doc.overallConfidence)} (${getConfidenceLevel(doc.overallConfidence)})`
    );
    lines.push(`   OCR Quality: ${doc.ocrQuality.confidenceGrade}, ${doc.ocrQuality.wordCount} words`);
    lines.push('   Field Extraction:');

    for (const field of FIELD_NAMES) {
      const score = doc.fieldAccuracy.fieldScores[field];
      const label = field.charAt(0).toUpperCase() + field.slice(1);
      lines.push(
        `     ${statusLabel(score)} ${label}: ${formatValue(doc.extracted[field])} ` +
        `(expected: ${formatValue(doc.expected[field])}) - ${formatPercent(score)}`
      );
    }
    lines.push('');
  }

  lines.push('RECOMMENDATIONS:');
  if (summary.avgFieldAccuracy >= 0.9) {
    lines.push('   System performing well.');
  } else if (summary.avgFieldAccuracy >= 0.7) {
    lines.push('   Good performance; consider tuning preprocessing options.');
  } else {
    lines.push('   Performance needs improvement:');
    lines.push('      - Check image quality and preprocessing steps');
    lines.push('      - Review field extraction patterns');
    lines.push('      - Add more labelled samples');
  }
  lines.push('');
  lines.push(rule);

  return lines.join('\n');
}
