/**
 * Render a synthetic receipt to samples/sample_receipt_1.png for the
 * evaluation run. Text is drawn through SVG, so output depends on the
 * fonts installed for librsvg.
 * Usage: npm run sample
 */

import { promises as fs } from 'fs';
import path from 'path';
import sharp from 'sharp';

const WIDTH = 400;
const HEIGHT = 600;

interface TextLine {
  text: string;
  x: number;
  y: number;
  size: number;
  bold?: boolean;
}

const ITEMS: [string, number][] = [
  ['Wireless Bluetooth Speaker', 89.99],
  ['USB-C Cable (6ft)', 19.99],
  ['Phone Case Premium', 24.99],
  ['Screen Protector', 12.99],
];
const TAX_RATE = 0.0875;

function escapeXml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function receiptLines(): TextLine[] {
  const lines: TextLine[] = [
    { text: 'TECH MART ELECTRONICS', x: 20, y: 40, size: 20, bold: true },
    { text: '123 Innovation Drive', x: 20, y: 70, size: 12 },
    { text: 'Silicon Valley, CA 94301', x: 20, y: 90, size: 12 },
    { text: 'Phone: (555) 123-4567', x: 20, y: 110, size: 12 },
    { text: 'Date: 03/15/2024', x: 20, y: 150, size: 16 },
    { text: 'Receipt #: 001234', x: 250, y: 150, size: 12 },
    { text: 'ITEMS:', x: 20, y: 200, size: 16 },
  ];

  let y = 225;
  let subtotal = 0;
  for (const [name, price] of ITEMS) {
    lines.push({ text: name, x: 20, y, size: 12 });
    lines.push({ text: `$${price.toFixed(2)}`, x: 300, y, size: 12 });
    subtotal += price;
    y += 20;
  }

  const tax = subtotal * TAX_RATE;
  y += 35;
  lines.push({ text: 'SUBTOTAL:', x: 20, y, size: 16 });
  lines.push({ text: `$${subtotal.toFixed(2)}`, x: 300, y, size: 16 });
  y += 25;
  lines.push({ text: `TAX (${(TAX_RATE * 100).toFixed(2)}%):`, x: 20, y, size: 16 });
  lines.push({ text: `$${tax.toFixed(2)}`, x: 300, y, size: 16 });
  y += 25;
  lines.push({ text: 'TOTAL:', x: 20, y, size: 20, bold: true });
  lines.push({ text: `$${(subtotal + tax).toFixed(2)}`, x: 300, y, size: 20, bold: true });
  y += 40;
  lines.push({ text: 'Payment: VISA ****1234', x: 20, y, size: 12 });
  y += 25;
  lines.push({ text: 'Thank you for shopping with us!', x: 20, y, size: 12 });

  return lines;
}

function toSvg(lines: TextLine[]): string {
  const body = lines
    .map(
      (l) =>
        `<text x="${l.x}" y="${l.y}" font-family="DejaVu Sans, Arial, sans-serif" ` +
        `font-size="${l.size}"${l.bold ? ' font-weight="bold"' : ''}>${escapeXml(l.text)}</text>`
    )
    .join('\n');

  return (
    `<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${HEIGHT}">` +
    `<rect width="100%" height="100%" fill="white"/>${body}</svg>`
  );
}

async function generate() {
  const outDir = path.resolve('samples');
  await fs.mkdir(outDir, { recursive: true });

  const outFile = path.join(outDir, 'sample_receipt_1.png');
  await sharp(Buffer.from(toSvg(receiptLines()))).png().toFile(outFile);
  console.log(`[Sample] Wrote ${outFile}`);
}

generate().catch((err) => {
  console.error('[Sample] Error:', err);
  process.exit(1);
});
