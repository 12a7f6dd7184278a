import { escapeXml } from "./format.js";
import type { ReceiptView } from "./types.js";

const ITEMS_TOP = 290;
const ITEM_STEP = 20;

export function renderSvg(view: ReceiptView): string {
  const modelName = escapeXml(view.modelName);
  const location = escapeXml(view.location);
  const sessionShort = escapeXml(view.sessionShort);
  const date = escapeXml(view.date);
  const duration = escapeXml(view.duration);
  const servedBy = escapeXml(view.servedBy);

  let y = ITEMS_TOP;
  const items: string[] = [];
  for (const item of view.items) {
    items.push(`  <text x="45" y="${y}" class="text">${escapeXml(item.label)}</text>
  <text x="200" y="${y}" class="text" text-anchor="middle">${escapeXml(item.quantity)}</text>
  <text x="370" y="${y}" class="text" text-anchor="end">${escapeXml(item.price)}</text>`);
    y += ITEM_STEP;
  }

  const totalY = y + 15;
  const height = totalY + 185;
  const billed = escapeXml(
    `${view.totalBilledTokens} billed of ${view.totalRawTokens} tokens @ ${view.multiplier}`,
  );

  return `<?xml version="1.0" encoding="UTF-8"?>
<svg width="400" height="${height}" viewBox="0 0 400 ${height}" xmlns="http://www.w3.org/2000/svg">
  <defs>
    <style>
      .receipt-bg { fill: #f8f8f8; }
      .text { font-family: 'Courier New', Courier, monospace; font-size: 12px; fill: #333; }
      .text-bold { font-family: 'Courier New', Courier, monospace; font-size: 12px; fill: #333; font-weight: bold; }
      .text-small { font-family: 'Courier New', Courier, monospace; font-size: 10px; fill: #666; }
      .separator { stroke: #333; stroke-width: 2; }
      .light-separator { stroke: #ccc; stroke-width: 1; stroke-dasharray: 2,2; }
      .logo-text { font-family: Arial, sans-serif; font-size: 24px; fill: #333; font-weight: bold; }
      .model-tag { fill: #e8e8e8; }
    </style>
  </defs>

  <rect class="receipt-bg" x="10" y="10" width="380" height="${height - 20}" rx="4"/>

  <text x="200" y="55" class="logo-text" text-anchor="middle">FACTORY</text>
  <text x="200" y="78" class="text-small" text-anchor="middle">DROID RECEIPT</text>
  <line x1="30" y1="95" x2="370" y2="95" class="separator"/>

  <rect class="model-tag" x="100" y="105" width="200" height="22" rx="3"/>
  <text x="200" y="121" class="text-bold" text-anchor="middle" font-size="11">${modelName}</text>

  <text x="30" y="150" class="text">Location</text>
  <text x="370" y="150" class="text" text-anchor="end">${location}</text>
  <text x="30" y="170" class="text">Session</text>
  <text x="370" y="170" class="text" text-anchor="end">${sessionShort}</text>
  <text x="30" y="190" class="text">Date</text>
  <text x="370" y="190" class="text" text-anchor="end">${date}</text>
  <text x="30" y="210" class="text">Duration</text>
  <text x="370" y="210" class="text" text-anchor="end">${duration}</text>
  <line x1="30" y1="230" x2="370" y2="230" class="separator"/>

  <text x="30" y="255" class="text-bold">ITEM</text>
  <text x="200" y="255" class="text-bold" text-anchor="middle">QTY</text>
  <text x="370" y="255" class="text-bold" text-anchor="end">PRICE</text>
  <line x1="30" y1="265" x2="370" y2="265" class="light-separator"/>

${items.join("\n")}

  <line x1="30" y1="${totalY}" x2="370" y2="${totalY}" class="separator"/>
  <text x="30" y="${totalY + 25}" class="text-bold" font-size="14">TOTAL</text>
  <text x="370" y="${totalY + 25}" class="text-bold" font-size="14" text-anchor="end">${escapeXml(view.totalCost)}</text>
  <line x1="30" y1="${totalY + 40}" x2="370" y2="${totalY + 40}" class="separator"/>
  <text x="200" y="${totalY + 60}" class="text-small" text-anchor="middle">${billed}</text>

  <text x="200" y="${totalY + 90}" class="text" text-anchor="middle">SERVED BY: ${servedBy}</text>
  <text x="200" y="${totalY + 120}" class="text" text-anchor="middle">Thank you for building!</text>
  <line x1="100" y1="${totalY + 140}" x2="300" y2="${totalY + 140}" class="light-separator"/>
  <text x="200" y="${totalY + 160}" class="text-small" text-anchor="middle">factory.ai</text>
</svg>
`;
}
