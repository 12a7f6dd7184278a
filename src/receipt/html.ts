import { escapeHtml } from "./format.js";
import type { ReceiptView } from "./types.js";

const STYLE = `
  * { margin: 0; padding: 0; box-sizing: border-box; }
  body { font-family: 'Courier New', Courier, monospace; font-size: 14px; background: linear-gradient(135deg, #1a1a2e 0%, #16213e 100%); min-height: 100vh; display: flex; align-items: center; justify-content: center; padding: 20px; }
  .receipt { background: #fafafa; width: 400px; padding: 30px 25px; box-shadow: 0 20px 60px rgba(0, 0, 0, 0.3); border-radius: 4px; }
  .header { text-align: center; padding-bottom: 20px; border-bottom: 2px solid #333; }
  .logo { font-family: Arial, sans-serif; font-size: 28px; font-weight: bold; letter-spacing: 4px; color: #333; margin-bottom: 5px; }
  .subtitle { font-size: 11px; color: #666; letter-spacing: 2px; }
  .badge { text-align: center; }
  .model-badge { background: #333; color: #fff; padding: 8px 16px; border-radius: 20px; display: inline-block; margin: 20px 0; font-size: 12px; font-weight: bold; }
  .meta-row, .items-header, .item-row, .total-row { display: flex; justify-content: space-between; }
  .meta-row { padding: 5px 0; border-bottom: 1px dashed #ccc; }
  .meta-row:last-child { border-bottom: none; }
  .meta-label { color: #666; }
  .separator { border-bottom: 2px solid #333; margin: 15px 0; }
  .items-header { padding: 10px 0; font-weight: bold; border-bottom: 1px dashed #ccc; }
  .item-row { padding: 3px 0; color: #555; }
  .item-label { min-width: 120px; }
  .qty { text-align: center; flex: 1; }
  .price { text-align: right; min-width: 80px; }
  .total-section { border-top: 2px solid #333; margin-top: 15px; padding-top: 15px; }
  .total-row { font-size: 18px; font-weight: bold; padding: 5px 0; }
  .billed { font-size: 11px; color: #666; text-align: center; padding-top: 5px; }
  .footer { text-align: center; margin-top: 25px; padding-top: 20px; border-top: 2px dashed #ccc; }
  .cashier, .thank-you { color: #333; margin-bottom: 15px; }
  .link { font-size: 11px; color: #999; }
  .link a { color: #666; text-decoration: none; }
  @media print { body { background: white; } .receipt { box-shadow: none; } }
`;

function metaRow(label: string, value: string): string {
  return `      <div class="meta-row">
        <span class="meta-label">${label}</span>
        <span class="meta-value">${escapeHtml(value)}</span>
      </div>`;
}

export function renderHtml(view: ReceiptView): string {
  const items = view.items
    .map(
      (item) => `      <div class="item-row">
        <span class="item-label">${escapeHtml(item.label)}</span>
        <span class="qty">${escapeHtml(item.quantity)}</span>
        <span class="price">${escapeHtml(item.price)}</span>
      </div>`,
    )
    .join("\n");

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Droid Receipt - ${escapeHtml(view.sessionShort)}</title>
  <style>${STYLE}</style>
</head>
<body>
  <div class="receipt">
    <div class="header">
      <div class="logo">FACTORY</div>
      <div class="subtitle">DROID RECEIPT</div>
    </div>
    <div class="badge"><span class="model-badge">${escapeHtml(view.modelName)}</span></div>
    <div class="meta">
${metaRow("Location", view.location)}
${metaRow("Session", view.sessionShort)}
${metaRow("Date", view.date)}
${metaRow("Duration", view.duration)}
    </div>
    <div class="separator"></div>
    <div class="items-header">
      <span>ITEM</span>
      <span>QTY</span>
      <span>PRICE</span>
    </div>
    <div class="item">
${items}
    </div>
    <div class="total-section">
      <div class="total-row">
        <span>TOTAL</span>
        <span>${escapeHtml(view.totalCost)}</span>
      </div>
      <div class="billed">${escapeHtml(view.totalBilledTokens)} billed of ${escapeHtml(view.totalRawTokens)} tokens @ ${escapeHtml(view.multiplier)}</div>
    </div>
    <div class="footer">
      <div class="cashier">SERVED BY: ${escapeHtml(view.servedBy)}</div>
      <div class="thank-you">Thank you for building!</div>
      <div class="link"><a href="https://factory.ai" target="_blank">factory.ai</a></div>
    </div>
  </div>
</body>
</html>
`;
}
