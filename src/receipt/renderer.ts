import type { ReceiptFormat } from "../config/types.js";
import { renderHtml } from "./html.js";
import { renderSvg } from "./svg.js";
import type { ReceiptDocument, ReceiptKind, ReceiptView } from "./types.js";

export function renderReceipt(view: ReceiptView, kind: ReceiptKind): string {
  switch (kind) {
    case "html":
      return renderHtml(view);
    case "svg":
      return renderSvg(view);
  }
}

export function kindsFor(format: ReceiptFormat): ReceiptKind[] {
  return format === "both" ? ["html", "svg"] : [format];
}

export function renderReceipts(view: ReceiptView, format: ReceiptFormat): ReceiptDocument[] {
  return kindsFor(format).map((kind) => ({ kind, content: renderReceipt(view, kind) }));
}
