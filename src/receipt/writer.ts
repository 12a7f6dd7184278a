import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { ensureDir } from "../config/paths.js";
import type { ReceiptDocument, ReceiptKind } from "./types.js";

export interface WrittenReceipt {
  readonly kind: ReceiptKind;
  readonly path: string;
}

export function receiptFileName(sessionId: string, kind: ReceiptKind): string {
  return `${sessionId.replace(/[/\\]/g, "_")}.${kind}`;
}

/** Overwrites any receipt already written for the same session. */
export function writeReceipts(
  dir: string,
  sessionId: string,
  documents: readonly ReceiptDocument[],
): WrittenReceipt[] {
  ensureDir(dir);
  return documents.map((doc) => {
    const path = join(dir, receiptFileName(sessionId, doc.kind));
    writeFileSync(path, doc.content, "utf-8");
    return { kind: doc.kind, path };
  });
}
