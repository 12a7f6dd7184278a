export type ReceiptKind = "html" | "svg";

export interface ReceiptLineItem {
  readonly label: string;
  /** Raw token count with thousands separators. */
  readonly quantity: string;
  readonly price: string;
}

/** Display strings shared by every rendering. Values are not escaped. */
export interface ReceiptView {
  readonly sessionShort: string;
  readonly location: string;
  readonly modelName: string;
  readonly servedBy: string;
  readonly date: string;
  readonly duration: string;
  readonly items: readonly ReceiptLineItem[];
  readonly totalRawTokens: string;
  readonly totalBilledTokens: string;
  readonly multiplier: string;
  readonly totalCost: string;
}

export interface ReceiptDocument {
  readonly kind: ReceiptKind;
  readonly content: string;
}
