export type ReceiptMetaKey = "store" | "date" | "location";

// Keys beyond store/date/location are writer-specific extensions.
export type ReceiptMeta = Partial<Record<ReceiptMetaKey, string>> &
  Record<string, string | undefined>;

export interface Receipt {
  readonly meta: Readonly<ReceiptMeta>;
  readonly items: readonly ReceiptItem[];
}

export interface ReceiptItem {
  readonly name: string;
  readonly cost: number;
  readonly discount: number;
  readonly tax: number;
}
