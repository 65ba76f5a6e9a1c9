import type { ReceiptMeta } from "./receipt";

export type WriterVariables = Record<string, string>;

/**
 * One formatting function per structural node of a receipt. The renderer
 * calls them bottom-up: fields, then items, then the item list, then the
 * receipt itself.
 */
export interface WriterFunctions {
  Receipt: (body: string, meta: Readonly<ReceiptMeta>, variables: WriterVariables) => string;
  ItemList: (items: string) => string;
  ItemListSep: () => string;
  Item: (name: string, cost: string, discount: string, tax: string) => string;
  Name: (name: string) => string;
  Cost: (cost: number) => string;
  Discount: (discount: number) => string;
  Tax: (tax: number) => string;
}

export type WriterSlot = keyof WriterFunctions;

export type WriterOverrides = Partial<WriterFunctions>;

export interface Writer {
  readonly name: string;
  readonly functions: Readonly<WriterFunctions>;
}

export interface ApiError {
  error: string;
}
