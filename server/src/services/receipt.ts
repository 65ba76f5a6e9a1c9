import { z } from "zod";
import type { Receipt, ReceiptItem, ReceiptMeta } from "shared";

export const receiptItemSchema = z.object({
  name: z.string().optional().default(""),
  cost: z.number().finite().optional().default(0),
  discount: z.number().finite().optional().default(0),
  tax: z.number().finite().optional().default(0),
});

export const receiptSchema = z.object({
  meta: z.record(z.string()).optional().default({}),
  items: z.array(receiptItemSchema).optional().default([]),
});

export type ReceiptInput = z.input<typeof receiptSchema>;
export type ReceiptItemInput = z.input<typeof receiptItemSchema>;

const presentMeta = (meta: Readonly<ReceiptMeta>): Record<string, string> =>
  Object.fromEntries(
    Object.entries(meta).filter((entry): entry is [string, string] => entry[1] !== undefined)
  );

/** @throws ZodError when a field has the wrong type or a number is not finite. */
export const createItem = (input: ReceiptItemInput = {}): ReceiptItem =>
  Object.freeze(receiptItemSchema.parse(input));

/** Absent meta values are dropped; items are validated as by {@link createItem}. */
export const createReceipt = (
  meta: Readonly<ReceiptMeta> = {},
  items: readonly ReceiptItemInput[] = []
): Receipt => {
  const parsed = receiptSchema.parse({ meta: presentMeta(meta), items });
  return Object.freeze({
    meta: Object.freeze(parsed.meta),
    items: Object.freeze(parsed.items.map((item) => Object.freeze(item))),
  });
};

// Tax is read as a rate here: 0.08 adds 8% to the cost.
export const itemTotal = (item: ReceiptItem): number =>
  item.cost * (1 + item.tax) - item.discount;

export const receiptTotal = (receipt: Receipt): number =>
  receipt.items.reduce((total, item) => total + itemTotal(item), 0);

export const itemsEqual = (a: ReceiptItem, b: ReceiptItem): boolean =>
  a.name === b.name &&
  a.cost === b.cost &&
  a.discount === b.discount &&
  a.tax === b.tax;

// Meta compares as a set of entries; items compare in order.
export const receiptsEqual = (a: Receipt, b: Receipt): boolean => {
  const metaA = presentMeta(a.meta);
  const metaB = presentMeta(b.meta);
  const keys = Object.keys(metaA);
  return (
    keys.length === Object.keys(metaB).length &&
    keys.every((key) => metaA[key] === metaB[key]) &&
    a.items.length === b.items.length &&
    a.items.every((item, index) => itemsEqual(item, b.items[index]))
  );
};
