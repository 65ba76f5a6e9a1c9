import type { ReceiptMeta } from "shared";
import { defineWriter } from "../renderer";

const metaObject = (meta: Readonly<ReceiptMeta>): Record<string, string> => {
  const entries: Record<string, string> = {};
  for (const [key, value] of Object.entries(meta)) {
    if (value !== undefined) entries[key] = value;
  }
  return entries;
};

export const jsonWriter = defineWriter("json", {
  Receipt: (body, meta) => `{"meta":${JSON.stringify(metaObject(meta))},"items":${body}}`,
  ItemList: (items) => `[${items}]`,
  ItemListSep: () => ",",
  Item: (name, cost, discount, tax) =>
    `{"name":${name},"cost":${cost},"discount":${discount},"tax":${tax}}`,
  Name: (name) => JSON.stringify(name),
  Cost: (cost) => JSON.stringify(cost),
  Discount: (discount) => JSON.stringify(discount),
  Tax: (tax) => JSON.stringify(tax),
});
