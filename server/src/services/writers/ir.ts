import { defineWriter } from "../renderer";

/**
 * Constructor notation for a receipt, e.g.
 * `Receipt({"store":"Acme"}, ItemList([Item("Milk", 3, 0, 0.08)]))`.
 */
export const irWriter = defineWriter("ir", {
  Receipt: (body, meta) => `Receipt(${JSON.stringify(meta)}, ${body})`,
  ItemList: (items) => `ItemList([${items}])`,
  ItemListSep: () => ", ",
  Item: (name, cost, discount, tax) => `Item(${name}, ${cost}, ${discount}, ${tax})`,
  Name: (name) => JSON.stringify(name),
});
