import { z } from "zod";
import type {
  Receipt,
  ReceiptMetaKey,
  Writer,
  WriterFunctions,
  WriterOverrides,
  WriterSlot,
  WriterVariables,
} from "shared";

// Number of arguments the renderer passes to each slot.
export const WRITER_SLOT_ARITY: Readonly<Record<WriterSlot, number>> = {
  Receipt: 3,
  ItemList: 1,
  ItemListSep: 0,
  Item: 4,
  Name: 1,
  Cost: 1,
  Discount: 1,
  Tax: 1,
};

const META_HEADINGS: ReadonlyArray<[ReceiptMetaKey, string]> = [
  ["store", "Store"],
  ["date", "Date"],
  ["location", "Location"],
];

/**
 * Float rendering: integral values keep a fractional part, so `0` becomes
 * `"0.0"` and `9` becomes `"9.0"`. Other values use the shortest
 * round-trip form.
 */
export function formatFloat(n: number): string {
  if (Number.isInteger(n) && Math.abs(n) < 1e16) {
    return n.toFixed(1);
  }
  return String(n);
}

export const defaultWriterFunctions: Readonly<WriterFunctions> = Object.freeze({
  Receipt: (body, meta) => {
    const output: string[] = [];
    for (const [key, heading] of META_HEADINGS) {
      const value = meta[key];
      if (value !== undefined) {
        output.push(`# ${heading}: ${value}`);
      }
    }
    output.push(body);
    return output.join("\n");
  },
  ItemList: (items) => items,
  ItemListSep: () => "\n",
  Item: (name, cost, discount, tax) => [name, cost, discount, tax].join(", "),
  Name: (name) => name,
  Cost: (cost) => String(cost),
  Discount: (discount) => String(discount),
  Tax: (tax) => formatFloat(tax),
} satisfies WriterFunctions);

export class WriterConfigurationError extends Error {
  readonly slot: WriterSlot | undefined;

  constructor(message: string, slot?: WriterSlot) {
    super(message);
    this.name = "WriterConfigurationError";
    this.slot = slot;
  }
}

const isWriterSlot = (key: string): key is WriterSlot =>
  Object.prototype.hasOwnProperty.call(WRITER_SLOT_ARITY, key);

const slotFunctionSchema = (slot: WriterSlot) =>
  z
    .custom<(...args: never[]) => unknown>(
      (value) => typeof value === "function",
      { message: `${slot} must be a function` }
    )
    .refine((fn) => fn.length <= WRITER_SLOT_ARITY[slot], {
      message: `${slot} accepts at most ${WRITER_SLOT_ARITY[slot]} argument(s)`,
    });

const overridesSchema = z
  .object({
    Receipt: slotFunctionSchema("Receipt").optional(),
    ItemList: slotFunctionSchema("ItemList").optional(),
    ItemListSep: slotFunctionSchema("ItemListSep").optional(),
    Item: slotFunctionSchema("Item").optional(),
    Name: slotFunctionSchema("Name").optional(),
    Cost: slotFunctionSchema("Cost").optional(),
    Discount: slotFunctionSchema("Discount").optional(),
    Tax: slotFunctionSchema("Tax").optional(),
  })
  .strict();

function validateOverrides(name: string, overrides: WriterOverrides): void {
  const result = overridesSchema.safeParse(overrides);
  if (result.success) {
    return;
  }
  const issue = result.error.issues[0];
  const key = issue?.path[0];
  const slot = typeof key === "string" && isWriterSlot(key) ? key : undefined;
  const message =
    issue?.code === "unrecognized_keys"
      ? `Unknown writer function(s): ${issue.keys.join(", ")}`
      : issue?.message ?? "Invalid writer functions";
  throw new WriterConfigurationError(`Writer "${name}": ${message}`, slot);
}

// Only writers returned by defineWriter skip validation in renderReceipt.
const builtWriters = new WeakSet<object>();

/**
 * Builds a writer from a bundle of overrides. Each slot resolves to the
 * supplied function or to its default; slots are independent of each other.
 *
 * @throws WriterConfigurationError when a key is not a known slot, a value is
 * not a function, or a function takes more parameters than its slot passes.
 */
export function defineWriter(name: string, overrides: WriterOverrides = {}): Writer {
  validateOverrides(name, overrides);
  const writer: Writer = Object.freeze({
    name,
    functions: Object.freeze({ ...defaultWriterFunctions, ...definedOnly(overrides) }),
  });
  builtWriters.add(writer);
  return writer;
}

function definedOnly(overrides: WriterOverrides): WriterOverrides {
  const defined: WriterOverrides = {};
  for (const [key, fn] of Object.entries(overrides)) {
    if (fn !== undefined && isWriterSlot(key)) {
      Object.assign(defined, { [key]: fn });
    }
  }
  return defined;
}

const isWriter = (writer: Writer | WriterOverrides): writer is Writer =>
  builtWriters.has(writer);

function expectString(writer: Writer, slot: WriterSlot, value: unknown): string {
  if (typeof value !== "string") {
    throw new WriterConfigurationError(
      `Writer "${writer.name}": ${slot} returned ${typeof value}, expected string`,
      slot
    );
  }
  return value;
}

/**
 * Renders a receipt with the given writer (or a bare override bundle).
 * Anything not built by defineWriter is validated as an override bundle, so
 * a hand-made `{ name, functions }` object is rejected. Errors thrown by
 * writer functions reach the caller unchanged.
 */
export function renderReceipt(
  writer: Writer | WriterOverrides,
  receipt: Receipt,
  variables: WriterVariables = {}
): string {
  const resolved = isWriter(writer) ? writer : defineWriter("custom", writer);
  const fs = resolved.functions;
  const check = (slot: WriterSlot, value: unknown) =>
    expectString(resolved, slot, value);

  const items = receipt.items.map((item) =>
    check(
      "Item",
      fs.Item(
        check("Name", fs.Name(item.name)),
        check("Cost", fs.Cost(item.cost)),
        check("Discount", fs.Discount(item.discount)),
        check("Tax", fs.Tax(item.tax))
      )
    )
  );
  const body = check("ItemList", fs.ItemList(items.join(check("ItemListSep", fs.ItemListSep()))));

  return check("Receipt", fs.Receipt(body, receipt.meta, variables));
}
