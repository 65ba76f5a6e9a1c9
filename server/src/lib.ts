export {
  createItem,
  createReceipt,
  itemsEqual,
  itemTotal,
  receiptsEqual,
  receiptTotal,
  receiptSchema,
  receiptItemSchema,
} from "./services/receipt";
export type { ReceiptInput, ReceiptItemInput } from "./services/receipt";
export {
  defaultWriterFunctions,
  defineWriter,
  formatFloat,
  renderReceipt,
  WriterConfigurationError,
  WRITER_SLOT_ARITY,
} from "./services/renderer";
export {
  csvWriter,
  getWriter,
  irWriter,
  jsonWriter,
  listWriters,
  UnknownWriterError,
  xmlWriter,
} from "./services/writers";
