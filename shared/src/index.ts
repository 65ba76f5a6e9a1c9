export type { Receipt, ReceiptItem, ReceiptMeta, ReceiptMetaKey } from "./types/receipt";
export type {
  ApiError,
  Writer,
  WriterFunctions,
  WriterOverrides,
  WriterSlot,
  WriterVariables,
} from "./types/writer";
