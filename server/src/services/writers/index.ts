import type { Writer } from "shared";
import { csvWriter } from "./csv";
import { irWriter } from "./ir";
import { jsonWriter } from "./json";
import { xmlWriter } from "./xml";

const writers: ReadonlyMap<string, Writer> = new Map(
  [csvWriter, jsonWriter, xmlWriter, irWriter].map((writer) => [writer.name, writer])
);

export class UnknownWriterError extends Error {
  readonly writerName: string;

  constructor(writerName: string) {
    super(`Unknown writer: ${writerName}`);
    this.name = "UnknownWriterError";
    this.writerName = writerName;
  }
}

export function getWriter(name: string): Writer {
  const writer = writers.get(name);
  if (!writer) {
    throw new UnknownWriterError(name);
  }
  return writer;
}

export function listWriters(): string[] {
  return [...writers.keys()].sort();
}

export { csvWriter, irWriter, jsonWriter, xmlWriter };
