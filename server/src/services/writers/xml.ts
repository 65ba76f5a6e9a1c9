import type { ReceiptMetaKey } from "shared";
import { defineWriter } from "../renderer";

const XML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&apos;",
};

export const escapeXml = (text: string): string =>
  text.replace(/[&<>"']/g, (ch) => XML_ESCAPES[ch] ?? ch);

const element = (tag: string, text: string) => `<${tag}>${text}</${tag}>`;

const META_KEYS: readonly ReceiptMetaKey[] = ["store", "date", "location"];

export const xmlWriter = defineWriter("xml", {
  Receipt: (body, meta) => {
    const lines = ['<?xml version="1.0" encoding="UTF-8"?>', "<receipt>"];
    for (const key of META_KEYS) {
      const value = meta[key];
      if (value !== undefined) lines.push(`  ${element(key, escapeXml(value))}`);
    }
    lines.push(body, "</receipt>");
    return lines.join("\n");
  },
  ItemList: (items) => (items ? `  <items>\n${items}\n  </items>` : "  <items/>"),
  Item: (name, cost, discount, tax) =>
    `    <item>${element("name", name)}${element("cost", cost)}${element("discount", discount)}${element("tax", tax)}</item>`,
  Name: (name) => escapeXml(name),
});
