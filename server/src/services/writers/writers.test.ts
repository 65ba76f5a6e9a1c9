import { describe, expect, it } from "vitest";
import { createReceipt } from "../receipt";
import { defaultWriterFunctions, renderReceipt } from "../renderer";
import { getWriter, listWriters, UnknownWriterError } from "./index";
import { escapeXml } from "./xml";

const groceries = createReceipt({ store: "Acme", date: "2024-01-01" }, [
  { name: "Milk", cost: 3, discount: 0, tax: 0.08 },
  { name: "Bread", cost: 2, discount: 0, tax: 0 },
]);

describe("writer registry", () => {
  it("lists the built-in writers by name", () => {
    expect(listWriters()).toEqual(["csv", "ir", "json", "xml"]);
  });

  it("throws UnknownWriterError for a missing writer", () => {
    expect(() => getWriter("yaml")).toThrow(UnknownWriterError);
    expect(() => getWriter("yaml")).toThrow("Unknown writer: yaml");
  });
});

describe("csv writer", () => {
  it("renders commented meta lines and comma separated items", () => {
    expect(renderReceipt(getWriter("csv"), groceries)).toBe(
      "# Store: Acme\n# Date: 2024-01-01\nMilk, 3, 0, 0.08\nBread, 2, 0, 0.0"
    );
  });
});

describe("json writer", () => {
  it("renders a JSON document", () => {
    const output = renderReceipt(getWriter("json"), groceries);
    expect(output).toBe(
      '{"meta":{"store":"Acme","date":"2024-01-01"},"items":[' +
        '{"name":"Milk","cost":3,"discount":0,"tax":0.08},' +
        '{"name":"Bread","cost":2,"discount":0,"tax":0}]}'
    );
    expect(JSON.parse(output)).toEqual({
      meta: { store: "Acme", date: "2024-01-01" },
      items: [
        { name: "Milk", cost: 3, discount: 0, tax: 0.08 },
        { name: "Bread", cost: 2, discount: 0, tax: 0 },
      ],
    });
  });

  it("escapes names and keeps extra meta keys", () => {
    const receipt = createReceipt({ cashier: "Lee" }, [{ name: 'Say "cheese"' }]);
    expect(JSON.parse(renderReceipt(getWriter("json"), receipt))).toEqual({
      meta: { cashier: "Lee" },
      items: [{ name: 'Say "cheese"', cost: 0, discount: 0, tax: 0 }],
    });
  });

  it("renders an empty item array", () => {
    expect(renderReceipt(getWriter("json"), createReceipt())).toBe('{"meta":{},"items":[]}');
  });
});

describe("xml writer", () => {
  it("escapes reserved characters", () => {
    expect(escapeXml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&apos;s&lt;/a&gt;"
    );
  });

  it("renders meta elements and items", () => {
    const receipt = createReceipt({ store: "Tom & Jerry's" }, [
      { name: "<Milk>", cost: 3, discount: 0.5, tax: 0 },
    ]);
    expect(renderReceipt(getWriter("xml"), receipt)).toBe(
      [
        '<?xml version="1.0" encoding="UTF-8"?>',
        "<receipt>",
        "  <store>Tom &amp; Jerry&apos;s</store>",
        "  <items>",
        "    <item><name>&lt;Milk&gt;</name><cost>3</cost><discount>0.5</discount><tax>0.0</tax></item>",
        "  </items>",
        "</receipt>",
      ].join("\n")
    );
  });

  it("keeps the default Tax slot", () => {
    expect(getWriter("xml").functions.Tax).toBe(defaultWriterFunctions.Tax);
  });

  it("renders an empty item list as a self-closing element", () => {
    expect(renderReceipt(getWriter("xml"), createReceipt())).toBe(
      '<?xml version="1.0" encoding="UTF-8"?>\n<receipt>\n  <items/>\n</receipt>'
    );
  });
});

describe("ir writer", () => {
  it("renders constructor notation", () => {
    expect(renderReceipt(getWriter("ir"), groceries)).toBe(
      'Receipt({"store":"Acme","date":"2024-01-01"}, ItemList([' +
        'Item("Milk", 3, 0, 0.08), Item("Bread", 2, 0, 0.0)]))'
    );
  });

  it("renders an empty receipt", () => {
    expect(renderReceipt(getWriter("ir"), createReceipt())).toBe("Receipt({}, ItemList([]))");
  });
});
