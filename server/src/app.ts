import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import { logger as accessLogger } from "hono/logger";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";
import type { ApiError, Writer } from "shared";
import env from "./utils/env-vars";
import { logger } from "./utils/logger";
import { receiptSchema, receiptTotal, createReceipt } from "./services/receipt";
import { renderReceipt } from "./services/renderer";
import { getWriter, listWriters, UnknownWriterError } from "./services/writers";

export interface AppOptions {
  maxBodySize?: number;
  defaultWriter?: string;
  writers?: {
    get: (name: string) => Writer;
    list: () => string[];
  };
}

export function createApp({
  maxBodySize = env.MAX_BODY_SIZE,
  defaultWriter = env.DEFAULT_WRITER,
  writers = { get: getWriter, list: listWriters },
}: AppOptions = {}) {
  const app = new Hono();

  app.use(accessLogger((message, ...rest) => logger.info(message, ...rest)));
  app.use(
    bodyLimit({
      maxSize: maxBodySize,
      onError: (c) =>
        c.json({ error: `Max body size is ${maxBodySize} bytes` } satisfies ApiError, 413),
    })
  );

  app.get("/healthz", async (c) => {
    return c.text("OK", 200);
  });

  app.get("/writers", (c) => {
    return c.json({ writers: writers.list() }, 200);
  });

  app.post(
    "/render",
    zValidator(
      "json",
      z.object({
        writer: z.string().nonempty().optional(),
        receipt: receiptSchema,
        variables: z.record(z.string()).optional(),
      })
    ),
    (c) => {
      const { writer: writerName = defaultWriter, receipt, variables } = c.req.valid("json");

      let writer: Writer;
      try {
        writer = writers.get(writerName);
      } catch (err) {
        if (err instanceof UnknownWriterError) {
          logger.warn("Render requested with unknown writer", { writer: writerName });
          return c.json({ error: err.message } satisfies ApiError, 404);
        }
        throw err;
      }

      try {
        const output = renderReceipt(
          writer,
          createReceipt(receipt.meta, receipt.items),
          variables
        );
        logger.debug("Rendered receipt", { writer: writer.name, items: receipt.items.length });
        return c.text(output, 200);
      } catch (err) {
        logger.error("Error rendering receipt:", err);
        const error = err instanceof Error ? err.message : "An unknown error occurred.";
        return c.json({ error } satisfies ApiError, 500);
      }
    }
  );

  app.post(
    "/summary",
    zValidator("json", z.object({ receipt: receiptSchema })),
    (c) => {
      const { receipt } = c.req.valid("json");
      const parsed = createReceipt(receipt.meta, receipt.items);
      return c.json({ itemCount: parsed.items.length, total: receiptTotal(parsed) }, 200);
    }
  );

  return app;
}

const app = createApp();

export default app;
