import { z } from "zod";

const envScheme = z.object({
  NODE_ENV: z.string().optional(),
  APP_PORT: z
    .string()
    .optional()
    .transform((str) => (str && parseInt(str)) || 3000),
  DEFAULT_WRITER: z.string().nonempty().optional().default("csv"),
  MAX_BODY_SIZE: z
    .string()
    .optional()
    // Default body size is 1MB
    .transform((str) => (str && parseInt(str)) || 1048576),
});

export type Env = z.infer<typeof envScheme>;

export const parseEnv = (source: Record<string, string | undefined>): Env =>
  envScheme.parse(source);

const env = parseEnv(process.env);

export default env;
