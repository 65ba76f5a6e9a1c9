import { describe, expect, it } from "vitest";
import { parseEnv } from "./env-vars";

describe("parseEnv", () => {
  it("applies defaults", () => {
    expect(parseEnv({})).toEqual({
      APP_PORT: 3000,
      DEFAULT_WRITER: "csv",
      MAX_BODY_SIZE: 1048576,
    });
  });

  it("reads numeric settings", () => {
    const env = parseEnv({ APP_PORT: "8080", MAX_BODY_SIZE: "2048", DEFAULT_WRITER: "json" });
    expect(env.APP_PORT).toBe(8080);
    expect(env.MAX_BODY_SIZE).toBe(2048);
    expect(env.DEFAULT_WRITER).toBe("json");
  });

  it("rejects an empty writer name", () => {
    expect(() => parseEnv({ DEFAULT_WRITER: "" })).toThrow();
  });
});
