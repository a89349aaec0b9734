import { describe, it, expect } from "vitest";
import { parseSessionConfig, sessionConfigSchema } from "../schemas/session.schemas.js";

describe("session.schemas", () => {
  it("should fill in defaults for an empty config", () => {
    expect(parseSessionConfig()).toEqual({
      shell: "/bin/bash",
      term: "xterm",
      rows: 100,
      columns: 100,
      env: {},
    });
  });

  it("should keep provided values", () => {
    const config = parseSessionConfig({ shell: "/bin/zsh", rows: 50, env: { TZ: "UTC" } });

    expect(config.shell).toBe("/bin/zsh");
    expect(config.rows).toBe(50);
    expect(config.columns).toBe(100);
    expect(config.env).toEqual({ TZ: "UTC" });
  });

  it("should list every invalid field", () => {
    expect(() => parseSessionConfig({ shell: "", columns: 1.5 })).toThrow(
      "Invalid session config: shell: Shell path is required; columns: Expected integer, received float"
    );
  });

  it("should reject non-string env values", () => {
    const result = sessionConfigSchema.safeParse({ env: { PORT: 8080 } });

    expect(result.success).toBe(false);
  });
});
