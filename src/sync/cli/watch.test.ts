import { describe, expect, it } from "vitest";
import { ConfigError } from "@/sync/errors";
import { watchRule } from "./watch";

describe("watchRule", () => {
  it("fires every N minutes below an hour", () => {
    expect(watchRule(1)).toBe("*/1 * * * *");
    expect(watchRule(15)).toBe("*/15 * * * *");
  });

  it("fires on the hour for whole-hour intervals", () => {
    expect(watchRule(60)).toBe("0 */1 * * *");
    expect(watchRule(180)).toBe("0 */3 * * *");
  });

  it.each([0, -5, 2.5, 90, 1440])("rejects %s minutes", (minutes) => {
    expect(() => watchRule(minutes)).toThrow(ConfigError);
  });
});
