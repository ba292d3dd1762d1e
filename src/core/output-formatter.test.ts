import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { OutputFormatter } from "./output-formatter";

describe("OutputFormatter", () => {
  const formatter = new OutputFormatter();

  beforeEach(() => {
    vi.stubEnv("NO_COLOR", "1");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("wraps success output in a JSON envelope", () => {
    const text = formatter.format({ success: true, message: "Done", data: { id: 1 }, meta: { count: 1 } }, true);
    expect(JSON.parse(text)).toEqual({ status: "success", message: "Done", data: { id: 1 }, meta: { count: 1 } });
  });

  it("reports errors in JSON with their code", () => {
    const text = formatter.format({ success: false, code: "UserNotFound", message: "User 'bob' not found" }, true);
    expect(JSON.parse(text)).toEqual({ status: "error", code: "UserNotFound", message: "User 'bob' not found" });
  });

  it("renders a list of records as a table", () => {
    const text = formatter.format(
      {
        success: true,
        message: "Found 2 issues from 2022",
        data: [
          { id: 1, title: "Add" },
          { id: 22, title: "Fix cache" },
        ],
      },
      false,
    );

    expect(text.split("\n")).toEqual([
      "✓ Found 2 issues from 2022",
      "+----+-----------+",
      "| id | title     |",
      "+----+-----------+",
      "| 1  | Add       |",
      "| 22 | Fix cache |",
      "+----+-----------+",
    ]);
  });

  it("says so when a list is empty", () => {
    expect(formatter.format({ success: true, message: "Found 0 issues from 2022", data: [] }, false)).toBe(
      "✓ Found 0 issues from 2022\nℹ No results found",
    );
  });

  it("prefixes text errors with their code", () => {
    expect(formatter.format({ success: false, code: "ValidationError", message: "type is required" }, false)).toBe(
      "✗ [ValidationError] type is required",
    );
    expect(formatter.format({ success: false }, false)).toBe("✗ Command failed");
  });

  it("colors output unless NO_COLOR is set", () => {
    vi.stubEnv("NO_COLOR", "");
    expect(formatter.format({ success: true, message: "Done" }, false)).toBe("\x1b[32m✓ Done\x1b[0m");
  });
});
