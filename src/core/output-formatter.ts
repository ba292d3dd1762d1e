import type { CommandOutput } from "../types/command-output";
import { success, error, info } from "./colors";

export class OutputFormatter {
  format(output: CommandOutput, jsonMode: boolean): string {
    if (jsonMode) {
      return JSON.stringify(
        output.success
          ? {
              status: "success",
              message: output.message,
              data: output.data,
              meta: output.meta,
            }
          : {
              status: "error",
              code: output.code,
              message: output.message ?? output.error?.message,
            },
        null,
        2
      );
    }

    if (output.success) {
      let result = "";
      if (output.message) {
        result += success(output.message) + "\n";
      }

      if (output.data) {
        result += this.formatData(output.data);
      }

      return result.trimEnd();
    }

    const code = output.code ? `[${output.code}] ` : "";
    return error(`${code}${output.message || output.error?.message || "Command failed"}`);
  }

  private formatData(data: unknown): string {
    if (Array.isArray(data)) {
      if (data.length === 0) {
        return info("No results found");
      }

      const rows = data.filter(
        (item): item is Record<string, unknown> => typeof item === "object" && item !== null
      );
      if (rows.length === data.length) {
        return this.formatTable(rows);
      }

      return data.map((item) => JSON.stringify(item, null, 2)).join("\n");
    }

    if (typeof data === "object" && data !== null) {
      return JSON.stringify(data, null, 2);
    }

    return String(data);
  }

  formatTable(items: Array<Record<string, unknown>>): string {
    const firstItem = items[0];
    if (!firstItem) {
      return "";
    }

    const headers = Object.keys(firstItem);
    const rows = items.map((item) => headers.map((h) => String(item[h] ?? "")));

    const colWidths = headers.map((h, i) =>
      Math.max(h.length, ...rows.map((r) => r[i]?.length ?? 0))
    );

    const separator = "+" + colWidths.map((w) => "-".repeat(w + 2)).join("+") + "+";
    const renderRow = (cells: string[]): string =>
      "|" +
      cells
        .map((cell, i) => {
          const width = colWidths[i] ?? cell.length;
          return ` ${cell.padEnd(width)} `;
        })
        .join("|") +
      "|";

    let result = separator + "\n";
    result += renderRow(headers) + "\n";
    result += separator + "\n";

    for (const row of rows) {
      result += renderRow(row) + "\n";
    }
    result += separator + "\n";

    return result;
  }
}

export const outputFormatter = new OutputFormatter();
