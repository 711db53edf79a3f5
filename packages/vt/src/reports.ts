import type { CursorState, ReportQuery } from "@termbed/shared";

/** Reply bytes a VT220-class terminal sends back for a query, as text. */
export function reportReply(query: ReportQuery, cursor: Pick<CursorState, "row" | "col">): string {
  switch (query) {
    case "status":
      return "\x1b[0n";
    case "cursor-position":
      return `\x1b[${cursor.row + 1};${cursor.col + 1}R`;
    case "device-attributes":
      return "\x1b[?1;2c";
    case "secondary-device-attributes":
      return "\x1b[>1;10;0c";
  }
}
