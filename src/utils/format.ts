// Formatting helpers for log lines.

/** Space separated, upper-case hex dump of a frame, e.g. `01 03 00 0A`. */
export function toHex(bytes: ArrayLike<number>): string {
  return Array.from(bytes, (b) =>
    b.toString(16).toUpperCase().padStart(2, "0"),
  ).join(" ");
}
