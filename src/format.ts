/** Renders a key or value for diagnostics. */
export function formatValue(value: unknown): string {
  switch (typeof value) {
    case "string":
      return JSON.stringify(value);
    case "bigint":
      return `${value}n`;
    case "function":
      return `[Function ${value.name || "anonymous"}]`;
    case "object":
      if (value === null) {
        return "null";
      }
      try {
        return JSON.stringify(value);
      } catch {
        // cyclic structures
        return String(value);
      }
    default:
      return String(value);
  }
}
