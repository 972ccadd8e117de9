const MAX_PUBLIC_MESSAGE_LENGTH = 500;

export function truncateText(value: string, maxLength: number): string {
  if (value.length <= maxLength) {
    return value;
  }
  return `${value.slice(0, Math.max(0, maxLength - 3))}...`;
}

// First line of an error message, bounded. Never includes a stack.
export function toPublicMessage(error: unknown): string {
  const raw = error instanceof Error ? error.message : String(error);
  const firstLine = raw.split(/\r?\n/u).find((line) => line.trim().length > 0) ?? "";
  const normalized = firstLine.trim();
  return truncateText(normalized.length > 0 ? normalized : "unknown error", MAX_PUBLIC_MESSAGE_LENGTH);
}
