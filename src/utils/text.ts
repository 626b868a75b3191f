export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const tailLines = (text: string, maxLines: number): string => {
  const lines = text.trimEnd().split("\n");
  return lines.length <= maxLines ? lines.join("\n") : lines.slice(-maxLines).join("\n");
};
