export type ParseResult<T> = { kind: "parsed"; value: T } | { kind: "unparseable"; raw: string };

export type JsonObject = Record<string, unknown>;

const parsed = <T>(value: T): ParseResult<T> => ({ kind: "parsed", value });
const unparseable = <T>(raw: string): ParseResult<T> => ({ kind: "unparseable", raw });

export const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const tryParseObject = (candidate: string): JsonObject | undefined => {
  try {
    const value: unknown = JSON.parse(candidate);
    return isJsonObject(value) ? value : undefined;
  } catch {
    return undefined;
  }
};

const findFirstJsonObjectSlice = (text: string): JsonObject | undefined => {
  for (let start = 0; start < text.length; start += 1) {
    if (text[start] !== "{") {
      continue;
    }

    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let end = start; end < text.length; end += 1) {
      const ch = text[end];

      if (inString) {
        if (escaped) {
          escaped = false;
        } else if (ch === "\\") {
          escaped = true;
        } else if (ch === "\"") {
          inString = false;
        }
        continue;
      }

      if (ch === "\"") {
        inString = true;
      } else if (ch === "{") {
        depth += 1;
      } else if (ch === "}") {
        depth -= 1;
        if (depth === 0) {
          const value = tryParseObject(text.slice(start, end + 1));
          if (value) return value;
          break;
        }
      }
    }
  }

  return undefined;
};

export const parseRawJson = (text: string): ParseResult<JsonObject> => {
  const value = tryParseObject(text.trim());
  return value ? parsed(value) : unparseable(text);
};

export const parseFencedJson = (text: string): ParseResult<JsonObject> => {
  for (const match of text.matchAll(/```json\s*([\s\S]*?)```/gi)) {
    const body = match[1].trim();
    const value = tryParseObject(body) ?? findFirstJsonObjectSlice(body);
    if (value) return parsed(value);
  }
  return unparseable(text);
};

export const parseFencedPlain = (text: string): ParseResult<JsonObject> => {
  for (const match of text.matchAll(/```[a-zA-Z0-9_-]*\s*\n([\s\S]*?)```/g)) {
    const value = tryParseObject(match[1].trim());
    if (value) return parsed(value);
  }
  return unparseable(text);
};

export const parseBareJsonObject = (text: string): ParseResult<JsonObject> => {
  const value = findFirstJsonObjectSlice(text);
  return value ? parsed(value) : unparseable(text);
};

const jsonChain = [parseRawJson, parseFencedJson, parseFencedPlain, parseBareJsonObject];

/** First arm that yields a JSON object wins. */
export const parseJsonObjectChain = (text: string): ParseResult<JsonObject> => {
  for (const attempt of jsonChain) {
    const result = attempt(text);
    if (result.kind === "parsed") return result;
  }
  return unparseable(text);
};

/**
 * Pulls `FILE: <path>` headers each followed by one fenced block, the layout models fall back to
 * when they ignore the JSON instruction.
 */
export const extractFileBlocks = (text: string): ParseResult<Record<string, string>> => {
  const files: Record<string, string> = {};
  const pattern = /^(?:#{1,6}\s*)?(?:FILE|File|file):\s*`?([^\s`]+)`?\s*\n```[^\n]*\n([\s\S]*?)\n?```/gm;

  for (const match of text.matchAll(pattern)) {
    files[match[1]] = match[2];
  }

  return Object.keys(files).length > 0 ? parsed(files) : unparseable(text);
};
