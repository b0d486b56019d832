import { ResponseParseError } from '../../utils/errors';

export type JsonObject = Record<string, unknown>;

const FENCE_BLOCK = /```[a-zA-Z0-9_-]*[ \t]*\r?\n?([\s\S]*?)```/g;
const FENCE_MARKER = /```[a-zA-Z0-9_-]*/g;

/**
 * Extracts the JSON object from a model answer. Tried in order: the last
 * balanced top-level `{...}` block, each fenced code block, then the whole
 * text with fence markers removed.
 */
export function parseModelResponse(text: string): JsonObject {
  const candidates = [
    lastTopLevelObject(text),
    ...[...text.matchAll(FENCE_BLOCK)].map((match) => match[1]),
    text.replace(FENCE_MARKER, ''),
  ];

  for (const candidate of candidates) {
    if (candidate === undefined) continue;
    const parsed = tryParseObject(candidate.trim());
    if (parsed) return parsed;
  }

  throw new ResponseParseError('No JSON object found in model response', text);
}

function tryParseObject(candidate: string): JsonObject | undefined {
  if (!candidate) return undefined;
  try {
    const value: unknown = JSON.parse(candidate);
    return isJsonObject(value) ? value : undefined;
  } catch {
    return undefined;
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Braces inside JSON string literals do not count towards nesting. */
export function lastTopLevelObject(text: string): string | undefined {
  let depth = 0;
  let start = -1;
  let inString = false;
  let escaped = false;
  let last: string | undefined;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }
    if (char === '"' && depth > 0) {
      inString = true;
    } else if (char === '{') {
      if (depth === 0) start = i;
      depth++;
    } else if (char === '}' && depth > 0) {
      depth--;
      if (depth === 0) last = text.slice(start, i + 1);
    }
  }

  return last;
}
