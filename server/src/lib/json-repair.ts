import logger from './logger.js';

const MAX_AGGRESSIVE_REPAIR_CHARS = 50_000;

function tryParse(text: string): unknown | undefined {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
}

/** Slice from the first `{`/`[` to its last matching closer, if any. */
function sliceOuterJson(text: string): string | null {
  const firstBrace = text.indexOf('{');
  const firstBracket = text.indexOf('[');
  let start = -1;
  let closeChar = '';

  if (firstBrace >= 0 && (firstBracket < 0 || firstBrace < firstBracket)) {
    start = firstBrace;
    closeChar = '}';
  } else if (firstBracket >= 0) {
    start = firstBracket;
    closeChar = ']';
  }
  if (start < 0) return null;

  const lastClose = text.lastIndexOf(closeChar);
  return lastClose > start ? text.slice(start, lastClose + 1) : text.slice(start);
}

/** Append the closers a truncated completion never emitted. */
function closeTruncated(text: string): string {
  const stack: string[] = [];
  let inString = false;
  let escape = false;
  for (const ch of text) {
    if (escape) { escape = false; continue; }
    if (ch === '\\' && inString) { escape = true; continue; }
    if (ch === '"') { inString = !inString; continue; }
    if (inString) continue;
    if (ch === '{') stack.push('}');
    else if (ch === '[') stack.push(']');
    else if (ch === '}' || ch === ']') stack.pop();
  }
  const suffix = (inString ? '"' : '') + stack.reverse().join('');
  return text.replace(/,\s*$/, '') + suffix;
}

/**
 * Parse JSON out of a model completion that may be wrapped in markdown fences
 * or prose, carry trailing commas, unquoted keys, or be cut off mid-object.
 * Returns `undefined` when nothing parseable is left.
 */
export function repairJSON(text: string): unknown | undefined {
  if (!text.trim()) return undefined;

  const unfenced = text.replace(/^\s*```(?:json)?\s*\n?/i, '').replace(/\n?```\s*$/i, '').trim();
  const direct = tryParse(unfenced);
  if (direct !== undefined) return direct;

  const sliced = sliceOuterJson(unfenced);
  if (sliced === null) {
    logger.debug({ rawSnippet: text.substring(0, 200) }, 'No JSON object in completion');
    return undefined;
  }
  const slicedParsed = tryParse(sliced);
  if (slicedParsed !== undefined) return slicedParsed;

  const noTrailing = sliced.replace(/,\s*([\]}])/g, '$1');
  const noTrailingParsed = tryParse(noTrailing);
  if (noTrailingParsed !== undefined) return noTrailingParsed;

  if (noTrailing.length > MAX_AGGRESSIVE_REPAIR_CHARS) {
    logger.warn({ size: noTrailing.length }, 'Skipping aggressive JSON repair on large input');
    return undefined;
  }

  const quotedKeys = noTrailing
    .replace(/(?<=[[{,:])\s*'([^']*)'\s*(?=[,\]}:])/g, '"$1"')
    .replace(/([{,]\s*)([A-Za-z_$][A-Za-z0-9_$]*)\s*:/g, '$1"$2":');
  const quotedParsed = tryParse(quotedKeys);
  if (quotedParsed !== undefined) return quotedParsed;

  const closed = closeTruncated(quotedKeys);
  if (closed !== quotedKeys) {
    const closedParsed = tryParse(closed);
    if (closedParsed !== undefined) return closedParsed;
  }

  logger.debug({ rawSnippet: text.substring(0, 300) }, 'Failed to repair JSON');
  return undefined;
}
