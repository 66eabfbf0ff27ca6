import logger from './logger.js';

const AGGRESSIVE_REPAIR_MAX_CHARS = 50_000;

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/** Trim to the outermost object or array, whichever opens first. */
function sliceToOuterJson(text: string): string {
  const firstBrace = text.indexOf('{');
  const firstBracket = text.indexOf('[');
  const useBrace = firstBrace >= 0 && (firstBracket < 0 || firstBrace < firstBracket);
  const start = useBrace ? firstBrace : firstBracket;
  if (start < 0) return text;
  const end = text.lastIndexOf(useBrace ? '}' : ']');
  return end > start ? text.slice(start, end + 1) : text.slice(start);
}

/** Append closers for brackets left open by a truncated response. */
function closePartial(text: string): string {
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
  const body = inString ? `${text}"` : text;
  return body.replace(/,\s*$/, '') + stack.reverse().join('');
}

/**
 * Best-effort JSON recovery for model output: markdown fences, prose around
 * the payload, trailing commas, single quotes, unquoted keys and truncation.
 * Returns `null` when nothing parses.
 */
export function repairJSON(text: string): unknown {
  if (!text.trim()) return null;

  const unfenced = text.replace(/^\s*```(?:json)?\s*\n?/i, '').replace(/\n?```\s*$/i, '').trim();
  const candidates: string[] = [unfenced];

  const sliced = sliceToOuterJson(unfenced);
  candidates.push(sliced);

  const noTrailing = sliced.replace(/,\s*([\]}])/g, '$1');
  candidates.push(noTrailing);

  if (noTrailing.length <= AGGRESSIVE_REPAIR_MAX_CHARS) {
    const singleQuotes = noTrailing.replace(/(?<=[[{,:])\s*'([^']*)'\s*(?=[,\]}:])/g, '"$1"');
    const quotedKeys = singleQuotes.replace(/([{,]\s*)([A-Za-z_$][A-Za-z0-9_$]*)\s*:/g, '$1"$2":');
    candidates.push(singleQuotes, quotedKeys, closePartial(quotedKeys));
  } else {
    logger.warn({ size: noTrailing.length }, 'Skipping aggressive JSON repair on large input');
  }

  const seen = new Set<string>();
  for (const candidate of candidates) {
    if (seen.has(candidate)) continue;
    seen.add(candidate);
    const parsed = tryParse(candidate);
    if (parsed.ok) return parsed.value;
  }

  logger.warn({ rawSnippet: text.substring(0, 300) }, 'Failed to repair JSON');
  return null;
}
