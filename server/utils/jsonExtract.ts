import JSON5 from 'json5';

/**
 * JSON extraction for model responses: fenced blocks, leading prose and
 * payloads cut off before their closing braces.
 */

export const stripCodeFence = (value: string): string =>
  value.replace(/^\s*```(?:json|json5|text)?\s*\r?\n?/, '').replace(/```[\s\r\n]*$/, '').trim();

const closerFor = (opener: string): string => (opener === '{' ? '}' : ']');

/**
 * Returns the first top-level object or array in `value`. A payload whose
 * closers never arrive is auto-closed from the stack of unmatched openers.
 */
export const extractBalancedJson = (value: string): string | null => {
  const trimmed = value.trim();
  let start = -1;
  let end = -1;
  let inString = false;
  let escapeNext = false;
  const stack: string[] = [];

  for (let i = 0; i < trimmed.length; i += 1) {
    const char = trimmed[i];

    if (inString) {
      if (escapeNext) {
        escapeNext = false;
      } else if (char === '\\') {
        escapeNext = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      if (stack.length > 0) inString = true;
      continue;
    }

    if (char === '{' || char === '[') {
      if (stack.length === 0) start = i;
      stack.push(char);
      continue;
    }

    if ((char === '}' || char === ']') && stack.length > 0) {
      // A mismatched closer still pops so a malformed payload cannot wedge the scan.
      stack.pop();
      if (stack.length === 0) {
        end = i;
        break;
      }
    }
  }

  if (start === -1) {
    return null;
  }
  if (end !== -1) {
    return trimmed.slice(start, end + 1);
  }

  let candidate = trimmed.slice(start);
  if (inString) {
    if (escapeNext) candidate = candidate.slice(0, -1);
    candidate += '"';
  }
  return candidate + stack.slice().reverse().map(closerFor).join('');
};

/** Parses the JSON payload of a model response, tolerating JSON5 syntax. */
export const parseJsonPayload = (rawResponse: string): unknown => {
  const extracted = extractBalancedJson(stripCodeFence(rawResponse));
  if (!extracted) {
    throw new Error('No JSON found in response');
  }
  return JSON5.parse(extracted);
};
