/**
 * Bounded JSON Repair
 *
 * Mapping documents often come from a model that stopped mid-output. One repair
 * pass is attempted: drop a dangling last line, strip one trailing comma, then
 * close whatever `{` / `[` is still open. There is no second pass.
 */

const DANGLING_LINE = /^\[?\{?,?$/;
const STRUCTURAL_CHAR = /[:\]}]/;

/**
 * Unclosed brackets in nesting order, ignoring anything inside string literals.
 * Returns null when a closer does not match its opener; appending cannot fix that.
 */
export function findUnclosed(text: string): string[] | null {
  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (const ch of text) {
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{' || ch === '[') {
      stack.push(ch);
    } else if (ch === '}' || ch === ']') {
      const open = stack.pop();
      if ((ch === '}' && open !== '{') || (ch === ']' && open !== '[')) {
        return null;
      }
    }
  }

  return stack;
}

export function repairJson(text: string): string {
  let repaired = text.trim();

  const lastNewline = repaired.lastIndexOf('\n');
  if (lastNewline !== -1) {
    const lastLine = repaired.slice(lastNewline).trim();
    if (DANGLING_LINE.test(lastLine) || !STRUCTURAL_CHAR.test(lastLine)) {
      repaired = repaired.slice(0, lastNewline).trimEnd();
    }
  }

  if (repaired.endsWith(',')) {
    repaired = repaired.slice(0, -1);
  }

  const unclosed = findUnclosed(repaired);
  if (unclosed) {
    for (let i = unclosed.length - 1; i >= 0; i--) {
      repaired += unclosed[i] === '{' ? '}' : ']';
    }
  }

  return repaired;
}
