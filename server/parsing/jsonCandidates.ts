export type PayloadShape = "array" | "object";

export type ParsedPayload =
  | { kind: "structured"; value: unknown }
  | { kind: "fragment"; value: unknown }
  | { kind: "opaque"; text: string };

const bracketPairs: Record<PayloadShape, { open: string; close: string }> = {
  array: { open: "[", close: "]" },
  object: { open: "{", close: "}" }
};

function sanitizeJsonCandidate(value: string): string {
  return value
    .replace(/^\uFEFF/, "")
    .replace(/[\u200B-\u200D\u2060]/g, "")
    .replace(/[\u201C\u201D]/g, "\"")
    .replace(/[\u2018\u2019]/g, "'")
    .trim();
}

export function stripCodeFence(value: string): string {
  let output = value.trim();
  const opening = output.match(/^```[A-Za-z0-9_-]*[ \t]*\r?\n?/);
  if (opening) {
    output = output.slice(opening[0].length);
  }
  if (output.endsWith("```")) {
    output = output.slice(0, -3);
  }
  return output.trim();
}

function removeTrailingCommas(value: string): string {
  let output = "";
  let inString = false;
  let escaped = false;

  for (let index = 0; index < value.length; index += 1) {
    const char = value[index];

    if (inString) {
      output += char;
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === "\"") {
        inString = false;
      }
      continue;
    }

    if (char === "\"") {
      inString = true;
      output += char;
      continue;
    }

    if (char === ",") {
      let lookAhead = index + 1;
      while (lookAhead < value.length && /\s/.test(value[lookAhead])) {
        lookAhead += 1;
      }

      const nextChar = value[lookAhead];
      if (nextChar === "}" || nextChar === "]") {
        continue;
      }
    }

    output += char;
  }

  return output;
}

function stripJsonComments(value: string): string {
  let output = "";
  let inString = false;
  let escaped = false;

  for (let index = 0; index < value.length; index += 1) {
    const char = value[index];
    const next = value[index + 1];

    if (inString) {
      output += char;
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === "\"") {
        inString = false;
      }
      continue;
    }

    if (char === "\"") {
      inString = true;
      output += char;
      continue;
    }

    if (char === "/" && next === "/") {
      while (index < value.length && value[index] !== "\n") {
        index += 1;
      }
      output += "\n";
      continue;
    }

    if (char === "/" && next === "*") {
      index += 2;
      while (index < value.length && !(value[index] === "*" && value[index + 1] === "/")) {
        index += 1;
      }
      index += 1;
      continue;
    }

    output += char;
  }

  return output;
}

/**
 * Returns the first balanced `open ... close` span of `text`, skipping brackets that
 * appear inside string literals. Starts over from the next opener when a span never closes.
 */
export function extractFirstBalanced(text: string, shape: PayloadShape): string | null {
  const { open, close } = bracketPairs[shape];
  let start = text.indexOf(open);

  while (start !== -1) {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let index = start; index < text.length; index += 1) {
      const char = text[index];

      if (inString) {
        if (escaped) {
          escaped = false;
        } else if (char === "\\") {
          escaped = true;
        } else if (char === "\"") {
          inString = false;
        }
        continue;
      }

      if (char === "\"") {
        inString = true;
        continue;
      }

      if (char === open) {
        depth += 1;
        continue;
      }

      if (char === close) {
        depth -= 1;
        if (depth === 0) {
          return text.slice(start, index + 1);
        }
      }
    }

    start = text.indexOf(open, start + 1);
  }

  return null;
}

function tryParse(candidate: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(candidate) };
  } catch {
    return { ok: false };
  }
}

function parseWithRepairs(candidate: string): { ok: true; value: unknown } | { ok: false } {
  const direct = tryParse(candidate);
  if (direct.ok) {
    return direct;
  }

  const noComments = stripJsonComments(candidate);
  const repairs = [noComments, removeTrailingCommas(candidate), removeTrailingCommas(noComments)];
  for (const repaired of repairs) {
    const parsed = tryParse(repaired);
    if (parsed.ok) {
      return parsed;
    }
  }

  return { ok: false };
}

function fencedBodies(text: string): string[] {
  const bodies = [stripCodeFence(text)];
  for (const block of text.matchAll(/```[A-Za-z0-9_-]*\s*([\s\S]*?)```/g)) {
    bodies.push(block[1].trim());
  }
  return bodies;
}

// Untouched bodies come first: curly quotes inside a valid string must survive the strict parse.
function collectBodies(rawOutput: string): string[] {
  const bodies = new Set<string>([...fencedBodies(rawOutput.trim()), ...fencedBodies(sanitizeJsonCandidate(rawOutput))]);
  return [...bodies].filter((body) => body.length > 0);
}

/**
 * Parses loosely formatted model output. A whole-body parse (after fence stripping and
 * comment or trailing-comma repair, first as received and then with quotes and
 * invisible characters cleaned up) is `structured`. Failing that, the first balanced
 * fragment of the preferred shape, then of the other shape, is `fragment`.
 */
export function parsePayload(rawOutput: string, prefer: PayloadShape): ParsedPayload {
  const bodies = collectBodies(rawOutput);

  for (const body of bodies) {
    const parsed = parseWithRepairs(body);
    if (parsed.ok) {
      return { kind: "structured", value: parsed.value };
    }
  }

  const shapes: PayloadShape[] = prefer === "array" ? ["array", "object"] : ["object", "array"];
  for (const shape of shapes) {
    for (const body of bodies) {
      const fragment = extractFirstBalanced(body, shape);
      if (!fragment) {
        continue;
      }

      const parsed = parseWithRepairs(fragment);
      if (parsed.ok) {
        return { kind: "fragment", value: parsed.value };
      }
    }
  }

  return { kind: "opaque", text: rawOutput };
}
