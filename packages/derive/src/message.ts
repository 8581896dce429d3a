/**
 * Message templates for error variants.
 *
 * A template is plain text with `{0}` standing for the variant's payload.
 * Literal braces are written `{{` and `}}`.
 *
 *   "Bad request: {0}"  +  "bad input"  →  "Bad request: bad input"
 */

import { inspect } from "node:util";

export type TemplateSegment =
  | { readonly kind: "text"; readonly text: string }
  | { readonly kind: "payload" };

export class TemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TemplateError";
  }
}

/**
 * Split a template into text and payload segments.
 *
 * @throws {TemplateError} on an unknown placeholder or an unbalanced brace
 */
export function parseTemplate(template: string): readonly TemplateSegment[] {
  const segments: TemplateSegment[] = [];
  let text = "";
  let i = 0;

  while (i < template.length) {
    const ch = template[i];
    const next = template[i + 1];

    if (ch === "{" && next === "{") {
      text += "{";
      i += 2;
    } else if (ch === "}" && next === "}") {
      text += "}";
      i += 2;
    } else if (ch === "{") {
      const close = template.indexOf("}", i);
      if (close === -1) {
        throw new TemplateError(`Unclosed "{" at position ${i}`);
      }
      const placeholder = template.slice(i + 1, close);
      if (placeholder !== "0") {
        throw new TemplateError(`Unknown placeholder "{${placeholder}}"`);
      }
      if (text !== "") {
        segments.push({ kind: "text", text });
        text = "";
      }
      segments.push({ kind: "payload" });
      i = close + 1;
    } else if (ch === "}") {
      throw new TemplateError(`Unmatched "}" at position ${i}`);
    } else {
      text += ch;
      i += 1;
    }
  }

  if (text !== "") {
    segments.push({ kind: "text", text });
  }
  return segments;
}

export function usesPayload(segments: readonly TemplateSegment[]): boolean {
  return segments.some((s) => s.kind === "payload");
}

export function formatTemplate(
  segments: readonly TemplateSegment[],
  payload: string,
): string {
  return segments
    .map((s) => (s.kind === "payload" ? payload : s.text))
    .join("");
}

/**
 * Human-readable form of a payload for message interpolation.
 */
export function displayPayload(payload: unknown): string {
  if (typeof payload === "string") return payload;
  if (payload instanceof Error) return payload.message;
  if (payload === null || payload === undefined) return "";
  if (typeof payload === "object") return inspect(payload, { depth: 2, breakLength: Infinity });
  return String(payload);
}
