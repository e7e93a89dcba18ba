import type { MalformedMarker, TemplateAnalysis } from "../../../../packages/shared/src/types";
import { isAnswerPlaceholder, isPredefinedVariable } from "./constants";

export type TemplateSegment =
  | { type: "text"; text: string }
  | { type: "placeholder"; name: string; raw: string };

export type ParsedTemplate = {
  segments: TemplateSegment[];
  /** Distinct placeholder names in order of first appearance. */
  placeholders: string[];
  malformed: MalformedMarker[];
};

const NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;
const SINGLE_BRACE = /^\{([A-Za-z_][A-Za-z0-9_]*)\}/;
/** Malformed markers are reported up to this many characters. */
const MAX_MARKER_TEXT = 40;

function clip(text: string): string {
  const firstLine = text.split("\n")[0];
  return firstLine.length > MAX_MARKER_TEXT ? `${firstLine.slice(0, MAX_MARKER_TEXT)}…` : firstLine;
}

/**
 * Split a template into literal text and placeholders.
 * `{{name}}` (inner whitespace allowed) and `{name}` are placeholders. An unclosed `{{`
 * or a `{{...}}` without a valid name is malformed and stays literal text.
 * A lone `{` that does not start `{name}` is literal and not reported.
 */
export function parseTemplate(template: string): ParsedTemplate {
  const segments: TemplateSegment[] = [];
  const placeholders: string[] = [];
  const malformed: MalformedMarker[] = [];
  let text = "";
  let i = 0;

  const flushText = () => {
    if (text) segments.push({ type: "text", text });
    text = "";
  };
  const pushPlaceholder = (name: string, raw: string) => {
    flushText();
    segments.push({ type: "placeholder", name, raw });
    if (!placeholders.includes(name)) placeholders.push(name);
  };

  while (i < template.length) {
    if (template.startsWith("{{", i)) {
      const close = template.indexOf("}}", i + 2);
      if (close === -1) {
        malformed.push({ text: clip(template.slice(i)), offset: i });
        text += template.slice(i);
        break;
      }
      const raw = template.slice(i, close + 2);
      const name = template.slice(i + 2, close).trim();
      if (NAME.test(name)) {
        pushPlaceholder(name, raw);
      } else {
        malformed.push({ text: clip(raw), offset: i });
        text += raw;
      }
      i = close + 2;
      continue;
    }

    if (template[i] === "{") {
      const m = SINGLE_BRACE.exec(template.slice(i));
      if (m) {
        pushPlaceholder(m[1], m[0]);
        i += m[0].length;
        continue;
      }
    }

    text += template[i];
    i += 1;
  }
  flushText();

  return { segments, placeholders, malformed };
}

/**
 * Placeholders, malformed markers and names no variable source can fill.
 * `knownVariables` are the names currently in the session's variable map.
 */
export function analyzeTemplate(template: string, knownVariables: Iterable<string>): TemplateAnalysis {
  const { placeholders, malformed } = parseTemplate(template);
  const known = new Set(knownVariables);
  const unknown = placeholders.filter(
    (name) => !isPredefinedVariable(name) && !isAnswerPlaceholder(name) && !known.has(name)
  );
  return { placeholders, malformed, unknown };
}
