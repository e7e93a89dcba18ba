/**
 * Batch renderer: substitute shared variables plus each row's answer into the template.
 * Pure and deterministic; unresolved placeholders become the missing marker and a
 * MissingVariable warning on the row instead of failing the batch.
 */

import type { AnswerRow, RenderedRow, RowWarning } from "../../../../packages/shared/src/types";
import { ANSWER_PLACEHOLDERS, isAnswerPlaceholder } from "../template/constants";
import { parseTemplate, type ParsedTemplate } from "../template/parse";

export type RenderOptions = {
  /** Substituted for unresolved placeholders. */
  missingMarker: string;
};

export type RenderOutcome = {
  prompt: string;
  /** Unresolved names, each listed once, in order of first appearance. */
  missing: string[];
};

function isResolved(value: string | undefined): value is string {
  return value !== undefined && value.trim() !== "";
}

/** Render one prompt from an already parsed template. */
export function renderParsed(
  parsed: ParsedTemplate,
  values: ReadonlyMap<string, string>,
  options: RenderOptions
): RenderOutcome {
  const missing: string[] = [];
  let prompt = "";
  for (const seg of parsed.segments) {
    if (seg.type === "text") {
      prompt += seg.text;
      continue;
    }
    const value = values.get(seg.name);
    if (isResolved(value)) {
      prompt += value;
    } else {
      prompt += options.missingMarker;
      if (!missing.includes(seg.name)) missing.push(seg.name);
    }
  }
  return { prompt, missing };
}

export function renderTemplate(
  template: string,
  variables: Record<string, string>,
  options: RenderOptions
): RenderOutcome {
  return renderParsed(parseTemplate(template), new Map(Object.entries(variables)), options);
}

function missingWarning(name: string): RowWarning {
  return {
    kind: "MissingVariable",
    name,
    message: isAnswerPlaceholder(name)
      ? `No answer provided for {{${name}}}`
      : `No value for {{${name}}}`
  };
}

/**
 * One rendered row per answer, same order as the input. Variables named like an
 * answer placeholder are shadowed by the row's answer.
 */
export function renderBatch(
  template: string,
  variables: Record<string, string>,
  answers: AnswerRow[],
  options: RenderOptions
): RenderedRow[] {
  const parsed = parseTemplate(template);
  const shared = new Map(Object.entries(variables));

  return answers.map((row, index) => {
    const values = new Map(shared);
    for (const name of ANSWER_PLACEHOLDERS) values.set(name, row.answer);
    const { prompt, missing } = renderParsed(parsed, values, options);
    return {
      index,
      student_id: row.student_id,
      answer: row.answer,
      prompt,
      warnings: missing.map(missingWarning)
    };
  });
}
