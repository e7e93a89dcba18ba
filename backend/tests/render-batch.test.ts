import { describe, expect, test } from "vitest";
import type { AnswerRow } from "../../packages/shared/src/types";
import { renderBatch, renderTemplate } from "../src/services/render/batch";

const opts = { missingMarker: "" };

function answers(...texts: string[]): AnswerRow[] {
  return texts.map((answer) => ({ answer, student_id: null }));
}

describe("renderTemplate", () => {
  test("substitutes shared variables and the answer", () => {
    const out = renderTemplate(
      "Discuss {topic}: {answer}",
      { topic: "Climate", answer: "It is warming." },
      opts
    );
    expect(out).toEqual({ prompt: "Discuss Climate: It is warming.", missing: [] });
  });

  test("values are inserted verbatim, including brace text", () => {
    const out = renderTemplate("A: {{a}}", { a: "{{b}} stays" }, opts);
    expect(out.prompt).toBe("A: {{b}} stays");
  });
});

describe("renderBatch", () => {
  test("one row per answer in input order", () => {
    const rows = renderBatch("Q: {{student_answer}}", {}, answers("first", "second", "third"), opts);
    expect(rows.map((r) => r.index)).toEqual([0, 1, 2]);
    expect(rows.map((r) => r.prompt)).toEqual(["Q: first", "Q: second", "Q: third"]);
  });

  test("a template without placeholders renders identically for every answer", () => {
    const rows = renderBatch("Give general feedback.", {}, answers("a", "b"), opts);
    expect(rows.map((r) => r.prompt)).toEqual(["Give general feedback.", "Give general feedback."]);
    expect(rows.every((r) => r.warnings.length === 0)).toBe(true);
  });

  test("rendering twice yields identical output", () => {
    const template = "{{task_instruction}} / {{student_answer}}";
    const variables = { task_instruction: "Write." };
    const first = renderBatch(template, variables, answers("x", "y"), opts);
    const second = renderBatch(template, variables, answers("x", "y"), opts);
    expect(second).toEqual(first);
  });

  test("unresolved names use the marker and warn once per name per row", () => {
    const rows = renderBatch(
      "{{x}} and {{x}} and {{y}} for {{student_answer}}",
      { y: "Y", x: "   " },
      answers("A", "  "),
      { missingMarker: "[?]" }
    );
    expect(rows[0].prompt).toBe("[?] and [?] and Y for A");
    expect(rows[0].warnings).toEqual([
      { kind: "MissingVariable", name: "x", message: "No value for {{x}}" }
    ]);
    expect(rows[1].prompt).toBe("[?] and [?] and Y for [?]");
    expect(rows[1].warnings).toEqual([
      { kind: "MissingVariable", name: "x", message: "No value for {{x}}" },
      {
        kind: "MissingVariable",
        name: "student_answer",
        message: "No answer provided for {{student_answer}}"
      }
    ]);
  });

  test("the row answer shadows a shared variable named like an answer placeholder", () => {
    const rows = renderBatch("{answer}", { answer: "shared" }, answers("row"), opts);
    expect(rows[0].prompt).toBe("row");
  });

  test("carries student ids through", () => {
    const rows = renderBatch(
      "{{student_answer}}",
      {},
      [
        { answer: "a", student_id: "s-1" },
        { answer: "b", student_id: null }
      ],
      opts
    );
    expect(rows.map((r) => r.student_id)).toEqual(["s-1", null]);
  });
});
