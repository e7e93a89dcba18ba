/**
 * Derive the predefined lesson variables from an activity document:
 * interactions (instruction, can-do statements), referenceScreens (vocabulary,
 * grammar, communication) and secondaryScreens (guiding questions).
 */

import type { PredefinedVariable } from "../template/constants";

export type ActivityExtraction = {
  values: Record<PredefinedVariable, string>;
  warnings: string[];
};

type JsonObject = Record<string, unknown>;

const ACTIVITY_KEYS = ["interactions", "referenceScreens", "secondaryScreens"] as const;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asText(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return "";
}

function bulletList(lines: string[]): string {
  return lines.map((l) => `- ${l}`).join("\n");
}

export function isActivityDocument(doc: JsonObject): boolean {
  return ACTIVITY_KEYS.some((key) => Array.isArray(doc[key]));
}

export function extractActivityVariables(doc: JsonObject): ActivityExtraction {
  const values: Record<PredefinedVariable, string> = {
    task_instruction: "",
    vocabulary_list: "",
    grammar_reference: "",
    communication_reference: "",
    guiding_questions: "",
    can_do_statements: ""
  };
  const warnings: string[] = [];

  const interactions = doc.interactions;
  const first = Array.isArray(interactions) ? interactions[0] : undefined;
  if (isObject(first)) {
    values.task_instruction = asText(first.instruction);
    const statements = first.canDoStatement;
    if (Array.isArray(statements)) {
      const lines = statements
        .filter(isObject)
        .map((s) => asText(s.statement))
        .filter((s) => s !== "");
      values.can_do_statements = bulletList(lines);
    }
  } else {
    warnings.push("Could not find an 'interactions' array with an interaction object in the JSON response.");
  }

  const referenceScreens = doc.referenceScreens;
  if (Array.isArray(referenceScreens)) {
    const vocabulary: string[] = [];
    for (const ref of referenceScreens) {
      if (!isObject(ref) || !isObject(ref.contents)) continue;
      const contents = ref.contents;
      switch (ref.category) {
        case "vocabulary":
          if (Array.isArray(contents.vocabularyList)) {
            vocabulary.push(...contents.vocabularyList.map(asText).filter((v) => v !== ""));
          }
          break;
        case "grammar":
          values.grammar_reference = asText(contents.reference);
          break;
        case "communication":
          values.communication_reference = asText(contents.reference);
          break;
        default:
          break;
      }
    }
    values.vocabulary_list = vocabulary.join(", ");
  } else {
    warnings.push("Could not find a 'referenceScreens' array in the JSON response.");
  }

  const secondaryScreens = doc.secondaryScreens;
  if (Array.isArray(secondaryScreens)) {
    const questions: string[] = [];
    for (const screen of secondaryScreens) {
      if (!isObject(screen) || !Array.isArray(screen.contents)) continue;
      for (const item of screen.contents) {
        if (!isObject(item)) continue;
        const text = asText(item.secondaryContent);
        if (text) questions.push(text);
      }
    }
    values.guiding_questions = bulletList(questions);
  } else {
    warnings.push("Could not find a 'secondaryScreens' array in the JSON response.");
  }

  return { values, warnings };
}
