/**
 * Variables every session offers as editable fields, filled from an activity document
 * or by hand. The answer placeholders are bound per row by the batch renderer.
 */
export const PREDEFINED_VARIABLES = [
  "task_instruction",
  "vocabulary_list",
  "grammar_reference",
  "communication_reference",
  "guiding_questions",
  "can_do_statements"
] as const;

export type PredefinedVariable = (typeof PREDEFINED_VARIABLES)[number];

/** First name is canonical; the rest are aliases bound to the same answer. */
export const ANSWER_PLACEHOLDERS = ["student_answer", "answer"] as const;

export function isAnswerPlaceholder(name: string): boolean {
  return (ANSWER_PLACEHOLDERS as readonly string[]).includes(name);
}

export function isPredefinedVariable(name: string): boolean {
  return (PREDEFINED_VARIABLES as readonly string[]).includes(name);
}
