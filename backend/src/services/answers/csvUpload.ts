import { parse } from "csv-parse/sync";
import type { AnswerRow, UploadedAnswers } from "../../../../packages/shared/src/types";

export const ANSWER_COLUMN = "Answers";
/** Header names accepted for the optional student identifier column. */
export const STUDENT_ID_COLUMNS = ["student", "student id", "student_id"];

export type ParseAnswersResult =
  | { ok: true; upload: UploadedAnswers }
  | { ok: false; error: { kind: "MalformedUpload"; message: string } };

function malformed(message: string): ParseAnswersResult {
  return { ok: false, error: { kind: "MalformedUpload", message } };
}

function normalizeHeader(h: string): string {
  return h.trim().toLowerCase();
}

function isStringRows(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === "string"))
  );
}

/**
 * Read student answers from CSV. The header row must contain an `Answers` column
 * (case-insensitive); a `Student` column, when present, supplies identifiers.
 */
export function parseAnswersCsv(filename: string, content: Buffer | string): ParseAnswersResult {
  let records: unknown;
  try {
    records = parse(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true
    });
  } catch (e) {
    return malformed(`Error processing CSV file: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (!isStringRows(records) || records.length === 0) {
    return malformed("CSV file is empty.");
  }

  const [header, ...body] = records;
  const normalized = header.map(normalizeHeader);
  const answerIdx = normalized.indexOf(normalizeHeader(ANSWER_COLUMN));
  if (answerIdx === -1) {
    return malformed(`CSV file is missing the required '${ANSWER_COLUMN}' column. Please check the header.`);
  }
  const idIdx = normalized.findIndex((h) => STUDENT_ID_COLUMNS.includes(h));

  const rows: AnswerRow[] = body.map((cells) => ({
    answer: cells[answerIdx] ?? "",
    student_id: idIdx === -1 ? null : (cells[idIdx] ?? "").trim() || null
  }));

  return {
    ok: true,
    upload: { filename, rows, has_student_ids: idIdx !== -1 }
  };
}
