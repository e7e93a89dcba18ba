/**
 * Export a rendered batch as CSV: one row per student, in render order.
 */

import { stringify } from "csv-stringify/sync";
import type { RenderResult } from "../../../../packages/shared/src/types";

export const EXPORT_FILENAME = "generated_prompts.csv";

export function buildExportCsv(result: RenderResult): string {
  const columns = result.has_student_ids
    ? ["Student", "Answers", "generated_prompt", "warnings"]
    : ["Answers", "generated_prompt", "warnings"];

  const records = result.rows.map((row) => {
    const warnings = row.warnings.map((w) => w.message).join("; ");
    return result.has_student_ids
      ? [row.student_id ?? "", row.answer, row.prompt, warnings]
      : [row.answer, row.prompt, warnings];
  });

  return stringify([columns, ...records]);
}
