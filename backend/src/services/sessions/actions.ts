/**
 * Session actions: each user action runs to completion and appends exactly one
 * event (with its notices) to the session's log.
 */

import type {
  AnswerMode,
  AnswerRow,
  Notice,
  RenderResult,
  ResolveMode,
  TemplateAnalysis
} from "../../../../packages/shared/src/types";
import { env } from "../../config/env";
import { createLogger } from "../../utils/logger";
import { parseAnswersCsv } from "../answers/csvUpload";
import { renderBatch } from "../render/batch";
import { getDefaultTemplate } from "../template/defaultTemplate";
import { analyzeTemplate } from "../template/parse";
import { fetchVariables } from "../variables/resolve";
import { sessionStore } from "./eventStore";
import type { SessionState } from "./state";

const log = createLogger("sessions");

export class SessionNotFoundError extends Error {
  constructor(id: string) {
    super(`Session not found: ${id}`);
    this.name = "SessionNotFoundError";
  }
}

export function createSession(template: string = getDefaultTemplate()): SessionState {
  return sessionStore.create(template);
}

export function getSession(id: string): SessionState | null {
  return sessionStore.get(id);
}

export function deleteSession(id: string): boolean {
  return sessionStore.delete(id);
}

export function variableValues(state: SessionState): Record<string, string> {
  return Object.fromEntries(Object.entries(state.variables).map(([name, entry]) => [name, entry.value]));
}

export function analyzeSessionTemplate(state: SessionState): TemplateAnalysis {
  return analyzeTemplate(state.template, Object.keys(state.variables));
}

export function templateNotices(analysis: TemplateAnalysis): Notice[] {
  const notices: Notice[] = [];
  if (analysis.malformed.length > 0) {
    const list = analysis.malformed.map((m) => `"${m.text}"`).join(", ");
    notices.push({ level: "warning", message: `Malformed placeholder markers were left as text: ${list}` });
  }
  if (analysis.unknown.length > 0) {
    notices.push({
      level: "warning",
      message: `The template uses variables not in the predefined list: ${analysis.unknown.join(", ")}`
    });
  }
  return notices;
}

export function editTemplate(id: string, template: string): { state: SessionState; analysis: TemplateAnalysis } {
  const current = requireSession(id);
  const analysis = analyzeTemplate(template, Object.keys(current.variables));
  const state = sessionStore.append(id, { type: "TEMPLATE_EDITED", template }, templateNotices(analysis));
  return { state, analysis };
}

/**
 * Fetch the content URL and replace the variable map wholesale on success.
 * On failure the previous variables stay; the error becomes a FetchFailed notice.
 */
export async function fetchContent(
  id: string,
  url: string,
  mode: ResolveMode = "auto"
): Promise<{ state: SessionState; ok: boolean }> {
  requireSession(id);
  const trimmed = url.trim();
  if (!trimmed) {
    const state = sessionStore.append(id, { type: "CONTENT_URL_EDITED", url: "", mode }, [
      { level: "warning", message: "Please enter a Content URL to fetch variables." }
    ]);
    return { state, ok: false };
  }

  const result = await fetchVariables(trimmed, mode);
  // The session may have expired while the request was in flight.
  requireSession(id);
  if (!result.ok) {
    log.info(`fetch for ${id} failed: ${result.error.message}`);
    const state = sessionStore.append(id, { type: "VARIABLES_FETCH_FAILED", url: trimmed, mode }, [
      { level: "error", kind: result.error.kind, message: result.error.message }
    ]);
    return { state, ok: false };
  }

  const count = Object.keys(result.values).length;
  const state = sessionStore.append(id, { type: "VARIABLES_FETCHED", url: trimmed, mode, values: result.values }, [
    ...result.notices,
    {
      level: "success",
      message: `Fetched ${count} variable${count === 1 ? "" : "s"} from the content URL (${result.mode}).`
    }
  ]);
  return { state, ok: true };
}

export function editVariable(id: string, name: string, value: string): SessionState {
  requireSession(id);
  return sessionStore.append(id, { type: "VARIABLE_EDITED", name, value });
}

export function selectAnswerMode(id: string, mode: AnswerMode): SessionState {
  requireSession(id);
  return sessionStore.append(id, { type: "ANSWER_MODE_SELECTED", mode });
}

export function editSingleAnswer(id: string, answer: string): SessionState {
  requireSession(id);
  return sessionStore.append(id, { type: "SINGLE_ANSWER_EDITED", answer });
}

export function uploadAnswers(
  id: string,
  filename: string,
  content: Buffer | string
): { state: SessionState; ok: boolean } {
  requireSession(id);
  const parsed = parseAnswersCsv(filename, content);
  if (!parsed.ok) {
    log.info(`upload ${filename} for ${id} rejected: ${parsed.error.message}`);
    const state = sessionStore.append(id, { type: "ANSWERS_UPLOAD_REJECTED" }, [
      { level: "error", kind: parsed.error.kind, message: parsed.error.message }
    ]);
    return { state, ok: false };
  }
  const n = parsed.upload.rows.length;
  const state = sessionStore.append(id, { type: "ANSWERS_UPLOADED", upload: parsed.upload }, [
    { level: "success", message: `Successfully read ${n} answer${n === 1 ? "" : "s"} from '${filename}'.` }
  ]);
  return { state, ok: true };
}

export function clearUpload(id: string): SessionState {
  requireSession(id);
  return sessionStore.append(id, { type: "ANSWERS_UPLOAD_CLEARED" }, [
    { level: "info", message: "Any previously uploaded CSV data has been cleared." }
  ]);
}

function answersFor(state: SessionState): AnswerRow[] | null {
  if (state.answer_mode === "single") {
    return [{ answer: state.single_answer, student_id: null }];
  }
  return state.upload ? state.upload.rows : null;
}

/**
 * Render one prompt per answer of the active answer mode and keep the result as
 * the session's latest render.
 */
export function renderSession(id: string): { state: SessionState; result: RenderResult | null } {
  const current = requireSession(id);
  const notices = templateNotices(analyzeSessionTemplate(current));

  const answers = answersFor(current);
  if (!answers || answers.length === 0) {
    const message = answers
      ? "The uploaded CSV has no answer rows; no prompts were generated."
      : "CSV method selected, but no answers were uploaded; no prompts were generated.";
    const state = sessionStore.append(id, { type: "RENDER_SKIPPED" }, [
      ...notices,
      { level: "warning", message }
    ]);
    return { state, result: null };
  }

  const rows = renderBatch(current.template, variableValues(current), answers, {
    missingMarker: env.MISSING_MARKER
  });
  const result: RenderResult = {
    rendered_at: new Date().toISOString(),
    answer_mode: current.answer_mode,
    rows,
    has_student_ids: current.answer_mode === "batch" && (current.upload?.has_student_ids ?? false)
  };

  const flagged = rows.filter((r) => r.warnings.length > 0);
  if (flagged.length > 0) {
    const names = [...new Set(flagged.flatMap((r) => r.warnings.map((w) => w.name)))];
    notices.push({
      level: "warning",
      kind: "MissingVariable",
      message: `Unresolved placeholders in ${flagged.length} of ${rows.length} prompts: ${names.join(", ")}`
    });
  }
  notices.push({
    level: "success",
    message: `Generated ${rows.length} prompt${rows.length === 1 ? "" : "s"}.`
  });
  log.debug(`rendered ${rows.length} rows for ${id}`);

  const state = sessionStore.append(id, { type: "BATCH_RENDERED", result }, notices);
  return { state, result };
}

function requireSession(id: string): SessionState {
  const state = sessionStore.get(id);
  if (!state) throw new SessionNotFoundError(id);
  return state;
}
