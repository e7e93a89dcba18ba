/**
 * Shared types for prompt batch sessions (template, variables, answers, render results).
 * Used by the backend API and any client rendering a session.
 */

export type ErrorKind = "FetchFailed" | "MissingVariable" | "MalformedUpload";

export type NoticeLevel = "info" | "success" | "warning" | "error";

/** User-facing message produced by the last action on a session. */
export interface Notice {
  level: NoticeLevel;
  message: string;
  kind?: ErrorKind;
}

export type AnswerMode = "single" | "batch";

/** How a fetched JSON document becomes variables. */
export type ResolveMode = "auto" | "flat" | "activity";

export type VariableSource = "fetched" | "manual";

export interface VariableEntry {
  value: string;
  source: VariableSource;
}

export type VariableMap = Record<string, VariableEntry>;

/** One student answer; student_id is only present for bulk uploads that carry one. */
export interface AnswerRow {
  answer: string;
  student_id: string | null;
}

export interface UploadedAnswers {
  filename: string;
  rows: AnswerRow[];
  has_student_ids: boolean;
}

export interface RowWarning {
  kind: "MissingVariable";
  name: string;
  message: string;
}

export interface RenderedRow {
  index: number;
  student_id: string | null;
  answer: string;
  prompt: string;
  warnings: RowWarning[];
}

export interface RenderResult {
  rendered_at: string;
  answer_mode: AnswerMode;
  rows: RenderedRow[];
  has_student_ids: boolean;
}

export interface MalformedMarker {
  text: string;
  offset: number;
}

export interface TemplateAnalysis {
  placeholders: string[];
  malformed: MalformedMarker[];
  /** Placeholders that are neither predefined, answer placeholders, nor present in the variable map. */
  unknown: string[];
}

export interface SessionDTO {
  id: string;
  created_at: string;
  updated_at: string;
  template: string;
  content_url: string;
  /** Resolve mode of the last fetch request. */
  resolve_mode: ResolveMode;
  variables: VariableMap;
  answer_mode: AnswerMode;
  single_answer: string;
  upload: UploadedAnswers | null;
  last_render: RenderResult | null;
  notices: Notice[];
}
