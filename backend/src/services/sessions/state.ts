import type {
  AnswerMode,
  Notice,
  RenderResult,
  ResolveMode,
  SessionDTO,
  UploadedAnswers,
  VariableEntry,
  VariableMap
} from "../../../../packages/shared/src/types";

export type SessionEventBody =
  | { type: "SESSION_CREATED"; template: string }
  | { type: "TEMPLATE_EDITED"; template: string }
  | { type: "CONTENT_URL_EDITED"; url: string; mode: ResolveMode }
  | { type: "VARIABLES_FETCHED"; url: string; mode: ResolveMode; values: Record<string, string> }
  | { type: "VARIABLES_FETCH_FAILED"; url: string; mode: ResolveMode }
  | { type: "VARIABLE_EDITED"; name: string; value: string }
  | { type: "ANSWER_MODE_SELECTED"; mode: AnswerMode }
  | { type: "SINGLE_ANSWER_EDITED"; answer: string }
  | { type: "ANSWERS_UPLOADED"; upload: UploadedAnswers }
  | { type: "ANSWERS_UPLOAD_REJECTED" }
  | { type: "ANSWERS_UPLOAD_CLEARED" }
  | { type: "BATCH_RENDERED"; result: RenderResult }
  | { type: "RENDER_SKIPPED" };

/** One discrete user action on a session, with the notices it produced. */
export type SessionEvent = SessionEventBody & {
  seq: number;
  created_at: string;
  notices: Notice[];
};

export type SessionState = SessionDTO & { last_seq: number };

export function emptySessionState(id: string): SessionState {
  return {
    id,
    created_at: "",
    updated_at: "",
    template: "",
    content_url: "",
    resolve_mode: "auto",
    variables: {},
    answer_mode: "single",
    single_answer: "",
    upload: null,
    last_render: null,
    notices: [],
    last_seq: 0
  };
}

/** Own-property copy, so a key such as `__proto__` stays a variable. */
function fetchedVariables(values: Record<string, string>): VariableMap {
  return Object.fromEntries(
    Object.entries(values).map(([name, value]) => [name, { value, source: "fetched" as const }])
  );
}

/** The session's own entry for a name; inherited object keys never count. */
export function variableEntry(state: SessionState, name: string): VariableEntry | undefined {
  return Object.hasOwn(state.variables, name) ? state.variables[name] : undefined;
}

/**
 * Apply one event. Pure: returns a new state and never mutates its input.
 * Notices always reflect the latest event only.
 */
export function applySessionEvent(state: SessionState, ev: SessionEvent): SessionState {
  const next: SessionState = {
    ...state,
    last_seq: ev.seq,
    updated_at: ev.created_at,
    notices: ev.notices
  };

  switch (ev.type) {
    case "SESSION_CREATED":
      next.created_at = ev.created_at;
      next.template = ev.template;
      break;

    case "TEMPLATE_EDITED":
      next.template = ev.template;
      break;

    case "CONTENT_URL_EDITED":
    case "VARIABLES_FETCH_FAILED":
      // A failed fetch keeps every previously resolved variable.
      next.content_url = ev.url;
      next.resolve_mode = ev.mode;
      break;

    case "VARIABLES_FETCHED":
      next.content_url = ev.url;
      next.resolve_mode = ev.mode;
      next.variables = fetchedVariables(ev.values);
      break;

    case "VARIABLE_EDITED":
      next.variables = { ...state.variables, [ev.name]: { value: ev.value, source: "manual" } };
      break;

    case "ANSWER_MODE_SELECTED":
      if (ev.mode !== state.answer_mode) {
        next.answer_mode = ev.mode;
        if (ev.mode === "single") next.upload = null;
        else next.single_answer = "";
      }
      break;

    case "SINGLE_ANSWER_EDITED":
      next.single_answer = ev.answer;
      break;

    case "ANSWERS_UPLOADED":
      next.upload = ev.upload;
      break;

    case "ANSWERS_UPLOAD_REJECTED":
    case "ANSWERS_UPLOAD_CLEARED":
      next.upload = null;
      break;

    case "BATCH_RENDERED":
      next.last_render = ev.result;
      break;

    case "RENDER_SKIPPED":
      // Only the notices change.
      break;

    default:
      break;
  }

  return next;
}

/**
 * Deterministic reducer: state = f(ordered events).
 */
export function reduceSessionState(id: string, events: SessionEvent[]): SessionState {
  let state = emptySessionState(id);
  for (const ev of events) {
    state = applySessionEvent(state, ev);
  }
  return state;
}

export function toSessionDTO(state: SessionState): SessionDTO {
  const { last_seq: _lastSeq, ...dto } = state;
  return dto;
}
