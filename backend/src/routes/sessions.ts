/**
 * Session API: JSON endpoints driving one editing session per id.
 * Every mutating endpoint returns the updated session, including the notices
 * produced by that action.
 */
import { Router } from "express";
import { z } from "zod";
import { validateBody } from "../middlewares/validate";
import { answersUpload } from "../middlewares/upload";
import { HttpError } from "../utils/httpError";
import { buildExportCsv, EXPORT_FILENAME } from "../services/export/csvExport";
import {
  analyzeSessionTemplate,
  clearUpload,
  createSession,
  deleteSession,
  editSingleAnswer,
  editTemplate,
  editVariable,
  fetchContent,
  getSession,
  renderSession,
  selectAnswerMode,
  uploadAnswers
} from "../services/sessions/actions";
import { toSessionDTO, type SessionState } from "../services/sessions/state";

export const sessionsRouter = Router();

const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const templateSchema = z.object({
  template: z.string().max(200_000, "Template is too long")
});

export const fetchSchema = z.object({
  url: z.string().max(2048, "URL is too long"),
  mode: z.enum(["auto", "flat", "activity"]).default("auto")
});

export const variableSchema = z.object({
  value: z.string().max(200_000, "Value is too long")
});

export const answerModeSchema = z.object({
  mode: z.enum(["single", "batch"])
});

export const answerSchema = z.object({
  answer: z.string().max(200_000, "Answer is too long")
});

export function loadSession(id: string): SessionState {
  const state = getSession(id);
  if (!state) throw new HttpError(404, "Session not found");
  return state;
}

export function assertVariableName(name: string): void {
  if (!VARIABLE_NAME.test(name)) {
    throw new HttpError(400, "Variable names must start with a letter or underscore and contain only letters, digits and underscores");
  }
}

sessionsRouter.post("/", (_req, res) => {
  const state = createSession();
  res.status(201).json({ session: toSessionDTO(state) });
});

sessionsRouter.get("/:id", (req, res, next) => {
  try {
    res.json({ session: toSessionDTO(loadSession(req.params.id)) });
  } catch (e) {
    next(e);
  }
});

sessionsRouter.delete("/:id", (req, res, next) => {
  try {
    if (!deleteSession(req.params.id)) throw new HttpError(404, "Session not found");
    res.sendStatus(204);
  } catch (e) {
    next(e);
  }
});

sessionsRouter.put("/:id/template", validateBody(templateSchema), (req, res, next) => {
  try {
    const { template }: z.infer<typeof templateSchema> = req.body;
    const { state, analysis } = editTemplate(req.params.id, template);
    res.json({ session: toSessionDTO(state), analysis });
  } catch (e) {
    next(e);
  }
});

sessionsRouter.get("/:id/template/analysis", (req, res, next) => {
  try {
    res.json({ analysis: analyzeSessionTemplate(loadSession(req.params.id)) });
  } catch (e) {
    next(e);
  }
});

sessionsRouter.post("/:id/fetch", validateBody(fetchSchema), async (req, res, next) => {
  try {
    const { url, mode }: z.infer<typeof fetchSchema> = req.body;
    const { state, ok } = await fetchContent(req.params.id, url, mode);
    res.json({ session: toSessionDTO(state), ok });
  } catch (e) {
    next(e);
  }
});

sessionsRouter.put("/:id/variables/:name", validateBody(variableSchema), (req, res, next) => {
  try {
    assertVariableName(req.params.name);
    const { value }: z.infer<typeof variableSchema> = req.body;
    const state = editVariable(req.params.id, req.params.name, value);
    res.json({ session: toSessionDTO(state) });
  } catch (e) {
    next(e);
  }
});

sessionsRouter.put("/:id/answer-mode", validateBody(answerModeSchema), (req, res, next) => {
  try {
    const { mode }: z.infer<typeof answerModeSchema> = req.body;
    res.json({ session: toSessionDTO(selectAnswerMode(req.params.id, mode)) });
  } catch (e) {
    next(e);
  }
});

sessionsRouter.put("/:id/answer", validateBody(answerSchema), (req, res, next) => {
  try {
    const { answer }: z.infer<typeof answerSchema> = req.body;
    res.json({ session: toSessionDTO(editSingleAnswer(req.params.id, answer)) });
  } catch (e) {
    next(e);
  }
});

sessionsRouter.post("/:id/answers/upload", answersUpload, (req, res, next) => {
  try {
    loadSession(req.params.id);
    if (!req.file) throw new HttpError(400, "CSV file missing (form field 'file')");
    const { state, ok } = uploadAnswers(req.params.id, req.file.originalname, req.file.buffer);
    res.status(ok ? 200 : 422).json({ session: toSessionDTO(state), ok });
  } catch (e) {
    next(e);
  }
});

sessionsRouter.delete("/:id/answers/upload", (req, res, next) => {
  try {
    res.json({ session: toSessionDTO(clearUpload(req.params.id)) });
  } catch (e) {
    next(e);
  }
});

sessionsRouter.post("/:id/render", (req, res, next) => {
  try {
    const { state, result } = renderSession(req.params.id);
    res.json({ session: toSessionDTO(state), result });
  } catch (e) {
    next(e);
  }
});

sessionsRouter.get("/:id/export.csv", (req, res, next) => {
  try {
    const state = loadSession(req.params.id);
    if (!state.last_render || state.last_render.rows.length === 0) {
      throw new HttpError(409, "Nothing has been generated yet");
    }
    res.setHeader("Content-Type", "text/csv; charset=utf-8");
    res.setHeader("Content-Disposition", `attachment; filename="${EXPORT_FILENAME}"`);
    res.send(buildExportCsv(state.last_render));
  } catch (e) {
    next(e);
  }
});
