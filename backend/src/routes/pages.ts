/**
 * Single-page UI: server-rendered session page. Each form posts one action and
 * redirects back to the page (post/redirect/get), which shows the action's notices.
 */
import { Router, type NextFunction, type Request, type Response } from "express";
import { z } from "zod";
import { toHttpError } from "../middlewares/errorHandler";
import { answersUpload } from "../middlewares/upload";
import { validateBody } from "../middlewares/validate";
import {
  analyzeSessionTemplate,
  clearUpload,
  createSession,
  editSingleAnswer,
  editTemplate,
  editVariable,
  fetchContent,
  renderSession,
  selectAnswerMode,
  uploadAnswers
} from "../services/sessions/actions";
import { HttpError } from "../utils/httpError";
import { variableEntry } from "../services/sessions/state";
import { renderErrorPage, renderSessionPage } from "../views/SessionPage";
import { answerModeSchema, assertVariableName, fetchSchema, loadSession, templateSchema } from "./sessions";

export const pagesRouter = Router();

const variablesFormSchema = z.object({
  vars: z.record(z.string()).default({}),
  new_name: z.string().default(""),
  new_value: z.string().default("")
});

const generateFormSchema = z.object({
  answer: z.string().optional()
});

/** Browsers submit textarea line breaks as CRLF. */
function normalizeNewlines(text: string): string {
  return text.replace(/\r\n/g, "\n");
}

function backToSession(res: Response, id: string, anchor?: string): void {
  res.redirect(303, `/sessions/${id}${anchor ? `#${anchor}` : ""}`);
}

pagesRouter.get("/", (_req, res) => {
  const state = createSession();
  backToSession(res, state.id);
});

pagesRouter.get("/sessions/:id", (req, res, next) => {
  try {
    const state = loadSession(req.params.id);
    res.type("html").send(renderSessionPage(state, analyzeSessionTemplate(state)));
  } catch (e) {
    next(e);
  }
});

pagesRouter.post("/sessions/:id/template", validateBody(templateSchema), (req, res, next) => {
  try {
    const { template }: z.infer<typeof templateSchema> = req.body;
    editTemplate(req.params.id, normalizeNewlines(template));
    backToSession(res, req.params.id, "template");
  } catch (e) {
    next(e);
  }
});

pagesRouter.post("/sessions/:id/fetch", validateBody(fetchSchema), async (req, res, next) => {
  try {
    const { url, mode }: z.infer<typeof fetchSchema> = req.body;
    await fetchContent(req.params.id, url, mode);
    backToSession(res, req.params.id, "variables");
  } catch (e) {
    next(e);
  }
});

pagesRouter.post("/sessions/:id/variables", validateBody(variablesFormSchema), (req, res, next) => {
  try {
    const id = req.params.id;
    const state = loadSession(id);
    const { vars, new_name, new_value }: z.infer<typeof variablesFormSchema> = req.body;

    const newName = new_name.trim();
    // Nothing is saved unless every submitted name is valid.
    for (const name of Object.keys(vars)) assertVariableName(name);
    if (newName) assertVariableName(newName);

    for (const [name, raw] of Object.entries(vars)) {
      const value = normalizeNewlines(raw);
      // Unchanged fields keep their source, so a fetched value stays "fetched".
      if ((variableEntry(state, name)?.value ?? "") !== value) editVariable(id, name, value);
    }
    if (newName) editVariable(id, newName, normalizeNewlines(new_value));
    backToSession(res, id, "variables");
  } catch (e) {
    next(e);
  }
});

pagesRouter.post("/sessions/:id/answer-mode", validateBody(answerModeSchema), (req, res, next) => {
  try {
    const { mode }: z.infer<typeof answerModeSchema> = req.body;
    selectAnswerMode(req.params.id, mode);
    backToSession(res, req.params.id, "answers");
  } catch (e) {
    next(e);
  }
});

pagesRouter.post("/sessions/:id/upload", answersUpload, (req, res, next) => {
  try {
    loadSession(req.params.id);
    if (!req.file) throw new HttpError(400, "Choose a CSV file to upload.");
    uploadAnswers(req.params.id, req.file.originalname, req.file.buffer);
    backToSession(res, req.params.id, "answers");
  } catch (e) {
    next(e);
  }
});

pagesRouter.post("/sessions/:id/upload/clear", (req, res, next) => {
  try {
    clearUpload(req.params.id);
    backToSession(res, req.params.id, "answers");
  } catch (e) {
    next(e);
  }
});

pagesRouter.post("/sessions/:id/generate", validateBody(generateFormSchema), (req, res, next) => {
  try {
    const id = req.params.id;
    const state = loadSession(id);
    const { answer }: z.infer<typeof generateFormSchema> = req.body;
    if (state.answer_mode === "single" && answer !== undefined) {
      const normalized = normalizeNewlines(answer);
      if (normalized !== state.single_answer) editSingleAnswer(id, normalized);
    }
    renderSession(id);
    backToSession(res, id, "generate");
  } catch (e) {
    next(e);
  }
});

export function pageErrorHandler(error: unknown, _req: Request, res: Response, _next: NextFunction): void {
  const httpError = toHttpError(error);
  res.status(httpError.statusCode).type("html").send(renderErrorPage(httpError.statusCode, httpError.message));
}

pagesRouter.use(pageErrorHandler);
