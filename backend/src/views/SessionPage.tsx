import type { ReactNode } from "react";
import type { RenderResult, TemplateAnalysis } from "../../../packages/shared/src/types";
import { ANSWER_PLACEHOLDERS, PREDEFINED_VARIABLES } from "../services/template/constants";
import { variableEntry, type SessionState } from "../services/sessions/state";
import { Layout } from "./Layout";
import { renderDocument } from "./render";
import { Badge } from "./ui/Badge";
import { Banner } from "./ui/Banner";
import { Button } from "./ui/Button";
import { Card, CardActions, CardContent, CardHeader, CardTitle } from "./ui/Card";
import { Table, TD, TH, THead, TRow } from "./ui/Table";
import { Textarea } from "./ui/Textarea";

/** Rows of an uploaded CSV shown as a preview. */
const PREVIEW_ROWS = 5;

const TITLE = "Prompt Batch Builder";

function variableNames(state: SessionState): string[] {
  const names: string[] = [...PREDEFINED_VARIABLES];
  for (const name of Object.keys(state.variables)) {
    if (!names.includes(name)) names.push(name);
  }
  return names;
}

function Step({ id, title, children }: { id: string; title: string; children: ReactNode }) {
  return (
    <Card id={id}>
      <CardHeader>
        <CardTitle>{title}</CardTitle>
      </CardHeader>
      <CardContent>{children}</CardContent>
    </Card>
  );
}

function TemplateStep({ state, analysis }: { state: SessionState; analysis: TemplateAnalysis }) {
  const allowed = [...PREDEFINED_VARIABLES, ...ANSWER_PLACEHOLDERS].map((n) => `{{${n}}}`).join(", ");
  const found = analysis.placeholders.length > 0 ? analysis.placeholders.join(", ") : "none";
  return (
    <Step id="template" title="1. Define your prompt template">
      <p>
        Use predefined variables: <code>{allowed}</code>. Single braces (<code>{"{name}"}</code>) work too.
      </p>
      <form method="post" action={`/sessions/${state.id}/template`}>
        <label htmlFor="template">Prompt template</label>
        <Textarea className="tall" id="template" name="template" defaultValue={state.template} />
        <p>{`Placeholders found: ${found}`}</p>
        <CardActions>
          <Button>Save template</Button>
        </CardActions>
      </form>
    </Step>
  );
}

function VariablesStep({ state }: { state: SessionState }) {
  const base = `/sessions/${state.id}`;
  return (
    <Step id="variables" title="2. Fetch content for template variables">
      <form method="post" action={`${base}/fetch`} className="row">
        <div className="grow">
          <label htmlFor="url">Content URL (expects JSON data)</label>
          <input
            type="url"
            id="url"
            name="url"
            defaultValue={state.content_url}
            placeholder="https://example.com/activity.json"
          />
        </div>
        <div>
          <label htmlFor="mode">Read as</label>
          <select id="mode" name="mode" defaultValue={state.resolve_mode}>
            <option value="auto">Auto</option>
            <option value="activity">Activity</option>
            <option value="flat">Flat JSON</option>
          </select>
        </div>
        <div>
          <Button>Fetch &amp; populate</Button>
        </div>
      </form>
      <form method="post" action={`${base}/variables`}>
        <p>
          <em>Fields are filled from the content URL. Edits made after a fetch take precedence.</em>
        </p>
        {variableNames(state).map((name) => {
          const entry = variableEntry(state, name);
          return (
            <div key={name}>
              <label htmlFor={`var-${name}`}>
                <code>{name}</code>
                {entry ? <Badge source={entry.source} /> : null}
              </label>
              <Textarea id={`var-${name}`} name={`vars[${name}]`} defaultValue={entry ? entry.value : ""} />
            </div>
          );
        })}
        <div className="row">
          <div className="grow">
            <label htmlFor="new_name">New variable name</label>
            <input type="text" id="new_name" name="new_name" />
          </div>
          <div className="grow">
            <label htmlFor="new_value">Value</label>
            <input type="text" id="new_value" name="new_value" />
          </div>
        </div>
        <CardActions>
          <Button>Save variables</Button>
        </CardActions>
      </form>
    </Step>
  );
}

function AnswerModeForm({ state }: { state: SessionState }) {
  return (
    <form method="post" action={`/sessions/${state.id}/answer-mode`} className="actions">
      <Button name="mode" value="single" variant={state.answer_mode === "single" ? "primary" : "secondary"}>
        Text box (single answer)
      </Button>
      <Button name="mode" value="batch" variant={state.answer_mode === "batch" ? "primary" : "secondary"}>
        Upload CSV (multiple answers)
      </Button>
    </form>
  );
}

function UploadPreview({ state }: { state: SessionState }) {
  const upload = state.upload;
  if (!upload) return null;
  return (
    <>
      <p>{`Using '${upload.filename}': ${upload.rows.length} answers.`}</p>
      <Table>
        <THead>
          <TRow>
            {upload.has_student_ids ? <TH>Student</TH> : null}
            <TH>Answers</TH>
          </TRow>
        </THead>
        <tbody>
          {upload.rows.slice(0, PREVIEW_ROWS).map((row, i) => (
            <TRow key={i}>
              {upload.has_student_ids ? <TD>{row.student_id ?? ""}</TD> : null}
              <TD>{row.answer}</TD>
            </TRow>
          ))}
        </tbody>
      </Table>
      <form method="post" action={`/sessions/${state.id}/upload/clear`} className="actions">
        <Button variant="secondary">Clear upload</Button>
      </form>
    </>
  );
}

function AnswersStep({ state }: { state: SessionState }) {
  if (state.answer_mode === "single") {
    return (
      <Step id="answers" title="3. Provide the student's answer">
        <AnswerModeForm state={state} />
        <label htmlFor="answer">
          Student&apos;s answer (for <code>{"{{student_answer}}"}</code>)
        </label>
        <Textarea id="answer" name="answer" form="generate-form" defaultValue={state.single_answer} />
      </Step>
    );
  }
  return (
    <Step id="answers" title="3. Provide the students' answers">
      <AnswerModeForm state={state} />
      <form method="post" action={`/sessions/${state.id}/upload`} encType="multipart/form-data">
        <label htmlFor="file">
          Upload CSV. The header must include &apos;Answers&apos;; an optional &apos;Student&apos; column names each row.
        </label>
        <input type="file" id="file" name="file" accept=".csv,text/csv" />
        <CardActions>
          <Button>Upload</Button>
        </CardActions>
      </form>
      <UploadPreview state={state} />
    </Step>
  );
}

function ResultsTable({ result, exportHref }: { result: RenderResult; exportHref: string }) {
  return (
    <>
      <p>
        <a href={exportHref}>Download generated prompts as CSV</a>
      </p>
      <Table>
        <THead>
          <TRow>
            {result.has_student_ids ? <TH>Student</TH> : null}
            <TH>Answer</TH>
            <TH>Generated prompt</TH>
            <TH>Warnings</TH>
          </TRow>
        </THead>
        <tbody>
          {result.rows.map((row) => (
            <TRow key={row.index}>
              {result.has_student_ids ? <TD>{row.student_id ?? ""}</TD> : null}
              <TD>
                <pre>{row.answer}</pre>
              </TD>
              <TD>
                <pre>{row.prompt}</pre>
              </TD>
              <TD>
                {row.warnings.map((w) => (
                  <div key={w.name}>{w.message}</div>
                ))}
              </TD>
            </TRow>
          ))}
        </tbody>
      </Table>
    </>
  );
}

function GenerateStep({ state }: { state: SessionState }) {
  const base = `/sessions/${state.id}`;
  const result = state.last_render;
  return (
    <Step id="generate" title="4. Generate final prompt(s)">
      <form method="post" action={`${base}/generate`} id="generate-form">
        <Button>Process &amp; generate prompts</Button>
      </form>
      {result && result.rows.length > 0 ? <ResultsTable result={result} exportHref={`/api${base}/export.csv`} /> : null}
    </Step>
  );
}

export function SessionPage({ state, analysis }: { state: SessionState; analysis: TemplateAnalysis }) {
  return (
    <Layout title={TITLE}>
      <h1>{TITLE}</h1>
      <p>Define a template, fetch activity content via URL, provide student answers, and generate one prompt per answer.</p>
      {state.notices.map((notice, i) => (
        <Banner key={i} notice={notice} />
      ))}
      <TemplateStep state={state} analysis={analysis} />
      <VariablesStep state={state} />
      <AnswersStep state={state} />
      <GenerateStep state={state} />
    </Layout>
  );
}

export function ErrorPage({ status, message }: { status: number; message: string }) {
  return (
    <Layout title={TITLE}>
      <h1>{TITLE}</h1>
      <Banner notice={{ level: "error", message }} />
      <p>
        <a href="/">Start a new session</a>
        {` (${status})`}
      </p>
    </Layout>
  );
}

export function renderSessionPage(state: SessionState, analysis: TemplateAnalysis): string {
  return renderDocument(<SessionPage state={state} analysis={analysis} />);
}

export function renderErrorPage(status: number, message: string): string {
  return renderDocument(<ErrorPage status={status} message={message} />);
}
