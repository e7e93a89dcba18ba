import request from "supertest";
import { describe, expect, test } from "vitest";
import { createApp } from "../src/app";
import { stubFetch, stubFetchJson } from "./helpers";

async function newSession(app: ReturnType<typeof createApp>): Promise<string> {
  const res = await request(app).post("/api/sessions");
  expect(res.status).toBe(201);
  return res.body.session.id;
}

describe("sessions API", () => {
  test("health check", async () => {
    const res = await request(createApp()).get("/health");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });
  });

  test("a new session starts with the default template and single-answer mode", async () => {
    const app = createApp();
    const res = await request(app).post("/api/sessions");
    expect(res.status).toBe(201);
    expect(res.body.session.template).toContain("{{student_answer}}");
    expect(res.body.session.answer_mode).toBe("single");
    expect(res.body.session.variables).toEqual({});
    expect(res.body.session.last_render).toBeNull();
    expect(res.body.session.notices).toEqual([]);
  });

  test("template, fetch, answer, render", async () => {
    const app = createApp();
    const id = await newSession(app);

    const tpl = await request(app).put(`/api/sessions/${id}/template`).send({ template: "Discuss {topic}: {answer}" });
    expect(tpl.status).toBe(200);
    expect(tpl.body.analysis).toEqual({ placeholders: ["topic", "answer"], malformed: [], unknown: ["topic"] });
    expect(tpl.body.session.notices).toEqual([
      { level: "warning", message: "The template uses variables not in the predefined list: topic" }
    ]);

    stubFetchJson({ topic: "Climate" });
    const fetched = await request(app).post(`/api/sessions/${id}/fetch`).send({ url: "https://content.test/topic.json" });
    expect(fetched.status).toBe(200);
    expect(fetched.body.ok).toBe(true);
    expect(fetched.body.session.variables).toEqual({ topic: { value: "Climate", source: "fetched" } });
    expect(fetched.body.session.notices).toEqual([
      { level: "success", message: "Fetched 1 variable from the content URL (flat)." }
    ]);

    await request(app).put(`/api/sessions/${id}/answer`).send({ answer: "It is warming." }).expect(200);

    const rendered = await request(app).post(`/api/sessions/${id}/render`);
    expect(rendered.status).toBe(200);
    expect(rendered.body.result.rows).toEqual([
      { index: 0, student_id: null, answer: "It is warming.", prompt: "Discuss Climate: It is warming.", warnings: [] }
    ]);
    expect(rendered.body.session.notices).toEqual([{ level: "success", message: "Generated 1 prompt." }]);
  });

  test("a failed fetch keeps the previous variables and reports FetchFailed", async () => {
    const app = createApp();
    const id = await newSession(app);
    stubFetchJson({ topic: "Climate" });
    await request(app).post(`/api/sessions/${id}/fetch`).send({ url: "https://content.test/a.json" }).expect(200);

    stubFetch("{not json");
    const res = await request(app).post(`/api/sessions/${id}/fetch`).send({ url: "https://content.test/b.json" });
    expect(res.status).toBe(200);
    expect(res.body.ok).toBe(false);
    expect(res.body.session.variables).toEqual({ topic: { value: "Climate", source: "fetched" } });
    expect(res.body.session.notices).toHaveLength(1);
    expect(res.body.session.notices[0].level).toBe("error");
    expect(res.body.session.notices[0].kind).toBe("FetchFailed");
  });

  test("an empty URL warns without fetching", async () => {
    const app = createApp();
    const id = await newSession(app);
    const requested = stubFetchJson({ topic: "Climate" });
    const res = await request(app).post(`/api/sessions/${id}/fetch`).send({ url: "   " });
    expect(res.body.ok).toBe(false);
    expect(res.body.session.notices).toEqual([
      { level: "warning", message: "Please enter a Content URL to fetch variables." }
    ]);
    expect(requested).toEqual([]);
  });

  test("manual edits override fetched values", async () => {
    const app = createApp();
    const id = await newSession(app);
    await request(app).put(`/api/sessions/${id}/template`).send({ template: "Discuss {topic}: {answer}" });
    stubFetchJson({ topic: "Climate" });
    await request(app).post(`/api/sessions/${id}/fetch`).send({ url: "https://content.test/a.json" });

    const edit = await request(app).put(`/api/sessions/${id}/variables/topic`).send({ value: "Oceans" });
    expect(edit.body.session.variables.topic).toEqual({ value: "Oceans", source: "manual" });

    await request(app).put(`/api/sessions/${id}/answer`).send({ answer: "Tides." });
    const rendered = await request(app).post(`/api/sessions/${id}/render`);
    expect(rendered.body.result.rows[0].prompt).toBe("Discuss Oceans: Tides.");
  });

  test("a variable named __proto__ is stored and rendered", async () => {
    const app = createApp();
    const id = await newSession(app);
    await request(app).put(`/api/sessions/${id}/template`).send({ template: "X={{__proto__}}" }).expect(200);
    await request(app).put(`/api/sessions/${id}/variables/__proto__`).send({ value: "set" }).expect(200);

    const rendered = await request(app).post(`/api/sessions/${id}/render`);
    expect(rendered.status).toBe(200);
    expect(rendered.body.result.rows).toEqual([
      { index: 0, student_id: null, answer: "", prompt: "X=set", warnings: [] }
    ]);
  });

  test("a fetched __proto__ key becomes a variable", async () => {
    const app = createApp();
    const id = await newSession(app);
    stubFetch('{"__proto__":"p","topic":"t"}');
    const fetched = await request(app).post(`/api/sessions/${id}/fetch`).send({ url: "https://content.test/odd.json" });
    expect(fetched.status).toBe(200);
    expect(Object.keys(fetched.body.session.variables)).toEqual(["__proto__", "topic"]);
    expect(fetched.body.session.resolve_mode).toBe("auto");
    expect(fetched.body.session.notices).toEqual([
      { level: "success", message: "Fetched 2 variables from the content URL (flat)." }
    ]);
  });

  test("unresolved placeholders are flagged per row", async () => {
    const app = createApp();
    const id = await newSession(app);
    await request(app)
      .put(`/api/sessions/${id}/template`)
      .send({ template: "{{task_instruction}}: {{student_answer}}" });
    await request(app).put(`/api/sessions/${id}/answer`).send({ answer: "Hi" });

    const res = await request(app).post(`/api/sessions/${id}/render`);
    expect(res.body.result.rows[0].prompt).toBe(": Hi");
    expect(res.body.result.rows[0].warnings).toEqual([
      { kind: "MissingVariable", name: "task_instruction", message: "No value for {{task_instruction}}" }
    ]);
    expect(res.body.session.notices).toEqual([
      { level: "warning", kind: "MissingVariable", message: "Unresolved placeholders in 1 of 1 prompts: task_instruction" },
      { level: "success", message: "Generated 1 prompt." }
    ]);
  });

  test("batch upload, render and CSV export", async () => {
    const app = createApp();
    const id = await newSession(app);
    await request(app).put(`/api/sessions/${id}/template`).send({ template: "Feedback for {{student_answer}}" });
    await request(app).put(`/api/sessions/${id}/answer-mode`).send({ mode: "batch" }).expect(200);

    const upload = await request(app)
      .post(`/api/sessions/${id}/answers/upload`)
      .attach("file", Buffer.from("Student,Answers\ns1,First\ns2,Second\n"), "answers.csv");
    expect(upload.status).toBe(200);
    expect(upload.body.ok).toBe(true);
    expect(upload.body.session.upload.rows).toHaveLength(2);
    expect(upload.body.session.notices).toEqual([
      { level: "success", message: "Successfully read 2 answers from 'answers.csv'." }
    ]);

    const rendered = await request(app).post(`/api/sessions/${id}/render`);
    expect(rendered.body.result.rows.map((r: { prompt: string }) => r.prompt)).toEqual([
      "Feedback for First",
      "Feedback for Second"
    ]);

    const exported = await request(app).get(`/api/sessions/${id}/export.csv`);
    expect(exported.status).toBe(200);
    expect(exported.headers["content-type"]).toBe("text/csv; charset=utf-8");
    expect(exported.headers["content-disposition"]).toBe('attachment; filename="generated_prompts.csv"');
    expect(exported.text).toBe(
      "Student,Answers,generated_prompt,warnings\ns1,First,Feedback for First,\ns2,Second,Feedback for Second,\n"
    );
  });

  test("a CSV without an Answers column is rejected as MalformedUpload", async () => {
    const app = createApp();
    const id = await newSession(app);
    await request(app).put(`/api/sessions/${id}/answer-mode`).send({ mode: "batch" });
    await request(app)
      .post(`/api/sessions/${id}/answers/upload`)
      .attach("file", Buffer.from("Answers\nkept?\n"), "first.csv")
      .expect(200);

    const res = await request(app)
      .post(`/api/sessions/${id}/answers/upload`)
      .attach("file", Buffer.from("Name\nx\n"), "bad.csv");
    expect(res.status).toBe(422);
    expect(res.body.ok).toBe(false);
    expect(res.body.session.upload).toBeNull();
    expect(res.body.session.notices).toEqual([
      {
        level: "error",
        kind: "MalformedUpload",
        message: "CSV file is missing the required 'Answers' column. Please check the header."
      }
    ]);
  });

  test("batch mode without an upload renders nothing", async () => {
    const app = createApp();
    const id = await newSession(app);
    await request(app).put(`/api/sessions/${id}/template`).send({ template: "{{student_answer}}" });
    await request(app).put(`/api/sessions/${id}/answer-mode`).send({ mode: "batch" });
    const res = await request(app).post(`/api/sessions/${id}/render`);
    expect(res.status).toBe(200);
    expect(res.body.result).toBeNull();
    expect(res.body.session.notices).toEqual([
      { level: "warning", message: "CSV method selected, but no answers were uploaded; no prompts were generated." }
    ]);
  });

  test("switching to batch clears the typed answer", async () => {
    const app = createApp();
    const id = await newSession(app);
    await request(app).put(`/api/sessions/${id}/answer`).send({ answer: "typed" });
    const res = await request(app).put(`/api/sessions/${id}/answer-mode`).send({ mode: "batch" });
    expect(res.body.session.answer_mode).toBe("batch");
    expect(res.body.session.single_answer).toBe("");
  });

  test("export before any render is a conflict", async () => {
    const app = createApp();
    const id = await newSession(app);
    const res = await request(app).get(`/api/sessions/${id}/export.csv`);
    expect(res.status).toBe(409);
    expect(res.body).toEqual({ error: "Nothing has been generated yet" });
  });

  test("validation and lookup errors", async () => {
    const app = createApp();
    const id = await newSession(app);

    expect((await request(app).put(`/api/sessions/${id}/answer-mode`).send({ mode: "other" })).status).toBe(400);
    expect((await request(app).put(`/api/sessions/${id}/variables/1bad`).send({ value: "x" })).status).toBe(400);

    const noFile = await request(app).post(`/api/sessions/${id}/answers/upload`);
    expect(noFile.status).toBe(400);
    expect(noFile.body).toEqual({ error: "CSV file missing (form field 'file')" });

    const missing = await request(app).put("/api/sessions/does-not-exist/template").send({ template: "x" });
    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ error: "Session not found" });

    const route = await request(app).get("/api/nothing-here");
    expect(route.status).toBe(404);
    expect(route.body).toEqual({ error: "Route not found" });
  });

  test("deleted sessions are gone", async () => {
    const app = createApp();
    const id = await newSession(app);
    await request(app).delete(`/api/sessions/${id}`).expect(204);
    expect((await request(app).get(`/api/sessions/${id}`)).status).toBe(404);
  });
});
