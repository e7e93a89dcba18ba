import express from "express";
import { pagesRouter } from "./routes/pages";
import { sessionsRouter } from "./routes/sessions";
import { errorHandler, notFoundHandler } from "./middlewares/errorHandler";

export function createApp() {
  const app = express();
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: true, limit: "1mb" }));

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.use("/api/sessions", sessionsRouter);
  app.use(pagesRouter);
  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
