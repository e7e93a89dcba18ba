import type { ReactElement } from "react";
import { renderToStaticMarkup } from "react-dom/server";

const DOCTYPE = /^<!doctype html>/i;

/** Static HTML for a full page; no client-side hydration. */
export function renderDocument(page: ReactElement): string {
  const markup = renderToStaticMarkup(page);
  // React may already emit the doctype for an <html> root.
  return DOCTYPE.test(markup) ? markup : `<!doctype html>${markup}`;
}
