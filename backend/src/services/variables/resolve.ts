/**
 * Variable resolver: fetch a JSON document from a content URL and turn it into
 * variable values. Failures are returned as FetchFailed, never thrown, so the
 * caller can keep the session's previous variables.
 */

import type { Notice, ResolveMode } from "../../../../packages/shared/src/types";
import { env } from "../../config/env";
import { createLogger } from "../../utils/logger";
import { extractActivityVariables, isActivityDocument } from "./activity";

const log = createLogger("fetch");

export type FetchFn = typeof fetch;

let fetchImpl: FetchFn | null = null;

/** Replace the HTTP client (tests); null restores the global fetch. */
export function setFetchImpl(fn: FetchFn | null): void {
  fetchImpl = fn;
}

export type FetchVariablesResult =
  | { ok: true; values: Record<string, string>; mode: Exclude<ResolveMode, "auto">; notices: Notice[] }
  | { ok: false; error: { kind: "FetchFailed"; message: string } };

/** Strings as-is, null as empty, arrays and objects as JSON. */
export function stringifyValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === null || value === undefined) return "";
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  return JSON.stringify(value);
}

/** One variable per top-level key, `__proto__` included. */
export function flattenTopLevel(doc: Record<string, unknown>): Record<string, string> {
  return Object.fromEntries(Object.entries(doc).map(([key, value]) => [key, stringifyValue(value)]));
}

function fetchFailed(message: string): FetchVariablesResult {
  return { ok: false, error: { kind: "FetchFailed", message } };
}

function describeJsonType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "an array";
  return `a ${typeof value}`;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Map a parsed JSON object to variables according to the resolve mode.
 * `auto` derives lesson variables from activity documents and flattens anything else.
 */
export function resolveDocument(
  doc: Record<string, unknown>,
  mode: ResolveMode
): { values: Record<string, string>; mode: Exclude<ResolveMode, "auto">; warnings: string[] } {
  const effective = mode === "auto" ? (isActivityDocument(doc) ? "activity" : "flat") : mode;
  if (effective === "flat") {
    return { values: flattenTopLevel(doc), mode: "flat", warnings: [] };
  }
  const { values, warnings } = extractActivityVariables(doc);
  return { values: { ...values }, mode: "activity", warnings };
}

export async function fetchVariables(rawUrl: string, mode: ResolveMode = "auto"): Promise<FetchVariablesResult> {
  const url = rawUrl.trim();
  let parsedUrl: URL;
  try {
    parsedUrl = new URL(url);
  } catch {
    return fetchFailed(`Invalid URL: ${url}`);
  }
  if (parsedUrl.protocol !== "http:" && parsedUrl.protocol !== "https:") {
    return fetchFailed(`Unsupported URL protocol: ${parsedUrl.protocol}`);
  }

  const doFetch = fetchImpl ?? fetch;
  let body: string;
  try {
    const res = await doFetch(parsedUrl, {
      headers: { Accept: "application/json" },
      signal: AbortSignal.timeout(env.FETCH_TIMEOUT_MS)
    });
    if (!res.ok) {
      return fetchFailed(`Error fetching URL: HTTP ${res.status}${res.statusText ? ` ${res.statusText}` : ""}`);
    }
    body = await res.text();
  } catch (e) {
    if (e instanceof Error && (e.name === "TimeoutError" || e.name === "AbortError")) {
      return fetchFailed(`Error fetching URL: timed out after ${env.FETCH_TIMEOUT_MS} ms`);
    }
    log.warn(`request to ${parsedUrl.host} failed:`, errorMessage(e));
    return fetchFailed(`Error fetching URL: ${errorMessage(e)}`);
  }

  let doc: unknown;
  try {
    doc = JSON.parse(body);
  } catch (e) {
    return fetchFailed(`Error parsing JSON response: ${errorMessage(e)}`);
  }
  if (typeof doc !== "object" || doc === null || Array.isArray(doc)) {
    return fetchFailed(`Expected a JSON object at the top level, got ${describeJsonType(doc)}`);
  }

  const resolved = resolveDocument(Object.fromEntries(Object.entries(doc)), mode);
  log.debug(`resolved ${Object.keys(resolved.values).length} variables (${resolved.mode}) from ${parsedUrl.host}`);
  return {
    ok: true,
    values: resolved.values,
    mode: resolved.mode,
    notices: resolved.warnings.map((message): Notice => ({ level: "warning", message }))
  };
}
