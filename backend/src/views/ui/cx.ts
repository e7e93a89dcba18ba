/** Join class names, skipping empty parts. */
export function cx(...parts: Array<string | false | null | undefined>): string | undefined {
  const joined = parts.filter((p): p is string => typeof p === "string" && p !== "").join(" ");
  return joined || undefined;
}
