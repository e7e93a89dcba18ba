import fs from "node:fs";
import path from "node:path";

const TEMPLATE_PATH = path.resolve(__dirname, "../../../templates/default-template.txt");

let cached: string | null = null;

/** Writing-feedback prompt loaded into every new session. */
export function getDefaultTemplate(): string {
  if (cached === null) {
    cached = fs.readFileSync(TEMPLATE_PATH, "utf8");
  }
  return cached;
}
