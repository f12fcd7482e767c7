import { readFile } from "node:fs/promises";

import { errorMessage } from "../utils/logger";

export async function loadJson(path: string | URL): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new Error(`Failed to load ${String(path)}: ${errorMessage(err)}`);
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    throw new Error(`Failed to parse ${String(path)}: ${errorMessage(err)}`);
  }
}
