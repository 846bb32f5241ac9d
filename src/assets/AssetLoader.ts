import { readFile } from "node:fs/promises";

/** Read and parse a JSON file. Rejects with the path in the message. */
export async function loadJSON(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new Error(`Failed to load JSON: ${path} (${err instanceof Error ? err.message : String(err)})`);
  }
  try {
    const data: unknown = JSON.parse(text);
    return data;
  } catch (err) {
    throw new Error(`Failed to parse JSON: ${path} (${err instanceof Error ? err.message : String(err)})`);
  }
}
