import fs from "node:fs";
import path from "node:path";
import { errorMessage } from "../utils.ts";

export type JsonFileRead =
  | { status: "missing" }
  | { status: "ok"; value: unknown }
  | { status: "invalid"; error: string };

let tempCounter = 0;

function tempPathFor(filePath: string) {
  tempCounter += 1;
  return `${filePath}.${process.pid}.${Date.now()}.${tempCounter}.tmp`;
}

function serialize(value: unknown) {
  return `${JSON.stringify(value, null, 2)}\n`;
}

export async function readJsonFile(filePath: string): Promise<JsonFileRead> {
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) return { status: "missing" };
    throw error;
  }
  try {
    return { status: "ok", value: JSON.parse(text) };
  } catch (error) {
    return { status: "invalid", error: errorMessage(error) };
  }
}

/** Writes through a sibling temp file and a rename. */
export async function writeJsonFileAtomic(filePath: string, value: unknown) {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = tempPathFor(filePath);
  try {
    await fs.promises.writeFile(tempPath, serialize(value), "utf8");
    await fs.promises.rename(tempPath, filePath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
}

export function isMissingFileError(error: unknown) {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
