import { promises as fs } from "fs";
import path from "path";
import { JsonObject, JsonValue } from "../types/json";
import { hasErrnoCode, NotFoundError, ParseError, SerializationError } from "./errors";

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

function describeType(value: unknown): string {
  if (value === null) return "null";
  if (typeof value !== "object") return typeof value;
  return value.constructor?.name ?? "object";
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Copies `value` into a JSON value, or throws SerializationError naming the
 * offending location. Object properties holding `undefined` are dropped, the
 * same as JSON.stringify does.
 */
export function toJsonValue(value: unknown, location = "$", ancestors: object[] = []): JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new SerializationError(`${location}: ${value} is not representable in JSON`);
    }
    return value;
  }
  if (typeof value !== "object") {
    throw new SerializationError(`${location}: ${describeType(value)} is not representable in JSON`);
  }
  if (ancestors.includes(value)) {
    throw new SerializationError(`${location}: circular reference`);
  }
  const chain = [...ancestors, value];

  if (Array.isArray(value)) {
    return value.map((item: unknown, index) => {
      if (item === undefined) {
        throw new SerializationError(`${location}[${index}]: undefined is not representable in JSON`);
      }
      return toJsonValue(item, `${location}[${index}]`, chain);
    });
  }
  if (!isPlainObject(value)) {
    throw new SerializationError(`${location}: ${describeType(value)} is not representable in JSON`);
  }

  const out: JsonObject = {};
  for (const [key, item] of Object.entries(value)) {
    if (item === undefined) continue;
    out[key] = toJsonValue(item, `${location}.${key}`, chain);
  }
  return out;
}

export async function readJson(filePath: string): Promise<JsonValue> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (hasErrnoCode(error, "ENOENT")) {
      throw new NotFoundError(`File not found: ${filePath}`, filePath);
    }
    throw error;
  }

  try {
    const parsed: JsonValue = JSON.parse(content);
    return parsed;
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Malformed JSON in ${filePath}: ${detail}`, filePath);
  }
}

export async function writeJson(filePath: string, data: unknown): Promise<string> {
  const text = JSON.stringify(toJsonValue(data), null, 2);
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, `${text}\n`, "utf8");
  return filePath;
}

export async function appendJsonLine(filePath: string, record: JsonObject): Promise<void> {
  await fs.appendFile(filePath, `${JSON.stringify(record)}\n`, "utf8");
}

export async function writeText(filePath: string, text: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, text, "utf8");
}

/** Creates an empty file, leaving existing content alone. */
export async function touchFile(filePath: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.appendFile(filePath, "", "utf8");
}

export async function writeBinary(filePath: string, data: Buffer): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, data);
}
