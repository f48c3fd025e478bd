import fs from "node:fs";
import { formatZodIssues } from "../mesh/wire-schema.js";
import type { ProtocolConfig } from "./types.protocol.js";
import { ProtocolSchema } from "./zod-schema.protocol.js";

export function resolveProtocolConfig(raw: unknown): ProtocolConfig {
  const parsed = ProtocolSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new Error(`invalid protocol config: ${formatZodIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function loadProtocolConfig(filePath: string): ProtocolConfig {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    throw new Error(`cannot read protocol config ${filePath}: ${String(err)}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new Error(`protocol config ${filePath} is not valid JSON: ${String(err)}`);
  }
  return resolveProtocolConfig(raw);
}
