import { cast, formatCastValue, isCastType, type CastOptions } from "../cast/caster.js";
import type { Section } from "../tree/section.js";

export const ROOT_PATH = ".";
export const PATH_SEPARATOR = "/";

export function parseSectionPath(text: string | undefined): string[] {
  if (!text || text === ROOT_PATH) {
    return [];
  }
  return text.split(PATH_SEPARATOR).filter((name) => name.length > 0);
}

export interface ReadValueRequest {
  path?: string;
  key: string;
  type?: string;
}

/** Looks up `key` under `path` and renders it, cast when a type is given. */
export function readValue(root: Section, request: ReadValueRequest, options: CastOptions = {}): string {
  const section = root.at(...parseSectionPath(request.path));
  const raw = section.get(request.key);
  if (!request.type) {
    return raw;
  }
  if (!isCastType(request.type)) {
    throw new Error(`Unknown type: ${request.type}`);
  }
  return formatCastValue(cast(raw, request.type, options));
}
