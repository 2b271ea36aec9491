import { InvalidIdentityError } from "./errors";
import type { Chapter } from "../types";

export const ARCHIVE_EXTENSION = ".zip";

const UUID_HYPHENATED = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const UUID_SIMPLE = /^[0-9a-f]{32}$/i;

// Much more restrictive than what filesystems actually need.
const UNSAFE_CHARS = /[^~☆:;’'",#!()\p{L}\p{N}\-_+=[\]. ]+/gu;
const UNSAFE_CHARS_ALLOW_QUESTION = /[^?~☆:;’'",#!()\p{L}\p{N}\-_+=[\]. ]+/gu;
const HYPHEN_RUNS = /--+/g;
const EDGE_HYPHENS_AND_SPACES = /^[ -]+|[ -]+$/g;

export type NamingOptions = {
  allowQuestionMarks: boolean;
};

function normalizeUuid(id: string): string {
  let raw = id.trim();
  if (raw.toLowerCase().startsWith("urn:uuid:")) {
    raw = raw.slice("urn:uuid:".length);
  } else if (raw.startsWith("{") && raw.endsWith("}")) {
    raw = raw.slice(1, -1);
  }

  if (UUID_HYPHENATED.test(raw)) return raw.replace(/-/g, "");
  if (UUID_SIMPLE.test(raw)) return raw;
  throw new InvalidIdentityError(id);
}

/** Unpadded base64url of the 16 raw UUID bytes: always 22 characters. */
export function encodeStableKey(id: string): string {
  return Buffer.from(normalizeUuid(id), "hex").toString("base64url");
}

export function sanitizeDisplayName(raw: string, options: NamingOptions): string {
  const pattern = options.allowQuestionMarks ? UNSAFE_CHARS_ALLOW_QUESTION : UNSAFE_CHARS;
  return raw.replace(pattern, "-").replace(HYPHEN_RUNS, "-").replace(EDGE_HYPHENS_AND_SPACES, "");
}

export function chapterDisplayText(chapter: Chapter, groupNames: string[]): string {
  const number = chapter.attributes.chapter ?? "0";
  const { volume, title } = chapter.attributes;

  let name: string;
  if (volume && title) {
    name = `Vol. ${volume} Ch. ${number} ${title}`;
  } else if (volume) {
    name = `Vol. ${volume} Ch. ${number}`;
  } else if (title) {
    name = `Ch. ${number} ${title}`;
  } else {
    name = `Ch. ${number}`;
  }

  return groupNames.length > 0 ? `${name} [${groupNames.join(", ")}]` : name;
}

export function composeChapterFilename(
  chapter: Chapter,
  groupNames: string[],
  stableKey: string,
  options: NamingOptions,
): string {
  return `${sanitizeDisplayName(chapterDisplayText(chapter, groupNames), options)} - ${stableKey}${ARCHIVE_EXTENSION}`;
}

export function composeMangaDirname(title: string, stableKey: string, options: NamingOptions): string {
  return `${sanitizeDisplayName(title, options)} - ${stableKey}`;
}
