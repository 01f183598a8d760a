/**
 * Optional field codec for `TAG:TYPE:VALUE` tokens
 *
 * @module sam/tags
 */

import { SamError } from "../../errors";
import type { SAMArraySubtype, SAMTag, SAMTagType } from "./types";
import { ARRAY_SUBTYPE_RANGES, ARRAY_SUBTYPES, TAG_TYPES } from "./types";

const TAG_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9]$/;
const CHAR_PATTERN = /^[!-~]$/;
const INTEGER_PATTERN = /^[-+]?[0-9]+$/;
const FLOAT_PATTERN = /^[-+]?[0-9]*\.?[0-9]+(?:[eE][-+]?[0-9]+)?$/;
const STRING_PATTERN = /^[ !-~]*$/;
const HEX_PATTERN = /^[0-9A-Fa-f]*$/;

const INTEGER_MIN = -2_147_483_648;
const INTEGER_MAX = 4_294_967_295;

const TAG_TYPE_SET: ReadonlySet<string> = new Set(TAG_TYPES);
const ARRAY_SUBTYPE_SET: ReadonlySet<string> = new Set(ARRAY_SUBTYPES);

function isTagType(char: string): char is SAMTagType {
  return TAG_TYPE_SET.has(char);
}

function isArraySubtype(char: string): char is SAMArraySubtype {
  return ARRAY_SUBTYPE_SET.has(char);
}

/**
 * Whether `name` is a valid two-character tag name
 */
function isValidTagName(name: string): boolean {
  return TAG_NAME_PATTERN.test(name);
}

/**
 * Parse one optional field token
 *
 * @throws {SamError} `MalformedField` for a bad token shape, tag name or
 *   A/i/f/Z value; `InvalidHexTag`, `InvalidArrayTag` or `UnknownTagType`
 *   for the rest
 *
 * @example
 * ```typescript
 * parseTag("NM:i:3");     // { tag: "NM", type: "i", value: 3 }
 * parseTag("ZB:B:c,1,-2"); // { tag: "ZB", type: "B", subtype: "c", value: [1, -2] }
 * ```
 */
function parseTag(token: string): SAMTag {
  if (token.length < 5 || token.charAt(2) !== ":" || token.charAt(4) !== ":") {
    throw SamError.malformedTag(token, "expected TAG:TYPE:VALUE");
  }

  const tag = token.slice(0, 2);
  const tagType = token.charAt(3);
  const value = token.slice(5);

  if (!isValidTagName(tag)) {
    throw SamError.malformedTag(token, `invalid tag name '${tag}'`);
  }
  if (!isTagType(tagType)) {
    throw SamError.unknownTagType(tag, tagType, token);
  }

  switch (tagType) {
    case "A":
      if (!CHAR_PATTERN.test(value)) {
        throw SamError.malformedTagValue(tag, tagType, token, "expected one printable character");
      }
      return { tag, type: "A", value };
    case "i":
      return { tag, type: "i", value: parseInteger(tag, token, value) };
    case "f":
      return { tag, type: "f", value: parseFloatValue(tag, token, value) };
    case "Z":
      if (!STRING_PATTERN.test(value)) {
        throw SamError.malformedTagValue(tag, tagType, token, "contains non-printable characters");
      }
      return { tag, type: "Z", value };
    case "H":
      return { tag, type: "H", value: parseHex(tag, token, value) };
    case "B":
      return parseArray(tag, token, value);
  }
}

function parseInteger(tag: string, token: string, text: string): number {
  if (!INTEGER_PATTERN.test(text)) {
    throw SamError.malformedTagValue(tag, "i", token, `'${text}' is not an integer`);
  }
  const value = Number(text);
  if (value < INTEGER_MIN || value > INTEGER_MAX) {
    throw SamError.malformedTagValue(
      tag,
      "i",
      token,
      `${text} is outside ${INTEGER_MIN}..${INTEGER_MAX}`
    );
  }
  return value;
}

function parseFloatValue(tag: string, token: string, text: string): number {
  const value = Number(text);
  if (!FLOAT_PATTERN.test(text) || !Number.isFinite(value)) {
    throw SamError.malformedTagValue(tag, "f", token, `'${text}' is not a finite number`);
  }
  return value;
}

function parseHex(tag: string, token: string, text: string): Uint8Array {
  if (text.length % 2 !== 0) {
    throw SamError.invalidHexTag(tag, token, `odd number of hex digits (${text.length})`);
  }
  if (!HEX_PATTERN.test(text)) {
    throw SamError.invalidHexTag(tag, token, `'${text}' contains non-hex characters`);
  }

  const bytes = new Uint8Array(text.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = Number.parseInt(text.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

function parseArray(tag: string, token: string, text: string): SAMTag {
  const subtype = text.charAt(0);
  if (subtype === "") {
    throw SamError.invalidArrayTag(tag, token, "missing element subtype");
  }
  if (!isArraySubtype(subtype)) {
    throw SamError.invalidArrayTag(tag, token, `unknown element subtype '${subtype}'`);
  }

  const rest = text.slice(1);
  if (rest === "") {
    return { tag, type: "B", subtype, value: [] };
  }
  if (rest.charAt(0) !== ",") {
    throw SamError.invalidArrayTag(tag, token, `expected ',' after subtype '${subtype}'`);
  }

  const value = rest
    .slice(1)
    .split(",")
    .map((element, index) => parseArrayElement(tag, token, subtype, element, index));

  return { tag, type: "B", subtype, value };
}

function parseArrayElement(
  tag: string,
  token: string,
  subtype: SAMArraySubtype,
  element: string,
  index: number
): number {
  if (subtype === "f") {
    const value = Number(element);
    if (!FLOAT_PATTERN.test(element) || !Number.isFinite(value)) {
      throw SamError.invalidArrayTag(
        tag,
        token,
        `element ${index} '${element}' is not a finite number`
      );
    }
    return value;
  }

  if (!INTEGER_PATTERN.test(element)) {
    throw SamError.invalidArrayTag(tag, token, `element ${index} '${element}' is not an integer`);
  }
  const value = Number(element);
  const [min, max] = ARRAY_SUBTYPE_RANGES[subtype];
  if (value < min || value > max) {
    throw SamError.invalidArrayTag(
      tag,
      token,
      `element ${index} (${element}) is outside ${min}..${max} for subtype '${subtype}'`
    );
  }
  return value;
}

function formatNumber(value: number): string {
  return Object.is(value, -0) ? "-0" : String(value);
}

function formatHex(bytes: Uint8Array): string {
  let hex = "";
  for (const byte of bytes) {
    hex += byte.toString(16).toUpperCase().padStart(2, "0");
  }
  return hex;
}

/**
 * Format an optional field as `TAG:TYPE:VALUE`
 *
 * Integers and floats are written with `String`, so a parsed value formats
 * back to an equal number; hex is written uppercase.
 */
function formatTag(tag: SAMTag): string {
  switch (tag.type) {
    case "A":
    case "Z":
      return `${tag.tag}:${tag.type}:${tag.value}`;
    case "i":
    case "f":
      return `${tag.tag}:${tag.type}:${formatNumber(tag.value)}`;
    case "H":
      return `${tag.tag}:H:${formatHex(tag.value)}`;
    case "B":
      return `${tag.tag}:B:${tag.subtype}${tag.value.map((v) => `,${formatNumber(v)}`).join("")}`;
    default: {
      const unreachable: never = tag;
      throw new Error(`Unhandled tag type: ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * First tag named `name`, if any
 */
function findTag(tags: readonly SAMTag[], name: string): SAMTag | undefined {
  return tags.find((t) => t.tag === name);
}

export {
  parseTag,
  formatTag,
  findTag,
  isValidTagName,
  isTagType,
  isArraySubtype,
  CHAR_PATTERN,
  INTEGER_PATTERN,
  FLOAT_PATTERN,
  STRING_PATTERN,
  INTEGER_MIN,
  INTEGER_MAX,
};
