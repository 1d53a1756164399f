/* packages/template/src/encoding.ts */

import { ArgumentError } from "./errors.js";

export type ComponentKind =
  | "scheme"
  | "userInfo"
  | "host"
  | "port"
  | "authority"
  | "path"
  | "pathSegment"
  | "matrixParam"
  | "query"
  | "queryParam"
  | "fragment";

// -- Encoding tables --

const ALPHA = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz";
const DIGIT = "0123456789";
const UNRESERVED = `${ALPHA}${DIGIT}-._~`;
const SUB_DELIMS = "!$&'()*+,;=";

function charSet(chars: string, without = ""): ReadonlySet<string> {
  const set = new Set(chars);
  for (const ch of without) set.delete(ch);
  return set;
}

const HOST = UNRESERVED + SUB_DELIMS;
const USER_INFO = HOST + ":";
const AUTHORITY = USER_INFO + "@";
const PATH = AUTHORITY + "/";
const QUERY = PATH + "?";

const ALLOWED: Record<ComponentKind, ReadonlySet<string>> = {
  scheme: charSet(`${ALPHA}${DIGIT}+-.`),
  port: charSet(DIGIT),
  host: charSet(HOST),
  userInfo: charSet(USER_INFO),
  authority: charSet(AUTHORITY),
  pathSegment: charSet(AUTHORITY, ";"),
  matrixParam: charSet(AUTHORITY, ";="),
  path: charSet(PATH),
  query: charSet(QUERY),
  queryParam: charSet(QUERY, "=&+"),
  fragment: charSet(QUERY),
};

const HEX = "0123456789ABCDEF";

function isHex(ch: string | undefined): boolean {
  return ch !== undefined && /^[0-9A-Fa-f]$/.test(ch);
}

function isEscapeAt(value: string, index: number): boolean {
  return value[index] === "%" && isHex(value[index + 1]) && isHex(value[index + 2]);
}

function percentEncode(ch: string): string {
  let out = "";
  for (const byte of new TextEncoder().encode(ch)) {
    out += `%${HEX[byte >> 4]}${HEX[byte & 0x0f]}`;
  }
  return out;
}

function encodeWith(value: string, kind: ComponentKind, keepEscapes: boolean): string {
  const allowed = ALLOWED[kind];
  let out = "";
  let i = 0;
  while (i < value.length) {
    if (keepEscapes && isEscapeAt(value, i)) {
      out += value.slice(i, i + 3);
      i += 3;
      continue;
    }
    // Iterate by code point so surrogate pairs encode as one UTF-8 sequence
    const cp = value.codePointAt(i) ?? 0;
    if (cp >= 0xd800 && cp <= 0xdfff) {
      throw new ArgumentError(`Unpaired surrogate at index ${i} in "${value}"`);
    }
    const ch = String.fromCodePoint(cp);
    if (allowed.has(ch)) {
      out += ch;
    } else if (ch === " " && kind === "queryParam") {
      out += "+";
    } else {
      out += percentEncode(ch);
    }
    i += ch.length;
  }
  return out;
}

// -- Public API --

/** Percent-encode every character that is not allowed in the given component */
export function encode(value: string, kind: ComponentKind): string {
  return encodeWith(value, kind, false);
}

/**
 * Like {@link encode}, but a `%` that already starts a valid escape sequence
 * is copied through, so encoding an encoded value does not double-escape it.
 */
export function contextualEncode(value: string, kind: ComponentKind): string {
  return encodeWith(value, kind, true);
}

export function decode(value: string, kind: ComponentKind): string {
  if (!value.includes("%") && !(kind === "queryParam" && value.includes("+"))) {
    return value;
  }

  let out = "";
  let bytes: number[] = [];
  const flush = () => {
    if (bytes.length > 0) {
      out += new TextDecoder().decode(new Uint8Array(bytes));
      bytes = [];
    }
  };

  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    if (ch === "%") {
      if (!isEscapeAt(value, i)) {
        throw new ArgumentError(`Malformed escape sequence at index ${i} in "${value}"`);
      }
      bytes.push(parseInt(value.slice(i + 1, i + 3), 16));
      i += 2;
      continue;
    }
    flush();
    out += ch === "+" && kind === "queryParam" ? " " : ch;
  }
  flush();
  return out;
}

/** True when every character is allowed in the component or part of a valid escape */
export function isEncoded(value: string, kind: ComponentKind): boolean {
  const allowed = ALLOWED[kind];
  for (let i = 0; i < value.length; i++) {
    if (isEscapeAt(value, i)) {
      i += 2;
      continue;
    }
    if (!allowed.has(value[i])) return false;
  }
  return true;
}
