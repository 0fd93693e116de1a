/**
 * Tokenizer for Python 3 source.
 * Emits INDENT/DEDENT/NEWLINE the way the reference grammar expects: no NEWLINE inside
 * brackets, blank and comment-only lines are skipped, backslash continuation joins lines.
 */

import { Deadline } from "../deadline";

export type TokenKind = "name" | "number" | "string" | "op" | "newline" | "indent" | "dedent" | "eof";

export interface Token {
  kind: TokenKind;
  value: string;
  line: number;
  /** Lower-cased string prefix ("", "r", "b", "f", "rb", ...) */
  prefix?: string;
  /** String body before escape processing */
  raw?: string;
}

export class PythonSyntaxError extends Error {
  constructor(message: string, public line: number) {
    super(message);
    this.name = "PythonSyntaxError";
    Object.setPrototypeOf(this, PythonSyntaxError.prototype);
  }
}

const OPERATORS = [
  "**=", "//=", ">>=", "<<=", "...",
  "->", ":=", "**", "//", "<<", ">>", "<=", ">=", "==", "!=",
  "+=", "-=", "*=", "/=", "%=", "&=", "|=", "^=", "@=",
  "+", "-", "*", "/", "%", "@", "&", "|", "^", "~", "<", ">",
  "(", ")", "[", "]", "{", "}", ",", ":", ".", ";", "=", "!",
];

const STRING_PREFIXES = new Set(["", "r", "u", "b", "br", "rb", "f", "fr", "rf"]);
const CLOSERS: Record<string, string> = { ")": "(", "]": "[", "}": "{" };

const STRING_START = /([rRbBuUfF]{0,2})('''|"""|'|")/y;
const NAME = /[\p{L}\p{Nl}_][\p{L}\p{Nl}\p{Mn}\p{Mc}\p{Nd}\p{Pc}]*/uy;
const NUMBER =
  /(?:0[xX](?:_?[0-9a-fA-F])+|0[oO](?:_?[0-7])+|0[bB](?:_?[01])+|(?:\d(?:_?\d)*)?\.\d(?:_?\d)*(?:[eE][+-]?\d(?:_?\d)*)?[jJ]?|\d(?:_?\d)*(?:\.(?:\d(?:_?\d)*)?)?(?:[eE][+-]?\d(?:_?\d)*)?[jJ]?)/y;

export function tokenize(source: string, deadline: Deadline = Deadline.unlimited()): Token[] {
  const src = source.replace(/\r\n?/g, "\n");
  const tokens: Token[] = [];
  const indents = [0];
  const brackets: Array<{ char: string; line: number }> = [];
  let pos = 0;
  let line = 1;
  let atLineStart = true;

  const push = (kind: TokenKind, value: string, tokenLine = line) => {
    tokens.push({ kind, value, line: tokenLine });
  };

  while (pos < src.length) {
    deadline.check();

    if (atLineStart && brackets.length === 0) {
      let column = 0;
      let p = pos;
      while (p < src.length) {
        const c = src[p];
        if (c === " ") column++;
        else if (c === "\t") column = (Math.floor(column / 8) + 1) * 8;
        else if (c === "\f") column = 0;
        else break;
        p++;
      }
      if (p >= src.length) {
        pos = p;
        break;
      }
      if (src[p] === "\n") {
        pos = p + 1;
        line++;
        continue;
      }
      if (src[p] === "#") {
        while (p < src.length && src[p] !== "\n") p++;
        pos = p;
        continue;
      }

      pos = p;
      atLineStart = false;
      const current = indents[indents.length - 1];
      if (column > current) {
        indents.push(column);
        push("indent", "");
      } else if (column < current) {
        while (indents.length > 1 && column < indents[indents.length - 1]) {
          indents.pop();
          push("dedent", "");
        }
        if (column !== indents[indents.length - 1]) {
          throw new PythonSyntaxError("unindent does not match any outer indentation level", line);
        }
      }
      continue;
    }

    const c = src[pos];

    if (c === " " || c === "\t" || c === "\f") {
      pos++;
      continue;
    }

    if (c === "#") {
      while (pos < src.length && src[pos] !== "\n") pos++;
      continue;
    }

    if (c === "\\") {
      if (src[pos + 1] === "\n") {
        pos += 2;
        line++;
        continue;
      }
      throw new PythonSyntaxError("unexpected character after line continuation character", line);
    }

    if (c === "\n") {
      if (brackets.length === 0) {
        push("newline", "");
        atLineStart = true;
      }
      pos++;
      line++;
      continue;
    }

    STRING_START.lastIndex = pos;
    const stringMatch = STRING_START.exec(src);
    if (stringMatch && STRING_PREFIXES.has(stringMatch[1].toLowerCase())) {
      const prefix = stringMatch[1].toLowerCase();
      const quote = stringMatch[2];
      const read = readString(src, pos + stringMatch[1].length + quote.length, quote, line);
      tokens.push({
        kind: "string",
        value: prefix.includes("r") ? read.body : decodeEscapes(read.body),
        raw: read.body,
        prefix,
        line,
      });
      line = read.line;
      pos = read.end;
      continue;
    }

    if (/[0-9]/.test(c) || (c === "." && /[0-9]/.test(src[pos + 1] ?? ""))) {
      NUMBER.lastIndex = pos;
      const match = NUMBER.exec(src);
      if (match) {
        push("number", match[0]);
        pos += match[0].length;
        continue;
      }
    }

    NAME.lastIndex = pos;
    const nameMatch = NAME.exec(src);
    if (nameMatch) {
      push("name", nameMatch[0]);
      pos += nameMatch[0].length;
      continue;
    }

    const op = OPERATORS.find((candidate) => src.startsWith(candidate, pos));
    if (op) {
      if (op === "(" || op === "[" || op === "{") {
        brackets.push({ char: op, line });
      } else if (op === ")" || op === "]" || op === "}") {
        const open = brackets.pop();
        if (!open) {
          throw new PythonSyntaxError(`unmatched '${op}'`, line);
        }
        if (open.char !== CLOSERS[op]) {
          throw new PythonSyntaxError(`closing parenthesis '${op}' does not match opening parenthesis '${open.char}'`, line);
        }
      }
      push("op", op);
      pos += op.length;
      continue;
    }

    const code = c.codePointAt(0) ?? 0;
    throw new PythonSyntaxError(
      `invalid character '${c}' (U+${code.toString(16).toUpperCase().padStart(4, "0")})`,
      line
    );
  }

  if (brackets.length > 0) {
    const open = brackets[brackets.length - 1];
    throw new PythonSyntaxError(`'${open.char}' was never closed`, open.line);
  }

  const last = tokens[tokens.length - 1];
  if (last && last.kind !== "newline" && last.kind !== "dedent") {
    push("newline", "");
  }
  while (indents.length > 1) {
    indents.pop();
    push("dedent", "");
  }
  push("eof", "");
  return tokens;
}

function readString(src: string, start: number, quote: string, startLine: number): { body: string; end: number; line: number } {
  const triple = quote.length === 3;
  let p = start;
  let line = startLine;
  let body = "";

  for (;;) {
    if (p >= src.length) {
      throw new PythonSyntaxError(
        triple
          ? `unterminated triple-quoted string literal (detected at line ${line})`
          : `unterminated string literal (detected at line ${line})`,
        startLine
      );
    }
    const ch = src[p];
    if (ch === "\\" && p + 1 < src.length) {
      if (src[p + 1] === "\n") line++;
      body += ch + src[p + 1];
      p += 2;
      continue;
    }
    if (ch === "\n" && !triple) {
      throw new PythonSyntaxError(`unterminated string literal (detected at line ${line})`, startLine);
    }
    if (src.startsWith(quote, p)) {
      return { body, end: p + quote.length, line };
    }
    if (ch === "\n") line++;
    body += ch;
    p++;
  }
}

const SIMPLE_ESCAPES: Record<string, string> = {
  "\\": "\\",
  "'": "'",
  '"': '"',
  n: "\n",
  t: "\t",
  r: "\r",
  "0": "\0",
  a: "\x07",
  b: "\b",
  f: "\f",
  v: "\v",
  "\n": "",
};

export function decodeEscapes(body: string): string {
  return body.replace(/\\(x[0-9a-fA-F]{2}|u[0-9a-fA-F]{4}|U[0-9a-fA-F]{8}|[\s\S])/g, (whole, escape: string) => {
    if (escape.length > 1) {
      const codePoint = parseInt(escape.slice(1), 16);
      return codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : whole;
    }
    return SIMPLE_ESCAPES[escape] ?? whole;
  });
}
