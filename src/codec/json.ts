/**
 * csafkit - JSON reader
 *
 * A strict RFC 8259 reader that reports the exact offset, line and column of
 * the first syntax error. `JSON.parse` on Node 20 omits the position for
 * several error classes.
 *
 * Nesting is tracked on an explicit stack, so depth is bounded by memory
 * rather than by the call stack.
 */

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

export interface SourcePosition {
  /** Zero-based byte offset into the UTF-8 encoding of the input */
  offset: number;
  /** One-based */
  line: number;
  /** One-based, counted in UTF-16 code units */
  column: number;
}

export class JsonSyntaxError extends Error {
  readonly reason: string;
  readonly position: SourcePosition;

  constructor(reason: string, position: SourcePosition) {
    super(`${reason} at line ${position.line}, column ${position.column}`);
    this.name = 'JsonSyntaxError';
    this.reason = reason;
    this.position = position;
  }
}

const NUMBER_PATTERN = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;
const HEX4_PATTERN = /^[0-9a-fA-F]{4}$/;

const ESCAPES: Record<string, string> = {
  '"': '"',
  '\\': '\\',
  '/': '/',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
};

/** An open container waiting for its next element */
type Frame =
  | { kind: 'array'; items: JsonValue[] }
  | { kind: 'object'; entries: Array<[string, JsonValue]>; key: string };

class JsonReader {
  private pos = 0;

  constructor(private readonly text: string) {
    // Tolerate a leading byte-order mark
    if (text.charCodeAt(0) === 0xfeff) {
      this.pos = 1;
    }
  }

  readDocument(): JsonValue {
    const stack: Frame[] = [];

    for (;;) {
      // Start of a value: open a container or read a scalar
      this.skipWhitespace();
      let value: JsonValue;
      const char: string | undefined = this.text[this.pos];

      if (char === '{') {
        this.pos++;
        this.skipWhitespace();
        if (this.text[this.pos] !== '}') {
          stack.push({ kind: 'object', entries: [], key: this.readKey() });
          continue;
        }
        this.pos++;
        value = {};
      } else if (char === '[') {
        this.pos++;
        this.skipWhitespace();
        if (this.text[this.pos] !== ']') {
          stack.push({ kind: 'array', items: [] });
          continue;
        }
        this.pos++;
        value = [];
      } else {
        value = this.readScalar(char);
      }

      // Hand the value to its container, closing containers as they end
      for (;;) {
        if (stack.length === 0) {
          this.skipWhitespace();
          if (this.pos < this.text.length) {
            this.fail('Unexpected content after JSON value');
          }
          return value;
        }

        const frame = stack[stack.length - 1];
        this.skipWhitespace();
        const next = this.text[this.pos];

        if (frame.kind === 'array') {
          frame.items.push(value);
          if (next === ',') {
            this.pos++;
            break;
          }
          if (next !== ']') {
            this.fail("Expected ',' or ']' after array element");
          }
          this.pos++;
          stack.pop();
          value = frame.items;
        } else {
          frame.entries.push([frame.key, value]);
          if (next === ',') {
            this.pos++;
            frame.key = this.readKey();
            break;
          }
          if (next !== '}') {
            this.fail("Expected ',' or '}' after property value");
          }
          this.pos++;
          stack.pop();
          // fromEntries defines own properties, so a "__proto__" key stays data
          value = Object.fromEntries(frame.entries);
        }
      }
    }
  }

  private readKey(): string {
    this.skipWhitespace();
    if (this.text[this.pos] !== '"') {
      this.fail('Expected property name');
    }
    const key = this.readString();
    this.skipWhitespace();
    this.expect(':');
    return key;
  }

  private readScalar(char: string | undefined): JsonValue {
    switch (char) {
      case '"':
        return this.readString();
      case 't':
        return this.readLiteral('true', true);
      case 'f':
        return this.readLiteral('false', false);
      case 'n':
        return this.readLiteral('null', null);
      case undefined:
        return this.fail('Unexpected end of input');
      default:
        if (char === '-' || (char >= '0' && char <= '9')) {
          return this.readNumber();
        }
        return this.fail(`Unexpected character ${JSON.stringify(char)}`);
    }
  }

  private readString(): string {
    this.pos++; // opening quote
    let result = '';
    let chunkStart = this.pos;

    for (;;) {
      if (this.pos >= this.text.length) {
        this.fail('Unterminated string');
      }
      const code = this.text.charCodeAt(this.pos);

      if (code === 0x22) {
        result += this.text.slice(chunkStart, this.pos);
        this.pos++;
        return result;
      }
      if (code < 0x20) {
        this.fail('Control character in string');
      }
      if (code === 0x5c) {
        result += this.text.slice(chunkStart, this.pos);
        result += this.readEscape();
        chunkStart = this.pos;
        continue;
      }
      this.pos++;
    }
  }

  private readEscape(): string {
    const escape: string | undefined = this.text[this.pos + 1];

    if (escape === 'u') {
      const hex = this.text.slice(this.pos + 2, this.pos + 6);
      if (!HEX4_PATTERN.test(hex)) {
        this.fail('Invalid unicode escape');
      }
      this.pos += 6;
      return String.fromCharCode(parseInt(hex, 16));
    }

    const decoded = escape === undefined ? undefined : ESCAPES[escape];
    if (decoded === undefined) {
      this.fail('Invalid escape sequence');
    }
    this.pos += 2;
    return decoded;
  }

  private readNumber(): number {
    NUMBER_PATTERN.lastIndex = this.pos;
    const match = NUMBER_PATTERN.exec(this.text);
    if (!match) {
      this.fail('Invalid number');
    }
    this.pos += match[0].length;
    return Number(match[0]);
  }

  private readLiteral<T extends JsonValue>(word: string, value: T): T {
    if (!this.text.startsWith(word, this.pos)) {
      this.fail(`Unexpected character ${JSON.stringify(this.text[this.pos])}`);
    }
    this.pos += word.length;
    return value;
  }

  private expect(char: string): void {
    if (this.text[this.pos] !== char) {
      this.fail(`Expected '${char}'`);
    }
    this.pos++;
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length) {
      const char = this.text[this.pos];
      if (char !== ' ' && char !== '\t' && char !== '\n' && char !== '\r') {
        return;
      }
      this.pos++;
    }
  }

  private fail(reason: string): never {
    throw new JsonSyntaxError(reason, locate(this.text, this.pos));
  }
}

/**
 * UTF-8 length of one UTF-16 code unit. A surrogate pair counts four bytes
 * on its high half; a lone surrogate encodes as U+FFFD.
 */
function utf8Width(text: string, index: number): number {
  const code = text.charCodeAt(index);
  if (code < 0x80) return 1;
  if (code < 0x800) return 2;
  if (code >= 0xd800 && code <= 0xdbff) {
    const low = text.charCodeAt(index + 1);
    return low >= 0xdc00 && low <= 0xdfff ? 4 : 3;
  }
  if (code >= 0xdc00 && code <= 0xdfff) {
    const high = text.charCodeAt(index - 1);
    return high >= 0xd800 && high <= 0xdbff ? 0 : 3;
  }
  return 3;
}

/**
 * Resolve a UTF-16 index into a byte offset plus line/column coordinates
 */
export function locate(text: string, index: number): SourcePosition {
  let line = 1;
  let lineStart = 0;
  let offset = 0;
  const end = Math.min(index, text.length);
  for (let i = 0; i < end; i++) {
    offset += utf8Width(text, i);
    if (text.charCodeAt(i) === 0x0a) {
      line++;
      lineStart = i + 1;
    }
  }
  return { offset, line, column: index - lineStart + 1 };
}

/**
 * Byte index of the first malformed UTF-8 sequence, or -1
 */
export function firstInvalidUtf8(bytes: Uint8Array): number {
  let i = 0;
  while (i < bytes.length) {
    const lead = bytes[i];
    if (lead < 0x80) {
      i++;
      continue;
    }

    let length: number;
    let min = 0x80;
    let max = 0xbf;
    if (lead >= 0xc2 && lead <= 0xdf) {
      length = 2;
    } else if (lead >= 0xe0 && lead <= 0xef) {
      length = 3;
      if (lead === 0xe0) min = 0xa0; // overlong
      if (lead === 0xed) max = 0x9f; // surrogates
    } else if (lead >= 0xf0 && lead <= 0xf4) {
      length = 4;
      if (lead === 0xf0) min = 0x90; // overlong
      if (lead === 0xf4) max = 0x8f; // above U+10FFFF
    } else {
      return i;
    }

    if (i + length > bytes.length) {
      return i;
    }
    for (let k = 1; k < length; k++) {
      const byte = bytes[i + k];
      const low = k === 1 ? min : 0x80;
      const high = k === 1 ? max : 0xbf;
      if (byte < low || byte > high) {
        return i;
      }
    }
    i += length;
  }
  return -1;
}

/**
 * Parse JSON text. Throws JsonSyntaxError on malformed input.
 */
export function readJson(text: string): JsonValue {
  return new JsonReader(text).readDocument();
}
