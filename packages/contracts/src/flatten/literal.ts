/**
 * Literal decoder for string-encoded mappings.
 *
 * Some API responses carry nested objects as text, either JSON or a
 * repr-style literal: single-quoted strings, True/False/None, tuples and
 * trailing commas. This decoder accepts both.
 */

export class LiteralSyntaxError extends Error {
  constructor(
    message: string,
    readonly position: number
  ) {
    super(`${message} at position ${position}`);
    this.name = 'LiteralSyntaxError';
  }
}

const NUMBER_PATTERN = /[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/y;
const IDENTIFIER_PATTERN = /[A-Za-z_][A-Za-z0-9_]*/y;

const KEYWORDS: { [word: string]: boolean | null } = {
  True: true,
  true: true,
  False: false,
  false: false,
  None: null,
  null: null,
};

const OCTAL_ESCAPE = /^[0-7]{1,3}/;
const HEX_WIDTH: { [ch: string]: number } = { x: 2, u: 4, U: 8 };

const SIMPLE_ESCAPES: { [ch: string]: string } = {
  n: '\n',
  t: '\t',
  r: '\r',
  b: '\b',
  f: '\f',
  v: '\v',
  a: '\x07',
  '\\': '\\',
  "'": "'",
  '"': '"',
  '/': '/',
};

class LiteralParser {
  private pos = 0;

  constructor(private readonly text: string) {}

  parseDocument(): unknown {
    const value = this.parseValue();
    this.skipWhitespace();
    if (this.pos < this.text.length) {
      throw this.error(`Unexpected "${this.text[this.pos]}"`);
    }
    return value;
  }

  private parseValue(): unknown {
    this.skipWhitespace();
    const ch = this.text[this.pos];
    if (ch === undefined) throw this.error('Unexpected end of input');

    switch (ch) {
      case '{':
        return this.parseMapping();
      case '[':
        return this.parseSequence(']');
      case '(':
        return this.parseSequence(')');
      case "'":
      case '"':
        return this.parseString(ch);
    }

    if (/[\d+\-.]/.test(ch)) return this.parseNumber();
    return this.parseKeyword();
  }

  private parseMapping(): { [key: string]: unknown } {
    this.pos++;
    const entries: Array<[string, unknown]> = [];

    for (;;) {
      this.skipWhitespace();
      if (this.peek() === '}') {
        this.pos++;
        return Object.fromEntries(entries);
      }

      const keyStart = this.pos;
      const key = this.parseValue();
      if (typeof key === 'object' && key !== null) {
        throw new LiteralSyntaxError('Mapping keys must be scalars', keyStart);
      }

      this.skipWhitespace();
      this.expect(':');
      entries.push([String(key), this.parseValue()]);

      this.skipWhitespace();
      const next = this.peek();
      if (next === ',') {
        this.pos++;
      } else if (next !== '}') {
        throw this.error('Expected "," or "}"');
      }
    }
  }

  private parseSequence(close: ']' | ')'): unknown[] {
    this.pos++;
    const items: unknown[] = [];

    for (;;) {
      this.skipWhitespace();
      if (this.peek() === close) {
        this.pos++;
        return items;
      }

      items.push(this.parseValue());

      this.skipWhitespace();
      const next = this.peek();
      if (next === ',') {
        this.pos++;
      } else if (next !== close) {
        throw this.error(`Expected "," or "${close}"`);
      }
    }
  }

  private parseString(quote: "'" | '"'): string {
    const start = this.pos;
    this.pos++;
    let out = '';

    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];

      if (ch === quote) {
        this.pos++;
        return out;
      }

      if (ch !== '\\') {
        out += ch;
        this.pos++;
        continue;
      }

      const escape = this.text[this.pos + 1];
      if (escape === undefined) break;

      const simple = SIMPLE_ESCAPES[escape];
      if (simple !== undefined) {
        out += simple;
        this.pos += 2;
      } else if (HEX_WIDTH[escape] !== undefined) {
        const width = HEX_WIDTH[escape] ?? 0;
        const hex = this.text.slice(this.pos + 2, this.pos + 2 + width);
        const codePoint = parseInt(hex, 16);
        if (!new RegExp(`^[0-9a-fA-F]{${width}}$`).test(hex) || codePoint > 0x10ffff) {
          throw this.error(`Invalid \\${escape} escape`);
        }
        out += String.fromCodePoint(codePoint);
        this.pos += 2 + width;
      } else if (OCTAL_ESCAPE.test(escape)) {
        const digits = OCTAL_ESCAPE.exec(this.text.slice(this.pos + 1, this.pos + 4))?.[0] ?? escape;
        out += String.fromCharCode(parseInt(digits, 8));
        this.pos += 1 + digits.length;
      } else {
        // unknown escapes are kept verbatim
        out += `\\${escape}`;
        this.pos += 2;
      }
    }

    throw new LiteralSyntaxError('Unterminated string', start);
  }

  private parseNumber(): number {
    NUMBER_PATTERN.lastIndex = this.pos;
    const match = NUMBER_PATTERN.exec(this.text);
    if (!match) throw this.error('Invalid number');
    this.pos += match[0].length;
    return Number(match[0]);
  }

  private parseKeyword(): boolean | null {
    IDENTIFIER_PATTERN.lastIndex = this.pos;
    const match = IDENTIFIER_PATTERN.exec(this.text);
    if (!match) throw this.error(`Unexpected "${this.text[this.pos]}"`);

    const word = match[0];
    if (!Object.prototype.hasOwnProperty.call(KEYWORDS, word)) {
      throw this.error(`Unexpected identifier "${word}"`);
    }
    this.pos += word.length;
    return KEYWORDS[word] ?? null;
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text[this.pos] ?? '')) {
      this.pos++;
    }
  }

  private peek(): string | undefined {
    return this.text[this.pos];
  }

  private expect(ch: string): void {
    if (this.peek() !== ch) throw this.error(`Expected "${ch}"`);
    this.pos++;
  }

  private error(message: string): LiteralSyntaxError {
    return new LiteralSyntaxError(message, this.pos);
  }
}

/**
 * Decode a JSON or repr-style literal string. Throws LiteralSyntaxError.
 */
export function parseLiteral(text: string): unknown {
  return new LiteralParser(text).parseDocument();
}
