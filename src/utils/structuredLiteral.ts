/**
 * Parser for the literal-dump format some providers return instead of JSON:
 *   {'results': [{'url': 'https://…', 'raw_content': None, 'score': 0.9}]}
 *
 * Supports dicts, lists, tuples, single- or double-quoted strings with
 * backslash escapes, numbers, True/False/None. Throws LiteralSyntaxError
 * on anything else.
 */

export class LiteralSyntaxError extends Error {
  constructor(message: string, public position: number) {
    super(`${message} at position ${position}`);
    this.name = 'LiteralSyntaxError';
  }
}

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  b: '\b',
  f: '\f',
  '\\': '\\',
  "'": "'",
  '"': '"',
  '0': '\0',
};

class LiteralReader {
  private pos = 0;

  constructor(private readonly src: string) {}

  parse(): unknown {
    const value = this.readValue();
    this.skipWhitespace();
    if (this.pos < this.src.length) {
      throw new LiteralSyntaxError('Unexpected trailing input', this.pos);
    }
    return value;
  }

  private skipWhitespace(): void {
    while (this.pos < this.src.length && /\s/.test(this.src[this.pos])) this.pos++;
  }

  private peek(): string {
    return this.src[this.pos] ?? '';
  }

  private expect(ch: string): void {
    this.skipWhitespace();
    if (this.src[this.pos] !== ch) {
      throw new LiteralSyntaxError(`Expected "${ch}"`, this.pos);
    }
    this.pos++;
  }

  private readValue(): unknown {
    this.skipWhitespace();
    const ch = this.peek();

    if (ch === '{') return this.readDict();
    if (ch === '[') return this.readSequence('[', ']');
    if (ch === '(') return this.readSequence('(', ')');
    if (ch === "'" || ch === '"') return this.readString();
    if (ch === '-' || ch === '+' || ch === '.' || /\d/.test(ch)) return this.readNumber();
    if (/[A-Za-z_]/.test(ch)) return this.readKeyword();

    throw new LiteralSyntaxError(ch ? `Unexpected character "${ch}"` : 'Unexpected end of input', this.pos);
  }

  private readDict(): Record<string, unknown> {
    this.expect('{');
    const out: Record<string, unknown> = {};
    this.skipWhitespace();
    if (this.peek() === '}') {
      this.pos++;
      return out;
    }

    for (;;) {
      const key = this.readValue();
      if (typeof key !== 'string' && typeof key !== 'number') {
        throw new LiteralSyntaxError('Dict keys must be strings or numbers', this.pos);
      }
      this.expect(':');
      out[String(key)] = this.readValue();
      this.skipWhitespace();

      const next = this.peek();
      this.pos++;
      if (next === '}') return out;
      if (next !== ',') throw new LiteralSyntaxError('Expected "," or "}"', this.pos - 1);
      this.skipWhitespace();
      if (this.peek() === '}') {
        this.pos++;
        return out;
      }
    }
  }

  private readSequence(open: string, close: string): unknown[] {
    this.expect(open);
    const out: unknown[] = [];
    this.skipWhitespace();
    if (this.peek() === close) {
      this.pos++;
      return out;
    }

    for (;;) {
      out.push(this.readValue());
      this.skipWhitespace();

      const next = this.peek();
      this.pos++;
      if (next === close) return out;
      if (next !== ',') throw new LiteralSyntaxError(`Expected "," or "${close}"`, this.pos - 1);
      this.skipWhitespace();
      if (this.peek() === close) {
        this.pos++;
        return out;
      }
    }
  }

  private readString(): string {
    const quote = this.src[this.pos];
    this.pos++;
    let out = '';

    while (this.pos < this.src.length) {
      const ch = this.src[this.pos];
      if (ch === quote) {
        this.pos++;
        return out;
      }
      if (ch === '\\') {
        const esc = this.src[this.pos + 1];
        if (esc === undefined) break;
        if (esc === 'u' || esc === 'x') {
          const len = esc === 'u' ? 4 : 2;
          const hex = this.src.slice(this.pos + 2, this.pos + 2 + len);
          if (!new RegExp(`^[0-9a-fA-F]{${len}}$`).test(hex)) {
            throw new LiteralSyntaxError('Bad escape sequence', this.pos);
          }
          out += String.fromCharCode(Number.parseInt(hex, 16));
          this.pos += 2 + len;
          continue;
        }
        out += ESCAPES[esc] ?? `\\${esc}`;
        this.pos += 2;
        continue;
      }
      out += ch;
      this.pos++;
    }

    throw new LiteralSyntaxError('Unterminated string', this.pos);
  }

  private readNumber(): number {
    const match = this.src.slice(this.pos).match(/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?/);
    if (!match) throw new LiteralSyntaxError('Bad number', this.pos);
    this.pos += match[0].length;
    return Number(match[0]);
  }

  private readKeyword(): boolean | null {
    const match = this.src.slice(this.pos).match(/^[A-Za-z_]\w*/);
    const word = match ? match[0] : '';
    this.pos += word.length;
    if (word === 'True') return true;
    if (word === 'False') return false;
    if (word === 'None') return null;
    throw new LiteralSyntaxError(`Unknown name "${word}"`, this.pos - word.length);
  }
}

export function parseStructuredLiteral(text: string): unknown {
  return new LiteralReader(text).parse();
}
