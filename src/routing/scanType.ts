/**
 * Forward-only extraction of the top-level `type` discriminator.
 *
 * Walks the members of the outermost JSON object without building it,
 * skipping nested values, and stops at the first `type` key. Anything after
 * that key is never looked at.
 */

const QUOTE = 0x22;
const BACKSLASH = 0x5c;

const HEX4 = /^[0-9a-fA-F]{4}$/;

function isWhitespace(ch: number): boolean {
  return ch === 0x20 || ch === 0x09 || ch === 0x0a || ch === 0x0d;
}

function isDelimiter(ch: number): boolean {
  // , } ]
  return isWhitespace(ch) || ch === 0x2c || ch === 0x7d || ch === 0x5d;
}

class Scanner {
  private readonly _text: string;
  private _pos = 0;

  constructor(text: string) {
    this._text = text;
  }

  findTopLevelString(key: string): string | null {
    this._skipWhitespace();
    if (!this._eat('{')) return null;

    for (;;) {
      this._skipWhitespace();
      if (this._peek() !== '"') return null;

      const name = this._readString();
      if (name === null) return null;

      this._skipWhitespace();
      if (!this._eat(':')) return null;
      this._skipWhitespace();

      if (name === key) {
        return this._peek() === '"' ? this._readString() : null;
      }

      if (!this._skipValue()) return null;

      this._skipWhitespace();
      if (!this._eat(',')) return null;
    }
  }

  private _peek(): string | undefined {
    return this._text[this._pos];
  }

  private _eat(ch: string): boolean {
    if (this._text[this._pos] !== ch) return false;
    this._pos++;
    return true;
  }

  private _skipWhitespace(): void {
    while (this._pos < this._text.length && isWhitespace(this._text.charCodeAt(this._pos))) {
      this._pos++;
    }
  }

  /**
   * Read a string literal starting at the opening quote, decoding escapes.
   */
  private _readString(): string | null {
    if (!this._eat('"')) return null;

    let out = '';
    let start = this._pos;

    while (this._pos < this._text.length) {
      const ch = this._text.charCodeAt(this._pos);

      if (ch === QUOTE) {
        out += this._text.slice(start, this._pos);
        this._pos++;
        return out;
      }

      if (ch === BACKSLASH) {
        out += this._text.slice(start, this._pos);
        const decoded = this._readEscape();
        if (decoded === null) return null;
        out += decoded;
        start = this._pos;
        continue;
      }

      // Raw control characters are not allowed inside JSON strings.
      if (ch < 0x20) return null;

      this._pos++;
    }

    return null;
  }

  private _readEscape(): string | null {
    const kind = this._text[this._pos + 1];
    this._pos += 2;

    switch (kind) {
      case '"':
        return '"';
      case '\\':
        return '\\';
      case '/':
        return '/';
      case 'b':
        return '\b';
      case 'f':
        return '\f';
      case 'n':
        return '\n';
      case 'r':
        return '\r';
      case 't':
        return '\t';
      case 'u': {
        const hex = this._text.slice(this._pos, this._pos + 4);
        if (!HEX4.test(hex)) return null;
        this._pos += 4;
        return String.fromCharCode(parseInt(hex, 16));
      }
      default:
        return null;
    }
  }

  private _skipValue(): boolean {
    const ch = this._peek();

    if (ch === '"') return this._readString() !== null;
    if (ch === '{' || ch === '[') return this._skipContainer();

    // Number or literal: consume up to the next delimiter.
    const start = this._pos;
    while (this._pos < this._text.length && !isDelimiter(this._text.charCodeAt(this._pos))) {
      this._pos++;
    }
    return this._pos > start;
  }

  private _skipContainer(): boolean {
    let depth = 0;

    while (this._pos < this._text.length) {
      const ch = this._text[this._pos];

      if (ch === '"') {
        if (this._readString() === null) return false;
        continue;
      }

      if (ch === '{' || ch === '[') {
        depth++;
      } else if (ch === '}' || ch === ']') {
        depth--;
        if (depth === 0) {
          this._pos++;
          return true;
        }
      }

      this._pos++;
    }

    return false;
  }
}

/**
 * Return the string value of the top-level `type` member of a JSON object,
 * or null when there is none or the text is malformed before it.
 */
export function scanType(text: string): string | null {
  return new Scanner(text).findTopLevelString('type');
}
