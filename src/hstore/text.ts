// src/hstore/text.ts
//
// Reader for hstore's text output, e.g. `"a"=>"1", "b"=>NULL, c=>d`.
import { HstoreError } from "./errors.js";
import type { WarnFn } from "./errors.js";
import { Hstore } from "./hstore.js";

type Token = Readonly<{ text: string; quoted: boolean }>;

function isSpace(ch: string | undefined): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

class TextCursor {
  private pos = 0;

  public constructor(private readonly src: string) {}

  public atEnd(): boolean {
    return this.pos >= this.src.length;
  }

  public skipSpace(): void {
    while (isSpace(this.src[this.pos])) this.pos++;
  }

  public peek(): string | undefined {
    return this.src[this.pos];
  }

  public expect(s: string): void {
    if (!this.src.startsWith(s, this.pos)) this.fail(`expected '${s}'`);
    this.pos += s.length;
  }

  public readToken(): Token {
    if (this.peek() === '"') return { text: this.readQuoted(), quoted: true };

    let out = "";
    while (!this.atEnd()) {
      const ch = this.src[this.pos];
      if (ch === undefined || isSpace(ch) || ch === "," || ch === '"') break;
      if (ch === "=" && this.src[this.pos + 1] === ">") break;
      if (ch === "\\") {
        const next = this.src[this.pos + 1];
        if (next === undefined) this.fail("dangling escape");
        out += next;
        this.pos += 2;
        continue;
      }
      out += ch;
      this.pos++;
    }
    if (out.length === 0) this.fail("expected key or value");
    return { text: out, quoted: false };
  }

  public fail(msg: string): never {
    throw new HstoreError("InvalidText", `invalid hstore text at offset ${this.pos}: ${msg}`);
  }

  private readQuoted(): string {
    this.pos++;
    let out = "";
    for (;;) {
      const ch = this.src[this.pos];
      if (ch === undefined) this.fail("unterminated quoted string");
      if (ch === '"') {
        this.pos++;
        return out;
      }
      if (ch === "\\") {
        const next = this.src[this.pos + 1];
        if (next === undefined) this.fail("unterminated quoted string");
        out += next;
        this.pos += 2;
        continue;
      }
      out += ch;
      this.pos++;
    }
  }
}

/**
 * Parses hstore text. An unquoted `NULL` value (any case) is dropped like a
 * null wire entry; later duplicate keys overwrite earlier ones.
 */
export function parseHstoreText(text: string, warn: WarnFn = () => {}): Hstore {
  const c = new TextCursor(text);
  const out = new Hstore();

  c.skipSpace();
  while (!c.atEnd()) {
    const key = c.readToken();
    c.skipSpace();
    c.expect("=>");
    c.skipSpace();
    const value = c.readToken();

    if (!value.quoted && value.text.toUpperCase() === "NULL") {
      warn(`dropped null value for key ${JSON.stringify(key.text)}`);
    } else {
      out.insert(key.text, value.text);
    }

    c.skipSpace();
    if (c.atEnd()) break;
    c.expect(",");
    c.skipSpace();
    if (c.atEnd()) c.fail("expected key after ','");
  }
  return out;
}
