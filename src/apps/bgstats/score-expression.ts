/**
 * Arithmetic over decimal literals with `+`, `-`, `*`, unary sign and
 * parentheses. Scores are sometimes entered as sums ("12+7+3") or
 * products ("4*5"); nothing else is accepted.
 *
 *   expr   := term (("+" | "-") term)*
 *   term   := factor ("*" factor)*
 *   factor := ("+" | "-") factor | number | "(" expr ")"
 */

export class ScoreExpressionError extends Error {
  constructor(input: string, reason: string) {
    super(`Cannot evaluate score "${input}": ${reason}`);
    this.name = "ScoreExpressionError";
  }
}

const MAX_DEPTH = 32;

class Parser {
  private pos = 0;
  private depth = 0;

  constructor(private readonly input: string) {}

  parse(): number {
    const value = this.expr();
    this.skipSpace();
    if (this.pos < this.input.length) {
      this.fail(`unexpected "${this.input[this.pos]}" at position ${this.pos}`);
    }
    return value;
  }

  private expr(): number {
    let value = this.term();
    for (;;) {
      this.skipSpace();
      const op = this.input[this.pos];
      if (op !== "+" && op !== "-") return value;
      this.pos++;
      const rhs = this.term();
      value = op === "+" ? value + rhs : value - rhs;
    }
  }

  private term(): number {
    let value = this.factor();
    for (;;) {
      this.skipSpace();
      if (this.input[this.pos] !== "*") return value;
      this.pos++;
      value *= this.factor();
    }
  }

  private factor(): number {
    this.skipSpace();
    const ch = this.input[this.pos];
    if (ch === "+" || ch === "-") {
      this.pos++;
      const value = this.nested(() => this.factor());
      return ch === "-" ? -value : value;
    }
    if (ch === "(") {
      this.pos++;
      const value = this.nested(() => this.expr());
      this.skipSpace();
      if (this.input[this.pos] !== ")") this.fail("missing closing parenthesis");
      this.pos++;
      return value;
    }
    return this.number();
  }

  private number(): number {
    const match = /^\d+(?:\.\d+)?/.exec(this.input.slice(this.pos));
    if (!match) {
      this.fail(this.pos < this.input.length ? `unexpected "${this.input[this.pos]}"` : "unexpected end of input");
    }
    this.pos += match[0].length;
    return Number(match[0]);
  }

  private nested(parse: () => number): number {
    if (++this.depth > MAX_DEPTH) this.fail("nested too deeply");
    try {
      return parse();
    } finally {
      this.depth--;
    }
  }

  private skipSpace(): void {
    while (this.pos < this.input.length && /\s/.test(this.input[this.pos])) this.pos++;
  }

  private fail(reason: string): never {
    throw new ScoreExpressionError(this.input, reason);
  }
}

export function evaluateScoreExpression(input: string): number {
  return new Parser(input).parse();
}
