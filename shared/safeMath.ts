const EXPRESSION_PATTERN = /^[0-9+\-*/().\s]+$/;
const TOKEN_PATTERN = /\s*(\d+\.?\d*|\.\d+|\*\*|[-+*/()])/y;

class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ParseError";
  }
}

function tokenize(expression: string): string[] {
  const tokens: string[] = [];
  TOKEN_PATTERN.lastIndex = 0;

  while (TOKEN_PATTERN.lastIndex < expression.length) {
    const start = TOKEN_PATTERN.lastIndex;
    const match = TOKEN_PATTERN.exec(expression);
    if (!match?.[1]) {
      if (expression.slice(start).trim() === "") break;
      throw new ParseError(`Unexpected input at ${start}`);
    }
    tokens.push(match[1]);
  }

  return tokens;
}

/**
 * Grammar, lowest precedence first:
 *   expr   := term (("+" | "-") term)*
 *   term   := unary (("*" | "/") unary)*
 *   unary  := ("+" | "-") unary | power
 *   power  := atom ("**" unary)?
 *   atom   := number | "(" expr ")"
 */
class Parser {
  private position = 0;

  constructor(private readonly tokens: readonly string[]) {}

  parse(): number {
    const value = this.expr();
    if (this.position !== this.tokens.length) {
      throw new ParseError(`Unexpected token "${this.tokens[this.position] ?? ""}"`);
    }
    return value;
  }

  private peek(): string | undefined {
    return this.tokens[this.position];
  }

  private next(): string | undefined {
    const token = this.tokens[this.position];
    this.position++;
    return token;
  }

  private expr(): number {
    let value = this.term();
    for (let op = this.peek(); op === "+" || op === "-"; op = this.peek()) {
      this.next();
      const right = this.term();
      value = op === "+" ? value + right : value - right;
    }
    return value;
  }

  private term(): number {
    let value = this.unary();
    for (let op = this.peek(); op === "*" || op === "/"; op = this.peek()) {
      this.next();
      const right = this.unary();
      value = op === "*" ? value * right : value / right;
    }
    return value;
  }

  private unary(): number {
    const op = this.peek();
    if (op === "-" || op === "+") {
      this.next();
      const operand = this.unary();
      return op === "-" ? -operand : operand;
    }
    return this.power();
  }

  private power(): number {
    const base = this.atom();
    if (this.peek() === "**") {
      this.next();
      return base ** this.unary();
    }
    return base;
  }

  private atom(): number {
    const token = this.next();
    if (token === "(") {
      const value = this.expr();
      if (this.next() !== ")") {
        throw new ParseError("Missing closing parenthesis");
      }
      return value;
    }
    if (token === undefined || !/^(\d|\.\d)/.test(token)) {
      throw new ParseError(`Expected a number, got "${token ?? "end of input"}"`);
    }
    return Number(token);
  }
}

/**
 * Evaluates a plain arithmetic expression (digits, + - * / ** and parentheses).
 * Anything else, and any non-finite result, yields null.
 */
export function safeMath(expression: string): number | null {
  if (!EXPRESSION_PATTERN.test(expression)) return null;

  try {
    const value = new Parser(tokenize(expression)).parse();
    return Number.isFinite(value) ? value : null;
  } catch (error) {
    if (error instanceof ParseError) return null;
    throw error;
  }
}
