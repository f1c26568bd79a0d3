import { z } from "zod";
import { defineTool } from "../tool.js";

export const CalculateArgsSchema = z.object({
  expression: z.string().trim().min(1),
});

export type CalculationResult =
  | { readonly expression: string; readonly result: string }
  | { readonly expression: string; readonly error: string };

/**
 * Evaluate an arithmetic expression: numbers, + - * / %, unary minus and
 * parentheses. Throws `SyntaxError` or `RangeError` on bad input.
 */
export function evaluateExpression(expression: string): number {
  const parser = new ExpressionParser(expression);
  const value = parser.parse();
  if (!Number.isFinite(value)) throw new RangeError("Result is not a finite number");
  return value;
}

export function calculate(expression: string): CalculationResult {
  try {
    return { expression, result: String(evaluateExpression(expression)) };
  } catch (err) {
    return { expression, error: err instanceof Error ? err.message : String(err) };
  }
}

export const calculatorTool = defineTool({
  name: "calculate",
  description: "Evaluate a mathematical expression. Supports basic arithmetic.",
  parameters: {
    type: "object",
    properties: {
      expression: { type: "string", description: "Math expression, e.g. '(100*1.08)-50'" },
    },
    required: ["expression"],
  },
  schema: CalculateArgsSchema,
  execute: ({ expression }) => calculate(expression),
});

// expression := term (("+" | "-") term)*
// term       := factor (("*" | "/" | "%") factor)*
// factor     := ("-" | "+") factor | number | "(" expression ")"
class ExpressionParser {
  private pos = 0;

  constructor(private readonly source: string) {}

  parse(): number {
    const value = this.expression();
    this.skipWhitespace();
    if (this.pos < this.source.length) {
      throw new SyntaxError(`Unexpected '${this.source[this.pos]}' at position ${this.pos}`);
    }
    return value;
  }

  private expression(): number {
    let value = this.term();
    for (;;) {
      const op = this.peek();
      if (op !== "+" && op !== "-") return value;
      this.pos++;
      const rhs = this.term();
      value = op === "+" ? value + rhs : value - rhs;
    }
  }

  private term(): number {
    let value = this.factor();
    for (;;) {
      const op = this.peek();
      if (op !== "*" && op !== "/" && op !== "%") return value;
      this.pos++;
      const rhs = this.factor();
      if ((op === "/" || op === "%") && rhs === 0) throw new RangeError("Division by zero");
      value = op === "*" ? value * rhs : op === "/" ? value / rhs : value % rhs;
    }
  }

  private factor(): number {
    const ch = this.peek();
    if (ch === "-" || ch === "+") {
      this.pos++;
      const value = this.factor();
      return ch === "-" ? -value : value;
    }
    if (ch === "(") {
      this.pos++;
      const value = this.expression();
      if (this.peek() !== ")") throw new SyntaxError("Missing closing parenthesis");
      this.pos++;
      return value;
    }
    return this.number();
  }

  private number(): number {
    this.skipWhitespace();
    const match = /^\d+(\.\d+)?|^\.\d+/.exec(this.source.slice(this.pos));
    if (!match) {
      const found = this.pos < this.source.length ? `'${this.source[this.pos]}'` : "end of input";
      throw new SyntaxError(`Expected a number but found ${found}`);
    }
    this.pos += match[0].length;
    return Number(match[0]);
  }

  private peek(): string | undefined {
    this.skipWhitespace();
    return this.source[this.pos];
  }

  private skipWhitespace(): void {
    while (this.pos < this.source.length && /\s/.test(this.source.charAt(this.pos))) this.pos++;
  }
}
