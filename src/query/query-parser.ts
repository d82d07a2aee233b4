/**
 * Query Parser
 *
 * Parses s-expression pattern text into ParsedPattern records.
 *
 * Grammar:
 *   Query     ::= (Pattern Clause*)*
 *   Pattern   ::= Matcher Quantifier? Capture*
 *   Matcher   ::= "(" Kind Item* ")" | "(" "_" Item* ")" | "_" | String
 *               | "[" Pattern+ "]" | "(" Pattern Clause* ")"
 *   Item      ::= "." | "!" Field | "!" Matcher | Field ":" Pattern
 *               | Pattern | Clause
 *   Clause    ::= "(" "#" Name ("?" | "!") Arg* ")"
 *   Arg       ::= Capture | String | Identifier
 *   Quantifier::= "?" | "*" | "+"
 *   Capture   ::= "@" Name
 *
 * Comments run from ";" to the end of the line.
 */

import { QuerySyntaxError } from "../errors.js";
import type {
  ChildStep,
  ParsedPattern,
  PatternMatcher,
  PatternProperty,
  PredicateArg,
  PredicateClause,
  Quantifier,
} from "./types.js";

/**
 * QueryToken types for lexing
 */
export type QueryToken =
  | { type: "lparen"; offset: number }
  | { type: "rparen"; offset: number }
  | { type: "lbracket"; offset: number }
  | { type: "rbracket"; offset: number }
  | { type: "colon"; offset: number }
  | { type: "bang"; offset: number }
  | { type: "dot"; offset: number }
  | { type: "quantifier"; value: Quantifier; offset: number }
  | { type: "capture"; value: string; offset: number }
  | { type: "predicate"; value: string; directive: boolean; offset: number }
  | { type: "string"; value: string; offset: number }
  | { type: "identifier"; value: string; offset: number }
  | { type: "eof"; offset: number };

const QUANTIFIERS: Record<string, Quantifier> = {
  "?": "optional",
  "*": "zero-or-more",
  "+": "one-or-more",
};

const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_]/;
const NAME_PART = /[A-Za-z0-9_.\-]/;

function syntaxError(source: string, message: string, offset: number): QuerySyntaxError {
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < offset && i < source.length; i++) {
    if (source[i] === "\n") {
      line++;
      lineStart = i + 1;
    }
  }
  return new QuerySyntaxError(message, offset, line, offset - lineStart + 1);
}

/**
 * Lexer: convert query text to tokens
 */
export function tokenize(source: string): QueryToken[] {
  const tokens: QueryToken[] = [];
  let i = 0;

  const readName = (from: number): string => {
    let end = from;
    while (end < source.length && NAME_PART.test(source[end])) end++;
    return source.slice(from, end);
  };

  while (i < source.length) {
    const ch = source[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    // Comment to end of line
    if (ch === ";") {
      while (i < source.length && source[i] !== "\n") i++;
      continue;
    }

    switch (ch) {
      case "(":
        tokens.push({ type: "lparen", offset: i++ });
        continue;
      case ")":
        tokens.push({ type: "rparen", offset: i++ });
        continue;
      case "[":
        tokens.push({ type: "lbracket", offset: i++ });
        continue;
      case "]":
        tokens.push({ type: "rbracket", offset: i++ });
        continue;
      case ":":
        tokens.push({ type: "colon", offset: i++ });
        continue;
      case "!":
        tokens.push({ type: "bang", offset: i++ });
        continue;
      case ".":
        tokens.push({ type: "dot", offset: i++ });
        continue;
      case "?":
      case "*":
      case "+":
        tokens.push({ type: "quantifier", value: QUANTIFIERS[ch], offset: i++ });
        continue;
    }

    if (ch === "@") {
      const name = readName(i + 1);
      if (!name || !IDENT_START.test(name[0])) {
        throw syntaxError(source, "Expected a capture name after '@'", i);
      }
      tokens.push({ type: "capture", value: name, offset: i });
      i += 1 + name.length;
      continue;
    }

    if (ch === "#") {
      const name = readName(i + 1);
      const suffix = source[i + 1 + name.length];
      if (!name || (suffix !== "?" && suffix !== "!")) {
        throw syntaxError(source, "Expected a predicate like '#eq?' or a directive like '#set!'", i);
      }
      tokens.push({ type: "predicate", value: name, directive: suffix === "!", offset: i });
      i += 2 + name.length;
      continue;
    }

    // String literal
    if (ch === '"') {
      const start = i;
      i++;
      let str = "";
      let closed = false;
      while (i < source.length) {
        const c = source[i];
        if (c === '"') {
          closed = true;
          i++;
          break;
        }
        if (c === "\n") break;
        if (c === "\\") {
          i++;
          const escaped = source[i];
          switch (escaped) {
            case "n":
              str += "\n";
              break;
            case "t":
              str += "\t";
              break;
            case "r":
              str += "\r";
              break;
            case "\\":
              str += "\\";
              break;
            case '"':
              str += '"';
              break;
            case undefined:
              break;
            default:
              // Preserve backslash for regex escape sequences like \d, \w, \.
              str += "\\" + escaped;
          }
          i++;
          continue;
        }
        str += c;
        i++;
      }
      if (!closed) {
        throw syntaxError(source, "Unterminated string", start);
      }
      tokens.push({ type: "string", value: str, offset: start });
      continue;
    }

    if (IDENT_START.test(ch)) {
      const start = i;
      while (i < source.length && IDENT_PART.test(source[i])) i++;
      tokens.push({ type: "identifier", value: source.slice(start, i), offset: start });
      continue;
    }

    throw syntaxError(source, `Unexpected character '${ch}'`, i);
  }

  tokens.push({ type: "eof", offset: source.length });
  return tokens;
}

interface PatternContext {
  predicates: PredicateClause[];
  properties: PatternProperty[];
}

/**
 * Recursive-descent parser over the token stream
 */
class Parser {
  private readonly source: string;
  private readonly tokens: QueryToken[];
  private pos = 0;

  constructor(source: string) {
    this.source = source;
    this.tokens = tokenize(source);
  }

  parseQuery(): ParsedPattern[] {
    const patterns: ParsedPattern[] = [];
    let last: PatternContext | null = null;

    while (this.peek().type !== "eof") {
      // Trailing clauses attach to the preceding pattern
      if (this.isClauseStart()) {
        if (!last) {
          throw this.error("Predicate appears before any pattern", this.peek().offset);
        }
        this.parseClause(last);
        continue;
      }

      const context: PatternContext = { predicates: [], properties: [] };
      const offset = this.peek().offset;
      const root = this.parsePattern(context, "root");
      patterns.push({
        root,
        predicates: context.predicates,
        properties: context.properties,
        offset,
      });
      last = context;
    }

    if (patterns.length === 0) {
      throw this.error("Query contains no patterns", 0);
    }
    return patterns;
  }

  /**
   * Matcher followed by an optional quantifier and captures
   */
  private parsePattern(
    context: PatternContext,
    position: "root" | "child" | "alternative",
    field: string | null = null
  ): PatternMatcher {
    const start = this.peek();
    const matcher = this.parseMatcher(context);

    let quantifier: Quantifier = "one";
    const q = this.peek();
    if (q.type === "quantifier") {
      if (position === "root") {
        throw this.error("A quantifier cannot apply to a top-level pattern", q.offset);
      }
      if (position === "alternative") {
        throw this.error("Quantify the whole alternation, not one alternative", q.offset);
      }
      this.pos++;
      quantifier = q.value;
    }

    const captures = [...matcher.captures];
    for (let t = this.peek(); t.type === "capture"; t = this.peek()) {
      this.pos++;
      if (!captures.includes(t.value)) captures.push(t.value);
    }

    if (quantifier === "one" && captures.length === matcher.captures.length && field === matcher.field) {
      return matcher;
    }
    return { ...matcher, captures, quantifier, field, offset: start.offset };
  }

  private parseMatcher(context: PatternContext): PatternMatcher {
    const token = this.peek();
    const base = { captures: [], field: null, quantifier: "one" as const, offset: token.offset };

    switch (token.type) {
      case "string":
        this.pos++;
        return { ...base, type: "anonymous", text: token.value };

      case "identifier":
        if (token.value === "_") {
          this.pos++;
          return { ...base, type: "wildcard" };
        }
        throw this.error(`Bare identifier '${token.value}' must be wrapped in parentheses`, token.offset);

      case "lbracket": {
        this.pos++;
        const alternatives: PatternMatcher[] = [];
        while (this.peek().type !== "rbracket") {
          if (this.peek().type === "eof") {
            throw this.error("Unclosed '['", token.offset);
          }
          if (this.isClauseStart()) {
            this.parseClause(context);
            continue;
          }
          alternatives.push(this.parsePattern(context, "alternative"));
        }
        this.pos++;
        if (alternatives.length === 0) {
          throw this.error("Alternation needs at least one pattern", token.offset);
        }
        return { ...base, type: "alternation", alternatives };
      }

      case "lparen":
        return this.parseParenthesized(context);

      default:
        throw this.error(`Expected a pattern, found ${describe(token)}`, token.offset);
    }
  }

  private parseParenthesized(context: PatternContext): PatternMatcher {
    const open = this.expect("lparen");
    const head = this.peek();

    // Grouping: ((pattern) @capture (#predicate ...))
    if (head.type === "lparen" || head.type === "lbracket" || head.type === "string") {
      if (this.isClauseStart()) {
        throw this.error("Predicate must follow a pattern", head.offset);
      }
      const inner = this.parsePattern(context, "root");
      while (this.isClauseStart()) {
        this.parseClause(context);
      }
      const close = this.peek();
      if (close.type !== "rparen") {
        throw this.error("Sibling sequences are not supported; a group holds one pattern and its predicates", close.offset);
      }
      this.pos++;
      return inner;
    }

    if (head.type !== "identifier") {
      throw this.error(`Expected a node kind after '(', found ${describe(head)}`, head.offset);
    }
    this.pos++;

    const kind = head.value === "_" ? null : head.value;
    const children: ChildStep[] = [];
    const negatedFields: string[] = [];
    const absent: PatternMatcher[] = [];
    let pendingAnchor = false;

    for (;;) {
      const token = this.peek();

      if (token.type === "rparen") {
        this.pos++;
        break;
      }
      if (token.type === "eof") {
        throw this.error(`Unclosed '(' for '${head.value}'`, open.offset);
      }

      if (token.type === "dot") {
        this.pos++;
        pendingAnchor = true;
        continue;
      }

      if (token.type === "bang") {
        this.pos++;
        const next = this.peek();
        if (next.type === "identifier" && next.value !== "_") {
          this.pos++;
          negatedFields.push(next.value);
        } else if (next.type === "lparen" || next.type === "lbracket" || next.type === "string") {
          // Captures inside an absence assertion can never bind
          const scratch: PatternContext = { predicates: [], properties: [] };
          absent.push(this.parseMatcher(scratch));
          if (scratch.predicates.length > 0 || scratch.properties.length > 0) {
            throw this.error("Predicates cannot appear inside an absence assertion", next.offset);
          }
        } else {
          throw this.error("Expected a field name or a pattern after '!'", next.offset);
        }
        continue;
      }

      if (this.isClauseStart()) {
        this.parseClause(context);
        continue;
      }

      let field: string | null = null;
      if (token.type === "identifier" && this.peek(1).type === "colon") {
        field = token.value;
        this.pos += 2;
      }

      children.push({ matcher: this.parsePattern(context, "child", field), anchored: pendingAnchor });
      pendingAnchor = false;
    }

    return {
      type: "node",
      kind,
      children,
      anchorEnd: pendingAnchor,
      negatedFields,
      absent,
      captures: [],
      field: null,
      quantifier: "one",
      offset: open.offset,
    };
  }

  private isClauseStart(): boolean {
    return this.peek().type === "lparen" && this.peek(1).type === "predicate";
  }

  /**
   * Parse `(#name? args...)` or `(#set! key value)` into the context
   */
  private parseClause(context: PatternContext): void {
    const open = this.expect("lparen");
    const head = this.peek();
    if (head.type !== "predicate") {
      throw this.error("Expected a predicate name", head.offset);
    }
    this.pos++;

    const args: PredicateArg[] = [];
    for (;;) {
      const token = this.peek();
      if (token.type === "rparen") {
        this.pos++;
        break;
      }
      if (token.type === "capture") {
        args.push({ type: "capture", name: token.value });
      } else if (token.type === "string" || token.type === "identifier") {
        args.push({ type: "string", value: token.value });
      } else if (token.type === "eof") {
        throw this.error(`Unclosed predicate '#${head.value}'`, open.offset);
      } else {
        throw this.error(`Unexpected ${describe(token)} in predicate arguments`, token.offset);
      }
      this.pos++;
    }

    if (head.directive) {
      if (head.value !== "set") {
        throw this.error(`Unknown directive '#${head.value}!'`, head.offset);
      }
      const [key, value, ...rest] = args;
      if (!key || key.type !== "string" || (value && value.type !== "string") || rest.length > 0) {
        throw this.error("'#set!' takes a key and an optional string value", head.offset);
      }
      context.properties.push({ key: key.value, value: value && value.type === "string" ? value.value : null });
      return;
    }

    context.predicates.push({ name: head.value, args, offset: head.offset });
  }

  private peek(ahead = 0): QueryToken {
    return this.tokens[Math.min(this.pos + ahead, this.tokens.length - 1)];
  }

  private expect<T extends QueryToken["type"]>(type: T): Extract<QueryToken, { type: T }> {
    const token = this.peek();
    if (!isToken(token, type)) {
      throw this.error(`Expected ${type}, found ${describe(token)}`, token.offset);
    }
    this.pos++;
    return token;
  }

  private error(message: string, offset: number): QuerySyntaxError {
    return syntaxError(this.source, message, offset);
  }
}

function isToken<T extends QueryToken["type"]>(token: QueryToken, type: T): token is Extract<QueryToken, { type: T }> {
  return token.type === type;
}

function describe(token: QueryToken): string {
  switch (token.type) {
    case "eof":
      return "end of query";
    case "identifier":
    case "string":
    case "capture":
      return `${token.type} '${token.value}'`;
    case "predicate":
      return `predicate '#${token.value}'`;
    default:
      return token.type;
  }
}

/**
 * Parse query text into patterns; throws QuerySyntaxError on malformed input
 */
export function parseQuery(source: string): ParsedPattern[] {
  return new Parser(source).parseQuery();
}
