/**
 * @module query/cypher-validator
 *
 * Local, fail-closed check of a generated Cypher statement before it reaches
 * the store. The statement is tokenized (string literals and comments are
 * skipped) and walked once with a bracket stack, which is enough to tell node
 * patterns, relationship patterns, property maps and map projections apart.
 *
 * Two classes of finding come back:
 * - `issues`: syntax problems and anything that is not a plain read
 * - `unknownElements`: labels, relationship types or properties absent from
 *   the schema snapshot
 */

import type { SchemaVocabulary } from "../graph/schema/snapshot.js";
import type { UnknownSchemaElement } from "./errors.js";

type TokenType = "ident" | "string" | "number" | "param" | "punct";

interface Token {
  type: TokenType;
  value: string;
  /** Backtick-quoted identifier */
  quoted: boolean;
}

interface PatternScope {
  labels: Set<string>;
  types: Set<string>;
}

type Frame =
  | { open: "("; pattern: PatternScope | null }
  | { open: "["; pattern: PatternScope | null }
  | { open: "{"; kind: "block" | "properties" | "projection" | "literal"; pattern?: PatternScope; variable?: string };

interface PropertyReference {
  name: string;
  variable?: string;
  pattern?: PatternScope;
}

export interface CypherReferences {
  labels: string[];
  relationshipTypes: string[];
  properties: string[];
}

export interface CypherValidation {
  valid: boolean;
  /** Syntax and read-only violations */
  issues: string[];
  unknownElements: UnknownSchemaElement[];
  references: CypherReferences;
}

const WRITE_KEYWORDS = new Set(["CREATE", "MERGE", "DELETE", "DETACH", "SET", "REMOVE", "DROP", "FOREACH", "LOAD"]);

const KEYWORDS = new Set([
  "MATCH",
  "OPTIONAL",
  "WHERE",
  "WITH",
  "RETURN",
  "AND",
  "OR",
  "XOR",
  "NOT",
  "IN",
  "UNWIND",
  "AS",
  "ORDER",
  "BY",
  "SKIP",
  "LIMIT",
  "DISTINCT",
  "EXISTS",
  "CALL",
  "UNION",
  "ALL",
  "CASE",
  "WHEN",
  "THEN",
  "ELSE",
  "END",
  "IS",
  "NULL",
  "CONTAINS",
  "STARTS",
  "ENDS",
  "ASC",
  "DESC",
  "ASCENDING",
  "DESCENDING",
  "TRUE",
  "FALSE",
  "YIELD",
  ...WRITE_KEYWORDS,
]);

/** Identifiers whose `{` opens a subquery rather than a map */
const BLOCK_OPENERS = new Set(["EXISTS", "COUNT", "COLLECT", "CALL"]);

const START_CLAUSES = new Set(["MATCH", "OPTIONAL", "WITH", "UNWIND", "RETURN"]);

const CLOSERS: Record<string, "(" | "[" | "{"> = { ")": "(", "]": "[", "}": "{" };

const IDENT_RE = /[A-Za-z_][A-Za-z0-9_]*/y;
const NUMBER_RE = /\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/y;
const PARAM_NAME_RE = /[A-Za-z0-9_]+/y;

function matchAt(re: RegExp, text: string, index: number): string | null {
  re.lastIndex = index;
  const match = re.exec(text);
  return match ? match[0] : null;
}

/** Index of the closing quote, or -1 */
function scanString(text: string, start: number, quote: string): number {
  let j = start + 1;
  while (j < text.length) {
    const ch = text.charAt(j);
    if (ch === "\\") {
      j += 2;
    } else if (ch === quote) {
      return j;
    } else {
      j++;
    }
  }
  return -1;
}

/** Index of the closing backtick, or -1; doubled backticks are escapes */
function scanBacktick(text: string, start: number): number {
  let j = start + 1;
  while (j < text.length) {
    if (text.charAt(j) === "`") {
      if (text.charAt(j + 1) === "`") {
        j += 2;
        continue;
      }
      return j;
    }
    j++;
  }
  return -1;
}

function tokenize(query: string): { tokens: Token[]; issues: string[] } {
  const tokens: Token[] = [];
  const issues: string[] = [];
  let i = 0;

  while (i < query.length) {
    const ch = query.charAt(i);

    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    if (query.startsWith("//", i)) {
      const end = query.indexOf("\n", i);
      i = end === -1 ? query.length : end + 1;
      continue;
    }
    if (query.startsWith("/*", i)) {
      const end = query.indexOf("*/", i + 2);
      if (end === -1) {
        issues.push("Unterminated block comment");
        break;
      }
      i = end + 2;
      continue;
    }
    if (ch === "'" || ch === '"') {
      const end = scanString(query, i, ch);
      if (end === -1) {
        issues.push("Unterminated string literal");
        break;
      }
      tokens.push({ type: "string", value: query.slice(i + 1, end), quoted: false });
      i = end + 1;
      continue;
    }
    if (ch === "`") {
      const end = scanBacktick(query, i);
      if (end === -1) {
        issues.push("Unterminated quoted identifier");
        break;
      }
      tokens.push({ type: "ident", value: query.slice(i + 1, end).replace(/``/g, "`"), quoted: true });
      i = end + 1;
      continue;
    }
    if (ch === "$") {
      if (query.charAt(i + 1) === "`") {
        const end = scanBacktick(query, i + 1);
        if (end === -1) {
          issues.push("Unterminated quoted identifier");
          break;
        }
        tokens.push({ type: "param", value: query.slice(i + 2, end), quoted: true });
        i = end + 1;
        continue;
      }
      const name = matchAt(PARAM_NAME_RE, query, i + 1);
      if (name !== null) {
        tokens.push({ type: "param", value: name, quoted: false });
        i += name.length + 1;
        continue;
      }
    }

    const number = matchAt(NUMBER_RE, query, i);
    if (number !== null) {
      tokens.push({ type: "number", value: number, quoted: false });
      i += number.length;
      continue;
    }
    const ident = matchAt(IDENT_RE, query, i);
    if (ident !== null) {
      tokens.push({ type: "ident", value: ident, quoted: false });
      i += ident.length;
      continue;
    }

    tokens.push({ type: "punct", value: ch, quoted: false });
    i++;
  }

  return { tokens, issues };
}

function isPunct(token: Token | undefined, value: string): boolean {
  return token !== undefined && token.type === "punct" && token.value === value;
}

function isKeyword(token: Token | undefined, keyword?: string): boolean {
  if (token === undefined || token.type !== "ident" || token.quoted) {
    return false;
  }
  const upper = token.value.toUpperCase();
  return keyword === undefined ? KEYWORDS.has(upper) : upper === keyword;
}

/** An identifier usable as a variable name */
function isVariable(token: Token | undefined): token is Token {
  return token !== undefined && token.type === "ident" && (token.quoted || !KEYWORDS.has(token.value.toUpperCase()));
}

/**
 * Names of a label or relationship-type expression starting at `start`:
 * `A`, `A:B`, `A|B`, `A&B`, `!A`
 */
function readNames(tokens: Token[], start: number): { names: string[]; next: number } {
  const names: string[] = [];
  let j = start;

  while (j < tokens.length) {
    while (isPunct(tokens[j], "!")) {
      j++;
    }
    const token = tokens[j];
    const after = tokens[j + 1];
    if (token === undefined || token.type !== "ident" || isPunct(after, ".") || isPunct(after, "(")) {
      // a separator not followed by a name belongs to the surrounding expression
      if (names.length > 0) {
        j--;
      }
      break;
    }
    names.push(token.value);
    j++;
    const separator = tokens[j];
    if (isPunct(separator, "|") || isPunct(separator, "&") || isPunct(separator, ":")) {
      j++;
      continue;
    }
    break;
  }

  return { names, next: j };
}

class CypherWalker {
  readonly issues: string[] = [];
  readonly labels = new Map<string, string | undefined>();
  readonly types = new Map<string, string | undefined>();
  readonly propertyRefs: PropertyReference[] = [];
  readonly bindings = new Map<string, PatternScope>();

  private readonly stack: Frame[] = [];
  private sawReturn = false;
  private semicolonAt = -1;

  constructor(private readonly tokens: Token[]) {}

  walk(): void {
    this.checkLeadingClause();

    let i = 0;
    while (i < this.tokens.length) {
      i = this.step(i);
    }

    const unclosed = this.stack[this.stack.length - 1];
    if (unclosed) {
      this.issue(`Unbalanced brackets: unclosed '${unclosed.open}'`);
    }
    if (!this.sawReturn) {
      this.issue("Query has no RETURN clause");
    }
  }

  private step(i: number): number {
    const token = this.tokens[i];
    if (token === undefined) {
      return i + 1;
    }
    const prev = this.tokens[i - 1];
    const next = this.tokens[i + 1];

    if (this.semicolonAt !== -1 && !isPunct(token, ";")) {
      this.issue("Multiple statements are not allowed");
    }

    if (token.type === "ident" && !token.quoted) {
      this.checkKeyword(token, prev, next);
      return i + 1;
    }
    if (token.type !== "punct") {
      return i + 1;
    }

    switch (token.value) {
      case ";":
        this.semicolonAt = i;
        return i + 1;
      case "(":
        // `name(` is a function call; anything else opens a pattern or a group
        this.stack.push({ open: "(", pattern: isVariable(prev) ? null : this.newScope() });
        return i + 1;
      case "[":
        this.stack.push({ open: "[", pattern: isPunct(prev, "-") ? this.newScope() : null });
        return i + 1;
      case "{":
        this.stack.push(this.mapFrame(prev));
        return i + 1;
      case ")":
      case "]":
      case "}":
        this.close(token.value);
        return i + 1;
      case ":":
        return this.colon(i, prev);
      case ".":
        return this.dot(i, prev);
      default:
        return i + 1;
    }
  }

  private checkLeadingClause(): void {
    const first = this.tokens[0];
    if (first === undefined) {
      this.issue("Query is empty");
      return;
    }
    if (isKeyword(first, "CALL")) {
      return;
    }
    if (!isKeyword(first) || !START_CLAUSES.has(first.value.toUpperCase())) {
      this.issue("Query must begin with a read clause (MATCH, OPTIONAL MATCH, WITH, UNWIND or RETURN)");
    }
  }

  private checkKeyword(token: Token, prev: Token | undefined, next: Token | undefined): void {
    const upper = token.value.toUpperCase();
    const top = this.top();
    const isMapKey = top?.open === "{" && top.kind !== "block" && isPunct(next, ":");

    if (isPunct(prev, ".") || isMapKey) {
      return;
    }
    if (WRITE_KEYWORDS.has(upper)) {
      this.issue(`Write clause not allowed: ${upper === "LOAD" ? "LOAD CSV" : upper}`);
    } else if (upper === "CALL" && !isPunct(next, "{")) {
      this.issue("Procedure calls are not allowed");
    } else if (upper === "RETURN" && this.stack.length === 0) {
      this.sawReturn = true;
    }
  }

  private mapFrame(prev: Token | undefined): Frame {
    const top = this.top();
    if (prev !== undefined && prev.type === "ident" && !prev.quoted && BLOCK_OPENERS.has(prev.value.toUpperCase())) {
      return { open: "{", kind: "block" };
    }
    if (top !== undefined && top.open !== "{" && top.pattern !== null) {
      return { open: "{", kind: "properties", pattern: top.pattern };
    }
    if (isVariable(prev)) {
      return { open: "{", kind: "projection", variable: prev.value };
    }
    return { open: "{", kind: "literal" };
  }

  private close(closer: string): void {
    const expected = CLOSERS[closer];
    const top = this.top();
    if (top === undefined || top.open !== expected) {
      this.issue(`Unbalanced brackets: unexpected '${closer}'`);
      return;
    }
    this.stack.pop();
  }

  private colon(i: number, prev: Token | undefined): number {
    const top = this.top();

    if (top?.open === "{" && top.kind !== "block") {
      // map key separator
      if (top.kind === "properties" && prev !== undefined && prev.type === "ident") {
        this.propertyRefs.push({ name: prev.value, pattern: top.pattern });
      }
      return i + 1;
    }

    const { names, next } = readNames(this.tokens, i + 1);
    const variable = isVariable(prev) ? prev.value : undefined;
    const relationship = top?.open === "[" && top.pattern !== null;
    const scope = top !== undefined && top.open !== "{" ? top.pattern : null;
    const binding = variable !== undefined ? this.binding(variable) : undefined;

    for (const name of names) {
      if (relationship) {
        this.types.set(name, variable);
        scope?.types.add(name);
        binding?.types.add(name);
      } else {
        this.labels.set(name, variable);
        scope?.labels.add(name);
        binding?.labels.add(name);
      }
    }
    return Math.max(next, i + 1);
  }

  private dot(i: number, prev: Token | undefined): number {
    const top = this.top();
    const name = this.tokens[i + 1];

    // `{.name}` inside a map projection
    if (
      top?.open === "{" &&
      top.kind === "projection" &&
      (isPunct(prev, "{") || isPunct(prev, ",")) &&
      name?.type === "ident"
    ) {
      this.propertyRefs.push({ name: name.value, variable: top.variable });
      return i + 2;
    }

    if (!isVariable(prev) || name?.type !== "ident") {
      return i + 1;
    }

    // `a.b.c(` is a namespaced function, not property access
    let j = i;
    while (isPunct(this.tokens[j], ".") && this.tokens[j + 1]?.type === "ident") {
      j += 2;
    }
    if (isPunct(this.tokens[j], "(")) {
      return j;
    }

    this.propertyRefs.push({ name: name.value, variable: prev.value });
    return j;
  }

  private binding(variable: string): PatternScope {
    let scope = this.bindings.get(variable);
    if (!scope) {
      scope = this.newScope();
      this.bindings.set(variable, scope);
    }
    return scope;
  }

  private newScope(): PatternScope {
    return { labels: new Set(), types: new Set() };
  }

  private top(): Frame | undefined {
    return this.stack[this.stack.length - 1];
  }

  private issue(message: string): void {
    if (!this.issues.includes(message)) {
      this.issues.push(message);
    }
  }
}

/**
 * Validate a statement against the snapshot vocabulary
 *
 * @example
 * ```typescript
 * const check = validateCypher(
 *   "MATCH (e:Employee)-[:WORKS_IN]->(d:Department) WHERE d.name = 'Engineering' RETURN e.name",
 *   new SchemaVocabulary(snapshot)
 * );
 * if (!check.valid) console.log(check.issues, check.unknownElements);
 * ```
 */
export function validateCypher(query: string, vocabulary: SchemaVocabulary): CypherValidation {
  const { tokens, issues: lexIssues } = tokenize(query);
  const walker = new CypherWalker(tokens);

  // A lexing failure leaves a partial token stream; structural checks on it would only add noise
  if (lexIssues.length === 0) {
    walker.walk();
  }

  const unknownElements: UnknownSchemaElement[] = [];
  const seen = new Set<string>();
  const report = (element: UnknownSchemaElement): void => {
    const key = `${element.kind}:${element.name}:${element.owner ?? ""}`;
    if (!seen.has(key)) {
      seen.add(key);
      unknownElements.push(element);
    }
  };

  for (const [label, owner] of walker.labels) {
    if (!vocabulary.hasLabel(label)) {
      report({ kind: "label", name: label, owner });
    }
  }
  for (const [type, owner] of walker.types) {
    if (!vocabulary.hasRelationshipType(type)) {
      report({ kind: "relationship", name: type, owner });
    }
  }
  for (const ref of walker.propertyRefs) {
    const scope = ref.pattern ?? (ref.variable !== undefined ? walker.bindings.get(ref.variable) : undefined);
    // Unknown owners are already reported; check the property against the known ones only
    const owners = {
      labels: [...(scope?.labels ?? [])].filter((l) => vocabulary.hasLabel(l)),
      types: [...(scope?.types ?? [])].filter((t) => vocabulary.hasRelationshipType(t)),
    };
    if (!vocabulary.hasProperty(ref.name, owners)) {
      report({ kind: "property", name: ref.name, owner: ref.variable });
    }
  }

  const issues = [...lexIssues, ...walker.issues];
  return {
    valid: issues.length === 0 && unknownElements.length === 0,
    issues,
    unknownElements,
    references: {
      labels: [...walker.labels.keys()],
      relationshipTypes: [...walker.types.keys()],
      properties: [...new Set(walker.propertyRefs.map((r) => r.name))],
    },
  };
}
