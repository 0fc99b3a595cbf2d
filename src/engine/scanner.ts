/**
 * Balanced-brace scanning of `{{…}}` expressions.
 *
 * The scanner counts depth instead of matching a regex, so expressions
 * may nest to any depth:
 *
 *   {{file_line:{{number1:1:3}}:notes.txt}}
 *   {{csv_value:0:name:{{artifacts}}/{{qs_id}}/people.csv}}
 *
 * Rules:
 *   - `{{` always opens an expression
 *   - `}}` closes the innermost open expression
 *   - `}}` with nothing open is literal text, so JSON answers such as
 *     `{"a": {"b": {{json_value:b:data.json}}}}` scan correctly
 *   - an `{{` that is never closed is a ParseError
 *   - there is no escape syntax
 */

import { ParseError } from "./errors.js";
import { isVariableToken } from "./variables.js";

// ---------------------------------------------------------------------------
// Nodes
// ---------------------------------------------------------------------------

export interface TextNode {
  kind: "text";
  value: string;
}

export interface ExpressionNode {
  kind: "expression";
  /** Full expression text including braces */
  source: string;
  /** Offset of the opening `{{` */
  start: number;
  /** Offset just past the closing `}}` */
  end: number;
  /** Content between the braces */
  body: TemplateNode[];
}

export type TemplateNode = TextNode | ExpressionNode;

interface Frame {
  start: number;
  children: TemplateNode[];
}

// ---------------------------------------------------------------------------
// Scanning
// ---------------------------------------------------------------------------

/**
 * Split text into literal text and (nested) expressions.
 * @throws ParseError on an unclosed `{{`
 */
export function parseTemplateNodes(text: string): TemplateNode[] {
  const root: TemplateNode[] = [];
  const stack: Frame[] = [];
  let textStart = 0;
  let i = 0;

  const current = (): TemplateNode[] => (stack.length > 0 ? stack[stack.length - 1].children : root);

  const flush = (upTo: number): void => {
    if (upTo > textStart) {
      current().push({ kind: "text", value: text.slice(textStart, upTo) });
    }
  };

  while (i < text.length) {
    if (text.startsWith("{{", i)) {
      flush(i);
      stack.push({ start: i, children: [] });
      i += 2;
      textStart = i;
    } else if (text.startsWith("}}", i) && stack.length > 0) {
      flush(i);
      const frame = stack.pop();
      if (frame === undefined) break;
      i += 2;
      current().push({
        kind: "expression",
        source: text.slice(frame.start, i),
        start: frame.start,
        end: i,
        body: frame.children,
      });
      textStart = i;
    } else {
      i += 1;
    }
  }

  if (stack.length > 0) {
    const unclosed = stack[stack.length - 1];
    throw new ParseError(`Unclosed '{{' at offset ${unclosed.start}`, unclosed.start, {
      expression: text.slice(unclosed.start, Math.min(text.length, unclosed.start + 40)),
    });
  }

  flush(text.length);
  return root;
}

/**
 * Split an expression body into `:`-separated segments. Only colons in
 * the body's own text split; colons inside nested expressions do not.
 */
export function splitArguments(body: TemplateNode[]): TemplateNode[][] {
  const segments: TemplateNode[][] = [[]];

  for (const node of body) {
    if (node.kind === "expression") {
      segments[segments.length - 1].push(node);
      continue;
    }
    const parts = node.value.split(":");
    parts.forEach((part, index) => {
      if (index > 0) segments.push([]);
      if (part !== "") segments[segments.length - 1].push({ kind: "text", value: part });
    });
  }

  return segments;
}

/**
 * Literal text of a body with no nested expressions, or undefined.
 */
export function plainText(body: TemplateNode[]): string | undefined {
  let out = "";
  for (const node of body) {
    if (node.kind === "expression") return undefined;
    out += node.value;
  }
  return out;
}

// ---------------------------------------------------------------------------
// Inspection helpers
// ---------------------------------------------------------------------------

/**
 * Top-level `{{…}}` expressions left in a string. Returns an empty list
 * for a fully resolved string.
 */
export function findUnresolvedExpressions(text: string): string[] {
  return parseTemplateNodes(text)
    .filter((node): node is ExpressionNode => node.kind === "expression")
    .map((node) => node.source);
}

/**
 * Distinct variable tokens (entity/semantic/number) anywhere in a
 * template, in order of first appearance.
 */
export function listVariableTokens(text: string): string[] {
  const found = new Set<string>();

  const visit = (nodes: TemplateNode[]): void => {
    for (const node of nodes) {
      if (node.kind !== "expression") continue;
      const body = plainText(node.body);
      if (body !== undefined && isVariableToken(body)) {
        found.add(body.trim());
      } else {
        visit(node.body);
      }
    }
  };

  visit(parseTemplateNodes(text));
  return [...found];
}
