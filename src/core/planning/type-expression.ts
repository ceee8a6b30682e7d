/**
 * Type annotation expressions
 *
 * Parses annotation text such as `Optional[Dict[str, List[int]]]` or
 * `int | None` into a small tree, so each named part can be mapped on its
 * own.
 *
 * @module
 */

export interface TypeExpression {
  /** Last segment of the dotted name; "Union" for `a | b`, "[]" for a bare bracket list */
  name: string;
  args: TypeExpression[];
}

type Token = { kind: "name"; value: string } | { kind: "punct"; value: "[" | "]" | "," | "|" };

function tokenize(text: string): Token[] | null {
  const tokens: Token[] = [];
  const pattern = /\s*(?:([A-Za-z_][\w.]*|\.\.\.)|(["'])([^"']*)\2|([[\],|]))/y;
  let position = 0;
  while (position < text.length) {
    if (text.slice(position).trim() === "") break;
    pattern.lastIndex = position;
    const match = pattern.exec(text);
    if (!match) return null;
    position = pattern.lastIndex;
    const [, name, , quoted, punct] = match;
    if (name !== undefined) {
      tokens.push({ kind: "name", value: name });
    } else if (quoted !== undefined) {
      // forward reference: the quoted text is itself a type expression
      const inner = tokenize(quoted);
      if (!inner) return null;
      tokens.push(...inner);
    } else if (punct === "[" || punct === "]" || punct === "," || punct === "|") {
      tokens.push({ kind: "punct", value: punct });
    }
  }
  return tokens;
}

function lastSegment(name: string): string {
  const parts = name.split(".");
  return parts[parts.length - 1] ?? name;
}

/**
 * @returns the parsed expression, or null when the text is not a type
 * expression this parser understands
 */
export function parseTypeExpression(text: string): TypeExpression | null {
  const tokens = tokenize(text);
  if (!tokens || tokens.length === 0) return null;
  let index = 0;

  const peek = (): Token | undefined => tokens[index];

  const parseList = (): TypeExpression[] | null => {
    const items: TypeExpression[] = [];
    if (peek()?.value === "]") return items;
    for (;;) {
      const item = parseUnion();
      if (!item) return null;
      items.push(item);
      if (peek()?.value !== ",") return items;
      index++;
    }
  };

  const parsePrimary = (): TypeExpression | null => {
    const token = peek();
    if (!token) return null;
    if (token.kind === "punct") {
      if (token.value !== "[") return null;
      index++;
      const items = parseList();
      if (!items || peek()?.value !== "]") return null;
      index++;
      return { name: "[]", args: items };
    }
    index++;
    const expression: TypeExpression = { name: lastSegment(token.value), args: [] };
    if (peek()?.value === "[") {
      index++;
      const args = parseList();
      if (!args || peek()?.value !== "]") return null;
      index++;
      expression.args = args;
    }
    return expression;
  };

  const parseUnion = (): TypeExpression | null => {
    const first = parsePrimary();
    if (!first) return null;
    const members = [first];
    while (peek()?.value === "|") {
      index++;
      const next = parsePrimary();
      if (!next) return null;
      members.push(next);
    }
    return members.length === 1 ? first : { name: "Union", args: members };
  };

  const expression = parseUnion();
  return expression && index === tokens.length ? expression : null;
}

/**
 * Every name used in an expression, outermost first
 */
export function namesIn(expression: TypeExpression): string[] {
  return [expression.name, ...expression.args.flatMap(namesIn)];
}
