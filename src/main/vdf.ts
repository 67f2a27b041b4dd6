export type VdfValue = string | VdfObject;
export type VdfObject = { [key: string]: VdfValue };

type Token = { kind: "string" | "open" | "close"; value: string; line: number };

const ESCAPES: Record<string, string> = { n: "\n", t: "\t", "\\": "\\", '"': '"' };

export function parseVdf(text: string): VdfObject {
  const tokens = tokenize(text);
  let index = 0;

  const parseBlock = (nested: boolean): VdfObject => {
    const out: VdfObject = {};
    while (index < tokens.length) {
      const token = tokens[index++];
      if (token.kind === "close") {
        if (!nested) throw new Error(`Unexpected '}' on line ${token.line}`);
        return out;
      }
      if (token.kind === "open") throw new Error(`Unexpected '{' on line ${token.line}`);
      const next = tokens[index++];
      if (!next) throw new Error(`Missing value for key "${token.value}"`);
      if (next.kind === "open") {
        out[token.value] = parseBlock(true);
      } else if (next.kind === "string") {
        out[token.value] = next.value;
      } else {
        throw new Error(`Unexpected '}' after key "${token.value}" on line ${next.line}`);
      }
    }
    if (nested) throw new Error("Unterminated block");
    return out;
  };

  return parseBlock(false);
}

export function stringifyVdf(root: VdfObject): string {
  const lines: string[] = [];
  const write = (obj: VdfObject, depth: number): void => {
    const indent = "\t".repeat(depth);
    for (const [key, value] of Object.entries(obj)) {
      if (typeof value === "string") {
        lines.push(`${indent}"${escape(key)}"\t\t"${escape(value)}"`);
      } else {
        lines.push(`${indent}"${escape(key)}"`);
        lines.push(`${indent}{`);
        write(value, depth + 1);
        lines.push(`${indent}}`);
      }
    }
  };
  write(root, 0);
  return lines.join("\n") + "\n";
}

export function getVdfString(obj: VdfObject, key: string): string | undefined {
  const lowered = key.toLowerCase();
  for (const [k, v] of Object.entries(obj)) {
    if (k.toLowerCase() === lowered && typeof v === "string") return v;
  }
  return undefined;
}

export function getVdfObject(obj: VdfObject, key: string): VdfObject | undefined {
  const lowered = key.toLowerCase();
  for (const [k, v] of Object.entries(obj)) {
    if (k.toLowerCase() === lowered && typeof v !== "string") return v;
  }
  return undefined;
}

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let line = 1;
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (ch === "\n") {
      line++;
      i++;
    } else if (/\s/.test(ch)) {
      i++;
    } else if (ch === "/" && text[i + 1] === "/") {
      while (i < text.length && text[i] !== "\n") i++;
    } else if (ch === "{") {
      tokens.push({ kind: "open", value: ch, line });
      i++;
    } else if (ch === "}") {
      tokens.push({ kind: "close", value: ch, line });
      i++;
    } else if (ch === '"') {
      const start = line;
      let value = "";
      i++;
      while (i < text.length && text[i] !== '"') {
        if (text[i] === "\\" && i + 1 < text.length) {
          const next = text[i + 1];
          value += ESCAPES[next] ?? `\\${next}`;
          i += 2;
          continue;
        }
        if (text[i] === "\n") line++;
        value += text[i++];
      }
      if (i >= text.length) throw new Error(`Unterminated string starting on line ${start}`);
      i++;
      tokens.push({ kind: "string", value, line: start });
    } else {
      let value = "";
      while (i < text.length && !/[\s{}"]/.test(text[i])) value += text[i++];
      tokens.push({ kind: "string", value, line });
    }
  }
  return tokens;
}

function escape(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n").replace(/\t/g, "\\t");
}
