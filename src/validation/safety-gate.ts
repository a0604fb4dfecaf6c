export type GateDecision = { accepted: true } | { accepted: false; reason: string };

type Token = { token: string; label: string };

// Longer tokens first so the reported reason names the most specific operator.
const COMMAND_TOKENS: readonly Token[] = [
  { token: "2>>", label: "stderr append redirection (2>>)" },
  { token: "2>", label: "stderr redirection (2>)" },
  { token: ">>", label: "append redirection (>>)" },
  { token: "&&", label: "command chaining (&&)" },
  { token: "||", label: "command chaining (||)" },
  { token: "$(", label: "command substitution ($()" },
  { token: "${", label: "parameter expansion (${)" },
  { token: "<<", label: "here-document (<<)" },
  { token: ";", label: "command separator (;)" },
  { token: "|", label: "pipe (|)" },
  { token: ">", label: "redirection (>)" },
  { token: "`", label: "backtick substitution" },
  { token: "\u0000", label: "NUL byte" },
  { token: "\r", label: "carriage return" },
  { token: "；", label: "full-width semicolon" },
  { token: "﹔", label: "small semicolon" },
  { token: "＆", label: "full-width ampersand" },
  { token: "﹠", label: "small ampersand" },
  { token: "｜", label: "full-width vertical bar" },
  { token: "＞", label: "full-width greater-than" }
];

const DESTRUCTIVE_SQL = /\b(DROP|TRUNCATE|ALTER|DELETE|UPDATE)\s/i;
const SELECT_START = /^\(*\s*SELECT\b/i;
const WITH_START = /^\(*\s*WITH\b/i;
const MAIN_STATEMENT_WORDS = new Set(["SELECT", "INSERT", "UPDATE", "DELETE", "MERGE", "VALUES", "TABLE"]);
const QUOTES = new Set(["'", '"', "`"]);

const ACCEPTED: GateDecision = { accepted: true };

export function checkCommand(text: string): GateDecision {
  const value = String(text ?? "");
  if (value.includes("\n")) {
    return { accepted: false, reason: "Multi-line commands are not allowed." };
  }
  const hit = COMMAND_TOKENS.find((entry) => value.includes(entry.token));
  if (hit) {
    return { accepted: false, reason: `Potentially dangerous command detected: ${hit.label}.` };
  }
  return ACCEPTED;
}

/**
 * One statement as written, plus its skeleton: comments blanked and string
 * literals emptied, so keywords can be checked on the code alone.
 */
export type SqlStatement = {
  text: string;
  skeleton: string;
};

export type SqlScan = {
  statements: SqlStatement[];
  /** False when a quote or block comment is left open. */
  complete: boolean;
};

function closingQuote(sql: string, start: number): number {
  const quote = sql[start];
  let index = start + 1;
  while (index < sql.length) {
    if (sql[index] === quote) {
      // A doubled quote is an escaped quote inside the literal.
      if (sql[index + 1] === quote) {
        index += 2;
        continue;
      }
      return index;
    }
    index += 1;
  }
  return -1;
}

export function scanSql(sql: string): SqlScan {
  const statements: SqlStatement[] = [];
  let text = "";
  let skeleton = "";
  const flush = (): void => {
    if (skeleton.trim().length > 0) {
      statements.push({ text: text.trim(), skeleton: skeleton.trim() });
    }
    text = "";
    skeleton = "";
  };

  let index = 0;
  while (index < sql.length) {
    const char = sql[index];
    const pair = sql.slice(index, index + 2);
    if (pair === "--") {
      const newline = sql.indexOf("\n", index);
      const stop = newline === -1 ? sql.length : newline;
      text += sql.slice(index, stop);
      skeleton += " ";
      index = stop;
      continue;
    }
    if (pair === "/*") {
      const close = sql.indexOf("*/", index + 2);
      if (close === -1) {
        text += sql.slice(index);
        flush();
        return { statements, complete: false };
      }
      text += sql.slice(index, close + 2);
      skeleton += " ";
      index = close + 2;
      continue;
    }
    if (QUOTES.has(char)) {
      const close = closingQuote(sql, index);
      if (close === -1) {
        text += sql.slice(index);
        flush();
        return { statements, complete: false };
      }
      text += sql.slice(index, close + 1);
      skeleton += char + char;
      index = close + 1;
      continue;
    }
    if (char === ";") {
      flush();
      index += 1;
      continue;
    }
    text += char;
    skeleton += char;
    index += 1;
  }
  flush();
  return { statements, complete: true };
}

/** Splits on semicolons outside literals and comments; empty statements are dropped. */
export function splitSqlStatements(sql: string): string[] {
  return scanSql(sql).statements.map((statement) => statement.text);
}

function destructiveVerb(sql: string): string | undefined {
  return DESTRUCTIVE_SQL.exec(sql)?.[1].toUpperCase();
}

/** The statement a WITH clause feeds, found at the nesting depth of the WITH keyword. */
export function mainStatementKeyword(skeleton: string): string | undefined {
  let depth = 0;
  let withDepth: number | null = null;
  for (const token of skeleton.match(/[()]|[A-Za-z_][A-Za-z0-9_]*/g) ?? []) {
    if (token === "(") {
      depth += 1;
      continue;
    }
    if (token === ")") {
      depth -= 1;
      continue;
    }
    const word = token.toUpperCase();
    if (withDepth === null) {
      if (word === "WITH") {
        withDepth = depth;
      }
      continue;
    }
    if (depth === withDepth && MAIN_STATEMENT_WORDS.has(word)) {
      return word;
    }
  }
  return undefined;
}

function isReadOnly(skeleton: string): boolean {
  if (SELECT_START.test(skeleton)) {
    return true;
  }
  return WITH_START.test(skeleton) && mainStatementKeyword(skeleton) === "SELECT";
}

function blockedSql(verb: string): GateDecision {
  return {
    accepted: false,
    reason: `Destructive SQL is blocked (${verb}). Ask explicitly for a read-only query or write it by hand.`
  };
}

export function checkSql(text: string): GateDecision {
  const value = String(text ?? "");
  // Comment markers count as whitespace, so DROP/**/TABLE is still seen.
  const mentioned = destructiveVerb(value.replace(/\/\*|\*\/|--/g, " "));
  if (!mentioned) {
    return ACCEPTED;
  }
  const scan = scanSql(value);
  if (!scan.complete) {
    return blockedSql(mentioned);
  }
  const executed = scan.statements.map((statement) => destructiveVerb(statement.skeleton)).find(Boolean);
  if (executed) {
    return blockedSql(executed);
  }
  if (scan.statements.length === 1 && isReadOnly(scan.statements[0].skeleton)) {
    return ACCEPTED;
  }
  return blockedSql(mentioned);
}
