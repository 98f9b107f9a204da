import { GenerationError } from './errors';

/**
 * Read-only SQL guard for model-written queries:
 * - Only allow SELECT / WITH
 * - Disallow multiple statements
 * - Block write / DDL / admin keywords
 */
export function assertReadOnlySql(sql: string) {
  if (!sql || !sql.trim()) throw new GenerationError('SQL is empty');

  // Checks run on the SQL with comments and quoted text blanked out
  const trimmed = maskLiterals(sql).trim();

  // Allow a single trailing semicolon
  const noTrailing = trimmed.endsWith(';') ? trimmed.slice(0, -1) : trimmed;
  if (noTrailing.includes(';')) {
    throw new GenerationError('Multiple SQL statements are not allowed');
  }

  const lower = noTrailing.toLowerCase();

  if (!(/^select\b/.test(lower) || /^with\b/.test(lower))) {
    throw new GenerationError('Only SELECT/WITH queries are allowed');
  }

  const forbiddenWords = [
    'insert',
    'into',
    'update',
    'delete',
    'merge',
    'drop',
    'alter',
    'truncate',
    'create',
    'grant',
    'revoke',
    'vacuum',
    'analyze',
    'refresh',
    'copy',
    'call',
    'execute',
    'listen',
    'notify',
  ];

  for (const kw of forbiddenWords) {
    const re = new RegExp(`\\b${kw}\\b`, 'i');
    if (re.test(noTrailing)) {
      throw new GenerationError(`Forbidden keyword in SQL: ${kw}`);
    }
  }

  const forbiddenSnippets = [
    'pg_read_file',
    'pg_write_file',
    'pg_execute_server_program',
  ];
  for (const s of forbiddenSnippets) {
    if (lower.includes(s)) {
      throw new GenerationError(`Forbidden keyword in SQL: ${s}`);
    }
  }

  // SET/RESET/DO used as statements; "offset" and "deleted_at" do not match
  if (/\b(set|reset|do)\b\s+/i.test(noTrailing)) {
    throw new GenerationError('Forbidden keyword in SQL: set/reset/do');
  }
}

/**
 * Pulls the query out of a model reply: drops code fences, a leading
 * "SQL:" or "Query:" label and the trailing semicolon.
 */
export function extractSql(reply: string): string {
  let sql = reply.trim();

  const fenced = sql.match(/```(?:sql)?\s*([\s\S]*?)```/i);
  if (fenced) sql = fenced[1].trim();

  sql = sql.replace(/^(?:sql|query)\s*:\s*/i, '');
  return sql.trim().replace(/;+\s*$/, '').trim();
}

const DOLLAR_TAG = /^\$(?:[A-Za-z_][A-Za-z0-9_]*)?\$/;

function isIdentChar(ch: string | undefined) {
  return ch !== undefined && /[A-Za-z0-9_$]/.test(ch);
}

/**
 * Replaces comments with a space and the body of every quoted literal,
 * quoted identifier and dollar-quoted string with nothing, so that
 * statement separators and keywords are only seen where Postgres sees them.
 */
export function maskLiterals(sql: string): string {
  let out = '';
  let i = 0;

  while (i < sql.length) {
    const ch = sql[i];
    const next = sql[i + 1];

    if (ch === '-' && next === '-') {
      const end = sql.indexOf('\n', i);
      i = end === -1 ? sql.length : end;
      out += ' ';
      continue;
    }

    if (ch === '/' && next === '*') {
      const end = sql.indexOf('*/', i + 2);
      if (end === -1) throw new GenerationError('Unterminated comment in SQL');
      i = end + 2;
      out += ' ';
      continue;
    }

    if (ch === "'" || ch === '"') {
      // E'...' honours backslash escapes, which this scan does not follow
      if (ch === "'" && /[eE]/.test(sql[i - 1] ?? '') && !isIdentChar(sql[i - 2])) {
        throw new GenerationError('Escape string literals are not allowed');
      }
      let end = sql.indexOf(ch, i + 1);
      while (end !== -1 && sql[end + 1] === ch) {
        end = sql.indexOf(ch, end + 2);
      }
      if (end === -1) throw new GenerationError('Unterminated quoted text in SQL');
      i = end + 1;
      out += ch + ch;
      continue;
    }

    if (ch === '$' && !isIdentChar(sql[i - 1])) {
      const tag = DOLLAR_TAG.exec(sql.slice(i));
      if (tag) {
        const end = sql.indexOf(tag[0], i + tag[0].length);
        if (end === -1) throw new GenerationError('Unterminated quoted text in SQL');
        i = end + tag[0].length;
        out += "''";
        continue;
      }
    }

    out += ch;
    i++;
  }

  return out;
}
