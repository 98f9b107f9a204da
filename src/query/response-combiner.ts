import type {
  AnswerSide,
  Classification,
  CombinedResponse,
  DocumentResult,
  HalfFailure,
  StructuredResult,
} from './types';

const SIDE_LABELS: Record<AnswerSide, string> = {
  structured: 'structured data',
  document: 'document',
};

export const DEFAULT_MAX_ROWS = 20;

function formatCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  let text: string;
  if (value instanceof Date) text = value.toISOString();
  else if (typeof value === 'object') text = JSON.stringify(value);
  else text = String(value);
  return text.replace(/\r?\n/g, ' ').replace(/\|/g, '\\|');
}

export function renderRows(
  result: StructuredResult,
  maxRows = DEFAULT_MAX_ROWS,
): string {
  const total = result.rows.length;
  if (!total) return 'The query returned no rows.';

  const columns = result.columns.length
    ? result.columns
    : Object.keys(result.rows[0]);

  const lines = [
    `Found ${total} ${total === 1 ? 'row' : 'rows'}.`,
    '',
    `| ${columns.map(formatCell).join(' | ')} |`,
    `| ${columns.map(() => '---').join(' | ')} |`,
  ];
  for (const row of result.rows.slice(0, maxRows)) {
    lines.push(`| ${columns.map((c) => formatCell(row[c])).join(' | ')} |`);
  }

  const hidden = total - maxRows;
  if (hidden > 0) {
    lines.push('', `... and ${hidden} more ${hidden === 1 ? 'row' : 'rows'}`);
  }
  return lines.join('\n');
}

export function failureNote(failure: HalfFailure) {
  return `Note: the ${SIDE_LABELS[failure.side]} half of this answer is unavailable (${failure.error}: ${failure.message}).`;
}

export function combine(
  classification: Classification,
  structured?: StructuredResult,
  document?: DocumentResult,
  failures: HalfFailure[] = [],
  maxRows = DEFAULT_MAX_ROWS,
): CombinedResponse {
  switch (classification.route) {
    case 'STRUCTURED':
      if (!structured) {
        throw new Error('STRUCTURED route requires a structured result');
      }
      return {
        classification,
        structured,
        final_answer: renderRows(structured, maxRows),
        failures: [],
      };

    case 'DOCUMENT':
      if (!document) {
        throw new Error('DOCUMENT route requires a document result');
      }
      return {
        classification,
        document,
        final_answer: document.answer,
        failures: [],
      };

    case 'BOTH': {
      // Juxtaposed only; the two sources are not reconciled.
      const sections: string[] = [];
      if (structured) {
        sections.push(`## Structured data\n\n${renderRows(structured, maxRows)}`);
      }
      if (document) {
        sections.push(`## Documents\n\n${document.answer}`);
      }

      const parts = [sections.join('\n\n---\n\n'), ...failures.map(failureNote)];
      return {
        classification,
        ...(structured ? { structured } : {}),
        ...(document ? { document } : {}),
        final_answer: parts.filter(Boolean).join('\n\n'),
        failures,
      };
    }
  }
}
