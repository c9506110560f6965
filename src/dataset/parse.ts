/**
 * Dataset parsing.
 * Turns delimited text (header row + question, answer, category, reference,
 * remarks) into an immutable, ordered list of Q&A entries.
 */

import { parse } from 'csv-parse/sync';
import { DatasetError } from '../errors.js';
import type { QAEntry } from '../types/models.js';

export interface ParseOptions {
  /** Field separator. Default: ",". */
  delimiter?: string;
}

/** Column positions, fixed by the sheet layout. */
const COLUMNS = {
  question: 0,
  answer: 1,
  category: 2,
  reference: 3,
  remarks: 4,
} as const;

const MIN_COLUMNS = 2;

export function parseDataset(text: string, options?: ParseOptions): readonly QAEntry[] {
  const records = readRecords(text, options?.delimiter ?? ',');
  const entries: QAEntry[] = [];

  // records[0] is the header row
  for (let i = 1; i < records.length; i++) {
    const cells = records[i].map((cell) => cell.trim());
    // Sheet row, header = 1. A quoted cell spanning lines is still one row.
    const sheetRow = i + 1;

    if (cells.every((cell) => cell === '')) continue;

    if (cells.length < MIN_COLUMNS) {
      throw new DatasetError(
        'MalformedRow',
        `Row ${sheetRow} has ${cells.length} column(s); question and answer are required`,
        sheetRow
      );
    }

    const question = cells[COLUMNS.question];
    const answer = cells[COLUMNS.answer];
    if (!question || !answer) continue;

    entries.push(
      Object.freeze({
        id: entries.length + 1,
        question,
        answer,
        category: optionalCell(cells, COLUMNS.category),
        reference: optionalCell(cells, COLUMNS.reference),
        remarks: optionalCell(cells, COLUMNS.remarks),
      })
    );
  }

  if (entries.length === 0) {
    throw new DatasetError('EmptyDataset', 'The dataset contains no usable question/answer rows');
  }

  return Object.freeze(entries);
}

function readRecords(text: string, delimiter: string): string[][] {
  let parsed: unknown;
  try {
    parsed = parse(text, {
      delimiter,
      bom: true,
      relax_column_count: true,
      skip_empty_lines: false,
    });
  } catch (err) {
    throw new DatasetError(
      'MalformedRow',
      `Dataset is not valid delimited text: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  if (!Array.isArray(parsed)) return [];

  return parsed.map((record: unknown) =>
    Array.isArray(record) ? record.map((cell: unknown) => String(cell ?? '')) : []
  );
}

function optionalCell(cells: string[], index: number): string | null {
  const value = cells[index];
  return value ? value : null;
}
