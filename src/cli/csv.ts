import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { InputError, describeError } from '../errors.js';
import type { ExtraInfo, ThreatRecord } from '../types/index.js';

const rowsSchema = z.array(z.array(z.string()));

const FIELD_ALIASES = new Map<string, 'file_path' | 'sha256' | 'description'>([
  ['file_path', 'file_path'],
  ['path', 'file_path'],
  ['sha256', 'sha256'],
  ['hash', 'sha256'],
  ['description', 'description']
]);

/**
 * Parses a threat CSV. The first column is the threat id whatever its header
 * says; known headers fill the named fields and every other non-empty cell
 * lands in additional_info under its header.
 */
export function parseThreatCsv(content: string): ThreatRecord[] {
  let raw: unknown;
  try {
    raw = parse(content, { bom: true, trim: true, skip_empty_lines: true, relax_column_count: true });
  } catch (error) {
    throw new InputError(`Invalid CSV: ${describeError(error)}`, { cause: error });
  }

  const parsed = rowsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InputError('Invalid CSV: unexpected row shape');
  }

  const [header, ...rows] = parsed.data;
  if (!header) return [];

  const columns = header.map(name => name.trim());

  return rows.map((row, i) => {
    const threatId = row[0] ?? '';
    if (threatId.length === 0) {
      // +2: one for the header, one for 1-based numbering
      throw new InputError(`Row ${i + 2}: missing threat id`);
    }

    const fields: { file_path?: string; sha256?: string; description?: string } = {};
    const extra: ExtraInfo = {};

    row.slice(1).forEach((cell, offset) => {
      if (cell.length === 0) return;
      const column = columns[offset + 1] || `column_${offset + 2}`;
      const field = FIELD_ALIASES.get(column.toLowerCase());
      if (field) {
        fields[field] = cell;
      } else {
        extra[column] = cell;
      }
    });

    const threat: ThreatRecord = {
      threat_id: threatId,
      ...fields,
      ...(Object.keys(extra).length > 0 ? { additional_info: extra } : {})
    };
    return threat;
  });
}
