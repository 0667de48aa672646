/**
 * Entry Index Module
 * Decodes the flat entry list (contents.js) into typed records
 */

import { FormatError } from '../errors';
import { parseJsonDocument } from '../json';
import type { EntryQuery, EntryRecord } from '../types/keychain';

/** Number of positional fields in one entry */
export const ENTRY_ARITY = 8;

/**
 * Positional shape of one raw entry:
 * [id, entryType, title, site, date, unknown1, unknown2, unknown3]
 */
type RawEntry = [string, string, string, string, number, string, number, string];

function isRawEntry(value: unknown): value is RawEntry {
  if (!Array.isArray(value) || value.length !== ENTRY_ARITY) return false;
  const [id, entryType, title, site, date, unknown1, unknown2, unknown3]: unknown[] = value;
  return (
    typeof id === 'string' &&
    typeof entryType === 'string' &&
    typeof title === 'string' &&
    typeof site === 'string' &&
    Number.isInteger(date) &&
    typeof unknown1 === 'string' &&
    Number.isInteger(unknown2) &&
    typeof unknown3 === 'string'
  );
}

function toEntryRecord(raw: RawEntry): EntryRecord {
  const [id, entryType, title, site, date, unknown1, unknown2, unknown3] = raw;
  return Object.freeze({ id, entryType, title, site, date, unknown1, unknown2, unknown3 });
}

/**
 * Decode the entry index
 * Fails atomically: one bad entry rejects the whole document
 * @param raw JSON text or an already parsed value
 */
export function parseEntries(raw: string | unknown): readonly EntryRecord[] {
  const document = typeof raw === 'string' ? parseJsonDocument(raw, 'Entry index') : raw;

  if (!Array.isArray(document)) {
    throw new FormatError('MalformedDocument', 'Entry index must be a JSON array');
  }

  const entries: EntryRecord[] = [];
  document.forEach((value: unknown, index: number) => {
    if (!isRawEntry(value)) {
      throw new FormatError('MalformedEntry', `Malformed entry at index ${index}`, { index });
    }
    entries.push(toEntryRecord(value));
  });

  return Object.freeze(entries);
}

/**
 * Filter decoded entries by type and by a title/site substring
 */
export function findEntries(entries: readonly EntryRecord[], query: EntryQuery): EntryRecord[] {
  const text = query.text?.trim().toLowerCase();
  return entries.filter(entry => {
    if (query.entryType !== undefined && entry.entryType !== query.entryType) return false;
    if (!text) return true;
    return entry.title.toLowerCase().includes(text) || entry.site.toLowerCase().includes(text);
  });
}
