// Path: src/lib/onepassword/types.ts
// Shapes of the 1Password CLI's JSON output, with runtime guards

import { InvalidFormatError } from '../../utils/error.js';

/**
 * Entry of `op item list --format json`
 */
export interface ItemSummary {
  id: string;
  title: string;
}

export interface FieldSection {
  id: string;
  label?: string;
}

/**
 * Field of `op item get --format json`
 */
export interface NoteField {
  id: string;
  label: string;
  type: string;
  /** `NOTES` for the built-in notes field */
  purpose?: string;
  value?: string;
  section?: FieldSection;
}

export interface SecureNote {
  id: string;
  title: string;
  fields: NoteField[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function parseSection(value: unknown): FieldSection | undefined {
  if (!isRecord(value) || typeof value.id !== 'string') {
    return undefined;
  }
  return { id: value.id, label: optionalString(value.label) };
}

function parseField(value: unknown): NoteField | null {
  if (!isRecord(value) || typeof value.id !== 'string') {
    return null;
  }
  return {
    id: value.id,
    label: optionalString(value.label) ?? '',
    type: optionalString(value.type) ?? 'STRING',
    purpose: optionalString(value.purpose),
    value: optionalString(value.value),
    section: parseSection(value.section),
  };
}

function parseJson(raw: string, what: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    throw new InvalidFormatError(`1Password CLI returned invalid JSON for ${what}`);
  }
}

/**
 * Parse the output of `op item list --format json`.
 * An empty output means no items.
 */
export function parseItemSummaries(raw: string): ItemSummary[] {
  if (!raw.trim()) {
    return [];
  }

  const parsed = parseJson(raw, 'item list');
  if (!Array.isArray(parsed)) {
    throw new InvalidFormatError('1Password CLI returned an unexpected item list');
  }

  const items: ItemSummary[] = [];
  for (const entry of parsed) {
    if (isRecord(entry) && typeof entry.id === 'string' && typeof entry.title === 'string') {
      items.push({ id: entry.id, title: entry.title });
    }
  }
  return items;
}

/**
 * Parse the output of `op item get <id> --format json`.
 */
export function parseSecureNote(raw: string): SecureNote {
  const parsed = parseJson(raw, 'item');
  if (!isRecord(parsed) || typeof parsed.id !== 'string') {
    throw new InvalidFormatError('1Password CLI returned an unexpected item');
  }

  const fields: NoteField[] = [];
  if (Array.isArray(parsed.fields)) {
    for (const entry of parsed.fields) {
      const field = parseField(entry);
      if (field) fields.push(field);
    }
  }

  return {
    id: parsed.id,
    title: optionalString(parsed.title) ?? '',
    fields,
  };
}
