/**
 * msgate — Template Languages & Localized Labels
 *
 * Lookup tables live in data/ and are read on first use.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { CompilationError } from './errors.js';
import type { Template } from './types.js';

const TableSchema = z.record(z.string());

type Table = Record<string, string>;

function loadTable(name: string): Table {
  const raw = readFileSync(new URL(`../../data/${name}`, import.meta.url), 'utf-8');
  return TableSchema.parse(JSON.parse(raw));
}

let languages: Table | undefined;
let listButtonLabels: Table | undefined;

// ============================================================================
// TEMPLATE LANGUAGE
// ============================================================================

/**
 * Provider language code for a template. The ISO 639-3 language and the
 * optional country are joined as `lang_CC` before lookup.
 *
 * @throws CompilationError when the pair has no provider mapping.
 */
export function templateLanguageCode(template: Pick<Template, 'language' | 'country'>): string {
  languages ??= loadTable('template-languages.json');

  const key = template.country ? `${template.language}_${template.country}` : template.language;
  const code = Object.hasOwn(languages, key) ? languages[key] : undefined;
  if (code === undefined) {
    throw new CompilationError(`unable to find mapping for language: ${key}`, 'UNKNOWN_LANGUAGE');
  }
  return code;
}

// ============================================================================
// LIST BUTTON
// ============================================================================

export const DEFAULT_LIST_BUTTON = 'Menu';

/** Label of a list message's open button for a BCP 47 language tag. */
export function listButtonLabel(textLanguage: string | undefined): string {
  if (!textLanguage) return DEFAULT_LIST_BUTTON;
  listButtonLabels ??= loadTable('list-button-labels.json');

  return Object.hasOwn(listButtonLabels, textLanguage)
    ? listButtonLabels[textLanguage] ?? DEFAULT_LIST_BUTTON
    : DEFAULT_LIST_BUTTON;
}
