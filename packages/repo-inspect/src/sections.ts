/**
 * Section filter shared by collection and rendering.
 */

import { SECTION_NAMES, type SectionName } from './types.js';

/**
 * An empty filter includes everything; otherwise the section must appear
 * in the filter verbatim (case-sensitive, no trimming).
 */
export function isSectionIncluded(filter: readonly string[], section: string): boolean {
  if (filter.length === 0) {
    return true;
  }
  return filter.includes(section);
}

/**
 * Split comma-separated --sections values. The flag may be given more than
 * once, so values from every occurrence are concatenated.
 */
export function parseSectionList(values: readonly string[]): string[] {
  const sections: string[] = [];
  for (const value of values) {
    for (const part of value.split(',')) {
      const trimmed = part.trim();
      if (trimmed.length > 0) {
        sections.push(trimmed);
      }
    }
  }
  return sections;
}

export function isSectionName(value: string): value is SectionName {
  return SECTION_NAMES.some((name) => name === value);
}

/** Filter entries that can never match a section */
export function unknownSections(filter: readonly string[]): string[] {
  return filter.filter((section) => !isSectionName(section));
}
