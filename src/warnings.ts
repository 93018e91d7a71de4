import { WARNING_TYPES } from './types';
import type { WarningEntries, WarningMap, WarningType } from './types';

/**
 * Type guard for keys read back from storage or parsed input.
 */
export function isWarningType(value: string): value is WarningType {
  return WARNING_TYPES.some((type) => type === value);
}

/**
 * Returns the warning types present in a map, in insertion order.
 * Object.keys() loses the key type, so this narrows it back.
 */
export function warningTypes(map: WarningMap): WarningType[] {
  return Object.keys(map).filter(isWarningType);
}

/**
 * Appends one check's entries to a page's WarningMap (mutates `into`).
 * @param into - The page's accumulated warnings.
 * @param entries - At most one evidence array per type, as produced by a check.
 */
export function mergeWarnings(into: WarningMap, entries: WarningEntries): void {
  for (const type of Object.keys(entries).filter(isWarningType)) {
    const evidence = entries[type];
    if (!evidence) continue;
    (into[type] ??= []).push(evidence);
  }
}

/**
 * Merges per-page maps into one crawl-wide map.
 * Evidence of the same type is concatenated in the order the pages are given.
 */
export function flattenWarnings(pageMaps: WarningMap[]): WarningMap {
  const all: WarningMap = {};
  for (const map of pageMaps) {
    for (const type of warningTypes(map)) {
      const evidence = map[type] ?? [];
      (all[type] ??= []).push(...evidence.map((e) => [...e]));
    }
  }
  return all;
}

/**
 * Splits a crawl-wide map back into per-page maps using each evidence array's
 * first element (the page URL).
 */
export function splitWarningsByPage(map: WarningMap): Map<string, WarningMap> {
  const byPage = new Map<string, WarningMap>();
  for (const type of warningTypes(map)) {
    for (const evidence of map[type] ?? []) {
      const [pageUrl] = evidence;
      if (pageUrl === undefined) continue;
      let pageMap = byPage.get(pageUrl);
      if (!pageMap) {
        pageMap = {};
        byPage.set(pageUrl, pageMap);
      }
      (pageMap[type] ??= []).push([...evidence]);
    }
  }
  return byPage;
}

/** Total number of warning occurrences in a map. */
export function countWarnings(map: WarningMap): number {
  return warningTypes(map).reduce((sum, type) => sum + (map[type]?.length ?? 0), 0);
}
