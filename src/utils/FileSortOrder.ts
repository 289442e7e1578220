import { t } from '@/i18n';
import type { FileReference } from '@/models/FileReference';

/**
 * Sort order options for the file list.
 */
export const FILES_SORT_ORDERS = [
  'noSorting',
  'nameAsc',
  'nameDesc',
  'creationTimeAsc',
  'creationTimeDesc',
  'modificationTimeAsc',
  'modificationTimeDesc',
] as const;

export type FilesSortOrder = typeof FILES_SORT_ORDERS[number];

/**
 * Check whether a stored value is a known sort order.
 */
export function isFilesSortOrder(value: unknown): value is FilesSortOrder {
  return typeof value === 'string' && FILES_SORT_ORDERS.some(order => order === value);
}

/**
 * Get the translated title of a sort order.
 */
export function getFilesSortOrderTitle(order: FilesSortOrder): string {
  return t(`databasePicker.sortOrder.${order}`);
}

/**
 * Get a date as epoch milliseconds, treating missing dates as the epoch.
 */
function getTime(date: Date | undefined): number {
  return date?.getTime() ?? 0;
}

/**
 * Get the name a reference is sorted by: the cached file name, or the visible name.
 */
function getSortName(ref: FileReference): string {
  return ref.info?.fileName ?? ref.visibleFileName;
}

/**
 * Compare two file references for the given order.
 * Returns a negative number when `a` goes first.
 */
export function compareFileReferences(order: FilesSortOrder, a: FileReference, b: FileReference): number {
  switch (order) {
    case 'nameAsc':
      return getSortName(a).localeCompare(getSortName(b), undefined, { sensitivity: 'base' });
    case 'nameDesc':
      return getSortName(b).localeCompare(getSortName(a), undefined, { sensitivity: 'base' });
    case 'creationTimeAsc':
      return getTime(a.info?.creationDate) - getTime(b.info?.creationDate);
    case 'creationTimeDesc':
      return getTime(b.info?.creationDate) - getTime(a.info?.creationDate);
    case 'modificationTimeAsc':
      return getTime(a.info?.modificationDate) - getTime(b.info?.modificationDate);
    case 'modificationTimeDesc':
      return getTime(b.info?.modificationDate) - getTime(a.info?.modificationDate);
    case 'noSorting':
    default:
      return 0;
  }
}

/**
 * Sort file references in place. Array.prototype.sort is stable, so equal items keep their order.
 */
export function sortFileReferences(refs: FileReference[], order: FilesSortOrder): FileReference[] {
  return refs.sort((a, b) => compareFileReferences(order, a, b));
}
