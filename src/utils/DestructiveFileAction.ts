import { t } from '@/i18n';
import type { FileLocation } from '@/models/FileReference';

/**
 * What eliminating a file does: delete files the app owns, remove the reference to anything else.
 */
export type DestructiveFileActionKind = 'delete' | 'remove';

export interface DestructiveFileAction {
  kind: DestructiveFileActionKind;
  title: string;
}

/**
 * Get the destructive action that applies to a file in the given location.
 */
export function getDestructiveFileAction(location: FileLocation): DestructiveFileAction {
  switch (location) {
    case 'internalDocuments':
    case 'internalBackup':
    case 'internalInbox':
      return { kind: 'delete', title: t('actions.delete') };
    case 'external':
    case 'remote':
      return { kind: 'remove', title: t('actions.remove') };
  }
}
