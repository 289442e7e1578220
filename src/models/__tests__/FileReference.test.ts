import { describe, it, expect } from 'vitest';

import { FileReference, findReference, getFileNameFromUrl } from '@/models/FileReference';

describe('FileReference', () => {
  it('should derive the visible name from the URL', () => {
    const ref = new FileReference({ url: 'file:///docs/My%20Passwords.kdbx', location: 'internalDocuments' });

    expect(ref.visibleFileName).toBe('My Passwords.kdbx');
    expect(ref.id).toBe('file:///docs/My%20Passwords.kdbx');
  });

  it('should report errors and backups', () => {
    const backup = new FileReference({ url: 'file:///backup/a.kdbx', location: 'internalBackup' });
    const broken = new FileReference({
      url: 'file:///ext/b.kdbx',
      location: 'external',
      error: new Error('gone'),
    });

    expect(backup.isBackup).toBe(true);
    expect(backup.hasError).toBe(false);
    expect(broken.isBackup).toBe(false);
    expect(broken.hasError).toBe(true);
  });
});

describe('getFileNameFromUrl', () => {
  it('should drop the query and fragment', () => {
    expect(getFileNameFromUrl('https://example.com/share/vault.kdbx?token=test#top')).toBe('vault.kdbx');
  });

  it('should keep malformed escapes as they are', () => {
    expect(getFileNameFromUrl('file:///docs/100%.kdbx')).toBe('100%.kdbx');
  });
});

describe('findReference', () => {
  const work = new FileReference({ url: 'file:///docs/work.kdbx', location: 'internalDocuments' });
  const home = new FileReference({ url: 'file:///docs/home.kdbx', location: 'internalDocuments' });

  it('should match by URL', () => {
    const copy = new FileReference({ url: 'file:///docs/home.kdbx', location: 'internalDocuments' });

    expect(findReference(copy, [work, home], false)).toBe(home);
  });

  it('should fall back to a namesake only when asked', () => {
    const moved = new FileReference({ url: 'file:///inbox/work.kdbx', location: 'internalInbox' });

    expect(findReference(moved, [work, home], false)).toBeUndefined();
    expect(findReference(moved, [work, home], true)).toBe(work);
  });
});
