/**
 * Unit Tests for attachment file naming
 */

import {
  buildBucketedPath,
  dateBucket,
  generateSavedFilename,
  getExtension,
  resolveAttachmentFilename,
} from '../../utils/fileNaming';

describe('fileNaming', () => {
  it('prefers the long filename', () => {
    expect(resolveAttachmentFilename({ longFilename: ' Site Photo.JPG ', shortFilename: 'SITEPH~1.JPG' })).toBe(
      'Site Photo.JPG'
    );
    expect(resolveAttachmentFilename({ longFilename: '', shortFilename: 'SITEPH~1.JPG' })).toBe('SITEPH~1.JPG');
    expect(resolveAttachmentFilename({})).toBe('unknown');
  });

  it('lower-cases extensions', () => {
    expect(getExtension('Report.PDF')).toBe('.pdf');
    expect(getExtension('archive.tar.gz')).toBe('.gz');
    expect(getExtension('README')).toBe('');
  });

  it('generates unique uuid names', () => {
    const first = generateSavedFilename('.png');
    const second = generateSavedFilename('.png');

    expect(first).toMatch(/^[0-9a-f-]{36}\.png$/);
    expect(first).not.toBe(second);
  });

  it('buckets by UTC date with forward slashes', () => {
    const date = new Date('2024-06-05T23:30:00Z');

    expect(dateBucket(date)).toEqual(['2024', '06', '05']);
    expect(buildBucketedPath('enquiry_attachments/documents', 'a.pdf', date)).toBe(
      'enquiry_attachments/documents/2024/06/05/a.pdf'
    );
  });
});
