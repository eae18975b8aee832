/**
 * Enquiry references are `MEM-{yy}-{nnnn}`, numbered per two-digit year.
 */

export const REFERENCE_PREFIX = 'MEM';

export function referenceYear(date: Date): number {
  return date.getUTCFullYear() % 100;
}

export function formatEnquiryReference(year: number, sequence: number): string {
  return `${REFERENCE_PREFIX}-${String(year).padStart(2, '0')}-${String(sequence).padStart(4, '0')}`;
}
