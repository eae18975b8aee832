/**
 * Address helpers for the free-form sender/recipient strings a .msg
 * container exposes.
 */

import addressparser from 'nodemailer/lib/addressparser';

export interface NameAndAddress {
  name: string;
  address: string;
}

const NAME_SPECIALS = /[,;<>"@()[\]:\\]/;

/**
 * `Name <addr>`, with the name quoted when it holds characters that would
 * otherwise split or end the entry (`"Smith, John" <john@example.com>`).
 */
export function formatMailbox(name: string, address: string): string {
  const displayName = NAME_SPECIALS.test(name) ? `"${name.replace(/(["\\])/g, '\\$1')}"` : name;
  return `${displayName} <${address}>`;
}

/**
 * Split a single `Name <addr>` / `addr` entry. Address is empty when the
 * entry carries none. An unquoted `Last, First <addr>` parses as two
 * entries; the one holding the address wins.
 */
export function parseAddress(entry: string): NameAndAddress {
  const trimmed = entry.trim();
  if (!trimmed) {
    return { name: '', address: '' };
  }

  const match = addressparser(trimmed, { flatten: true }).find((candidate) => candidate.address.includes('@'));
  if (!match) {
    return { name: '', address: '' };
  }

  return { name: match.name.trim(), address: match.address.trim() };
}

/**
 * Render one entry canonically: `Name <addr>`, bare `addr`, or the entry
 * itself when no address can be found in it.
 */
export function formatAddress(entry: string): string {
  const { name, address } = parseAddress(entry);
  if (name && address) {
    return formatMailbox(name, address);
  }
  return address || entry.trim();
}

/**
 * Format a semicolon-separated recipient string.
 *
 * @example
 * formatRecipientList('Jane Doe <jane@example.com>;  bob@example.com;')
 * // 'Jane Doe <jane@example.com>; bob@example.com'
 */
export function formatRecipientList(recipients: string | null | undefined): string {
  if (!recipients) {
    return '';
  }

  return recipients
    .split(';')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map(formatAddress)
    .join('; ');
}
