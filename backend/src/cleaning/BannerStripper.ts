/**
 * Banner Stripper
 * Removes the mail gateway's external-sender banners and Outlook's
 * auto-linked `<https://...>` artifacts from plain text.
 */

import {
  EXTERNAL_WARNING_BANNER,
  EXTERNAL_WARNING_BANNER_LEAD,
  FIRST_CONTACT_BANNER_END,
  FIRST_CONTACT_BANNER_PATTERN,
  FIRST_CONTACT_BANNER_START,
} from '../config/parsing';

const BANNER_LEAD_LOWER = EXTERNAL_WARNING_BANNER_LEAD.toLowerCase();
const FIRST_CONTACT_START_LOWER = FIRST_CONTACT_BANNER_START.toLowerCase();
const FIRST_CONTACT_END_LOWER = FIRST_CONTACT_BANNER_END.toLowerCase();

const ANGLE_BRACKET_LINK = /<https?:\/\/[^>]+>/g;

/**
 * Drop every line carrying a known banner. Other lines pass through untouched.
 */
export function removeBanners(text: string | null | undefined): string {
  if (!text) {
    return '';
  }

  return text
    .split(/\r\n|\r|\n/)
    .filter((line) => {
      const lower = line.toLowerCase();
      if (lower.includes(BANNER_LEAD_LOWER)) {
        return false;
      }
      return !(lower.includes(FIRST_CONTACT_START_LOWER) && lower.includes(FIRST_CONTACT_END_LOWER));
    })
    .join('\n');
}

/**
 * Remove `<http://...>` / `<https://...>` substrings. Bracketed email
 * addresses are left alone.
 */
export function removeAngleBracketLinks(text: string | null | undefined): string {
  if (!text) {
    return '';
  }
  return text.replace(ANGLE_BRACKET_LINK, '');
}

/**
 * True when the opening `scanChars` characters carry the full external
 * warning banner or the first-contact safety tip.
 */
export function hasExternalWarningBanner(text: string | null | undefined, scanChars = 400): boolean {
  if (!text) {
    return false;
  }

  const bodyStart = text.slice(0, scanChars);
  if (bodyStart.includes(EXTERNAL_WARNING_BANNER)) {
    return true;
  }
  return FIRST_CONTACT_BANNER_PATTERN.test(bodyStart);
}
