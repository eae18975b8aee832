/**
 * Latest Message Extractor
 * Keeps only the newest message of a reply chain: everything above the
 * first quoted-header line or `>`-quoted line.
 */

import logger from '../utils/logger';
import { HtmlToTextConverter } from '../parsing/HtmlToTextConverter';

const PREVIOUS_MESSAGE_MARKERS: readonly RegExp[] = [
  /From:\s+\w+/i,
  /Sent:\s+.+/i,
  /To:\s+.+/i,
  /Subject:\s+.+/i,
  /On\s+.+wrote:/i,
  /On\s+.+said:/i,
  /_{10,}/,
  /-{5,}Original Message-{5,}/i,
  /-{3,}\s*Original Message\s*-{3,}/i,
];

const FALLBACK_SEPARATORS: readonly string[] = ['From:', 'Sent:', '-----Original', '--- Original'];

/** Below this the extraction is considered to have found nothing useful. */
const MIN_USEFUL_LENGTH = 50;
const MIN_RESULT_LENGTH = 10;
const FALLBACK_BODY_LENGTH = 100;

const htmlConverter = new HtmlToTextConverter();

function looksLikeHtml(body: string): boolean {
  return body.includes('<') && body.includes('>');
}

function takeLatestLines(text: string): string {
  const latest: string[] = [];

  for (const line of text.split('\n')) {
    const stripped = line.trim();
    if (latest.length === 0 && !stripped) {
      continue;
    }
    if (PREVIOUS_MESSAGE_MARKERS.some((marker) => marker.test(stripped)) || stripped.startsWith('>')) {
      break;
    }
    latest.push(line);
  }

  return latest
    .join('\n')
    .trim()
    .replace(/\n\s*\n\s*\n+/g, '\n\n')
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n')
    .replace(/&[a-zA-Z0-9#]+;/g, '')
    .trim();
}

/**
 * Newest message of a conversation body (plain text or HTML). Falls back
 * to the whole body, as text, when too little survives.
 */
export function extractLatestEmailFromConversation(emailBody: string | null | undefined): string {
  if (!emailBody) {
    return '';
  }

  const text = looksLikeHtml(emailBody) ? htmlConverter.convert(emailBody) : emailBody;
  let latest = takeLatestLines(text);

  if (latest.length < MIN_USEFUL_LENGTH && text.length > FALLBACK_BODY_LENGTH) {
    for (const separator of FALLBACK_SEPARATORS) {
      const index = text.indexOf(separator);
      if (index === -1) {
        continue;
      }
      const before = text.slice(0, index).trim();
      if (before.length > MIN_USEFUL_LENGTH) {
        latest = before;
        break;
      }
    }
  }

  const result = latest.length > MIN_RESULT_LENGTH ? latest : text;
  logger.debug('Extracted latest message from conversation', {
    inputLength: emailBody.length,
    resultLength: result.length,
  });
  return result;
}
