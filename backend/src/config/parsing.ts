/**
 * Parsing Configuration
 * Heuristic constants for .msg body rendering, direction detection and
 * attachment handling.
 *
 * The thresholds and word lists were tuned against real council mailboxes.
 * They are heuristics with known false positives and negatives, not a
 * grammar: change them only with fresh mailbox samples to test against.
 */

import { config } from './index';

/** Injected by the mail gateway on every message from outside the organisation. */
export const EXTERNAL_WARNING_BANNER =
  'WARNING: This email came from outside of the organisation. Do not provide login or password details. Always be cautious opening links and attachments wherever the email appears to come from. If you have any doubts about this email, contact ICT.';

/** First sentence of EXTERNAL_WARNING_BANNER; enough to identify the banner line. */
export const EXTERNAL_WARNING_BANNER_LEAD =
  'WARNING: This email came from outside of the organisation.';

/** Outlook "first contact" safety tip, start and end fragments. */
export const FIRST_CONTACT_BANNER_START = "You don't often get email from";
export const FIRST_CONTACT_BANNER_END = 'Learn why this is important';

export const FIRST_CONTACT_BANNER_PATTERN =
  /You don't often get email from [\s\S]+?\. Learn why this is important\./i;

export const CLOSING_WORDS: readonly string[] = ['thanks', 'Thanks', 'regards', 'Regards'];
export const SIGNATURE_KEYWORDS: readonly string[] = ['Team', 'Department', 'Officer'];
export const SIGNATURE_NAME_PATTERN = /^[A-Z][a-z]+ [A-Z][a-z]+$/;
export const TERMINAL_PUNCTUATION: readonly string[] = ['.', '!', '?', ':', ';'];

export const IMAGE_EXTENSIONS: readonly string[] = [
  '.jpg',
  '.jpeg',
  '.png',
  '.gif',
  '.bmp',
  '.webp',
  '.tiff',
  '.tif',
];

export const DOCUMENT_EXTENSIONS: readonly string[] = ['.pdf', '.doc', '.docx'];

/** File types accepted as message containers. */
export const CONTAINER_EXTENSIONS: readonly string[] = ['.eml', '.msg'];

/** Compound File Binary (OLE2) header every .msg file starts with. */
export const OLE_SIGNATURE = Buffer.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]);

export interface ParsingConfig {
  direction: {
    inbox_address: string;
    banner_scan_chars: number;
  };
  body: {
    short_line_length: number;
    snippet_max_length: number;
    snippet_truncate_at: number;
    reply_separator_min_line: number;
  };
  dates: {
    local_time_zone: string;
    display_time_zone: string;
  };
  containers: {
    max_size_mb: number;
  };
  images: {
    max_size_mb: number;
    max_dimension: number;
    quality: number;
  };
  storage: {
    media_root: string;
    media_url: string;
    image_dir: string;
    document_dir: string;
  };
}

export const DEFAULT_PARSING_CONFIG: ParsingConfig = {
  direction: {
    inbox_address: 'memberenquiries@redcar-cleveland.gov.uk',
    banner_scan_chars: 400,
  },
  body: {
    short_line_length: 15,
    snippet_max_length: 250,
    snippet_truncate_at: 247,
    reply_separator_min_line: 3,
  },
  dates: {
    local_time_zone: 'Europe/London',
    display_time_zone: 'Europe/London',
  },
  containers: {
    max_size_mb: 50,
  },
  images: {
    max_size_mb: 2,
    max_dimension: 2048,
    quality: 85,
  },
  storage: {
    media_root: './media',
    media_url: '/media/',
    image_dir: 'enquiry_photos',
    document_dir: 'enquiry_attachments/documents',
  },
};

export type ParsingConfigOverrides = {
  [K in keyof ParsingConfig]?: Partial<ParsingConfig[K]>;
};

/**
 * Get parsing config with overrides
 */
export function getParsingConfig(overrides?: ParsingConfigOverrides): ParsingConfig {
  if (!overrides) {
    return DEFAULT_PARSING_CONFIG;
  }

  return {
    direction: {
      ...DEFAULT_PARSING_CONFIG.direction,
      ...(overrides.direction || {}),
    },
    body: {
      ...DEFAULT_PARSING_CONFIG.body,
      ...(overrides.body || {}),
    },
    dates: {
      ...DEFAULT_PARSING_CONFIG.dates,
      ...(overrides.dates || {}),
    },
    containers: {
      ...DEFAULT_PARSING_CONFIG.containers,
      ...(overrides.containers || {}),
    },
    images: {
      ...DEFAULT_PARSING_CONFIG.images,
      ...(overrides.images || {}),
    },
    storage: {
      ...DEFAULT_PARSING_CONFIG.storage,
      ...(overrides.storage || {}),
    },
  };
}

/**
 * Load parsing config from environment
 */
export function loadParsingConfigFromEnv(): ParsingConfig {
  return getParsingConfig({
    direction: {
      inbox_address: config.memberEnquiriesEmail,
    },
    dates: {
      local_time_zone: config.timeZones.local,
      display_time_zone: config.timeZones.display,
    },
    containers: {
      max_size_mb: config.containers.maxSizeMb,
    },
    images: {
      max_size_mb: config.images.maxSizeMb,
      max_dimension: config.images.maxDimension,
      quality: config.images.quality,
    },
    storage: {
      media_root: config.media.root,
      media_url: config.media.url,
    },
  });
}
