/**
 * Message Parsing Orchestrator
 * Turns one .msg container into a ParsedEmail, or a `{ error }` result.
 *
 * This service:
 * - Opens the container once and always closes it
 * - Resolves sender, date and direction
 * - Renders the body in the requested mode
 * - Extracts attachments unless asked to skip them
 *
 * Only container-open failures and unexpected orchestration failures reach
 * the caller, and only as an error result; nothing is thrown.
 */

import logger from '../../utils/logger';
import { ContainerOpenError, EmailProcessingError, errorMessage } from '../../errors';
import { ParsingConfig, loadParsingConfigFromEnv } from '../../config/parsing';
import { FileOperationsLog, noopFileOperationsLog } from '../../utils/fileOperationsLogger';
import { MsgContainerReader } from '../../parsing/MsgContainerReader';
import { resolveSender } from '../../parsing/SenderResolver';
import { DateResolver } from '../../parsing/DateResolver';
import { DirectionClassifier } from '../../parsing/DirectionClassifier';
import { BodyRenderer } from '../../parsing/BodyRenderer';
import { HtmlToTextConverter } from '../../parsing/HtmlToTextConverter';
import { formatRecipientList } from '../../parsing/addresses';
import {
  AttachmentRecord,
  BodyContentMode,
  ContainerReader,
  MailContainer,
  ParseOptions,
  ParseResult,
  ParsedEmail,
} from '../../parsing/types';
import { AttachmentExtractor } from '../attachments/AttachmentExtractor';
import { ImageResizer } from '../attachments/ImageResizer';
import { ImageCodecLoader, loadSharpCodec } from '../attachments/imageCodec';

// ============================================================================
// Types
// ============================================================================

export interface OrchestratorDependencies {
  reader?: ContainerReader;
  config?: ParsingConfig;
  fileLog?: FileOperationsLog;
  loadCodec?: ImageCodecLoader;
  now?: () => Date;
}

export const UNKNOWN_RECIPIENTS = 'Unknown Recipient(s)';
export const NO_SUBJECT = '(No Subject)';
export const NO_BODY_CONTENT = '(No body content)';

// ============================================================================
// Orchestrator
// ============================================================================

export class MsgParsingOrchestrator {
  private readonly reader: ContainerReader;
  private readonly fileLog: FileOperationsLog;
  private readonly dateResolver: DateResolver;
  private readonly directionClassifier: DirectionClassifier;
  private readonly bodyRenderer: BodyRenderer;
  private readonly htmlConverter = new HtmlToTextConverter();
  private readonly attachmentExtractor: AttachmentExtractor;

  constructor(deps: OrchestratorDependencies = {}) {
    const config = deps.config ?? loadParsingConfigFromEnv();

    this.reader = deps.reader ?? new MsgContainerReader({ maxSizeMb: config.containers.max_size_mb });
    this.fileLog = deps.fileLog ?? noopFileOperationsLog;

    this.dateResolver = new DateResolver({
      localTimeZone: config.dates.local_time_zone,
      displayTimeZone: config.dates.display_time_zone,
      now: deps.now,
    });

    this.directionClassifier = new DirectionClassifier({
      inboxAddress: config.direction.inbox_address,
      bannerScanChars: config.direction.banner_scan_chars,
    });

    this.bodyRenderer = new BodyRenderer({
      snippetMaxLength: config.body.snippet_max_length,
      snippetTruncateAt: config.body.snippet_truncate_at,
      shortLineLength: config.body.short_line_length,
      replySeparatorMinLine: config.body.reply_separator_min_line,
    });

    const resizer = new ImageResizer(
      {
        maxSizeMb: config.images.max_size_mb,
        maxDimension: config.images.max_dimension,
        quality: config.images.quality,
      },
      deps.loadCodec ?? loadSharpCodec
    );

    this.attachmentExtractor = new AttachmentExtractor({
      mediaRoot: config.storage.media_root,
      mediaUrl: config.storage.media_url,
      imageDir: config.storage.image_dir,
      documentDir: config.storage.document_dir,
      resizer,
      fileLog: this.fileLog,
      now: deps.now,
    });
  }

  /**
   * Main entry point for parsing a container file.
   */
  async parse(containerPath: string, options: ParseOptions = {}): Promise<ParseResult> {
    const mode = options.body_content_mode ?? 'snippet';
    const skipAttachments = options.skip_attachments ?? false;

    logger.info('Parsing message container', { containerPath, mode, skipAttachments });

    let container: MailContainer;
    try {
      container = await this.reader.open(containerPath);
    } catch (error: unknown) {
      const openError =
        error instanceof ContainerOpenError ? error : ContainerOpenError.fromCause(containerPath, error);
      logger.error('Failed to open message container', {
        containerPath,
        error: openError.toJSON(),
      });
      this.fileLog.logError('PARSE', containerPath, openError.message);
      return { error: `Failed to open/parse container: ${openError.message}` };
    }

    try {
      const parsed = await this.buildParsedEmail(container, mode, skipAttachments);

      logger.info('Message container parsed', {
        containerPath,
        direction: parsed.direction,
        isHtml: parsed.is_html,
        bodyLength: parsed.body_content.length,
        attachmentsExtracted: parsed.image_attachments.length,
      });

      return parsed;
    } catch (error: unknown) {
      const processingError = new EmailProcessingError(errorMessage(error), containerPath, {
        cause: error instanceof Error ? error : undefined,
      });
      logger.error('Error processing message container', {
        containerPath,
        error: processingError.toJSON(),
      });
      this.fileLog.logError('PARSE', containerPath, processingError.message);
      return { error: `General error processing container: ${processingError.message}` };
    } finally {
      this.closeContainer(container, containerPath);
    }
  }

  private async buildParsedEmail(
    container: MailContainer,
    mode: BodyContentMode,
    skipAttachments: boolean
  ): Promise<ParsedEmail> {
    const sender = resolveSender(container);
    const date = this.dateResolver.resolve(container);

    let plainText: string | undefined;
    const getPlainText = (): string => {
      if (plainText === undefined) {
        plainText = container.plainBody || this.htmlConverter.convert(container.htmlBody);
      }
      return plainText;
    };

    const direction = this.directionClassifier.classify(container, getPlainText);

    const body = this.bodyRenderer.render(mode, {
      plainText: getPlainText(),
      htmlBody: container.htmlBody,
    });

    const attachments = await this.extractAttachments(container, skipAttachments);

    return {
      raw_from: sender.raw_from,
      email_from: sender.email_from,
      email_to: formatRecipientList(container.to) || UNKNOWN_RECIPIENTS,
      email_cc: formatRecipientList(container.cc),
      subject: container.subject || NO_SUBJECT,
      email_date: date.email_date,
      email_date_str: date.email_date_str,
      body_content: body.body_content || NO_BODY_CONTENT,
      direction,
      has_attachments: (container.attachments?.length ?? 0) > 0,
      is_html: body.is_html,
      image_attachments: attachments,
    };
  }

  private async extractAttachments(
    container: MailContainer,
    skipAttachments: boolean
  ): Promise<AttachmentRecord[]> {
    if (skipAttachments) {
      logger.info('Skipping attachment processing as requested');
      return [];
    }

    const { records, failures, skipped } = await this.attachmentExtractor.extract(container.attachments);
    if (failures.length > 0 || skipped > 0) {
      logger.info('Attachment extraction finished with omissions', {
        extracted: records.length,
        failed: failures.map((failure) => failure.filename),
        skipped,
      });
    }
    return records;
  }

  private closeContainer(container: MailContainer, containerPath: string): void {
    try {
      container.close();
    } catch (error: unknown) {
      logger.warn('Error closing message container', {
        containerPath,
        error: errorMessage(error),
      });
    }
  }
}

/**
 * Parse a container with default dependencies.
 */
export function parseMsgFile(
  containerPath: string,
  mode: BodyContentMode = 'snippet',
  skipAttachments = false,
  deps: OrchestratorDependencies = {}
): Promise<ParseResult> {
  return new MsgParsingOrchestrator(deps).parse(containerPath, {
    body_content_mode: mode,
    skip_attachments: skipAttachments,
  });
}
