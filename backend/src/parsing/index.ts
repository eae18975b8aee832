/**
 * Parsing Module - Export Index
 * Container reading and the per-field resolvers used by the orchestrator.
 */

export { MsgContainerReader, MsgContainerReaderOptions } from './MsgContainerReader';
export { validateContainerFile, ContainerFileInfo } from './containerValidation';
export { resolveSender, ResolvedSender, UNKNOWN_SENDER } from './SenderResolver';
export { DateResolver, ResolvedDate, formatDisplayDate, parseTimestamp } from './DateResolver';
export { DirectionClassifier } from './DirectionClassifier';
export { BodyRenderer, RenderedBody } from './BodyRenderer';
export { HtmlToTextConverter } from './HtmlToTextConverter';
export { formatMailbox, formatRecipientList, parseAddress } from './addresses';

export {
  RawAttachment,
  MailContainer,
  ContainerReader,
  BodyContentMode,
  BODY_CONTENT_MODES,
  EmailDirection,
  AttachmentFileType,
  AttachmentRecord,
  ImageAttachmentRecord,
  DocumentAttachmentRecord,
  ParsedEmail,
  ParseFailure,
  ParseResult,
  ParseOptions,
  isParseFailure,
} from './types';
