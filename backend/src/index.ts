/**
 * Enquiry mail ingestion
 * Public entry points for parsing .msg containers, prefilling enquiry
 * forms and creating enquiries.
 */

export {
  MsgParsingOrchestrator,
  OrchestratorDependencies,
  parseMsgFile,
  UNKNOWN_RECIPIENTS,
  NO_SUBJECT,
  NO_BODY_CONTENT,
} from './services/processing';

export {
  createEnquiryFromEmail,
  EnquiryFromEmailDependencies,
  EnquiryFromEmailResult,
} from './services/enquiryFromEmail';
export {
  processEmailForFormPopulation,
  processEmailForHistory,
  FormPopulationResult,
  EnquiryFormData,
  HistoryEmailData,
  MemberInfo,
} from './services/emailFormData';
export { extractLatestEmailFromConversation } from './cleaning/LatestMessageExtractor';

export * from './parsing';
export * from './repositories';
export * from './errors';

export { config } from './config';
export { closePool } from './db';
export {
  ParsingConfig,
  ParsingConfigOverrides,
  DEFAULT_PARSING_CONFIG,
  getParsingConfig,
  loadParsingConfigFromEnv,
} from './config/parsing';
export {
  FileOperationsLog,
  FileOperationsLogger,
  createFileOperationsLogger,
  noopFileOperationsLog,
} from './utils/fileOperationsLogger';
export { AttachmentExtractor, ExtractionResult } from './services/attachments/AttachmentExtractor';
export { ImageResizer, ResizeResult } from './services/attachments/ImageResizer';
export { ImageCodec, SharpImageCodec } from './services/attachments/imageCodec';
