/**
 * Processing Module
 * Exports message container parsing orchestration.
 */

export {
  MsgParsingOrchestrator,
  OrchestratorDependencies,
  parseMsgFile,
  UNKNOWN_RECIPIENTS,
  NO_SUBJECT,
  NO_BODY_CONTENT,
} from './MsgParsingOrchestrator';
