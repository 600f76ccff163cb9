/**
 * Hazard Relay: Type Exports
 */

export type {
  Alert,
  FeedKind,
  SourceDescriptor,
  SentState,
} from './alert';
export {
  AlertSchema,
  FeedKindSchema,
  SourceDescriptorSchema,
  DEFAULT_HEADLINE,
  EMPTY_SENT_STATE,
  isFirstRun,
} from './alert';
