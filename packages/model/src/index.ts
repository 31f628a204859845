export type {
  CurationReport,
  HeadingCount,
  SemanticReport,
  StructureReport,
  TextQualityReport,
} from './curation-report';
export type { CurationJob, CurationJobStatus } from './curation-job';
export type { CurationRecord, CurationRecordStore } from './curation-record';
export type { MarkdownSource, ParsedDocument } from './parsed-document';
export type {
  ComponentUsageReport,
  ModelUsageDetail,
  PhaseUsageReport,
  TokenUsageReport,
  TokenUsageSummary,
} from './token-usage-report';
